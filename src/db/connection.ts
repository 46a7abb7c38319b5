import { Client } from "pg";
import { DbConfig } from "../config/dbConfig";

export type Row = Record<string, unknown>;

export interface QueryRows {
  rows: Row[];
  rowCount: number;
}

/**
 * The slice of a database client the stores rely on
 */
export interface DbConnection {
  connect(): Promise<void>;
  query(text: string, values?: unknown[]): Promise<QueryRows>;
  end(): Promise<void>;
}

export type ConnectionFactory = (config: DbConfig) => DbConnection;

/**
 * Raised when a connection cannot be established.
 * Query errors on an open connection are passed through untouched.
 */
export class ConnectionError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "ConnectionError";
  }
}

/**
 * Create a node-postgres client for a single operation
 */
export function openPgConnection(config: DbConfig): DbConnection {
  const client = new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  });

  // pg emits 'error' on the client when the socket drops, on top of rejecting
  // the pending query. Without a listener that event would take the process down.
  let lost: Error | null = null;
  client.on("error", (err: Error) => {
    lost = err;
  });

  return {
    connect: async () => {
      await client.connect();
    },
    query: async (text, values) => {
      try {
        const result = await client.query(text, values);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
      } catch (err) {
        if (lost !== null || isConnectionLoss(err)) {
          throw new ConnectionError(errorMessage(err), err);
        }
        throw err;
      }
    },
    end: async () => {
      await client.end();
    },
  };
}

/**
 * pg reports a socket closed mid-statement as a plain Error without a code
 */
export function isConnectionLoss(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("Connection terminated");
}

/**
 * Open a fresh connection, run `work` with it, and close it on every exit path.
 * Connections are never pooled or reused between operations.
 */
export async function withConnection<T>(
  factory: ConnectionFactory,
  config: DbConfig,
  work: (conn: DbConnection) => Promise<T>
): Promise<T> {
  const conn = factory(config);

  try {
    await conn.connect();
  } catch (err) {
    // A client that never connected has nothing to end
    throw new ConnectionError(
      `Could not connect to ${config.host}:${config.port}/${config.database}: ${errorMessage(err)}`,
      err
    );
  }

  try {
    return await work(conn);
  } finally {
    // The statement has already succeeded or failed; a failed close changes neither
    await conn.end().catch(() => undefined);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
