import { ConnectionFactory, DbConnection, QueryRows } from "../db/connection";

type StoredRow = {
  id: number;
  name: string;
  email: string;
  created_at: Date;
};

/**
 * Error shaped like a pg DatabaseError (message plus SQLSTATE code)
 */
export function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function normalize(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * In-process stand-in for the students table.
 *
 * Understands only the statements the store and schema issue, and mimics the
 * Postgres behaviour tests care about: serial ids (consumed even when an
 * insert fails), the unique email constraint, the non-empty checks and
 * row counts for update/delete.
 */
export class FakeStudentDatabase {
  tableCreated = false;
  connectAttempts = 0;
  connectionsEnded = 0;
  readonly statements: string[] = [];

  // Set to make connect(), query() or end() fail
  connectError: Error | null = null;
  queryError: Error | null = null;
  endError: Error | null = null;

  // Drop the socket as a statement is sent, the way pg reports it
  dropConnectionOnQuery = false;

  private rows: StoredRow[] = [];
  private nextId = 1;

  readonly factory: ConnectionFactory = () => this.openConnection();

  get rowCount(): number {
    return this.rows.length;
  }

  private openConnection(): DbConnection {
    let open = false;

    return {
      connect: async () => {
        this.connectAttempts++;
        if (this.connectError) {
          throw this.connectError;
        }
        open = true;
      },
      query: async (text, values) => {
        if (!open) {
          throw new Error("Client is not connected");
        }
        const sql = normalize(text);
        this.statements.push(sql);
        if (this.dropConnectionOnQuery) {
          open = false;
          throw new Error("Connection terminated unexpectedly");
        }
        if (this.queryError) {
          throw this.queryError;
        }
        return this.execute(sql, values ?? []);
      },
      end: async () => {
        open = false;
        this.connectionsEnded++;
        if (this.endError) {
          throw this.endError;
        }
      },
    };
  }

  private execute(sql: string, values: unknown[]): QueryRows {
    if (sql.startsWith("CREATE TABLE IF NOT EXISTS students")) {
      this.tableCreated = true;
      return { rows: [], rowCount: 0 };
    }
    if (sql.startsWith("INSERT INTO students")) {
      return this.insert(values[0], values[1]);
    }
    if (sql.startsWith("SELECT id, name, email, created_at FROM students ORDER BY id")) {
      const rows = [...this.rows].sort((a, b) => a.id - b.id).map((r) => ({ ...r }));
      return { rows, rowCount: rows.length };
    }
    if (sql.startsWith("UPDATE students SET")) {
      return this.update(sql, values);
    }
    if (sql === "DELETE FROM students WHERE id = $1") {
      const before = this.rows.length;
      this.rows = this.rows.filter((r) => r.id !== values[0]);
      return { rows: [], rowCount: before - this.rows.length };
    }
    throw new Error(`FakeStudentDatabase cannot run: ${sql}`);
  }

  private insert(name: unknown, email: unknown): QueryRows {
    const id = this.nextId++;
    const row = {
      id,
      name: this.checkText("name", name),
      email: this.checkText("email", email),
      created_at: new Date(),
    };
    this.checkUniqueEmail(row.email, id);
    this.rows.push(row);
    return { rows: [{ id }], rowCount: 1 };
  }

  private update(sql: string, values: unknown[]): QueryRows {
    const where = /WHERE id = \$(\d+)$/.exec(sql);
    if (!where) {
      throw new Error(`FakeStudentDatabase cannot run: ${sql}`);
    }
    const id = values[parseInt(where[1], 10) - 1];
    const row = this.rows.find((r) => r.id === id);
    if (!row) {
      return { rows: [], rowCount: 0 };
    }

    const changes: Partial<StoredRow> = {};
    for (const [, column, param] of sql.matchAll(/(name|email) = \$(\d+)/g)) {
      const value = this.checkText(column, values[parseInt(param, 10) - 1]);
      if (column === "name") {
        changes.name = value;
      } else {
        this.checkUniqueEmail(value, row.id);
        changes.email = value;
      }
    }
    Object.assign(row, changes);
    return { rows: [], rowCount: 1 };
  }

  private checkText(column: string, value: unknown): string {
    if (value === null || value === undefined) {
      throw pgError(
        "23502",
        `null value in column "${column}" of relation "students" violates not-null constraint`
      );
    }
    const text = String(value);
    if (text === "") {
      throw pgError(
        "23514",
        `new row for relation "students" violates check constraint "students_${column}_check"`
      );
    }
    return text;
  }

  private checkUniqueEmail(email: string, ownerId: number): void {
    if (this.rows.some((r) => r.email === email && r.id !== ownerId)) {
      throw pgError(
        "23505",
        `duplicate key value violates unique constraint "students_email_key"`
      );
    }
  }
}
