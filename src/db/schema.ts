import { DbConfig } from "../config/dbConfig";
import { StoreResult, success, failure } from "../domain/storeResult";
import { ConnectionFactory, openPgConnection, withConnection } from "./connection";
import { toStoreError } from "./errors";

export const STUDENTS_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS students (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL CHECK (name <> ''),
    email TEXT NOT NULL UNIQUE CHECK (email <> ''),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/**
 * Ensure the students table exists. Safe to run on every start.
 * Callers treat a failure as fatal.
 */
export async function initSchema(
  config: DbConfig,
  factory: ConnectionFactory = openPgConnection
): Promise<StoreResult<void>> {
  try {
    await withConnection(factory, config, async (conn) => {
      await conn.query(STUDENTS_TABLE_DDL);
    });
    return success(undefined);
  } catch (err) {
    return failure(toStoreError(err));
  }
}
