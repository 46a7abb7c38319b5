import { DbConfig } from "../config/dbConfig";
import { ConnectionFactory, DbConnection, Row, openPgConnection, withConnection } from "../db/connection";
import { toStoreError } from "../db/errors";
import { Student, CreateStudentInput, UpdateStudentInput } from "../domain/student";
import { StoreResult, success, failure } from "../domain/storeResult";

/**
 * Map a driver row to a Student, rejecting rows of the wrong shape
 */
export function toStudent(row: Row): Student {
  const { id, name, email, created_at } = row;
  if (
    typeof id !== "number" ||
    typeof name !== "string" ||
    typeof email !== "string" ||
    !(created_at instanceof Date)
  ) {
    throw new Error(`Unexpected student row: ${JSON.stringify(row)}`);
  }
  return { id, name, email, createdAt: created_at };
}

/**
 * StudentStore reads and writes the students table.
 * Every call opens its own connection and runs a single statement.
 */
export class StudentStore {
  constructor(
    private readonly config: DbConfig,
    private readonly factory: ConnectionFactory = openPgConnection
  ) {}

  /**
   * Insert a student and return the generated id
   */
  async create(input: CreateStudentInput): Promise<StoreResult<number>> {
    return this.run(async (conn) => {
      const result = await conn.query(
        "INSERT INTO students (name, email) VALUES ($1, $2) RETURNING id",
        [input.name, input.email]
      );
      const id = result.rows[0]?.id;
      if (typeof id !== "number") {
        throw new Error("Insert did not return an id");
      }
      return id;
    });
  }

  /**
   * Get all students, oldest id first
   */
  async list(): Promise<StoreResult<Student[]>> {
    return this.run(async (conn) => {
      const result = await conn.query(
        "SELECT id, name, email, created_at FROM students ORDER BY id"
      );
      return result.rows.map(toStudent);
    });
  }

  /**
   * Update the supplied fields of a student.
   * Returns the number of rows changed (0 if the id doesn't exist).
   */
  async update(id: number, input: UpdateStudentInput): Promise<StoreResult<number>> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    if (input.name !== undefined) {
      values.push(input.name);
      assignments.push(`name = $${values.length}`);
    }
    if (input.email !== undefined) {
      values.push(input.email);
      assignments.push(`email = $${values.length}`);
    }

    if (assignments.length === 0) {
      return success(0);
    }

    values.push(id);
    const sql = `UPDATE students SET ${assignments.join(", ")} WHERE id = $${values.length}`;

    return this.run(async (conn) => {
      const result = await conn.query(sql, values);
      return result.rowCount;
    });
  }

  /**
   * Delete a student.
   * Returns the number of rows removed (0 if the id doesn't exist).
   */
  async delete(id: number): Promise<StoreResult<number>> {
    return this.run(async (conn) => {
      const result = await conn.query("DELETE FROM students WHERE id = $1", [id]);
      return result.rowCount;
    });
  }

  private async run<T>(work: (conn: DbConnection) => Promise<T>): Promise<StoreResult<T>> {
    try {
      return success(await withConnection(this.factory, this.config, work));
    } catch (err) {
      return failure(toStoreError(err));
    }
  }
}
