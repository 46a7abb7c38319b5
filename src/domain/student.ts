/**
 * Student Domain Model
 *
 * A student row lives only in the `students` table. The shell never keeps a
 * copy between operations; every listing re-queries.
 */

export interface Student {
  id: number;
  name: string;

  // Unique across all students (enforced by the table constraint)
  email: string;

  // Set by the database on insert, never updated
  createdAt: Date;
}

/**
 * Input type for creating a new student
 */
export interface CreateStudentInput {
  name: string;
  email: string;
}

/**
 * Input type for updating a student.
 * Omitted fields are left unchanged.
 */
export interface UpdateStudentInput {
  name?: string;
  email?: string;
}
