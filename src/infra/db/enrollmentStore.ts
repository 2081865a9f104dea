import type { PoolClient } from 'pg';
import type { Enrollment } from '../../domain/enrollment/course.js';
import {
  DuplicateEnrollmentError,
  EnrollmentStore,
  EnrollmentWithCourse,
} from '../../application/enrollment/ports.js';

interface EnrollmentRow {
  id: number;
  user_id: string;
  course_id: number;
  enrolled_at: Date;
}

const UNIQUE_VIOLATION = '23505';
const USER_COURSE_CONSTRAINT = 'enrollments_user_course_key';

function isUniqueViolation(error: unknown, constraint: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION &&
    'constraint' in error &&
    error.constraint === constraint
  );
}

function mapEnrollment(row: EnrollmentRow): Enrollment {
  return {
    id: row.id,
    studentId: row.user_id,
    courseId: row.course_id,
    enrolledAt: row.enrolled_at,
  };
}

/**
 * Enrollment reads and writes on a single transaction's connection.
 */
export class PgEnrollmentStore implements EnrollmentStore {
  constructor(private client: PoolClient) {}

  async lockStudent(studentId: string): Promise<void> {
    await this.client.query('SELECT id FROM users WHERE id = $1 FOR UPDATE', [studentId]);
  }

  async countByCourse(courseId: number): Promise<number> {
    const result = await this.client.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM enrollments WHERE course_id = $1',
      [courseId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async countByStudent(studentId: string): Promise<number> {
    const result = await this.client.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM enrollments WHERE user_id = $1',
      [studentId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async existsByStudentAndCourse(studentId: string, courseId: number): Promise<boolean> {
    const result = await this.client.query<{ exists: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM enrollments WHERE user_id = $1 AND course_id = $2
       ) AS exists`,
      [studentId, courseId]
    );
    return result.rows[0]?.exists ?? false;
  }

  async findByIdAndStudent(
    enrollmentId: number,
    studentId: string
  ): Promise<EnrollmentWithCourse | null> {
    const result = await this.client.query<EnrollmentRow & { course_name: string }>(
      `SELECT e.id, e.user_id, e.course_id, e.enrolled_at, c.name AS course_name
       FROM enrollments e
       JOIN courses c ON c.id = e.course_id
       WHERE e.id = $1 AND e.user_id = $2`,
      [enrollmentId, studentId]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      ...mapEnrollment(row),
      courseName: row.course_name,
    };
  }

  async insert(studentId: string, courseId: number): Promise<Enrollment> {
    try {
      const result = await this.client.query<EnrollmentRow>(
        `INSERT INTO enrollments (user_id, course_id)
         VALUES ($1, $2)
         RETURNING id, user_id, course_id, enrolled_at`,
        [studentId, courseId]
      );
      return mapEnrollment(result.rows[0]);
    } catch (error: unknown) {
      if (isUniqueViolation(error, USER_COURSE_CONSTRAINT)) {
        throw new DuplicateEnrollmentError(studentId, courseId);
      }
      throw error;
    }
  }

  async delete(enrollmentId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM enrollments WHERE id = $1', [
      enrollmentId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }
}
