import type { PoolClient, QueryResultRow } from 'pg';
import type { Course } from '../../domain/enrollment/course.js';
import type { CatalogStore, FindCourseOptions } from '../../application/enrollment/ports.js';
import { COURSE_COLUMNS, CourseRow, loadCourses, RowQuery } from './courseRows.js';

/**
 * Catalog reads on a single transaction's connection.
 */
export class PgCatalogStore implements CatalogStore {
  private readonly query: RowQuery;

  constructor(private client: PoolClient) {
    this.query = <R extends QueryResultRow>(text: string, values: unknown[]) =>
      this.client.query<R>(text, values);
  }

  async findCourseWithSlots(
    courseId: number,
    options: FindCourseOptions = {}
  ): Promise<Course | null> {
    // FOR UPDATE holds the course row until COMMIT/ROLLBACK, so concurrent
    // enrollments into this course run their seat check one after another
    const lockClause = options.forUpdate ? ' FOR UPDATE' : '';

    const result = await this.client.query<CourseRow>(
      `SELECT ${COURSE_COLUMNS}
       FROM courses c
       WHERE c.id = $1${lockClause}`,
      [courseId]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const [course] = await loadCourses(this.query, result.rows);
    return course;
  }

  async findEnrolledCoursesWithSlots(studentId: string): Promise<Course[]> {
    const result = await this.client.query<CourseRow>(
      `SELECT ${COURSE_COLUMNS}
       FROM courses c
       JOIN enrollments e ON e.course_id = c.id
       WHERE e.user_id = $1
       ORDER BY e.enrolled_at, e.id`,
      [studentId]
    );

    return loadCourses(this.query, result.rows);
  }
}
