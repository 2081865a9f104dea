import type { Pool, QueryResultRow } from 'pg';
import { summarizeCourse, CourseSummary } from '../../domain/enrollment/course.js';
import type {
  CourseFilter,
  CourseQueryStore,
  ScheduleEntry,
} from '../../application/enrollment/ports.js';
import { COURSE_COLUMNS, CourseRow, loadCourses, RowQuery } from './courseRows.js';

type CourseCountRow = CourseRow & { enrolled_count: number };

const ENROLLED_COUNT_COLUMN = `(SELECT COUNT(*)::int FROM enrollments ec WHERE ec.course_id = c.id) AS enrolled_count`;

/**
 * Escape LIKE wildcards so a search term is matched literally.
 */
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PgCourseQueries implements CourseQueryStore {
  private readonly query: RowQuery;

  constructor(private db: Pool) {
    this.query = <R extends QueryResultRow>(text: string, values: unknown[]) =>
      this.db.query<R>(text, values);
  }

  async listCourses(filter: CourseFilter): Promise<CourseSummary[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.search) {
      values.push(`%${escapeLike(filter.search)}%`);
      conditions.push(`c.name ILIKE $${values.length}`);
    }
    if (filter.type) {
      values.push(filter.type);
      conditions.push(`c.type = $${values.length}`);
    }
    if (filter.semester) {
      values.push(filter.semester);
      conditions.push(`c.semester = $${values.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const result = await this.db.query<CourseCountRow>(
      `SELECT ${COURSE_COLUMNS}, ${ENROLLED_COUNT_COLUMN}
       FROM courses c
       ${where}
       ORDER BY c.code`,
      values
    );

    return this.summarize(result.rows);
  }

  async getCourse(courseId: number): Promise<CourseSummary | null> {
    const result = await this.db.query<CourseCountRow>(
      `SELECT ${COURSE_COLUMNS}, ${ENROLLED_COUNT_COLUMN}
       FROM courses c
       WHERE c.id = $1`,
      [courseId]
    );

    const [course] = await this.summarize(result.rows);
    return course ?? null;
  }

  async listStudentSchedule(studentId: string): Promise<ScheduleEntry[]> {
    const result = await this.db.query<
      CourseCountRow & { enrollment_id: number; enrolled_at: Date }
    >(
      `SELECT e.id AS enrollment_id, e.enrolled_at,
              ${COURSE_COLUMNS}, ${ENROLLED_COUNT_COLUMN}
       FROM enrollments e
       JOIN courses c ON c.id = e.course_id
       WHERE e.user_id = $1
       ORDER BY e.enrolled_at, e.id`,
      [studentId]
    );

    const courses = await this.summarize(result.rows);
    return result.rows.map((row, i) => ({
      enrollmentId: row.enrollment_id,
      enrolledAt: row.enrolled_at,
      course: courses[i],
    }));
  }

  private async summarize(rows: CourseCountRow[]): Promise<CourseSummary[]> {
    const courses = await loadCourses(this.query, rows);
    return courses.map((course, i) => summarizeCourse(course, rows[i].enrolled_count));
  }
}
