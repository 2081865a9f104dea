import type { CourseSummary } from '../../domain/enrollment/course.js';
import type { CourseFilter, CourseQueryStore } from '../enrollment/ports.js';

export interface CourseListResult {
  count: number;
  results: CourseSummary[];
}

export class CatalogQueries {
  constructor(private courseQueries: CourseQueryStore) {}

  async listCourses(filter: CourseFilter = {}): Promise<CourseListResult> {
    const search = filter.search?.trim();
    const results = await this.courseQueries.listCourses({
      ...filter,
      search: search ? search : undefined,
    });

    return { count: results.length, results };
  }

  async getCourse(courseId: number): Promise<CourseSummary | null> {
    return this.courseQueries.getCourse(courseId);
  }
}
