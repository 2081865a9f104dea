import type { CourseQueryStore, ScheduleEntry } from './ports.js';

export class EnrollmentQueries {
  constructor(private courseQueries: CourseQueryStore) {}

  /**
   * The student's current schedule, oldest enrollment first.
   */
  async getSchedule(studentId: string): Promise<ScheduleEntry[]> {
    return this.courseQueries.listStudentSchedule(studentId);
  }
}
