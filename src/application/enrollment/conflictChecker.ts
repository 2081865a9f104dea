import type { Course } from '../../domain/enrollment/course.js';
import { findScheduleConflict, ScheduleConflict } from '../../domain/enrollment/conflict.js';
import type { CatalogStore } from './ports.js';

/**
 * Checks a candidate course against the courses a student currently holds.
 * Reads only; it sees whatever the given catalog store sees, so inside an
 * enrollment transaction it observes the student's locked schedule.
 */
export class ConflictChecker {
  async findConflict(
    catalog: CatalogStore,
    studentId: string,
    candidate: Course
  ): Promise<ScheduleConflict | null> {
    if (candidate.timeSlots.length === 0) {
      return null;
    }

    const enrolledCourses = await catalog.findEnrolledCoursesWithSlots(studentId);
    return findScheduleConflict(candidate.timeSlots, enrolledCourses);
  }

  async hasConflict(catalog: CatalogStore, studentId: string, candidate: Course): Promise<boolean> {
    return (await this.findConflict(catalog, studentId, candidate)) !== null;
  }
}
