import { Course } from './course.js';
import { TimeSlot, slotsOverlap, describeTimeSlot } from './timeSlot.js';

export interface ScheduleConflict {
  readonly candidateSlot: TimeSlot;
  readonly enrolledCourse: Pick<Course, 'id' | 'name'>;
  readonly enrolledSlot: TimeSlot;
}

/**
 * Find the first pair of overlapping meetings between a candidate course and
 * the courses a student is already enrolled in. Returns null when the
 * candidate fits the student's schedule.
 */
export function findScheduleConflict(
  candidateSlots: readonly TimeSlot[],
  enrolledCourses: readonly Pick<Course, 'id' | 'name' | 'timeSlots'>[]
): ScheduleConflict | null {
  for (const candidateSlot of candidateSlots) {
    for (const enrolledCourse of enrolledCourses) {
      for (const enrolledSlot of enrolledCourse.timeSlots) {
        if (slotsOverlap(candidateSlot, enrolledSlot)) {
          return {
            candidateSlot,
            enrolledCourse: { id: enrolledCourse.id, name: enrolledCourse.name },
            enrolledSlot,
          };
        }
      }
    }
  }

  return null;
}

export function hasScheduleConflict(
  candidateSlots: readonly TimeSlot[],
  enrolledCourses: readonly Pick<Course, 'id' | 'name' | 'timeSlots'>[]
): boolean {
  return findScheduleConflict(candidateSlots, enrolledCourses) !== null;
}

export function describeConflict(conflict: ScheduleConflict): string {
  return `${describeTimeSlot(conflict.candidateSlot)} overlaps ${conflict.enrolledCourse.name} (${describeTimeSlot(conflict.enrolledSlot)})`;
}
