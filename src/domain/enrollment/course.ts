import { TimeSlot } from './timeSlot.js';

export const COURSE_TYPES = ['required', 'elective'] as const;

export type CourseType = (typeof COURSE_TYPES)[number];

export function isCourseType(value: string): value is CourseType {
  return (COURSE_TYPES as readonly string[]).includes(value);
}

/**
 * Catalog course with its weekly meetings.
 */
export interface Course {
  readonly id: number;
  readonly code: string;
  readonly name: string;
  readonly type: CourseType;
  readonly capacity: number;
  readonly credits: number;
  readonly description: string;
  readonly semester: string | null;
  readonly teacherId: string | null;
  readonly timeSlots: readonly TimeSlot[];
}

/**
 * Course as seen by the catalog read side, with derived enrollment counts.
 */
export interface CourseSummary extends Course {
  readonly enrolledCount: number;
  readonly remainingCapacity: number;
}

export function remainingCapacity(capacity: number, enrolledCount: number): number {
  return capacity - enrolledCount;
}

export function summarizeCourse(course: Course, enrolledCount: number): CourseSummary {
  return {
    ...course,
    enrolledCount,
    remainingCapacity: remainingCapacity(course.capacity, enrolledCount),
  };
}

/**
 * An active registration of one student in one course.
 * Enrollments are only ever created and deleted, never updated.
 */
export interface Enrollment {
  readonly id: number;
  readonly studentId: string;
  readonly courseId: number;
  readonly enrolledAt: Date;
}
