import type { Enrollment } from '../../domain/enrollment/course.js';
import { describeConflict } from '../../domain/enrollment/conflict.js';
import {
  AlreadyEnrolledError,
  CourseFullError,
  CourseNotFoundError,
  MaxCourseLimitReachedError,
  TimeConflictError,
} from '../../domain/enrollment/errors.js';
import { MAX_COURSE_LIMIT } from '../../domain/enrollment/limits.js';
import { ConflictChecker } from './conflictChecker.js';
import { DuplicateEnrollmentError, TransactionRunner } from './ports.js';

export interface EnrollCommand {
  studentId: string;
  courseId: number;
}

export class EnrollUseCase {
  constructor(
    private transactions: TransactionRunner,
    private conflictChecker: ConflictChecker = new ConflictChecker()
  ) {}

  /**
   * Enroll a student in a course.
   *
   * Every check and the insert run in one transaction. The student row is
   * locked first, then the course row, so concurrent requests touching the
   * same student or the same course's seats are applied one at a time and
   * each sees the previous one's committed result.
   */
  async execute(command: EnrollCommand): Promise<Enrollment> {
    const { studentId, courseId } = command;

    return this.transactions.run(async ({ catalog, enrollments }) => {
      await enrollments.lockStudent(studentId);

      // 1. Course exists (and its seat count is now ours until commit)
      const course = await catalog.findCourseWithSlots(courseId, { forUpdate: true });
      if (!course) {
        throw new CourseNotFoundError(`Course not found: ${courseId}`);
      }

      // 2. Not already enrolled
      if (await enrollments.existsByStudentAndCourse(studentId, courseId)) {
        throw new AlreadyEnrolledError(`Already enrolled in ${course.name}`);
      }

      // 3. Seats left
      const enrolledCount = await enrollments.countByCourse(courseId);
      if (enrolledCount >= course.capacity) {
        throw new CourseFullError(
          `${course.name} is full (${enrolledCount}/${course.capacity})`
        );
      }

      // 4. Fits the student's schedule
      const conflict = await this.conflictChecker.findConflict(catalog, studentId, course);
      if (conflict) {
        throw new TimeConflictError(`Enrollment failed: time conflict, ${describeConflict(conflict)}`);
      }

      // 5. Course load
      const currentCount = await enrollments.countByStudent(studentId);
      if (currentCount >= MAX_COURSE_LIMIT) {
        throw new MaxCourseLimitReachedError(
          `Maximum course limit reached (${MAX_COURSE_LIMIT} courses)`
        );
      }

      // 6. Commit
      try {
        return await enrollments.insert(studentId, courseId);
      } catch (error) {
        if (error instanceof DuplicateEnrollmentError) {
          throw new AlreadyEnrolledError(`Already enrolled in ${course.name}`);
        }
        throw error;
      }
    });
  }
}
