import { CourseNotFoundError } from '../../domain/enrollment/errors.js';
import { ConflictChecker } from './conflictChecker.js';
import { TransactionRunner } from './ports.js';

export interface CheckConflictQuery {
  studentId: string;
  courseId: number;
}

export interface CheckConflictResult {
  courseId: number;
  hasConflict: boolean;
}

/**
 * Reports whether a course would clash with the student's current schedule,
 * without enrolling. A course the student already holds clashes with itself.
 */
export class CheckConflictUseCase {
  constructor(
    private transactions: TransactionRunner,
    private conflictChecker: ConflictChecker = new ConflictChecker()
  ) {}

  async execute(query: CheckConflictQuery): Promise<CheckConflictResult> {
    return this.transactions.run(async ({ catalog }) => {
      const course = await catalog.findCourseWithSlots(query.courseId);
      if (!course) {
        throw new CourseNotFoundError(`Course not found: ${query.courseId}`);
      }

      return {
        courseId: course.id,
        hasConflict: await this.conflictChecker.hasConflict(catalog, query.studentId, course),
      };
    });
  }
}
