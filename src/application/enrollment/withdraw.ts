import {
  EnrollmentNotFoundError,
  MinCourseLimitReachedError,
} from '../../domain/enrollment/errors.js';
import { MIN_COURSE_LIMIT } from '../../domain/enrollment/limits.js';
import { TransactionRunner } from './ports.js';

export interface WithdrawCommand {
  studentId: string;
  enrollmentId: number;
}

export interface WithdrawResult {
  message: string;
  courseName: string;
  remainingEnrollments: number;
}

export class WithdrawUseCase {
  constructor(private transactions: TransactionRunner) {}

  async execute(command: WithdrawCommand): Promise<WithdrawResult> {
    const { studentId, enrollmentId } = command;

    return this.transactions.run(async ({ enrollments }) => {
      await enrollments.lockStudent(studentId);

      // Someone else's enrollment is reported exactly like a missing one
      const enrollment = await enrollments.findByIdAndStudent(enrollmentId, studentId);
      if (!enrollment) {
        throw new EnrollmentNotFoundError();
      }

      const currentCount = await enrollments.countByStudent(studentId);
      if (currentCount <= MIN_COURSE_LIMIT) {
        throw new MinCourseLimitReachedError(
          `Withdrawal failed: at least ${MIN_COURSE_LIMIT} courses are required`
        );
      }

      const deleted = await enrollments.delete(enrollment.id);
      if (!deleted) {
        throw new EnrollmentNotFoundError();
      }

      return {
        message: `Withdrew from ${enrollment.courseName}`,
        courseName: enrollment.courseName,
        remainingEnrollments: currentCount - 1,
      };
    });
  }
}
