import type { Course, CourseSummary, CourseType, Enrollment } from '../../domain/enrollment/course.js';

export interface FindCourseOptions {
  /**
   * Lock the course row until the surrounding transaction ends.
   * Enrollment checks that read the course's seat count must hold this lock.
   */
  forUpdate?: boolean;
}

export interface CatalogStore {
  findCourseWithSlots(courseId: number, options?: FindCourseOptions): Promise<Course | null>;
  findEnrolledCoursesWithSlots(studentId: string): Promise<Course[]>;
}

export interface EnrollmentWithCourse extends Enrollment {
  readonly courseName: string;
}

export interface EnrollmentStore {
  /**
   * Serialize every enroll/withdraw of one student for the rest of the
   * transaction. Always taken before any course lock.
   */
  lockStudent(studentId: string): Promise<void>;
  countByCourse(courseId: number): Promise<number>;
  countByStudent(studentId: string): Promise<number>;
  existsByStudentAndCourse(studentId: string, courseId: number): Promise<boolean>;
  findByIdAndStudent(enrollmentId: number, studentId: string): Promise<EnrollmentWithCourse | null>;
  /** Throws DuplicateEnrollmentError when the (student, course) pair already exists. */
  insert(studentId: string, courseId: number): Promise<Enrollment>;
  delete(enrollmentId: number): Promise<boolean>;
}

/**
 * Stores bound to one database transaction.
 */
export interface EnrollmentTransaction {
  readonly catalog: CatalogStore;
  readonly enrollments: EnrollmentStore;
}

/**
 * Runs work inside a single transaction: commits when the work resolves,
 * rolls back and rethrows when it rejects.
 */
export interface TransactionRunner {
  run<T>(work: (tx: EnrollmentTransaction) => Promise<T>): Promise<T>;
}

export class DuplicateEnrollmentError extends Error {
  constructor(
    public readonly studentId: string,
    public readonly courseId: number
  ) {
    super(`Enrollment already exists for student ${studentId} in course ${courseId}`);
    this.name = 'DuplicateEnrollmentError';
  }
}

export interface CourseFilter {
  search?: string;
  type?: CourseType;
  semester?: string;
}

export interface ScheduleEntry {
  readonly enrollmentId: number;
  readonly enrolledAt: Date;
  readonly course: CourseSummary;
}

/**
 * Read side for catalog browsing and student schedules. Not used by the
 * enroll/withdraw decision path.
 */
export interface CourseQueryStore {
  listCourses(filter: CourseFilter): Promise<CourseSummary[]>;
  getCourse(courseId: number): Promise<CourseSummary | null>;
  listStudentSchedule(studentId: string): Promise<ScheduleEntry[]>;
}
