import { describe, it, expect, beforeEach } from 'vitest';
import { EnrollUseCase } from '../enroll.js';
import {
  AlreadyEnrolledError,
  CourseFullError,
  CourseNotFoundError,
  MaxCourseLimitReachedError,
  TimeConflictError,
} from '../../../domain/enrollment/errors.js';
import { MAX_COURSE_LIMIT } from '../../../domain/enrollment/limits.js';
import { InMemoryEnrollmentDatabase } from './support/inMemoryDatabase.js';

describe('EnrollUseCase', () => {
  const studentId = 'student-1';
  let db: InMemoryEnrollmentDatabase;
  let useCase: EnrollUseCase;

  beforeEach(() => {
    db = new InMemoryEnrollmentDatabase();
    useCase = new EnrollUseCase(db);
  });

  it('should enroll a student in a course with free seats', async () => {
    const course = db.addCourse({
      name: 'Algorithms',
      timeSlots: [{ dayOfWeek: 1, startTime: '09:00', endTime: '12:00' }],
    });

    const enrollment = await useCase.execute({ studentId, courseId: course.id });

    expect(enrollment.studentId).toBe(studentId);
    expect(enrollment.courseId).toBe(course.id);
    expect(db.enrollmentsOf(studentId)).toEqual([enrollment]);
    expect(db.commits).toBe(1);
  });

  it('should reject an unknown course', async () => {
    await expect(useCase.execute({ studentId, courseId: 999 })).rejects.toThrow(
      new CourseNotFoundError('Course not found: 999')
    );
    expect(db.rollbacks).toBe(1);
  });

  it('should reject a second enrollment in the same course', async () => {
    const course = db.addCourse({ name: 'Algorithms' });
    db.addEnrollment(studentId, course.id);

    await expect(useCase.execute({ studentId, courseId: course.id })).rejects.toThrow(
      new AlreadyEnrolledError('Already enrolled in Algorithms')
    );
    expect(db.enrollmentsOf(studentId)).toHaveLength(1);
  });

  it('should report already enrolled before the self time conflict', async () => {
    const course = db.addCourse({
      timeSlots: [{ dayOfWeek: 2, startTime: '09:00', endTime: '10:00' }],
    });
    db.addEnrollment(studentId, course.id);

    await expect(useCase.execute({ studentId, courseId: course.id })).rejects.toBeInstanceOf(
      AlreadyEnrolledError
    );
  });

  it('should reject a full course', async () => {
    const course = db.addCourse({ name: 'Seminar', capacity: 1 });
    db.addEnrollment('student-2', course.id);

    await expect(useCase.execute({ studentId, courseId: course.id })).rejects.toThrow(
      new CourseFullError('Seminar is full (1/1)')
    );
    expect(db.enrollmentsIn(course.id)).toHaveLength(1);
  });

  it('should check capacity before time conflicts', async () => {
    const enrolled = db.addCourse({
      timeSlots: [{ dayOfWeek: 1, startTime: '09:00', endTime: '12:00' }],
    });
    const full = db.addCourse({
      capacity: 1,
      timeSlots: [{ dayOfWeek: 1, startTime: '10:00', endTime: '11:00' }],
    });
    db.addEnrollment(studentId, enrolled.id);
    db.addEnrollment('student-2', full.id);

    await expect(useCase.execute({ studentId, courseId: full.id })).rejects.toBeInstanceOf(
      CourseFullError
    );
  });

  it('should reject a course that overlaps the current schedule', async () => {
    const algorithms = db.addCourse({
      name: 'Algorithms',
      timeSlots: [
        { dayOfWeek: 1, startTime: '09:00', endTime: '12:00' },
        { dayOfWeek: 3, startTime: '09:00', endTime: '12:00' },
      ],
    });
    const networks = db.addCourse({
      name: 'Networks',
      timeSlots: [{ dayOfWeek: 1, startTime: '10:00', endTime: '13:00' }],
    });
    db.addEnrollment(studentId, algorithms.id);

    await expect(useCase.execute({ studentId, courseId: networks.id })).rejects.toThrow(
      new TimeConflictError(
        'Enrollment failed: time conflict, Monday 10:00-13:00 overlaps Algorithms (Monday 09:00-12:00)'
      )
    );
    expect(db.enrollmentsOf(studentId)).toHaveLength(1);
  });

  it('should accept a course that starts when another ends', async () => {
    const morning = db.addCourse({
      timeSlots: [{ dayOfWeek: 1, startTime: '09:00', endTime: '12:00' }],
    });
    const noon = db.addCourse({
      timeSlots: [{ dayOfWeek: 1, startTime: '12:00', endTime: '14:00' }],
    });
    db.addEnrollment(studentId, morning.id);

    await useCase.execute({ studentId, courseId: noon.id });

    expect(db.enrollmentsOf(studentId)).toHaveLength(2);
  });

  it('should enroll in a course without meetings regardless of schedule', async () => {
    const busy = db.addCourse({
      timeSlots: [{ dayOfWeek: 4, startTime: '08:00', endTime: '20:00' }],
    });
    const online = db.addCourse({ name: 'Online Reading' });
    db.addEnrollment(studentId, busy.id);

    await useCase.execute({ studentId, courseId: online.id });

    expect(db.enrollmentsOf(studentId)).toHaveLength(2);
  });

  it('should stop at the maximum course load', async () => {
    for (let i = 0; i < MAX_COURSE_LIMIT; i++) {
      db.addEnrollment(studentId, db.addCourse().id);
    }
    const extra = db.addCourse();

    await expect(useCase.execute({ studentId, courseId: extra.id })).rejects.toThrow(
      new MaxCourseLimitReachedError('Maximum course limit reached (8 courses)')
    );
    expect(db.enrollmentsOf(studentId)).toHaveLength(MAX_COURSE_LIMIT);
  });

  it('should allow the eighth course', async () => {
    for (let i = 0; i < MAX_COURSE_LIMIT - 1; i++) {
      db.addEnrollment(studentId, db.addCourse().id);
    }
    const last = db.addCourse();

    await useCase.execute({ studentId, courseId: last.id });

    expect(db.enrollmentsOf(studentId)).toHaveLength(MAX_COURSE_LIMIT);
  });

  it('should propagate storage failures and leave nothing behind', async () => {
    const course = db.addCourse();
    db.failNext('insert', new Error('connection reset'));

    await expect(useCase.execute({ studentId, courseId: course.id })).rejects.toThrow(
      'connection reset'
    );
    expect(db.enrollmentsOf(studentId)).toEqual([]);
    expect(db.rollbacks).toBe(1);
  });
});
