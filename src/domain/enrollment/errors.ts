export class DomainError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CourseNotFoundError extends DomainError {
  constructor(message = 'Course not found') {
    super('COURSE_NOT_FOUND', message);
  }
}

export class AlreadyEnrolledError extends DomainError {
  constructor(message = 'Already enrolled in this course') {
    super('ALREADY_ENROLLED', message);
  }
}

export class CourseFullError extends DomainError {
  constructor(message = 'Course is full, no remaining capacity') {
    super('COURSE_FULL', message);
  }
}

export class TimeConflictError extends DomainError {
  constructor(message = 'Enrollment failed: time conflict') {
    super('TIME_CONFLICT', message);
  }
}

export class MaxCourseLimitReachedError extends DomainError {
  constructor(message = 'Maximum course limit reached') {
    super('MAX_COURSE_LIMIT_REACHED', message);
  }
}

/**
 * Raised both when the enrollment does not exist and when it belongs to
 * another student. Callers must not be able to tell the two apart.
 */
export class EnrollmentNotFoundError extends DomainError {
  constructor(message = 'Enrollment not found') {
    super('ENROLLMENT_NOT_FOUND', message);
  }
}

export class MinCourseLimitReachedError extends DomainError {
  constructor(message = 'Minimum course limit reached') {
    super('MIN_COURSE_LIMIT_REACHED', message);
  }
}

export class InvalidTimeSlotError extends DomainError {
  constructor(message = 'Invalid time slot') {
    super('INVALID_TIME_SLOT', message);
  }
}
