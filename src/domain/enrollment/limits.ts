/**
 * Per-student course load bounds.
 * A student may not enroll past MAX_COURSE_LIMIT and may not withdraw
 * below MIN_COURSE_LIMIT active enrollments.
 */
export const MAX_COURSE_LIMIT = 8;
export const MIN_COURSE_LIMIT = 2;
