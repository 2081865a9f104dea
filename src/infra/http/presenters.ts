import type { CourseSummary, Enrollment } from '../../domain/enrollment/course.js';
import { formatClockTime, TimeSlot } from '../../domain/enrollment/timeSlot.js';
import type { ScheduleEntry } from '../../application/enrollment/ports.js';

export interface TimeSlotResponse {
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  location: string;
}

export interface CourseResponse {
  id: number;
  code: string;
  name: string;
  type: string;
  capacity: number;
  credits: number;
  description: string;
  semester: string | null;
  teacherId: string | null;
  enrolledCount: number;
  remainingCapacity: number;
  timeSlots: TimeSlotResponse[];
}

export function presentTimeSlot(slot: TimeSlot): TimeSlotResponse {
  return {
    dayOfWeek: slot.dayOfWeek,
    startTime: formatClockTime(slot.startMinute),
    endTime: formatClockTime(slot.endMinute),
    location: slot.location,
  };
}

export function presentCourse(course: CourseSummary): CourseResponse {
  return {
    id: course.id,
    code: course.code,
    name: course.name,
    type: course.type,
    capacity: course.capacity,
    credits: course.credits,
    description: course.description,
    semester: course.semester,
    teacherId: course.teacherId,
    enrolledCount: course.enrolledCount,
    remainingCapacity: course.remainingCapacity,
    timeSlots: course.timeSlots.map(presentTimeSlot),
  };
}

export function presentEnrollment(enrollment: Enrollment) {
  return {
    id: enrollment.id,
    studentId: enrollment.studentId,
    courseId: enrollment.courseId,
    enrolledAt: enrollment.enrolledAt.toISOString(),
  };
}

export function presentScheduleEntry(entry: ScheduleEntry) {
  return {
    enrollmentId: entry.enrollmentId,
    enrolledAt: entry.enrolledAt.toISOString(),
    course: presentCourse(entry.course),
  };
}
