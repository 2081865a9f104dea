import type { QueryResult, QueryResultRow } from 'pg';
import { Course, isCourseType } from '../../domain/enrollment/course.js';
import { isDayOfWeek, parseClockTime, TimeSlot } from '../../domain/enrollment/timeSlot.js';

/**
 * Runs one parameterized statement. Lets the row loaders below work the same
 * on a pooled connection inside a transaction and on the pool itself.
 */
export type RowQuery = <R extends QueryResultRow>(
  text: string,
  values: unknown[]
) => Promise<QueryResult<R>>;

export interface CourseRow {
  id: number;
  code: string;
  name: string;
  type: string;
  capacity: number;
  credits: number;
  description: string;
  semester: string | null;
  teacher_id: string | null;
}

interface TimeSlotRow {
  course_id: number;
  day_of_week: number;
  start_time: string;
  end_time: string;
  location: string;
}

export const COURSE_COLUMNS = `c.id, c.code, c.name, c.type, c.capacity, c.credits,
       c.description, c.semester, c.teacher_id`;

export function mapTimeSlot(row: TimeSlotRow): TimeSlot {
  if (!isDayOfWeek(row.day_of_week)) {
    throw new Error(`Invalid day_of_week ${row.day_of_week} for course ${row.course_id}`);
  }

  return {
    dayOfWeek: row.day_of_week,
    startMinute: parseClockTime(row.start_time),
    endMinute: parseClockTime(row.end_time),
    location: row.location,
  };
}

export function mapCourse(row: CourseRow, timeSlots: TimeSlot[]): Course {
  if (!isCourseType(row.type)) {
    throw new Error(`Invalid course type ${row.type} for course ${row.id}`);
  }

  return {
    id: row.id,
    code: row.code,
    name: row.name,
    type: row.type,
    capacity: row.capacity,
    credits: row.credits,
    description: row.description,
    semester: row.semester,
    teacherId: row.teacher_id,
    timeSlots,
  };
}

/**
 * Load the time slots of several courses in one round trip, keyed by course id.
 */
export async function loadTimeSlots(
  query: RowQuery,
  courseIds: number[]
): Promise<Map<number, TimeSlot[]>> {
  const slotsByCourse = new Map<number, TimeSlot[]>();
  if (courseIds.length === 0) {
    return slotsByCourse;
  }

  const result = await query<TimeSlotRow>(
    `SELECT course_id, day_of_week, start_time::text AS start_time,
            end_time::text AS end_time, location
     FROM course_time_slots
     WHERE course_id = ANY($1::int[])
     ORDER BY course_id, day_of_week, start_time`,
    [courseIds]
  );

  for (const row of result.rows) {
    const slots = slotsByCourse.get(row.course_id) ?? [];
    slots.push(mapTimeSlot(row));
    slotsByCourse.set(row.course_id, slots);
  }

  return slotsByCourse;
}

export async function loadCourses(query: RowQuery, rows: CourseRow[]): Promise<Course[]> {
  const slotsByCourse = await loadTimeSlots(
    query,
    rows.map((row) => row.id)
  );
  return rows.map((row) => mapCourse(row, slotsByCourse.get(row.id) ?? []));
}
