import { InvalidTimeSlotError } from './errors.js';

export type DayOfWeek = 1 | 2 | 3 | 4 | 5 | 6 | 7;

const DAY_NAMES: Record<DayOfWeek, string> = {
  1: 'Monday',
  2: 'Tuesday',
  3: 'Wednesday',
  4: 'Thursday',
  5: 'Friday',
  6: 'Saturday',
  7: 'Sunday',
};

/**
 * One recurring weekly meeting of a course.
 * Times are minutes since midnight; the slot covers [startMinute, endMinute).
 */
export interface TimeSlot {
  readonly dayOfWeek: DayOfWeek;
  readonly startMinute: number;
  readonly endMinute: number;
  readonly location: string;
}

export interface TimeSlotInput {
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  location?: string;
}

const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export function isDayOfWeek(value: number): value is DayOfWeek {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

export function dayName(day: DayOfWeek): string {
  return DAY_NAMES[day];
}

/**
 * Parse "HH:MM" or "HH:MM:SS" (the form Postgres returns TIME columns in)
 * into minutes since midnight. Seconds become a fraction of a minute.
 */
export function parseClockTime(value: string): number {
  const match = CLOCK_TIME_PATTERN.exec(value);
  if (!match) {
    throw new InvalidTimeSlotError(`Invalid time of day: ${value}`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = match[3] ? parseInt(match[3], 10) : 0;

  return hours * 60 + minutes + seconds / 60;
}

export function formatClockTime(minuteOfDay: number): string {
  const hours = Math.floor(minuteOfDay / 60);
  const minutes = Math.floor(minuteOfDay % 60);
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Build a slot from catalog input, rejecting slots that do not end after
 * they start. Used where catalog data enters the system.
 */
export function createTimeSlot(input: TimeSlotInput): TimeSlot {
  if (!isDayOfWeek(input.dayOfWeek)) {
    throw new InvalidTimeSlotError(
      `Day of week must be an integer from 1 to 7, got ${input.dayOfWeek}`
    );
  }

  const startMinute = parseClockTime(input.startTime);
  const endMinute = parseClockTime(input.endTime);

  if (endMinute <= startMinute) {
    throw new InvalidTimeSlotError(
      `Time slot must end after it starts (${input.startTime}-${input.endTime})`
    );
  }

  return {
    dayOfWeek: input.dayOfWeek,
    startMinute,
    endMinute,
    location: input.location ?? '',
  };
}

/**
 * Two slots overlap when they fall on the same day and their half-open
 * intervals intersect. Slots that only touch (one ends when the other
 * starts) do not overlap.
 */
export function slotsOverlap(a: TimeSlot, b: TimeSlot): boolean {
  return (
    a.dayOfWeek === b.dayOfWeek &&
    a.startMinute < b.endMinute &&
    a.endMinute > b.startMinute
  );
}

export function describeTimeSlot(slot: TimeSlot): string {
  return `${dayName(slot.dayOfWeek)} ${formatClockTime(slot.startMinute)}-${formatClockTime(slot.endMinute)}`;
}
