import { readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import type { Pool, PoolClient } from 'pg';
import dotenv from 'dotenv';
import { z } from 'zod';
import { createPool } from '../infra/db/pool.js';
import { PgTransactionRunner, rollbackAndRelease } from '../infra/db/transactionRunner.js';
import { Password } from '../domain/auth/password.js';
import { USER_ROLES } from '../domain/auth/user.js';
import { COURSE_TYPES } from '../domain/enrollment/course.js';
import { createTimeSlot, formatClockTime } from '../domain/enrollment/timeSlot.js';
import { EnrollUseCase } from '../application/enrollment/enroll.js';
import type { TransactionRunner } from '../application/enrollment/ports.js';
import { AlreadyEnrolledError } from '../domain/enrollment/errors.js';

dotenv.config();

const SEED_FILE = join(process.cwd(), 'src/scripts/data/seed.json');

const seedSchema = z.object({
  users: z.array(
    z.object({
      username: z.string().min(1),
      name: z.string().min(1),
      email: z.string().email().optional(),
      role: z.enum(USER_ROLES),
      password: z.string().min(8),
    })
  ),
  courses: z.array(
    z.object({
      code: z.string().min(1).max(20),
      name: z.string().min(1),
      type: z.enum(COURSE_TYPES),
      capacity: z.number().int().positive(),
      credits: z.number().int().nonnegative(),
      semester: z.string().nullable().default(null),
      description: z.string().default(''),
      teacher: z.string().nullable().default(null),
      timeSlots: z.array(
        z.object({
          dayOfWeek: z.number().int(),
          startTime: z.string(),
          endTime: z.string(),
          location: z.string().optional(),
        })
      ),
    })
  ),
  enrollments: z
    .array(
      z.object({
        student: z.string(),
        courses: z.array(z.string()),
      })
    )
    .default([]),
});

export type SeedData = z.infer<typeof seedSchema>;

export async function loadSeedData(file: string = SEED_FILE): Promise<SeedData> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
  return seedSchema.parse(raw);
}

async function clearData(client: PoolClient): Promise<void> {
  console.log('Clearing existing data...');
  await client.query('DELETE FROM enrollments');
  await client.query('DELETE FROM course_time_slots');
  await client.query('DELETE FROM courses');
  await client.query("DELETE FROM users WHERE role <> 'admin'");
}

async function insertUsers(client: PoolClient, data: SeedData): Promise<Map<string, string>> {
  const ids = new Map<string, string>();

  for (const user of data.users) {
    const passwordHash = await Password.hash(user.password);
    const result = await client.query<{ id: string }>(
      `INSERT INTO users (username, name, email, role, password_hash)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (username) DO UPDATE SET name = EXCLUDED.name
       RETURNING id`,
      [user.username, user.name, user.email ?? null, user.role, passwordHash]
    );
    ids.set(user.username, result.rows[0].id);
  }

  return ids;
}

async function insertCourses(
  client: PoolClient,
  data: SeedData,
  userIds: Map<string, string>
): Promise<Map<string, number>> {
  const ids = new Map<string, number>();

  for (const course of data.courses) {
    // Reject malformed slots before anything is written
    const slots = course.timeSlots.map(createTimeSlot);

    const teacherId = course.teacher ? userIds.get(course.teacher) : undefined;
    if (course.teacher && !teacherId) {
      throw new Error(`Unknown teacher ${course.teacher} for course ${course.code}`);
    }

    const result = await client.query<{ id: number }>(
      `INSERT INTO courses (code, name, type, capacity, credits, description, semester, teacher_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (code) DO UPDATE SET
         name = EXCLUDED.name,
         type = EXCLUDED.type,
         capacity = EXCLUDED.capacity,
         credits = EXCLUDED.credits,
         description = EXCLUDED.description,
         semester = EXCLUDED.semester,
         teacher_id = EXCLUDED.teacher_id
       RETURNING id`,
      [
        course.code,
        course.name,
        course.type,
        course.capacity,
        course.credits,
        course.description,
        course.semester,
        teacherId ?? null,
      ]
    );
    const courseId = result.rows[0].id;

    for (const slot of slots) {
      await client.query(
        `INSERT INTO course_time_slots (course_id, day_of_week, start_time, end_time, location)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (course_id, day_of_week, start_time) DO NOTHING`,
        [
          courseId,
          slot.dayOfWeek,
          formatClockTime(slot.startMinute),
          formatClockTime(slot.endMinute),
          slot.location,
        ]
      );
    }

    ids.set(course.code, courseId);
  }

  return ids;
}

/**
 * Enroll through the regular use case so seeded schedules obey every rule.
 * Enrollments left by an earlier run are kept; returns how many were created.
 */
export async function enrollStudents(
  transactions: TransactionRunner,
  data: Pick<SeedData, 'enrollments'>,
  userIds: Map<string, string>,
  courseIds: Map<string, number>
): Promise<number> {
  const enrollUseCase = new EnrollUseCase(transactions);
  let created = 0;

  for (const entry of data.enrollments) {
    const studentId = userIds.get(entry.student);
    if (!studentId) {
      throw new Error(`Unknown student ${entry.student}`);
    }

    for (const code of entry.courses) {
      const courseId = courseIds.get(code);
      if (courseId === undefined) {
        throw new Error(`Unknown course ${code}`);
      }
      try {
        await enrollUseCase.execute({ studentId, courseId });
        created++;
      } catch (error) {
        if (!(error instanceof AlreadyEnrolledError)) {
          throw error;
        }
      }
    }
  }

  return created;
}

async function insertCatalog(
  pool: Pool,
  data: SeedData,
  clear: boolean
): Promise<{ userIds: Map<string, string>; courseIds: Map<string, number> }> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');

    if (clear) {
      await clearData(client);
    }

    console.log('Creating users...');
    const userIds = await insertUsers(client, data);

    console.log('Creating courses and time slots...');
    const courseIds = await insertCourses(client, data, userIds);

    await client.query('COMMIT');
    client.release();
    return { userIds, courseIds };
  } catch (error) {
    await rollbackAndRelease(client);
    throw error;
  }
}

/**
 * Safe to run repeatedly: users and courses are upserted by username and
 * code, existing slots and enrollments are left in place.
 */
export async function seed(pool: Pool, options: { clear: boolean }): Promise<void> {
  const data = await loadSeedData();
  const { userIds, courseIds } = await insertCatalog(pool, data, options.clear);

  console.log('Creating sample enrollments...');
  const enrolled = await enrollStudents(new PgTransactionRunner(pool), data, userIds, courseIds);

  console.log(
    `✓ Seeded ${userIds.size} users, ${courseIds.size} courses, ${enrolled} new enrollments`
  );
}

async function main(): Promise<void> {
  const pool = createPool(process.env.DATABASE_URL);

  try {
    await seed(pool, { clear: process.argv.includes('--clear') });
  } catch (error) {
    console.error('Seeding failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
