import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createPool } from '../../infra/db/pool.js';
import { runMigrations } from '../../infra/db/migrate.js';
import { loadSeedData, seed } from '../seed.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('seed', () => {
  const pool = createPool(process.env.DATABASE_URL);
  let courseCodes: string[];
  let usernames: string[];

  async function countRows(): Promise<{ courses: number; slots: number; enrollments: number }> {
    const result = await pool.query<{ courses: number; slots: number; enrollments: number }>(
      `SELECT
         (SELECT COUNT(*)::int FROM courses WHERE code = ANY($1)) AS courses,
         (SELECT COUNT(*)::int FROM course_time_slots s
            JOIN courses c ON c.id = s.course_id WHERE c.code = ANY($1)) AS slots,
         (SELECT COUNT(*)::int FROM enrollments e
            JOIN courses c ON c.id = e.course_id WHERE c.code = ANY($1)) AS enrollments`,
      [courseCodes]
    );
    return result.rows[0];
  }

  beforeAll(async () => {
    await runMigrations(pool);
    const data = await loadSeedData();
    courseCodes = data.courses.map((c) => c.code);
    usernames = data.users.map((u) => u.username);
  });

  afterAll(async () => {
    await pool.query('DELETE FROM courses WHERE code = ANY($1)', [courseCodes]);
    await pool.query('DELETE FROM users WHERE username = ANY($1)', [usernames]);
    await pool.end();
  });

  it('should leave the data unchanged when run a second time', async () => {
    await seed(pool, { clear: false });
    const first = await countRows();

    await expect(seed(pool, { clear: false })).resolves.toBeUndefined();

    expect(await countRows()).toEqual(first);
    expect(first.courses).toBe(courseCodes.length);
  });
});
