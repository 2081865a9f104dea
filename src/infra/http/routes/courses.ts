import { Router } from 'express';
import { z } from 'zod';
import { COURSE_TYPES } from '../../../domain/enrollment/course.js';
import { CatalogQueries } from '../../../application/catalog/queries.js';
import { CheckConflictUseCase } from '../../../application/enrollment/checkConflict.js';
import type { CourseQueryStore, TransactionRunner } from '../../../application/enrollment/ports.js';
import { NotFoundError } from '../../../application/errors.js';
import { authMiddleware, getAuth, requireRole } from '../middleware/auth.js';
import { idParamSchema, validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { presentCourse } from '../presenters.js';

/**
 * @openapi
 * /api/courses:
 *   get:
 *     tags: [Courses]
 *     summary: List courses with enrollment counts and time slots
 *     parameters:
 *       - in: query
 *         name: search
 *         schema: { type: string }
 *         description: Case-insensitive match on course name
 *       - in: query
 *         name: type
 *         schema: { type: string, enum: [required, elective] }
 *       - in: query
 *         name: semester
 *         schema: { type: string }
 *     responses:
 *       200: { description: OK }
 *
 * /api/courses/{id}:
 *   get:
 *     tags: [Courses]
 *     summary: Get one course
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer, minimum: 1, maximum: 2147483647 }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Course not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/courses/{id}/conflict:
 *   get:
 *     tags: [Courses]
 *     summary: Check whether a course clashes with the caller's schedule
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer, minimum: 1, maximum: 2147483647 }
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Caller is not a student
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Course not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const listCoursesQuerySchema = z.object({
  search: z.string().optional(),
  type: z.enum(COURSE_TYPES).optional(),
  semester: z.string().min(1).optional(),
});

const courseParamsSchema = z.object({
  id: idParamSchema,
});

export interface CourseRouteDependencies {
  courseQueries: CourseQueryStore;
  transactions: TransactionRunner;
  jwtSecret: string;
}

export function createCourseRoutes({ courseQueries, transactions, jwtSecret }: CourseRouteDependencies) {
  const router = Router();
  const catalog = new CatalogQueries(courseQueries);
  const checkConflictUseCase = new CheckConflictUseCase(transactions);

  router.get(
    '/',
    validate({ query: listCoursesQuerySchema }),
    asyncHandler(async (req, res) => {
      const filter = listCoursesQuerySchema.parse(req.query);
      const { count, results } = await catalog.listCourses(filter);
      res.json({ count, results: results.map(presentCourse) });
    })
  );

  router.get(
    '/:id',
    validate({ params: courseParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = courseParamsSchema.parse(req.params);
      const course = await catalog.getCourse(id);
      if (!course) {
        throw new NotFoundError('Course not found');
      }
      res.json(presentCourse(course));
    })
  );

  router.get(
    '/:id/conflict',
    authMiddleware(jwtSecret),
    requireRole('student'),
    validate({ params: courseParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = courseParamsSchema.parse(req.params);
      const result = await checkConflictUseCase.execute({
        studentId: getAuth(req).userId,
        courseId: id,
      });
      res.json(result);
    })
  );

  return router;
}
