import { Router } from 'express';
import { z } from 'zod';
import { EnrollUseCase } from '../../../application/enrollment/enroll.js';
import { WithdrawUseCase } from '../../../application/enrollment/withdraw.js';
import { EnrollmentQueries } from '../../../application/enrollment/queries.js';
import type { CourseQueryStore, TransactionRunner } from '../../../application/enrollment/ports.js';
import { authMiddleware, getAuth, requireRole } from '../middleware/auth.js';
import { idParamSchema, idSchema, validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { presentEnrollment, presentScheduleEntry } from '../presenters.js';

/**
 * @openapi
 * /api/enrollments/my-courses:
 *   get:
 *     tags: [Enrollments]
 *     summary: Alias of GET /api/enrollments
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *
 * /api/enrollments:
 *   get:
 *     tags: [Enrollments]
 *     summary: The caller's current schedule
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Enrollments]
 *     summary: Enroll in a course
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [courseId]
 *             properties:
 *               courseId: { type: integer, minimum: 1, maximum: 2147483647, example: 1 }
 *     responses:
 *       201: { description: Enrolled }
 *       404:
 *         description: Course not found (COURSE_NOT_FOUND)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: ALREADY_ENROLLED, COURSE_FULL or TIME_CONFLICT
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: MAX_COURSE_LIMIT_REACHED
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/enrollments/{id}:
 *   delete:
 *     tags: [Enrollments]
 *     summary: Withdraw from a course
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer, minimum: 1, maximum: 2147483647 }
 *     responses:
 *       200: { description: Withdrawn }
 *       404:
 *         description: ENROLLMENT_NOT_FOUND (also for other students' enrollments)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: MIN_COURSE_LIMIT_REACHED
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const enrollBodySchema = z.object({
  courseId: idSchema,
});

const withdrawParamsSchema = z.object({
  id: idParamSchema,
});

export interface EnrollmentRouteDependencies {
  transactions: TransactionRunner;
  courseQueries: CourseQueryStore;
  jwtSecret: string;
}

export function createEnrollmentRoutes({
  transactions,
  courseQueries,
  jwtSecret,
}: EnrollmentRouteDependencies) {
  const router = Router();
  const enrollUseCase = new EnrollUseCase(transactions);
  const withdrawUseCase = new WithdrawUseCase(transactions);
  const queries = new EnrollmentQueries(courseQueries);

  // Enrollment is for students only
  router.use(authMiddleware(jwtSecret), requireRole('student'));

  const listSchedule = asyncHandler(async (req, res) => {
    const schedule = await queries.getSchedule(getAuth(req).userId);
    res.json(schedule.map(presentScheduleEntry));
  });

  router.get('/', listSchedule);
  router.get('/my-courses', listSchedule);

  router.post(
    '/',
    validate({ body: enrollBodySchema }),
    asyncHandler(async (req, res) => {
      const { courseId } = enrollBodySchema.parse(req.body);
      const enrollment = await enrollUseCase.execute({
        studentId: getAuth(req).userId,
        courseId,
      });
      res.status(201).json(presentEnrollment(enrollment));
    })
  );

  router.delete(
    '/:id',
    validate({ params: withdrawParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = withdrawParamsSchema.parse(req.params);
      const result = await withdrawUseCase.execute({
        studentId: getAuth(req).userId,
        enrollmentId: id,
      });
      res.json(result);
    })
  );

  return router;
}
