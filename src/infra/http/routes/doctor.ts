import { Router } from 'express';
import { z } from 'zod';
import { DoctorQueries } from '../../../application/dashboard/doctorQueries.js';
import { MedicalRecordRepository, UserRepository } from '../../../application/ports.js';
import { principalOf, requireRole } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/doctor/dashboard:
 *   get:
 *     tags: [Doctor]
 *     summary: Doctor profile, records written and stats
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: No live session
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Not a doctor
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/doctor/patients:
 *   get:
 *     tags: [Doctor]
 *     summary: List patients, or search them by email when q is given
 *     security: [{ cookieAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: q
 *         schema: { type: string }
 *     responses:
 *       200: { description: OK }
 *
 * /api/doctor/patients/{id}:
 *   get:
 *     tags: [Doctor]
 *     summary: A patient and how many records this doctor has written about them
 *     security: [{ cookieAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Patient not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const searchQuerySchema = z.object({
  q: z.string().trim().optional(),
});

const patientParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export interface DoctorRoutesDeps {
  userRepo: UserRepository;
  recordRepo: MedicalRecordRepository;
}

export function createDoctorRoutes({ userRepo, recordRepo }: DoctorRoutesDeps) {
  const router = Router();
  const queries = new DoctorQueries(userRepo, recordRepo);

  router.use(requireRole('doctor'));

  router.get(
    '/dashboard',
    asyncHandler(async (req, res) => {
      const { subjectId } = principalOf(req);
      res.json(await queries.dashboard(subjectId));
    })
  );

  router.get(
    '/patients',
    validate({ query: searchQuerySchema }),
    asyncHandler(async (req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      const patients = q ? await queries.searchPatients(q) : await queries.listPatients();
      res.json(patients);
    })
  );

  router.get(
    '/patients/:id',
    validate({ params: patientParamsSchema }),
    asyncHandler(async (req, res) => {
      const { subjectId } = principalOf(req);
      const { id } = patientParamsSchema.parse(req.params);
      res.json(await queries.getPatient(subjectId, id));
    })
  );

  return router;
}
