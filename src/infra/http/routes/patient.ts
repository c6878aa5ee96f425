import { Router } from 'express';
import { z } from 'zod';
import { PatientQueries } from '../../../application/dashboard/patientQueries.js';
import { MedicalRecordRepository, UserRepository } from '../../../application/ports.js';
import { principalOf, requireRole } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/patient/dashboard:
 *   get:
 *     tags: [Patient]
 *     summary: Patient profile, records about them and stats
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Not a patient
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/patient/doctors:
 *   get:
 *     tags: [Patient]
 *     summary: Search doctors by email, or list doctors already visited when q is absent
 *     security: [{ cookieAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: q
 *         schema: { type: string }
 *     responses:
 *       200: { description: OK }
 */

const searchQuerySchema = z.object({
  q: z.string().trim().optional(),
});

export interface PatientRoutesDeps {
  userRepo: UserRepository;
  recordRepo: MedicalRecordRepository;
}

export function createPatientRoutes({ userRepo, recordRepo }: PatientRoutesDeps) {
  const router = Router();
  const queries = new PatientQueries(userRepo, recordRepo);

  router.use(requireRole('patient'));

  router.get(
    '/dashboard',
    asyncHandler(async (req, res) => {
      const { subjectId } = principalOf(req);
      res.json(await queries.dashboard(subjectId));
    })
  );

  router.get(
    '/doctors',
    validate({ query: searchQuerySchema }),
    asyncHandler(async (req, res) => {
      const { subjectId } = principalOf(req);
      const { q } = searchQuerySchema.parse(req.query);
      const doctors = q
        ? await queries.searchDoctors(q)
        : await queries.visitedDoctors(subjectId);
      res.json(doctors);
    })
  );

  return router;
}
