import { Router } from 'express';
import { z } from 'zod';
import { CreateRecordUseCase } from '../../../application/records/createRecord.js';
import { RecordQueries } from '../../../application/records/queries.js';
import { MedicalRecordRepository, UserRepository } from '../../../application/ports.js';
import { principalOf, requireAuth, requireRole } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/records:
 *   post:
 *     tags: [Records]
 *     summary: Create a medical record for a patient (doctors only)
 *     security: [{ cookieAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [patientEmail, title]
 *             properties:
 *               patientEmail: { type: string, format: email }
 *               title: { type: string }
 *               notes: { type: string }
 *     responses:
 *       201: { description: Record created }
 *       400:
 *         description: Missing title, or the email belongs to a doctor
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Not a doctor
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: No user with that email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Records]
 *     summary: Records written by the doctor, or about the patient, newest first
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: No live session
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const createRecordBodySchema = z.object({
  patientEmail: z.string().email(),
  title: z.string().min(1),
  notes: z.string().optional(),
});

export interface RecordRoutesDeps {
  userRepo: UserRepository;
  recordRepo: MedicalRecordRepository;
}

export function createRecordRoutes({ userRepo, recordRepo }: RecordRoutesDeps) {
  const router = Router();
  const createRecordUseCase = new CreateRecordUseCase(userRepo, recordRepo);
  const queries = new RecordQueries(recordRepo);

  router.post(
    '/',
    requireRole('doctor'),
    validate({ body: createRecordBodySchema }),
    asyncHandler(async (req, res) => {
      const { subjectId } = principalOf(req);
      const body = createRecordBodySchema.parse(req.body);
      const record = await createRecordUseCase.execute({ doctorId: subjectId, ...body });
      res.status(201).json(record);
    })
  );

  router.get(
    '/',
    requireAuth,
    asyncHandler(async (req, res) => {
      const { subjectId, role } = principalOf(req);
      const records =
        role === 'doctor' ? await queries.writtenBy(subjectId) : await queries.about(subjectId);
      res.json(records);
    })
  );

  return router;
}
