import { describe, it, expect, beforeEach } from 'vitest';
import { PatientQueries } from '../patientQueries.js';
import { NotFoundError } from '../../errors.js';
import {
  InMemoryMedicalRecordRepo,
  InMemoryUserRepo,
  createInMemoryRepos,
} from '../../../testing/inMemoryRepos.js';

describe('PatientQueries', () => {
  let userRepo: InMemoryUserRepo;
  let recordRepo: InMemoryMedicalRecordRepo;
  let queries: PatientQueries;
  let patientId: number;
  let houseId: number;
  let greyId: number;

  beforeEach(async () => {
    ({ userRepo, recordRepo } = createInMemoryRepos());
    queries = new PatientQueries(userRepo, recordRepo);

    const patient = await userRepo.create('pat@example.com', 'hash', 'patient');
    const house = await userRepo.create('house@example.com', 'hash', 'doctor');
    const grey = await userRepo.create('grey@example.com', 'hash', 'doctor');
    await userRepo.create('wilson@example.com', 'hash', 'doctor');
    patientId = patient?.id ?? 0;
    houseId = house?.id ?? 0;
    greyId = grey?.id ?? 0;
  });

  it('should summarise records and distinct doctors', async () => {
    await recordRepo.create({ doctorId: houseId, patientId, title: 'Diagnosis', notes: 'Lupus?' });
    await recordRepo.create({ doctorId: houseId, patientId, title: 'Revised', notes: 'Not lupus' });
    await recordRepo.create({ doctorId: greyId, patientId, title: 'Surgery', notes: '' });

    const dashboard = await queries.dashboard(patientId);

    expect(dashboard.patient.email).toBe('pat@example.com');
    expect(dashboard.records.map((r) => r.doctorEmail)).toEqual([
      'grey@example.com',
      'house@example.com',
      'house@example.com',
    ]);
    expect(dashboard.stats).toEqual({ totalRecords: 3, uniqueDoctors: 2 });
  });

  it('should show an empty dashboard for a new patient', async () => {
    const dashboard = await queries.dashboard(patientId);
    expect(dashboard.records).toEqual([]);
    expect(dashboard.stats).toEqual({ totalRecords: 0, uniqueDoctors: 0 });
  });

  it('should report a patient that no longer exists', async () => {
    await expect(queries.dashboard(404)).rejects.toThrow(NotFoundError);
  });

  it('should list visited doctors once each, by email', async () => {
    await recordRepo.create({ doctorId: houseId, patientId, title: 'One', notes: '' });
    await recordRepo.create({ doctorId: houseId, patientId, title: 'Two', notes: '' });
    await recordRepo.create({ doctorId: greyId, patientId, title: 'Three', notes: '' });

    const doctors = await queries.visitedDoctors(patientId);

    expect(doctors.map((d) => d.email)).toEqual(['grey@example.com', 'house@example.com']);
  });

  it('should search only doctors by email fragment', async () => {
    const doctors = await queries.searchDoctors('EXAMPLE');
    expect(doctors.map((d) => d.email)).toEqual([
      'grey@example.com',
      'house@example.com',
      'wilson@example.com',
    ]);
  });
});
