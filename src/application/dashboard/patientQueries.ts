import { UserSummary, toSummary } from '../../domain/auth/user.js';
import { PatientRecordView, countDistinct } from '../../domain/records/medicalRecord.js';
import { MedicalRecordRepository, UserRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface PatientDashboard {
  patient: UserSummary;
  records: PatientRecordView[];
  stats: {
    totalRecords: number;
    uniqueDoctors: number;
  };
}

export const DOCTOR_SEARCH_LIMIT = 20;

export class PatientQueries {
  constructor(
    private userRepo: UserRepository,
    private recordRepo: MedicalRecordRepository
  ) {}

  async dashboard(patientId: number): Promise<PatientDashboard> {
    const patient = await this.userRepo.findById(patientId);
    if (!patient) {
      throw new NotFoundError('Patient not found');
    }

    const records = await this.recordRepo.listByPatient(patientId);

    return {
      patient: toSummary(patient),
      records,
      stats: {
        totalRecords: records.length,
        uniqueDoctors: countDistinct(records, (r) => r.doctorId),
      },
    };
  }

  async searchDoctors(term: string): Promise<UserSummary[]> {
    return this.userRepo.searchByRole('doctor', term, DOCTOR_SEARCH_LIMIT);
  }

  /** Doctors who have written at least one record about the patient. */
  async visitedDoctors(patientId: number): Promise<UserSummary[]> {
    return this.userRepo.listDoctorsForPatient(patientId);
  }
}
