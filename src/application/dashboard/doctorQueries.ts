import { UserSummary, toSummary } from '../../domain/auth/user.js';
import { DoctorRecordView, countDistinct } from '../../domain/records/medicalRecord.js';
import { MedicalRecordRepository, UserRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface DoctorDashboard {
  doctor: UserSummary;
  records: DoctorRecordView[];
  stats: {
    totalRecords: number;
    uniquePatients: number;
  };
}

export interface PatientDetail {
  patient: UserSummary;
  /** Records written about this patient by the requesting doctor. */
  recordCount: number;
}

export const PATIENT_SEARCH_LIMIT = 20;
export const PATIENT_LIST_LIMIT = 100;

export class DoctorQueries {
  constructor(
    private userRepo: UserRepository,
    private recordRepo: MedicalRecordRepository
  ) {}

  async dashboard(doctorId: number): Promise<DoctorDashboard> {
    const doctor = await this.userRepo.findById(doctorId);
    if (!doctor) {
      throw new NotFoundError('Doctor not found');
    }

    const records = await this.recordRepo.listByDoctor(doctorId);

    return {
      doctor: toSummary(doctor),
      records,
      stats: {
        totalRecords: records.length,
        uniquePatients: countDistinct(records, (r) => r.patientId),
      },
    };
  }

  async listPatients(): Promise<UserSummary[]> {
    return this.userRepo.listByRole('patient', PATIENT_LIST_LIMIT);
  }

  async searchPatients(term: string): Promise<UserSummary[]> {
    return this.userRepo.searchByRole('patient', term, PATIENT_SEARCH_LIMIT);
  }

  async getPatient(doctorId: number, patientId: number): Promise<PatientDetail> {
    const patient = await this.userRepo.findById(patientId);
    if (!patient || patient.role !== 'patient') {
      throw new NotFoundError('Patient not found');
    }

    const recordCount = await this.recordRepo.countForPatientByDoctor(patientId, doctorId);
    return { patient: toSummary(patient), recordCount };
  }
}
