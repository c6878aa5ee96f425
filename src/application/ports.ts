import { Role, User, UserSummary } from '../domain/auth/user.js';
import {
  DoctorRecordView,
  MedicalRecord,
  NewMedicalRecord,
  PatientRecordView,
} from '../domain/records/medicalRecord.js';

/**
 * Persistence seams used by the use cases. `UserRepo` and
 * `MedicalRecordRepo` implement them over PostgreSQL.
 */
export interface UserRepository {
  /** Returns null when the email is already registered. */
  create(email: string, passwordHash: string, role: Role): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  updatePasswordHash(id: number, passwordHash: string): Promise<void>;
  searchByRole(role: Role, term: string, limit?: number): Promise<UserSummary[]>;
  listByRole(role: Role, limit?: number): Promise<UserSummary[]>;
  listDoctorsForPatient(patientId: number): Promise<UserSummary[]>;
}

export interface MedicalRecordRepository {
  create(record: NewMedicalRecord): Promise<MedicalRecord>;
  listByDoctor(doctorId: number): Promise<DoctorRecordView[]>;
  listByPatient(patientId: number): Promise<PatientRecordView[]>;
  countForPatientByDoctor(patientId: number, doctorId: number): Promise<number>;
}
