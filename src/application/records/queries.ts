import { DoctorRecordView, PatientRecordView } from '../../domain/records/medicalRecord.js';
import { MedicalRecordRepository } from '../ports.js';

export class RecordQueries {
  constructor(private recordRepo: MedicalRecordRepository) {}

  async writtenBy(doctorId: number): Promise<DoctorRecordView[]> {
    return this.recordRepo.listByDoctor(doctorId);
  }

  async about(patientId: number): Promise<PatientRecordView[]> {
    return this.recordRepo.listByPatient(patientId);
  }
}
