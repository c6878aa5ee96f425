import { pool } from './pool.js';
import {
  DoctorRecordView,
  MedicalRecord,
  NewMedicalRecord,
  PatientRecordView,
} from '../../domain/records/medicalRecord.js';
import { MedicalRecordRepository } from '../../application/ports.js';

export class MedicalRecordRepo implements MedicalRecordRepository {
  async create(record: NewMedicalRecord): Promise<MedicalRecord> {
    const result = await pool.query<{
      id: number;
      doctor_id: number;
      patient_id: number;
      title: string;
      notes: string;
      created_at: Date;
    }>(
      `INSERT INTO medical_records (doctor_id, patient_id, title, notes)
       VALUES ($1, $2, $3, $4)
       RETURNING id, doctor_id, patient_id, title, notes, created_at`,
      [record.doctorId, record.patientId, record.title, record.notes]
    );

    const row = result.rows[0];
    return {
      id: row.id,
      doctorId: row.doctor_id,
      patientId: row.patient_id,
      title: row.title,
      notes: row.notes,
      createdAt: row.created_at,
    };
  }

  async listByDoctor(doctorId: number): Promise<DoctorRecordView[]> {
    const result = await pool.query<{
      id: number;
      title: string;
      notes: string;
      created_at: Date;
      patient_id: number;
      patient_email: string;
    }>(
      `SELECT mr.id, mr.title, mr.notes, mr.created_at,
              mr.patient_id, u.email AS patient_email
       FROM medical_records mr
       JOIN users u ON mr.patient_id = u.id
       WHERE mr.doctor_id = $1
       ORDER BY mr.created_at DESC, mr.id DESC`,
      [doctorId]
    );

    return result.rows.map((row) => ({
      id: row.id,
      title: row.title,
      notes: row.notes,
      createdAt: row.created_at,
      patientId: row.patient_id,
      patientEmail: row.patient_email,
    }));
  }

  async listByPatient(patientId: number): Promise<PatientRecordView[]> {
    const result = await pool.query<{
      id: number;
      title: string;
      notes: string;
      created_at: Date;
      doctor_id: number;
      doctor_email: string;
    }>(
      `SELECT mr.id, mr.title, mr.notes, mr.created_at,
              mr.doctor_id, u.email AS doctor_email
       FROM medical_records mr
       JOIN users u ON mr.doctor_id = u.id
       WHERE mr.patient_id = $1
       ORDER BY mr.created_at DESC, mr.id DESC`,
      [patientId]
    );

    return result.rows.map((row) => ({
      id: row.id,
      title: row.title,
      notes: row.notes,
      createdAt: row.created_at,
      doctorId: row.doctor_id,
      doctorEmail: row.doctor_email,
    }));
  }

  async countForPatientByDoctor(patientId: number, doctorId: number): Promise<number> {
    // COUNT(*) is bigint; pg hands it back as a string
    const result = await pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count
       FROM medical_records
       WHERE patient_id = $1 AND doctor_id = $2`,
      [patientId, doctorId]
    );
    return Number(result.rows[0]?.count ?? 0);
  }
}
