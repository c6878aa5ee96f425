export interface MedicalRecord {
  readonly id: number;
  readonly doctorId: number;
  readonly patientId: number;
  readonly title: string;
  readonly notes: string;
  readonly createdAt: Date;
}

export interface NewMedicalRecord {
  doctorId: number;
  patientId: number;
  title: string;
  notes: string;
}

/** A record as listed for the doctor who wrote it. */
export interface DoctorRecordView {
  readonly id: number;
  readonly title: string;
  readonly notes: string;
  readonly createdAt: Date;
  readonly patientId: number;
  readonly patientEmail: string;
}

/** A record as listed for the patient it is about. */
export interface PatientRecordView {
  readonly id: number;
  readonly title: string;
  readonly notes: string;
  readonly createdAt: Date;
  readonly doctorId: number;
  readonly doctorEmail: string;
}

export function countDistinct<T>(items: readonly T[], key: (item: T) => number): number {
  return new Set(items.map(key)).size;
}
