import { MedicalRecord } from '../../domain/records/medicalRecord.js';
import { MedicalRecordRepository, UserRepository } from '../ports.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface CreateRecordCommand {
  doctorId: number;
  patientEmail: string;
  title: string;
  notes?: string;
}

export class CreateRecordUseCase {
  constructor(
    private userRepo: UserRepository,
    private recordRepo: MedicalRecordRepository
  ) {}

  async execute(command: CreateRecordCommand): Promise<MedicalRecord> {
    const title = command.title.trim();
    if (!title) {
      throw new ValidationError('Title is required');
    }

    const patient = await this.userRepo.findByEmail(command.patientEmail);
    if (!patient) {
      throw new NotFoundError(`Patient with email '${command.patientEmail}' not found`);
    }
    if (patient.role !== 'patient') {
      throw new ValidationError(`User '${command.patientEmail}' is not a patient`);
    }

    return this.recordRepo.create({
      doctorId: command.doctorId,
      patientId: patient.id,
      title,
      notes: command.notes?.trim() ?? '',
    });
  }
}
