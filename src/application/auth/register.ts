import { Password } from '../../domain/auth/password.js';
import { Role } from '../../domain/auth/user.js';
import { UserRepository } from '../ports.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  password: string;
  role: Role;
}

export interface RegisterResult {
  userId: number;
  email: string;
  role: Role;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('Email already registered');
    }

    const passwordHash = await Password.hash(command.password);

    // The unique index still decides when two registrations race.
    const user = await this.userRepo.create(command.email, passwordHash, command.role);
    if (!user) {
      throw new ConflictError('Email already registered');
    }

    return {
      userId: user.id,
      email: user.email,
      role: user.role,
    };
  }
}
