import { Password } from '../../domain/auth/password.js';
import { SessionRegistry } from '../../domain/auth/sessionRegistry.js';
import { Role } from '../../domain/auth/user.js';
import { Logger } from '../../infra/logging/logger.js';
import { UserRepository } from '../ports.js';
import { UnauthorizedError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
  userId: number;
  email: string;
  role: Role;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private sessions: SessionRegistry,
    private logger: Logger
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new UnauthorizedError('Invalid email or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError('Invalid email or password');
    }

    if (Password.needsRehash(user.passwordHash)) {
      const upgraded = await Password.hash(command.password);
      await this.userRepo.updatePasswordHash(user.id, upgraded);
      this.logger.info({ userId: user.id }, 'Upgraded stored credential');
    }

    const token = this.sessions.create(user.id, user.role);
    this.logger.info({ userId: user.id, role: user.role }, 'Session created');

    return {
      token,
      userId: user.id,
      email: user.email,
      role: user.role,
    };
  }
}
