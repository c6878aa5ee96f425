import { pool, isUniqueViolation } from './pool.js';
import { Role, User, UserSummary, isRole } from '../../domain/auth/user.js';
import { UserRepository } from '../../application/ports.js';

interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  role: string;
  created_at: Date;
}

type UserSummaryRow = Omit<UserRow, 'password_hash'>;

function toRole(value: string): Role {
  if (!isRole(value)) {
    throw new Error(`Unknown role in users table: ${value}`);
  }
  return value;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    role: toRole(row.role),
    createdAt: row.created_at,
  };
}

function toUserSummary(row: UserSummaryRow): UserSummary {
  return {
    id: row.id,
    email: row.email,
    role: toRole(row.role),
    createdAt: row.created_at,
  };
}

/** Escape LIKE wildcards so the term matches literally. */
export function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export class UserRepo implements UserRepository {
  async create(email: string, passwordHash: string, role: Role): Promise<User | null> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await client.query<UserRow>(
        `INSERT INTO users (email, password_hash, role)
         VALUES ($1, $2, $3)
         RETURNING id, email, password_hash, role, created_at`,
        [email, passwordHash, role]
      );
      await client.query('COMMIT');
      return toUser(result.rows[0]);
    } catch (error) {
      await client.query('ROLLBACK');
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await pool.query<UserRow>(
      'SELECT id, email, password_hash, role, created_at FROM users WHERE email = $1',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    const result = await pool.query<UserRow>(
      'SELECT id, email, password_hash, role, created_at FROM users WHERE id = $1',
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    await pool.query('UPDATE users SET password_hash = $2 WHERE id = $1', [id, passwordHash]);
  }

  async searchByRole(role: Role, term: string, limit = 20): Promise<UserSummary[]> {
    const result = await pool.query<UserSummaryRow>(
      `SELECT id, email, role, created_at
       FROM users
       WHERE role = $1 AND email ILIKE $2
       ORDER BY email
       LIMIT $3`,
      [role, likePattern(term), limit]
    );
    return result.rows.map(toUserSummary);
  }

  async listByRole(role: Role, limit = 100): Promise<UserSummary[]> {
    const result = await pool.query<UserSummaryRow>(
      `SELECT id, email, role, created_at
       FROM users
       WHERE role = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [role, limit]
    );
    return result.rows.map(toUserSummary);
  }

  async listDoctorsForPatient(patientId: number): Promise<UserSummary[]> {
    const result = await pool.query<UserSummaryRow>(
      `SELECT DISTINCT u.id, u.email, u.role, u.created_at
       FROM users u
       INNER JOIN medical_records mr ON u.id = mr.doctor_id
       WHERE mr.patient_id = $1 AND u.role = 'doctor'
       ORDER BY u.email`,
      [patientId]
    );
    return result.rows.map(toUserSummary);
  }
}
