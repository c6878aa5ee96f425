export const ROLES = ['doctor', 'patient'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

/**
 * Registered user. `passwordHash` is a credential produced by `Password.hash`
 * (or a legacy `salt:digest` credential awaiting upgrade).
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly createdAt: Date;
}

/**
 * User as exposed to other users and API responses (no credential).
 */
export type UserSummary = Omit<User, 'passwordHash'>;

export function toSummary(user: User): UserSummary {
  return {
    id: user.id,
    email: user.email,
    role: user.role,
    createdAt: user.createdAt,
  };
}
