import { CookieOptions, Request, Response, NextFunction } from 'express';
import { SessionPrincipal, SessionRegistry } from '../../../domain/auth/sessionRegistry.js';
import { Role } from '../../../domain/auth/user.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';

export const SESSION_COOKIE = 'session_token';

export interface AuthRequest extends Request {
  auth?: SessionPrincipal;
}

export interface SessionCookieSettings {
  secure: boolean;
  /** Never longer than the registry's TTL. */
  maxAgeMs: number;
}

/**
 * Options for the session cookie: hidden from scripts, same-site only.
 */
export function sessionCookieOptions(settings: SessionCookieSettings): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: settings.secure,
    path: '/',
    maxAge: settings.maxAgeMs,
  };
}

/** clearCookie must match path/flags but takes no maxAge. */
export function clearSessionCookie(res: Response, settings: SessionCookieSettings): void {
  res.clearCookie(SESSION_COOKIE, {
    httpOnly: true,
    sameSite: 'lax',
    secure: settings.secure,
    path: '/',
  });
}

export function readSessionToken(req: Request): string | undefined {
  const value: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Resolve the session cookie, if any, into `req.auth`. Never rejects a
 * request; guards below decide. A cookie naming an unknown or expired session
 * is cleared.
 */
export function authenticate(sessions: SessionRegistry, cookie: SessionCookieSettings) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const token = readSessionToken(req);
    if (token) {
      const principal = sessions.get(token);
      if (principal) {
        req.auth = principal;
      } else {
        clearSessionCookie(res, cookie);
      }
    }
    next();
  };
}

export function requireAuth(req: AuthRequest, _res: Response, next: NextFunction): void {
  if (!req.auth) {
    next(new UnauthorizedError('Authentication required'));
    return;
  }
  next();
}

const ROLE_LABELS: Record<Role, string> = {
  doctor: 'Doctor',
  patient: 'Patient',
};

export function requireRole(role: Role) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    if (!req.auth) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }
    if (req.auth.role !== role) {
      next(new ForbiddenError(`Access denied. ${ROLE_LABELS[role]} role required.`));
      return;
    }
    next();
  };
}

/**
 * The principal attached by `authenticate`. Handlers behind a guard call
 * this instead of asserting `req.auth`.
 */
export function principalOf(req: AuthRequest): SessionPrincipal {
  if (!req.auth) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.auth;
}
