import { randomBytes } from 'crypto';
import { Role } from './user.js';

/** Milliseconds since the epoch. */
export type Clock = () => number;

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

/** 48 bytes encode to exactly 64 base64url characters. */
const TOKEN_BYTES = 48;

/**
 * Identity resolved from a live session.
 */
export interface SessionPrincipal {
  readonly subjectId: number;
  readonly role: Role;
}

interface SessionEntry extends SessionPrincipal {
  readonly createdAt: number;
}

export interface SessionRegistryOptions {
  ttlMs?: number;
  clock?: Clock;
}

/**
 * In-memory session table keyed by opaque bearer tokens.
 *
 * Expiry is lazy: an entry older than the TTL is removed the first time it is
 * read, or by `sweepExpired` when a reaper is running. Nothing is persisted,
 * so a process restart logs everyone out.
 *
 * Every method is synchronous, so on the event loop each call completes
 * before another handler can touch the map.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: SessionRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(subjectId: number, role: Role): string {
    let token = generateToken();
    // Never hand out a token that is still live.
    while (this.sessions.has(token)) {
      token = generateToken();
    }
    this.sessions.set(token, { subjectId, role, createdAt: this.clock() });
    return token;
  }

  get(token: string): SessionPrincipal | null {
    const entry = this.sessions.get(token);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry, this.clock())) {
      this.sessions.delete(token);
      return null;
    }

    return { subjectId: entry.subjectId, role: entry.role };
  }

  delete(token: string): void {
    this.sessions.delete(token);
  }

  /**
   * Remove every expired entry. Returns how many were removed.
   */
  sweepExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [token, entry] of this.sessions) {
      if (this.isExpired(entry, now)) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Run `sweepExpired` every `intervalMs`. The timer does not keep the process
   * alive. Returns a function that stops it; a non-positive interval starts
   * nothing.
   */
  startReaper(intervalMs: number, onSweep?: (removed: number) => void): () => void {
    if (intervalMs <= 0) {
      return () => {};
    }

    const timer = setInterval(() => {
      const removed = this.sweepExpired();
      onSweep?.(removed);
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }

  private isExpired(entry: SessionEntry, now: number): boolean {
    return now - entry.createdAt >= this.ttlMs;
  }
}

function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}
