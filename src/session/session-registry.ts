/**
 * Session Registry
 *
 * Maps session ids to BrowserSessions, bounds how many are resident, evicts
 * the least recently active one when a new id would exceed capacity, and
 * routes explicit close, eviction and idle reaping through one teardown path.
 *
 * Map updates are synchronous. Admission reserves a slot and claims its
 * eviction victim in the same tick, so concurrent admissions never pick the
 * same victim and the map never grows past capacity. A victim stays in the
 * map until its browser has been released.
 */

import { randomUUID } from 'node:crypto';
import type { AutomationDriver } from '../browser/automation-driver.js';
import { SessionError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  BrowserSession,
  type OpenOverrides,
  type OpenResult,
  type SessionOptions,
  type SessionSummary,
  type TeardownReason,
} from './browser-session.js';

const logger = createLogger('session-registry');

/** Session id used when a tool call does not name one */
export const DEFAULT_SESSION_ID = 'default';

/** Default maximum resident sessions */
export const DEFAULT_CAPACITY = 10;

/** Default idle time before a session is reapable: 30 minutes */
export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

export type CloseStatus = 'closed' | 'already_closed';

export interface RegistryOptions {
  capacity: number;
  idleTimeoutMs: number;
  /** Create unknown ids on first reference (default: true) */
  autoCreate: boolean;
  session: SessionOptions;
}

export interface SessionActivity {
  id: string;
  lastActivityAt: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, BrowserSession>();
  private readonly pendingCreates = new Map<string, Promise<BrowserSession>>();
  private readonly closing = new Map<string, Promise<CloseStatus>>();
  private readonly evicting = new Set<string>();
  /** Admissions waiting for their victim's release */
  private readonly admissions = new Set<Promise<BrowserSession>>();
  private reserved = 0;

  constructor(
    private readonly driver: AutomationDriver,
    private readonly options: RegistryOptions,
    private readonly clock: () => number = Date.now
  ) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
  }

  get capacity(): number {
    return this.options.capacity;
  }

  get idleTimeoutMs(): number {
    return this.options.idleTimeoutMs;
  }

  get autoCreate(): boolean {
    return this.options.autoCreate;
  }

  /** Number of resident sessions, including ones whose release is in flight */
  get size(): number {
    return this.sessions.size;
  }

  has(id: string): boolean {
    return this.live(id) !== undefined;
  }

  /**
   * Return the session for `id`, creating an unopened one when absent.
   * Records activity on the returned session.
   */
  async resolve(id: string): Promise<BrowserSession> {
    const existing = this.live(id);
    if (existing) {
      existing.touch(this.clock());
      return existing;
    }

    let creation = this.pendingCreates.get(id);
    if (!creation) {
      creation = this.admit(id).finally(() => {
        this.pendingCreates.delete(id);
      });
      this.pendingCreates.set(id, creation);
    }

    const session = await creation;
    session.touch(this.clock());
    return session;
  }

  /**
   * Session lookup used by tool handlers. Creates unknown ids only when
   * autoCreate is on.
   *
   * @throws SessionError SESSION_NOT_FOUND for unknown ids when autoCreate is off
   */
  async acquire(id: string): Promise<BrowserSession> {
    if (this.options.autoCreate) {
      return this.resolve(id);
    }
    const session = this.live(id);
    if (!session) {
      throw SessionError.notFound(id);
    }
    session.touch(this.clock());
    return session;
  }

  /**
   * Generate a fresh id and register an unopened session under it.
   */
  async createSessionId(): Promise<string> {
    const id = randomUUID();
    await this.resolve(id);
    return id;
  }

  /**
   * Ensure the session's browser is open.
   */
  async open(id: string, overrides?: OpenOverrides): Promise<OpenResult> {
    const session = await this.resolve(id);
    return session.open(overrides);
  }

  /**
   * Release the session's browser and remove it. Unknown or already closed
   * ids report `already_closed`.
   */
  async close(id: string, reason: TeardownReason = 'closed'): Promise<CloseStatus> {
    const inflight = this.closing.get(id);
    if (inflight) {
      return inflight;
    }
    const session = this.sessions.get(id);
    if (!session) {
      return 'already_closed';
    }
    return this.closeEntry(id, session, reason);
  }

  /**
   * Close the session only if it is still idle at `now`.
   *
   * @returns whether a teardown was started
   */
  async closeIfIdle(id: string, now: number = this.clock()): Promise<boolean> {
    const session = this.live(id);
    if (!session || now - session.lastActivityAt <= this.options.idleTimeoutMs) {
      return false;
    }
    logger.info('Reaping idle session', {
      session_id: id,
      idle_seconds: Math.floor((now - session.lastActivityAt) / 1000),
    });
    await this.closeEntry(id, session, 'idle');
    return true;
  }

  list(): SessionSummary[] {
    const now = this.clock();
    return this.residents().map((session) => session.summary(now));
  }

  snapshotActivity(): SessionActivity[] {
    return this.residents().map((session) => ({
      id: session.id,
      lastActivityAt: session.lastActivityAt,
    }));
  }

  /**
   * Close every resident session.
   */
  async shutdown(): Promise<void> {
    const ids = [...this.sessions.keys()];
    logger.info('Closing all sessions', { count: ids.length });
    await Promise.all(ids.map((id) => this.close(id, 'shutdown')));
    await Promise.all([...this.closing.values()]);
  }

  /** Resident session not on its way out */
  private live(id: string): BrowserSession | undefined {
    return this.isLeaving(id) ? undefined : this.sessions.get(id);
  }

  private isLeaving(id: string): boolean {
    return this.evicting.has(id) || this.closing.has(id);
  }

  private residents(): BrowserSession[] {
    return [...this.sessions.values()].filter((session) => !this.isLeaving(session.id));
  }

  /** Resident count with claimed victims already gone and reservations placed */
  private occupancy(): number {
    return this.sessions.size - this.evicting.size + this.reserved;
  }

  private async admit(id: string): Promise<BrowserSession> {
    const inflight = this.closing.get(id);
    if (inflight) {
      await inflight;
    }

    for (;;) {
      const existing = this.live(id);
      if (existing) {
        return existing;
      }

      if (this.occupancy() < this.options.capacity) {
        return this.insert(id);
      }

      const victim = this.pickVictim();
      if (victim) {
        return this.evictFor(id, victim);
      }

      // Every resident is already claimed by another admission
      await Promise.race([...this.closing.values(), ...this.admissions]);
    }
  }

  /**
   * Release `victim` and insert `id` in its slot. The slot stays reserved
   * until the insert, so no other admission can take it in between.
   */
  private evictFor(id: string, victim: BrowserSession): Promise<BrowserSession> {
    this.reserved++;
    this.evicting.add(victim.id);
    logger.notice('Evicting least recently active session', {
      session_id: victim.id,
      for_session_id: id,
      capacity: this.options.capacity,
    });

    const run = async (): Promise<BrowserSession> => {
      try {
        await this.closeEntry(victim.id, victim, 'evicted');
        return this.insert(id);
      } finally {
        this.reserved--;
        this.admissions.delete(admission);
      }
    };
    const admission: Promise<BrowserSession> = run();
    this.admissions.add(admission);
    return admission;
  }

  private insert(id: string): BrowserSession {
    const session = new BrowserSession(id, this.driver, this.options.session, this.clock());
    this.sessions.set(id, session);
    logger.debug('Session created', { session_id: id, resident: this.sessions.size });
    return session;
  }

  /**
   * A session already being closed if there is one, otherwise the oldest
   * lastActivityAt among unclaimed sessions. Ties go to the earliest inserted.
   */
  private pickVictim(): BrowserSession | undefined {
    let victim: BrowserSession | undefined;
    for (const session of this.sessions.values()) {
      if (this.evicting.has(session.id)) {
        continue;
      }
      if (this.closing.has(session.id)) {
        return session;
      }
      if (!victim || session.lastActivityAt < victim.lastActivityAt) {
        victim = session;
      }
    }
    return victim;
  }

  private closeEntry(
    id: string,
    session: BrowserSession,
    reason: TeardownReason
  ): Promise<CloseStatus> {
    const inflight = this.closing.get(id);
    if (inflight) {
      return inflight;
    }

    const teardown = (async (): Promise<CloseStatus> => {
      try {
        const released = await session.close(reason, { final: true });
        return released ? 'closed' : 'already_closed';
      } finally {
        if (this.sessions.get(id) === session) {
          this.sessions.delete(id);
        }
        this.evicting.delete(id);
        this.closing.delete(id);
      }
    })();

    this.closing.set(id, teardown);
    return teardown;
  }
}
