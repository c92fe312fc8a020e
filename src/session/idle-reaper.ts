/**
 * Idle Reaper
 *
 * Periodically closes sessions that have not been used for longer than the
 * registry's idle timeout. Runs independently of tool calls; a session
 * touched between the snapshot and its teardown is left alone.
 */

import { createLogger } from '../shared/services/logging.service.js';
import type { SessionRegistry } from './session-registry.js';

const logger = createLogger('idle-reaper');

/** Default sweep interval: 5 minutes */
export const DEFAULT_REAP_INTERVAL_MS = 5 * 60 * 1000;

export type ReapableRegistry = Pick<
  SessionRegistry,
  'snapshotActivity' | 'closeIfIdle' | 'idleTimeoutMs'
>;

export interface IdleReaperOptions {
  intervalMs?: number;
  clock?: () => number;
}

export class IdleReaper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping: Promise<string[]> | null = null;
  private readonly intervalMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly registry: ReapableRegistry,
    options: IdleReaperOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_REAP_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Start periodic sweeps. Calling start on a running reaper does nothing.
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    // Don't keep the process alive just for sweeps
    this.timer.unref();

    logger.debug('Idle reaper started', {
      interval_ms: this.intervalMs,
      idle_timeout_ms: this.registry.idleTimeoutMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.debug('Idle reaper stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Close every session idle beyond the timeout.
   * Overlapping calls share the sweep already in progress.
   *
   * @returns ids of the sessions that were closed
   */
  sweep(): Promise<string[]> {
    this.sweeping ??= this.runSweep().finally(() => {
      this.sweeping = null;
    });
    return this.sweeping;
  }

  private async tick(): Promise<void> {
    try {
      const reaped = await this.sweep();
      if (reaped.length > 0) {
        logger.info('Idle sessions reaped', { count: reaped.length, session_ids: reaped });
      }
    } catch (error) {
      logger.error('Idle sweep failed', error instanceof Error ? error : undefined);
    }
  }

  private async runSweep(): Promise<string[]> {
    const now = this.clock();
    const idleTimeout = this.registry.idleTimeoutMs;
    const candidates = this.registry
      .snapshotActivity()
      .filter((entry) => now - entry.lastActivityAt > idleTimeout);

    const results = await Promise.allSettled(
      candidates.map(async (entry) => {
        const closed = await this.registry.closeIfIdle(entry.id, now);
        return closed ? entry.id : null;
      })
    );

    const reaped: string[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        if (result.value !== null) {
          reaped.push(result.value);
        }
      } else {
        logger.warning('Failed to reap idle session', {
          session_id: candidates[i].id,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
    return reaped;
  }
}
