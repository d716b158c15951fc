/**
 * Tick Scheduler
 *
 * The host delivers a tick every TICK_GRANULARITY_MS. Extensions register
 * periodic actions while their configuration is parsed; the registrations
 * are staged in a TickRegistry and frozen into a TickScheduler at start.
 */

import type { ExtensionLogger } from '../logging/logger.js';

export const TICK_GRANULARITY_MS = 100;

export type TickAction = () => void;

export interface TickEntry {
  lastFired: number;
  readonly periodMs: number;
  readonly action: TickAction;
}

/**
 * Collects tick registrations made during config parsing.
 */
export class TickRegistry {
  private staged: TickEntry[] = [];
  private readonly logger: ExtensionLogger;

  constructor(logger: ExtensionLogger) {
    this.logger = logger;
  }

  /**
   * Run `action` every `periodMs` milliseconds. The period should be a
   * multiple of TICK_GRANULARITY_MS; shorter periods fire on every tick.
   */
  register(periodMs: number, action: TickAction): void {
    if (!Number.isInteger(periodMs) || periodMs <= 0) {
      throw new RangeError(`Tick period must be a positive integer, got ${periodMs}`);
    }
    if (periodMs % TICK_GRANULARITY_MS !== 0) {
      this.logger.warn('Tick period is not a multiple of the tick granularity', {
        periodMs,
        granularityMs: TICK_GRANULARITY_MS,
      });
    }
    this.staged.push({ lastFired: 0, periodMs, action });
  }

  get size(): number {
    return this.staged.length;
  }

  /** Hand over the staged entries and leave the registry empty. */
  drain(): TickEntry[] {
    const entries = this.staged;
    this.staged = [];
    return entries;
  }
}

export class TickScheduler {
  private readonly entries: readonly TickEntry[];

  constructor(entries: readonly TickEntry[]) {
    this.entries = Object.freeze([...entries]);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Evaluate every entry in registration order. The clock is read per entry,
   * so a slow action delays the entries after it. Errors thrown by an action
   * propagate to the caller.
   */
  tick(clock: () => number): number {
    let fired = 0;
    for (const entry of this.entries) {
      const now = clock();
      if (now - entry.lastFired >= entry.periodMs) {
        entry.lastFired = now;
        fired++;
        entry.action();
      }
    }
    return fired;
  }
}
