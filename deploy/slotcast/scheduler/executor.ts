/**
 * Executor - the periodic unit of work
 *
 * Per invocation:
 *   idle -> lock_acquired -> recovery_swept -> slot_selected -> publishing
 *        -> completed | failed -> idle
 *
 * A held lock is not a failure: the invocation reports `locked` and exits.
 * Store and allocator errors are caught and reported in the result; the
 * lock is released on every path.
 *
 * @module deploy/slotcast/scheduler/executor
 */

import {
  LockHeldError,
  PublishTimeoutError,
  RunTimeoutError,
  errorMessage,
} from '../errors.js';
import type { HealthMonitor, HealthReport } from '../health/health-monitor.js';
import type { LockManager } from '../lock/lock-manager.js';
import type { ScheduleStore } from '../store/schedule-store.js';
import {
  systemClock,
  type Clock,
  type EntryError,
  type Publisher,
  type PublishReceipt,
  type ScheduleEntry,
} from '../types.js';
import type { RecoverySweeper, SweepResult } from './recovery-sweeper.js';
import type { RetryPolicy } from './retry-policy.js';

// =============================================================================
// Interfaces
// =============================================================================

export interface ExecutorConfig {
  /** Bound on a single Publisher call (default: 180s) */
  publishTimeoutMs: number;
  /** Bound on a whole invocation (default: 300s) */
  runTimeoutMs: number;
  verbose: boolean;
}

export interface ExecutorDeps {
  store: ScheduleStore;
  lock: LockManager;
  sweeper: RecoverySweeper;
  policy: RetryPolicy;
  publisher: Publisher;
  health?: HealthMonitor;
  clock?: Clock;
}

export type RunMode = 'run' | 'catch_up' | 'recover';

export type RunStatus =
  | 'locked'
  | 'no_action'
  | 'recovered'
  | 'posted'
  | 'retry_scheduled'
  | 'failed'
  | 'error';

export interface SlotOutcome {
  entryId: string;
  contentKey: string;
  scheduledTime: string;
  status: 'posted' | 'retry_scheduled' | 'failed';
  attemptCount: number;
  externalPostId?: string;
  error?: EntryError;
}

export interface RunResult {
  mode: RunMode;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  sweep: SweepResult | null;
  slots: SlotOutcome[];
  /** Set for `error`, for a run timeout, and for `locked` */
  message?: string;
  health?: HealthReport;
}

interface RunProgress {
  sweep: SweepResult | null;
  slots: SlotOutcome[];
  /** Entries already attempted in this invocation; a retry waits for the next one */
  attempted: Set<string>;
}

export const DEFAULT_EXECUTOR_CONFIG: ExecutorConfig = {
  publishTimeoutMs: 180_000,
  runTimeoutMs: 300_000,
  verbose: false,
};

// =============================================================================
// Executor
// =============================================================================

export class Executor {
  private readonly config: ExecutorConfig;
  private readonly clock: Clock;

  constructor(
    private readonly deps: ExecutorDeps,
    config?: Partial<ExecutorConfig>
  ) {
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...config };
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Sweep, then publish at most one due slot.
   */
  async runOnce(): Promise<RunResult> {
    return this.invoke('run', async (progress, signal) => {
      progress.sweep = await this.deps.sweeper.sweep(this.clock.now());
      const outcome = await this.executeNext(progress, signal);
      if (outcome) progress.slots.push(outcome);
    });
  }

  /**
   * Sweep once, then publish due slots until none is due, `maxSlots`
   * attempts were made, or a fatal failure ends the run. Each entry is
   * attempted at most once per catch-up.
   */
  async catchUp(maxSlots: number): Promise<RunResult> {
    return this.invoke('catch_up', async (progress, signal) => {
      progress.sweep = await this.deps.sweeper.sweep(this.clock.now());

      while (progress.slots.length < maxSlots) {
        const outcome = await this.executeNext(progress, signal);
        if (!outcome) break;
        progress.slots.push(outcome);
        if (outcome.error && this.deps.policy.isFatal(outcome.error.kind)) break;
      }
    });
  }

  /** Lock plus sweep; nothing is published. */
  async recoverOnly(): Promise<RunResult> {
    return this.invoke('recover', async (progress) => {
      progress.sweep = await this.deps.sweeper.sweep(this.clock.now());
    });
  }

  // ---------------------------------------------------------------------------
  // Invocation
  // ---------------------------------------------------------------------------

  private async invoke(
    mode: RunMode,
    body: (progress: RunProgress, signal: AbortSignal) => Promise<void>
  ): Promise<RunResult> {
    const startedAt = this.clock.now().toISOString();
    const progress: RunProgress = { sweep: null, slots: [], attempted: new Set() };

    let status: RunStatus;
    let message: string | undefined;

    try {
      await this.deps.lock.withLock(async () => {
        await this.deps.store.attachWriter();
        try {
          await this.withRunTimeout((signal) => body(progress, signal));
        } finally {
          await this.deps.store.detachWriter();
        }
      });
      status = summarize(mode, progress);
    } catch (e) {
      if (e instanceof LockHeldError) {
        console.log(`[executor] ${e.message}; skipping this invocation`);
        return {
          mode,
          status: 'locked',
          startedAt,
          finishedAt: this.clock.now().toISOString(),
          sweep: null,
          slots: [],
          message: e.message,
        };
      }
      status = e instanceof RunTimeoutError ? 'failed' : 'error';
      message = errorMessage(e);
      console.error(`[executor] ${mode} ${status}: ${message}`);
    }

    const result: RunResult = {
      mode,
      status,
      startedAt,
      finishedAt: this.clock.now().toISOString(),
      sweep: progress.sweep,
      slots: progress.slots,
    };
    if (message !== undefined) result.message = message;
    if (this.deps.health) {
      result.health = await this.deps.health.evaluate(this.clock.now());
    }

    this.logDebug(`${mode} finished: ${status} (${progress.slots.length} slot(s))`);
    return result;
  }

  /**
   * Abort the run's signal and reject once `runTimeoutMs` passes.
   */
  private async withRunTimeout(fn: (signal: AbortSignal) => Promise<void>): Promise<void> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new RunTimeoutError(this.config.runTimeoutMs);
        controller.abort(error);
        reject(error);
      }, this.config.runTimeoutMs);
    });

    try {
      await Promise.race([fn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ---------------------------------------------------------------------------
  // Slot execution
  // ---------------------------------------------------------------------------

  /**
   * Publish the earliest due entry not yet attempted in this invocation,
   * or return null when none is due.
   */
  private async executeNext(progress: RunProgress, runSignal: AbortSignal): Promise<SlotOutcome | null> {
    if (runSignal.aborted) return null;

    const due = this.deps.store.nextDue(this.clock.now(), progress.attempted);
    if (!due) {
      this.logDebug('no entry due');
      return null;
    }
    progress.attempted.add(due.id);

    const started = await this.deps.store.transition(due.id, 'in_progress');
    console.log(
      `[executor] Publishing ${started.contentKey} (slot ${started.scheduledTime}, attempt ${started.attemptCount})`
    );

    let receipt: PublishReceipt;
    try {
      receipt = await this.publish(started, runSignal);
    } catch (e) {
      return this.recordFailure(started, e);
    }

    const posted = await this.deps.store.transition(started.id, 'posted', {
      externalPostId: receipt.externalPostId,
    });
    console.log(`[executor] Posted ${posted.contentKey} as ${receipt.externalPostId}`);

    return {
      entryId: posted.id,
      contentKey: posted.contentKey,
      scheduledTime: posted.scheduledTime,
      status: 'posted',
      attemptCount: posted.attemptCount,
      externalPostId: receipt.externalPostId,
    };
  }

  private async recordFailure(entry: ScheduleEntry, error: unknown): Promise<SlotOutcome> {
    const lastError = this.deps.policy.toEntryError(error, this.clock.now());
    const decision = this.deps.policy.decide(lastError.kind, entry.attemptCount);

    const updated =
      decision === 'retry'
        ? await this.deps.store.transition(entry.id, 'pending', { lastError })
        : await this.deps.store.transition(entry.id, 'failed', { lastError });

    const status = decision === 'retry' ? 'retry_scheduled' : 'failed';
    const line = `[executor] ${entry.contentKey} ${lastError.kind} failure (attempt ${entry.attemptCount}/${this.deps.policy.maxAttempts}): ${lastError.message}`;
    if (status === 'failed') {
      console.error(line);
    } else {
      console.warn(line);
    }

    return {
      entryId: updated.id,
      contentKey: updated.contentKey,
      scheduledTime: updated.scheduledTime,
      status,
      attemptCount: updated.attemptCount,
      error: lastError,
    };
  }

  /**
   * Call the Publisher under its own timeout, also aborting with the run.
   */
  private async publish(entry: ScheduleEntry, runSignal: AbortSignal): Promise<PublishReceipt> {
    const controller = new AbortController();
    const timeoutMs = this.config.publishTimeoutMs;

    const onRunAbort = () => controller.abort(new PublishTimeoutError());
    runSignal.addEventListener('abort', onRunAbort, { once: true });

    // Both abort paths carry a PublishTimeoutError as the reason
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const timer = setTimeout(() => controller.abort(new PublishTimeoutError(timeoutMs)), timeoutMs);

    try {
      return await Promise.race([
        this.deps.publisher.publish(entry.payload, new Date(entry.scheduledTime), {
          signal: controller.signal,
          idempotencyKey: entry.id,
        }),
        aborted,
      ]);
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }

  private logDebug(message: string): void {
    if (this.config.verbose) {
      console.log(`[executor] DEBUG: ${message}`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

const STATUS_SEVERITY: Record<SlotOutcome['status'], number> = {
  posted: 0,
  retry_scheduled: 1,
  failed: 2,
};

/**
 * Overall status of a finished invocation: the worst slot outcome, or
 * `recovered` / `no_action` when nothing was published.
 */
function summarize(mode: RunMode, progress: RunProgress): RunStatus {
  if (progress.slots.length === 0) {
    const swept = progress.sweep;
    const changed = swept !== null && (swept.requeued.length > 0 || swept.reconciled.length > 0);
    return mode === 'recover' && changed ? 'recovered' : 'no_action';
  }

  let worst = progress.slots[0].status;
  for (const slot of progress.slots) {
    if (STATUS_SEVERITY[slot.status] > STATUS_SEVERITY[worst]) worst = slot.status;
  }
  return worst;
}
