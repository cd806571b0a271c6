/**
 * Recovery Sweeper - re-enqueues failed slots as immediate catch-up slots
 *
 * Runs under the run lock, before slot selection:
 * 1. In-progress entries can only be left over from a crashed holder; each
 *    is settled as a timed-out attempt through the retry policy.
 * 2. Up to `batchSize` failed entries (oldest first) that are neither fatal
 *    nor out of recovery rounds go back to pending on front-loaded slots.
 *
 * The sweeper only transitions existing entries, so it cannot duplicate a
 * content key.
 *
 * @module deploy/slotcast/scheduler/recovery-sweeper
 */

import { SlotCollisionError } from '../errors.js';
import type { ScheduleStore } from '../store/schedule-store.js';
import type { EntryError, ScheduleEntry } from '../types.js';
import type { RetryPolicy } from './retry-policy.js';
import type { SlotAllocator } from './slot-allocator.js';

// =============================================================================
// Interfaces
// =============================================================================

export interface RecoverySweeperConfig {
  /** Failed entries re-enqueued per sweep (default: 3) */
  batchSize: number;
  verbose: boolean;
}

export interface ReconciledOrphan {
  entryId: string;
  contentKey: string;
  outcome: 'retry_scheduled' | 'failed';
}

export interface RequeuedEntry {
  entryId: string;
  contentKey: string;
  scheduledTime: string;
  recoveryRounds: number;
}

export interface SkippedEntry {
  entryId: string;
  reason: 'fatal' | 'exhausted';
}

export interface SweepResult {
  reconciled: ReconciledOrphan[];
  requeued: RequeuedEntry[];
  skipped: SkippedEntry[];
}

export const DEFAULT_SWEEPER_CONFIG: RecoverySweeperConfig = {
  batchSize: 3,
  verbose: false,
};

// =============================================================================
// RecoverySweeper
// =============================================================================

export class RecoverySweeper {
  private readonly config: RecoverySweeperConfig;

  constructor(
    private readonly store: ScheduleStore,
    private readonly allocator: SlotAllocator,
    private readonly policy: RetryPolicy,
    config?: Partial<RecoverySweeperConfig>
  ) {
    this.config = { ...DEFAULT_SWEEPER_CONFIG, ...config };
  }

  async sweep(now: Date): Promise<SweepResult> {
    const reconciled = await this.reconcileOrphans(now);
    const { requeued, skipped } = await this.requeueFailed(now);

    if (reconciled.length > 0 || requeued.length > 0) {
      console.log(
        `[recovery] Reconciled ${reconciled.length} orphan(s), re-enqueued ${requeued.length} failed entr${
          requeued.length === 1 ? 'y' : 'ies'
        }`
      );
    }

    return { reconciled, requeued, skipped };
  }

  // ---------------------------------------------------------------------------
  // Orphans
  // ---------------------------------------------------------------------------

  private async reconcileOrphans(now: Date): Promise<ReconciledOrphan[]> {
    const orphans = this.store.list({ states: ['in_progress'] });
    const results: ReconciledOrphan[] = [];

    for (const orphan of orphans) {
      const lastError: EntryError = {
        kind: 'timeout',
        message: 'Publish interrupted before completion; holder exited',
        at: now.toISOString(),
      };
      const outcome =
        this.policy.decide('timeout', orphan.attemptCount) === 'retry' ? 'retry_scheduled' : 'failed';

      await this.store.transition(orphan.id, outcome === 'retry_scheduled' ? 'pending' : 'failed', { lastError });
      results.push({ entryId: orphan.id, contentKey: orphan.contentKey, outcome });
      console.warn(`[recovery] Orphaned in-progress entry ${orphan.id} settled as ${outcome}`);
    }

    return results;
  }

  // ---------------------------------------------------------------------------
  // Failed entries
  // ---------------------------------------------------------------------------

  private async requeueFailed(now: Date): Promise<{ requeued: RequeuedEntry[]; skipped: SkippedEntry[] }> {
    const skipped: SkippedEntry[] = [];
    const candidates: ScheduleEntry[] = [];

    const failed = this.store.list({ states: ['failed'] }).sort(compareByUpdated);
    for (const entry of failed) {
      if (entry.lastError && this.policy.isFatal(entry.lastError.kind)) {
        skipped.push({ entryId: entry.id, reason: 'fatal' });
        continue;
      }
      if (!this.policy.isRecoverable(entry.lastError, entry.recoveryRounds)) {
        skipped.push({ entryId: entry.id, reason: 'exhausted' });
        continue;
      }
      candidates.push(entry);
    }

    const batch = candidates.slice(0, this.config.batchSize);
    if (skipped.length > 0) {
      this.logDebug(`${skipped.length} failed entr${skipped.length === 1 ? 'y needs' : 'ies need'} manual attention`);
    }
    if (batch.length === 0) {
      return { requeued: [], skipped };
    }

    const slots = this.allocator.reserveFrontloadSlots(batch.length, now);
    const requeued: RequeuedEntry[] = [];

    for (const [index, entry] of batch.entries()) {
      const recoveryRounds = entry.recoveryRounds + 1;
      try {
        const updated = await this.store.transition(entry.id, 'pending', {
          scheduledTime: slots[index],
          attemptCount: 0,
          lastError: null,
          recoveryRounds,
        });
        requeued.push({
          entryId: updated.id,
          contentKey: updated.contentKey,
          scheduledTime: updated.scheduledTime,
          recoveryRounds,
        });
      } catch (e) {
        if (!(e instanceof SlotCollisionError)) throw e;
        console.warn(`[recovery] Slot ${e.scheduledTime} taken while re-enqueueing ${entry.id}; retrying next sweep`);
      }
    }

    return { requeued, skipped };
  }

  private logDebug(message: string): void {
    if (this.config.verbose) {
      console.log(`[recovery] DEBUG: ${message}`);
    }
  }
}

function compareByUpdated(a: ScheduleEntry, b: ScheduleEntry): number {
  const byUpdated = a.updatedAt.localeCompare(b.updatedAt);
  return byUpdated !== 0 ? byUpdated : a.id.localeCompare(b.id);
}
