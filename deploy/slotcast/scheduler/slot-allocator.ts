/**
 * Slot Allocator - turns discovered items into slot assignments
 *
 * Two placement modes:
 * - steady state (one new item): the slot after the queued tail, or
 *   one cadence past the next boundary when nothing upcoming is queued
 * - front-loading (a burst): back-to-back slots starting at
 *   now + lead, ignoring the queued tail
 *
 * Both probe forward past occupied slots and preserve discovery order.
 *
 * @module deploy/slotcast/scheduler/slot-allocator
 */

import { DuplicateContentError, ScheduleFullError, SlotCollisionError } from '../errors.js';
import type { ScheduleStore } from '../store/schedule-store.js';
import type { DiscoveredItem, EntrySource, ScheduleEntry } from '../types.js';
import { MINUTE_MS, SLOTS_PER_DAY, SlotGrid } from './slot-grid.js';

// =============================================================================
// Interfaces
// =============================================================================

export interface AllocatorConfig {
  /** Offset before the first front-loaded slot (default: 2 minutes) */
  frontloadLeadMs: number;
  /** Probe limit in cadence steps (default: one week of slots) */
  horizonSlots: number;
  verbose: boolean;
}

export type AllocationMode = 'none' | 'steady' | 'frontload';

export interface DuplicateRejection {
  contentKey: string;
  /** Existing entry id, or null when the key repeated inside the batch */
  existingId: string | null;
}

export interface AllocationResult {
  mode: AllocationMode;
  scheduled: ScheduleEntry[];
  duplicates: DuplicateRejection[];
}

export const DEFAULT_ALLOCATOR_CONFIG: AllocatorConfig = {
  frontloadLeadMs: 2 * MINUTE_MS,
  horizonSlots: SLOTS_PER_DAY * 7,
  verbose: false,
};

// =============================================================================
// SlotAllocator
// =============================================================================

export class SlotAllocator {
  private readonly config: AllocatorConfig;

  constructor(
    private readonly store: ScheduleStore,
    private readonly grid: SlotGrid,
    config?: Partial<AllocatorConfig>
  ) {
    this.config = { ...DEFAULT_ALLOCATOR_CONFIG, ...config };
  }

  /**
   * Schedule a discovery batch. Items already active in the store, or
   * repeated within the batch, are reported rather than thrown.
   */
  async allocate(items: DiscoveredItem[], now: Date): Promise<AllocationResult> {
    const duplicates: DuplicateRejection[] = [];
    const fresh: DiscoveredItem[] = [];
    const seen = new Set<string>();

    for (const item of items) {
      if (seen.has(item.contentKey)) {
        duplicates.push({ contentKey: item.contentKey, existingId: null });
        continue;
      }
      seen.add(item.contentKey);

      const existing = this.store.findActiveByContentKey(item.contentKey);
      if (existing) {
        duplicates.push({ contentKey: item.contentKey, existingId: existing.id });
        continue;
      }
      fresh.push(item);
    }

    if (fresh.length === 0) {
      return { mode: 'none', scheduled: [], duplicates };
    }

    const mode: AllocationMode = fresh.length === 1 ? 'steady' : 'frontload';
    const source: EntrySource = mode === 'steady' ? 'discovery' : 'frontload';
    const scheduled: ScheduleEntry[] = [];

    let candidate = mode === 'steady' ? this.steadyStart(now) : this.frontloadStart(now);

    for (const item of fresh) {
      const placed = await this.place(item, candidate, source);
      if (placed.kind === 'duplicate') {
        duplicates.push({ contentKey: item.contentKey, existingId: placed.existingId });
        continue;
      }
      scheduled.push(placed.entry);
      candidate = this.grid.advance(new Date(placed.entry.scheduledTime));
    }

    if (scheduled.length > 0) {
      this.log(
        `${mode}: scheduled ${scheduled.length} item(s) at ${scheduled
          .map((e) => e.scheduledTime)
          .join(', ')}`
      );
    }
    if (duplicates.length > 0) {
      this.logDebug(`rejected ${duplicates.length} duplicate content key(s)`);
    }

    return { mode, scheduled, duplicates };
  }

  /**
   * Free front-loaded slots for `count` items, without writing anything.
   * Used by the recovery sweeper to re-enqueue failed entries.
   */
  reserveFrontloadSlots(count: number, now: Date): Date[] {
    const occupied = this.store.occupiedSlots();
    const slots: Date[] = [];
    let candidate = this.frontloadStart(now);

    while (slots.length < count) {
      candidate = this.firstFree(candidate, occupied);
      slots.push(candidate);
      occupied.add(this.grid.key(candidate));
      candidate = this.grid.advance(candidate);
    }

    return slots;
  }

  /**
   * Slot a single steady-state item would receive.
   */
  steadyStart(now: Date): Date {
    const tail = this.store.tail();
    if (tail && tail.getTime() > now.getTime()) {
      return this.grid.advance(tail);
    }
    return this.grid.advance(this.grid.nextBoundaryAfter(now));
  }

  frontloadStart(now: Date): Date {
    return this.grid.ceil(new Date(now.getTime() + this.config.frontloadLeadMs));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async place(
    item: DiscoveredItem,
    from: Date,
    source: EntrySource
  ): Promise<{ kind: 'placed'; entry: ScheduleEntry } | { kind: 'duplicate'; existingId: string }> {
    let candidate = from;

    for (let step = 0; step < this.config.horizonSlots; step++) {
      candidate = this.firstFree(candidate, this.store.occupiedSlots());
      try {
        const entry = await this.store.put({
          contentKey: item.contentKey,
          payload: item.payload,
          scheduledTime: candidate,
          source,
        });
        return { kind: 'placed', entry };
      } catch (e) {
        if (e instanceof DuplicateContentError) {
          return { kind: 'duplicate', existingId: e.existingId };
        }
        if (e instanceof SlotCollisionError) {
          this.logDebug(`collision at ${e.scheduledTime}, advancing`);
          candidate = this.grid.advance(candidate);
          continue;
        }
        throw e;
      }
    }

    throw new ScheduleFullError(this.config.horizonSlots);
  }

  private firstFree(from: Date, occupied: Set<string>): Date {
    let candidate = from;
    for (let step = 0; step < this.config.horizonSlots; step++) {
      if (!occupied.has(this.grid.key(candidate))) {
        return candidate;
      }
      candidate = this.grid.advance(candidate);
    }
    throw new ScheduleFullError(this.config.horizonSlots);
  }

  private log(message: string): void {
    console.log(`[slot-allocator] ${message}`);
  }

  private logDebug(message: string): void {
    if (this.config.verbose) {
      console.log(`[slot-allocator] DEBUG: ${message}`);
    }
  }
}
