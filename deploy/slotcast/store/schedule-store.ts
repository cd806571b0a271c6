/**
 * Schedule Store - durable table of publish slots
 *
 * Single source of truth for the orchestrator. Mutations go through the
 * journal first and are applied in memory only once the journal line is
 * fsynced; snapshots of the three logical collections are checkpoints over
 * the journal.
 *
 * Storage layout (under dataDir):
 *   - schedule.json   pending / in_progress / failed / skipped entries
 *   - completed.json  posted entries + completed-outcome archive
 *   - failed.json     failed-outcome archive
 *   - journal/        write-ahead segments + journal checkpoint
 *
 * Every entry carries the journal sequence of its last mutation
 * (`revision`), so a crash between snapshot writes is resolved by keeping
 * the highest revision per id and replaying the journal over it.
 *
 * @module deploy/slotcast/store/schedule-store
 */

import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { saveJsonFile } from '../../../src/infra/json-file.js';
import { JournalManager, type JournalEntry } from '../wal/journal-manager.js';
import { SlotGrid } from '../scheduler/slot-grid.js';
import {
  readSnapshots,
  snapshotMarks,
  type CompletedSnapshot,
  type FailedSnapshot,
  type ScheduleSnapshot,
  type SnapshotSet,
} from './snapshots.js';
import {
  DuplicateContentError,
  EntryNotFoundError,
  InvalidTransitionError,
  SlotAlignmentError,
  SlotCollisionError,
  SlotcastError,
} from '../errors.js';
import {
  ACTIVE_STATES,
  QUEUED_STATES,
  systemClock,
  type Clock,
  type EntryError,
  type EntrySource,
  type EntryState,
  type JsonObject,
  type OutcomeRecord,
  type ScheduleEntry,
  type TimeWindow,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface NewScheduleEntry {
  contentKey: string;
  payload: JsonObject;
  scheduledTime: Date;
  source: EntrySource;
}

export interface TransitionPatch {
  /** Only honoured on failed -> pending */
  scheduledTime?: Date;
  lastError?: EntryError | null;
  /** Only honoured on failed -> pending (recovery reset) */
  attemptCount?: number;
  externalPostId?: string;
  recoveryRounds?: number;
}

export interface EntryFilter {
  states?: EntryState[];
  contentKey?: string;
}

export interface ScheduleStoreOptions {
  dataDir: string;
  grid?: SlotGrid;
  clock?: Clock;
  /** Snapshot after this many mutations (default: 50) */
  checkpointEvery?: number;
  /**
   * Load without writing anything; mutations throw until attachWriter()
   * is called under the run lock.
   */
  readOnly?: boolean;
  verbose?: boolean;
}

interface JournalBody {
  entry: ScheduleEntry;
  outcome?: OutcomeRecord;
}

/** Loads a lock-free reader retries while a writer keeps checkpointing */
const MAX_LOAD_ATTEMPTS = 3;

const ALLOWED_TRANSITIONS: Record<EntryState, readonly EntryState[]> = {
  pending: ['in_progress', 'skipped'],
  in_progress: ['posted', 'failed', 'pending'],
  failed: ['pending'],
  posted: [],
  skipped: [],
};

export function isTransitionAllowed(from: EntryState, to: EntryState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// =============================================================================
// ScheduleStore
// =============================================================================

export class ScheduleStore {
  private readonly entries = new Map<string, ScheduleEntry>();
  private readonly outcomeLog: OutcomeRecord[] = [];
  private journal: JournalManager<JournalBody>;
  private readonly grid: SlotGrid;
  private readonly clock: Clock;
  private readonly checkpointEvery: number;
  private readonly verbose: boolean;
  private readonly openedReadOnly: boolean;
  private readOnly: boolean;
  private mutationsSinceCheckpoint = 0;
  private writeChain: Promise<unknown> = Promise.resolve();
  private opened = false;

  private constructor(private readonly options: ScheduleStoreOptions) {
    this.grid = options.grid ?? new SlotGrid();
    this.clock = options.clock ?? systemClock;
    this.checkpointEvery = options.checkpointEvery ?? 50;
    this.verbose = options.verbose ?? false;
    this.openedReadOnly = options.readOnly ?? false;
    this.readOnly = this.openedReadOnly;
    this.journal = this.createJournal();
  }

  /**
   * Open (or create) a store: load snapshots, then replay the journal.
   */
  static async open(options: ScheduleStoreOptions): Promise<ScheduleStore> {
    const store = new ScheduleStore(options);
    await store.load();
    return store;
  }

  // ---------------------------------------------------------------------------
  // Paths
  // ---------------------------------------------------------------------------

  private get schedulePath(): string {
    return join(this.options.dataDir, 'schedule.json');
  }

  private get completedPath(): string {
    return join(this.options.dataDir, 'completed.json');
  }

  private get failedPath(): string {
    return join(this.options.dataDir, 'failed.json');
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Insert a new pending entry.
   *
   * @throws DuplicateContentError if an active entry holds the content key
   * @throws SlotCollisionError if a queued entry holds the slot
   * @throws SlotAlignmentError if the slot is off the grid
   */
  async put(input: NewScheduleEntry): Promise<ScheduleEntry> {
    return this.serialize(async () => {
      this.assertOpen();

      const existing = this.findActiveByContentKey(input.contentKey);
      if (existing) {
        throw new DuplicateContentError(input.contentKey, existing.id);
      }
      this.assertSlotFree(input.scheduledTime);

      const now = this.clock.now().toISOString();
      const id = uuidv4();

      const record = await this.journal.append('put', id, (seq) => ({
        entry: {
          id,
          contentKey: input.contentKey,
          payload: input.payload,
          scheduledTime: input.scheduledTime.toISOString(),
          state: 'pending',
          attemptCount: 0,
          lastError: null,
          source: input.source,
          recoveryRounds: 0,
          externalPostId: null,
          revision: seq,
          createdAt: now,
          updatedAt: now,
        },
      }));

      const entry = record.body.entry;
      this.entries.set(entry.id, entry);
      this.logDebug(`put ${entry.id} (${entry.contentKey}) at ${entry.scheduledTime}`);
      await this.maybeCheckpoint();
      return { ...entry };
    });
  }

  /**
   * Move an entry along the state machine.
   *
   * Entering `in_progress` increments attemptCount; entering `posted`
   * clears lastError. Terminal publish outcomes are archived.
   */
  async transition(id: string, to: EntryState, patch: TransitionPatch = {}): Promise<ScheduleEntry> {
    return this.serialize(async () => {
      this.assertOpen();

      const current = this.entries.get(id);
      if (!current) {
        throw new EntryNotFoundError(id);
      }
      if (!isTransitionAllowed(current.state, to)) {
        throw new InvalidTransitionError(id, current.state, to);
      }

      const isRequeue = current.state === 'failed' && to === 'pending';
      let scheduledTime = current.scheduledTime;
      if (isRequeue && patch.scheduledTime) {
        this.assertSlotFree(patch.scheduledTime, id);
        scheduledTime = patch.scheduledTime.toISOString();
      }
      if (isRequeue && !patch.scheduledTime) {
        this.assertSlotFree(new Date(current.scheduledTime), id);
      }

      const now = this.clock.now().toISOString();

      const record = await this.journal.append('transition', id, (seq) => {
        const next: ScheduleEntry = {
          ...current,
          state: to,
          scheduledTime,
          attemptCount: this.nextAttemptCount(current, to, isRequeue, patch),
          lastError: to === 'posted' ? null : patch.lastError !== undefined ? patch.lastError : current.lastError,
          recoveryRounds: patch.recoveryRounds ?? current.recoveryRounds,
          externalPostId: patch.externalPostId ?? current.externalPostId,
          revision: seq,
          updatedAt: now,
        };
        return to === 'posted' || to === 'failed'
          ? { entry: next, outcome: this.buildOutcome(next, to, now) }
          : { entry: next };
      });

      const entry = record.body.entry;
      this.entries.set(entry.id, entry);
      if (record.body.outcome) {
        this.outcomeLog.push(record.body.outcome);
      }
      this.logDebug(`transition ${id}: ${current.state} -> ${to}`);
      await this.maybeCheckpoint();
      return { ...entry };
    });
  }

  /**
   * Become the writer: reload from disk so changes made by the previous
   * lock holder are visible. No-op for a store opened writable.
   */
  async attachWriter(): Promise<void> {
    return this.serialize(async () => {
      if (!this.openedReadOnly) return;
      await this.reload(false);
    });
  }

  /**
   * Checkpoint and drop back to read-only before the lock is released.
   */
  async detachWriter(): Promise<void> {
    return this.serialize(async () => {
      if (!this.openedReadOnly || this.readOnly || !this.opened) return;
      await this.writeSnapshots();
      await this.journal.close();
      this.readOnly = true;
    });
  }

  /**
   * Write all three snapshots and let the journal drop covered segments.
   */
  async checkpoint(): Promise<void> {
    return this.serialize(async () => {
      this.assertOpen();
      await this.writeSnapshots();
    });
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    if (!this.readOnly) {
      await this.checkpoint();
    }
    await this.journal.close();
    this.opened = false;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get(id: string): ScheduleEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  list(filter: EntryFilter = {}): ScheduleEntry[] {
    const states = filter.states ? new Set(filter.states) : null;
    return [...this.entries.values()]
      .filter((e) => !states || states.has(e.state))
      .filter((e) => filter.contentKey === undefined || e.contentKey === filter.contentKey)
      .sort(compareBySlot)
      .map((e) => ({ ...e }));
  }

  /**
   * Earliest pending entry whose slot is at or before `now`, ignoring the
   * ids in `exclude`.
   */
  nextDue(now: Date, exclude?: ReadonlySet<string>): ScheduleEntry | null {
    const nowMs = now.getTime();
    let best: ScheduleEntry | null = null;

    for (const entry of this.entries.values()) {
      if (entry.state !== 'pending') continue;
      if (exclude?.has(entry.id)) continue;
      if (new Date(entry.scheduledTime).getTime() > nowMs) continue;
      if (!best || compareBySlot(entry, best) < 0) {
        best = entry;
      }
    }

    return best ? { ...best } : null;
  }

  findActiveByContentKey(contentKey: string): ScheduleEntry | undefined {
    for (const entry of this.entries.values()) {
      if (entry.contentKey === contentKey && ACTIVE_STATES.has(entry.state)) {
        return { ...entry };
      }
    }
    return undefined;
  }

  /** Slot keys held by pending / in_progress entries. */
  occupiedSlots(): Set<string> {
    const slots = new Set<string>();
    for (const entry of this.entries.values()) {
      if (QUEUED_STATES.has(entry.state)) {
        slots.add(this.grid.key(entry.scheduledTime));
      }
    }
    return slots;
  }

  /** Latest queued slot, or null when nothing is queued. */
  tail(): Date | null {
    let latest: number | null = null;
    for (const entry of this.entries.values()) {
      if (!QUEUED_STATES.has(entry.state)) continue;
      const ms = new Date(entry.scheduledTime).getTime();
      if (latest === null || ms > latest) latest = ms;
    }
    return latest === null ? null : new Date(latest);
  }

  /**
   * Count entries by state; with a window, only entries updated inside it.
   */
  countByState(window?: TimeWindow): Record<EntryState, number> {
    const counts: Record<EntryState, number> = {
      pending: 0,
      in_progress: 0,
      posted: 0,
      failed: 0,
      skipped: 0,
    };

    for (const entry of this.entries.values()) {
      if (window && !inWindow(entry.updatedAt, window)) continue;
      counts[entry.state]++;
    }

    return counts;
  }

  /** Archived terminal outcomes inside the window, oldest first. */
  outcomes(window: TimeWindow): OutcomeRecord[] {
    return this.outcomeLog
      .filter((o) => inWindow(o.at, window))
      .sort((a, b) => a.at.localeCompare(b.at))
      .map((o) => ({ ...o }));
  }

  getJournalStatus(): ReturnType<JournalManager<JournalBody>['getStatus']> {
    return this.journal.getStatus();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createJournal(): JournalManager<JournalBody> {
    return new JournalManager<JournalBody>(
      { journalDir: join(this.options.dataDir, 'journal'), readOnly: this.readOnly, verbose: this.verbose },
      () => this.clock.now()
    );
  }

  private async reload(readOnly: boolean): Promise<void> {
    this.readOnly = readOnly;
    await this.resetState();
    await this.load();
  }

  private async resetState(): Promise<void> {
    await this.journal.close();
    this.entries.clear();
    this.outcomeLog.length = 0;
    this.opened = false;
    this.journal = this.createJournal();
  }

  private async load(): Promise<void> {
    const paths = {
      schedulePath: this.schedulePath,
      completedPath: this.completedPath,
      failedPath: this.failedPath,
    };
    let snapshots = readSnapshots(paths);
    let replayed = 0;

    for (let attempt = 1; ; attempt++) {
      replayed = await this.restore(snapshots);
      // Only a reader outside the lock can race a writer's checkpoint
      if (!this.readOnly) break;

      const current = readSnapshots(paths);
      if (sameMarks(snapshotMarks(snapshots), snapshotMarks(current))) break;
      if (attempt >= MAX_LOAD_ATTEMPTS) {
        throw new SlotcastError(
          'STORE_UNSTABLE',
          `Snapshots kept changing while loading ${this.options.dataDir} (${attempt} attempts)`
        );
      }

      this.logDebug('Snapshots were rewritten during load; reloading');
      await this.resetState();
      snapshots = current;
    }

    this.opened = true;
    this.mutationsSinceCheckpoint = replayed;
    this.logDebug(`Loaded ${this.entries.size} entries (${replayed} replayed from journal)`);

    if (replayed > 0 && !this.readOnly) {
      await this.writeSnapshots();
    }
  }

  /**
   * Apply snapshots, then replay the journal past the oldest of them.
   */
  private async restore({ schedule, completed, failed }: SnapshotSet): Promise<number> {
    for (const entry of [...(schedule?.entries ?? []), ...(completed?.entries ?? [])]) {
      const known = this.entries.get(entry.id);
      if (!known || known.revision < entry.revision) {
        this.entries.set(entry.id, entry);
      }
    }

    const completedThrough = completed?.throughSeq ?? 0;
    const failedThrough = failed?.throughSeq ?? 0;
    this.outcomeLog.push(...(completed?.outcomes ?? []), ...(failed?.outcomes ?? []));

    await this.journal.initialize();

    const sinceSeq = Math.min(schedule?.throughSeq ?? 0, completedThrough, failedThrough);
    const { replayed } = await this.journal.replay(sinceSeq, (record: JournalEntry<JournalBody>) => {
      const { entry, outcome } = record.body;
      const known = this.entries.get(entry.id);
      if (!known || known.revision < record.seq) {
        this.entries.set(entry.id, entry);
      }
      if (outcome) {
        const through = outcome.outcome === 'posted' ? completedThrough : failedThrough;
        if (record.seq > through) {
          this.outcomeLog.push(outcome);
        }
      }
    });

    return replayed;
  }

  private async writeSnapshots(): Promise<void> {
    const throughSeq = this.journal.getStatus().seq;
    const writtenAt = this.clock.now().toISOString();
    const all = [...this.entries.values()].sort(compareBySlot);

    const schedule: ScheduleSnapshot = {
      version: 1,
      throughSeq,
      writtenAt,
      entries: all.filter((e) => e.state !== 'posted'),
    };
    const completed: CompletedSnapshot = {
      version: 1,
      throughSeq,
      writtenAt,
      entries: all.filter((e) => e.state === 'posted'),
      outcomes: this.outcomeLog.filter((o) => o.outcome === 'posted'),
    };
    const failed: FailedSnapshot = {
      version: 1,
      throughSeq,
      writtenAt,
      outcomes: this.outcomeLog.filter((o) => o.outcome === 'failed'),
    };

    saveJsonFile(this.schedulePath, schedule);
    saveJsonFile(this.completedPath, completed);
    saveJsonFile(this.failedPath, failed);

    await this.journal.compact(throughSeq);
    this.mutationsSinceCheckpoint = 0;
  }

  private async maybeCheckpoint(): Promise<void> {
    this.mutationsSinceCheckpoint++;
    if (this.mutationsSinceCheckpoint >= this.checkpointEvery) {
      await this.writeSnapshots();
    }
  }

  private nextAttemptCount(
    current: ScheduleEntry,
    to: EntryState,
    isRequeue: boolean,
    patch: TransitionPatch
  ): number {
    if (to === 'in_progress') return current.attemptCount + 1;
    if (isRequeue && patch.attemptCount !== undefined) return patch.attemptCount;
    return current.attemptCount;
  }

  private buildOutcome(entry: ScheduleEntry, outcome: 'posted' | 'failed', at: string): OutcomeRecord {
    const record: OutcomeRecord = {
      entryId: entry.id,
      contentKey: entry.contentKey,
      outcome,
      scheduledTime: entry.scheduledTime,
      at,
      attemptCount: entry.attemptCount,
    };
    if (outcome === 'posted' && entry.externalPostId) {
      record.externalPostId = entry.externalPostId;
    }
    if (outcome === 'failed' && entry.lastError) {
      record.error = entry.lastError;
    }
    return record;
  }

  private assertSlotFree(time: Date, ignoreId?: string): void {
    if (!this.grid.isAligned(time)) {
      throw new SlotAlignmentError(time.toISOString());
    }
    const key = this.grid.key(time);
    for (const entry of this.entries.values()) {
      if (entry.id === ignoreId || !QUEUED_STATES.has(entry.state)) continue;
      if (this.grid.key(entry.scheduledTime) === key) {
        throw new SlotCollisionError(key, entry.id);
      }
    }
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new Error('Schedule store is closed');
    }
    if (this.readOnly) {
      throw new Error('Schedule store opened read-only');
    }
  }

  /**
   * Run mutations one at a time so validation and the journal append
   * cannot interleave.
   */
  private serialize<R>(fn: () => Promise<R>): Promise<R> {
    const run = this.writeChain.then(fn, fn);
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private logDebug(message: string): void {
    if (this.verbose) {
      console.log(`[schedule-store] DEBUG: ${message}`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function compareBySlot(a: ScheduleEntry, b: ScheduleEntry): number {
  const bySlot = new Date(a.scheduledTime).getTime() - new Date(b.scheduledTime).getTime();
  if (bySlot !== 0) return bySlot;
  const byCreated = a.createdAt.localeCompare(b.createdAt);
  return byCreated !== 0 ? byCreated : a.id.localeCompare(b.id);
}

function sameMarks(a: readonly number[], b: readonly number[]): boolean {
  return a.every((mark, i) => mark === b[i]);
}

function inWindow(iso: string, window: TimeWindow): boolean {
  const ms = new Date(iso).getTime();
  return ms >= window.since.getTime() && ms < window.until.getTime();
}
