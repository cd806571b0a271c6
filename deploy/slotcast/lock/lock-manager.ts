/**
 * Lock Manager - process-level mutual exclusion for orchestrator runs
 *
 * The lock is a file holding `{ token, pid, hostname, acquiredAt }`. It is
 * written to a private temp file first and then hard-linked into place, so
 * the lock path either does not exist or carries a complete record.
 *
 * A lock whose holder is dead (per the LivenessProbe), or whose record is
 * unreadable, is reclaimed: renamed aside, verified, removed, and the
 * acquisition retried once.
 *
 * @module deploy/slotcast/lock/lock-manager
 */

import { mkdirSync } from 'fs';
import { link, open, readFile, rename, unlink } from 'fs/promises';
import { hostname as osHostname } from 'os';
import { dirname } from 'path';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { v4 as uuidv4 } from 'uuid';
import { LockHeldError, errnoCode, errorMessage } from '../errors.js';
import { systemClock, type Clock } from '../types.js';

// =============================================================================
// Interfaces
// =============================================================================

export interface LockRecord {
  token: string;
  pid: number;
  hostname: string;
  acquiredAt: string;
}

export interface LivenessProbe {
  isAlive(record: LockRecord): boolean;
}

export type LockEvent =
  | { type: 'acquired'; record: LockRecord }
  | { type: 'released'; record: LockRecord }
  | { type: 'stale_lock_reclaimed'; previous: LockRecord | null; at: string };

export interface LockManagerOptions {
  lockPath: string;
  probe?: LivenessProbe;
  clock?: Clock;
  /** Overrides for tests; default to this process */
  pid?: number;
  hostname?: string;
  onEvent?: (event: LockEvent) => void | Promise<void>;
  verbose?: boolean;
}

// =============================================================================
// Default Liveness Probe
// =============================================================================

/**
 * Signal 0 checks for existence without delivering anything. EPERM means
 * the process exists under another user. Locks from another host cannot be
 * probed and count as alive.
 */
export const processLivenessProbe: LivenessProbe = {
  isAlive(record: LockRecord): boolean {
    if (record.hostname !== osHostname()) {
      return true;
    }
    try {
      process.kill(record.pid, 0);
      return true;
    } catch (e) {
      return errnoCode(e) === 'EPERM';
    }
  },
};

// =============================================================================
// LockManager
// =============================================================================

type ReadResult = { kind: 'missing' } | { kind: 'record'; raw: string; record: LockRecord | null };

export class LockManager {
  private readonly probe: LivenessProbe;
  private readonly clock: Clock;
  private readonly pid: number;
  private readonly hostname: string;
  private readonly verbose: boolean;
  private held: LockRecord | null = null;

  constructor(private readonly options: LockManagerOptions) {
    this.probe = options.probe ?? processLivenessProbe;
    this.clock = options.clock ?? systemClock;
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? osHostname();
    this.verbose = options.verbose ?? false;
  }

  get lockPath(): string {
    return this.options.lockPath;
  }

  isHeld(): boolean {
    return this.held !== null;
  }

  /**
   * Take the lock.
   *
   * @throws LockHeldError if a live process holds it
   */
  async acquire(): Promise<LockRecord> {
    if (this.held) {
      throw new LockHeldError(this.held.pid, this.held.acquiredAt);
    }
    mkdirSync(dirname(this.lockPath), { recursive: true, mode: 0o700 });

    const record: LockRecord = {
      token: uuidv4(),
      pid: this.pid,
      hostname: this.hostname,
      acquiredAt: this.clock.now().toISOString(),
    };

    if (await this.tryCreate(record)) {
      return this.markAcquired(record);
    }

    const reclaimed = await this.reclaimIfStale();
    if (reclaimed && (await this.tryCreate(record))) {
      return this.markAcquired(record);
    }

    const current = await this.read();
    if (current.kind === 'record' && current.record) {
      throw new LockHeldError(current.record.pid, current.record.acquiredAt);
    }
    throw new LockHeldError(-1, 'unknown');
  }

  /**
   * Remove the lock file, but only while it still carries our token.
   */
  async release(): Promise<void> {
    const held = this.held;
    if (!held) return;
    this.held = null;

    const current = await this.read();
    if (current.kind === 'missing') {
      console.warn(`[lock] Lock file vanished before release (token ${held.token})`);
      return;
    }
    if (current.record?.token !== held.token) {
      console.warn('[lock] Lock file belongs to another holder, leaving it in place');
      return;
    }

    try {
      await unlink(this.lockPath);
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') throw e;
    }
    this.logDebug(`released (pid ${held.pid})`);
    await this.emit({ type: 'released', record: held });
  }

  /**
   * Run `fn` while holding the lock; released on every exit path.
   */
  async withLock<T>(fn: (record: LockRecord) => Promise<T>): Promise<T> {
    const record = await this.acquire();
    try {
      return await fn(record);
    } finally {
      await this.release();
    }
  }

  /** Current lock record on disk, or null when unlocked or unreadable. */
  async inspect(): Promise<LockRecord | null> {
    const current = await this.read();
    return current.kind === 'record' ? current.record : null;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async tryCreate(record: LockRecord): Promise<boolean> {
    const tmpPath = `${this.lockPath}.${record.token}.tmp`;
    const handle = await open(tmpPath, 'wx', 0o600);
    try {
      await handle.writeFile(JSON.stringify(record), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await link(tmpPath, this.lockPath);
      return true;
    } catch (e) {
      if (errnoCode(e) === 'EEXIST') return false;
      throw e;
    } finally {
      await unlink(tmpPath);
    }
  }

  /**
   * Move a dead holder's lock aside. Returns true when the path is free.
   */
  private async reclaimIfStale(): Promise<boolean> {
    const current = await this.read();
    if (current.kind === 'missing') {
      return true;
    }
    if (current.record && this.probe.isAlive(current.record)) {
      return false;
    }

    const asidePath = `${this.lockPath}.stale.${uuidv4()}`;
    try {
      await rename(this.lockPath, asidePath);
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return true;
      throw e;
    }

    // Another process may have reclaimed and re-locked between our read and
    // the rename; if so, put its lock back.
    const moved = await readFile(asidePath, 'utf-8');
    if (moved !== current.raw) {
      try {
        await link(asidePath, this.lockPath);
      } catch (e) {
        if (errnoCode(e) !== 'EEXIST') throw e;
      }
      await unlink(asidePath);
      return false;
    }

    await unlink(asidePath);
    const previous = current.record;
    console.warn(
      previous
        ? `[lock] Stale lock from dead process ${previous.pid} (${previous.hostname}), taking over`
        : '[lock] Unreadable lock record, taking over'
    );
    await this.emit({ type: 'stale_lock_reclaimed', previous, at: this.clock.now().toISOString() });
    return true;
  }

  private async read(): Promise<ReadResult> {
    let raw: string;
    try {
      raw = await readFile(this.lockPath, 'utf-8');
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return { kind: 'missing' };
      throw e;
    }
    return { kind: 'record', raw, record: parseLockRecord(raw) };
  }

  private async markAcquired(record: LockRecord): Promise<LockRecord> {
    this.held = record;
    this.logDebug(`acquired (pid ${record.pid})`);
    await this.emit({ type: 'acquired', record });
    return record;
  }

  private async emit(event: LockEvent): Promise<void> {
    if (!this.options.onEvent) return;
    try {
      await this.options.onEvent(event);
    } catch (e) {
      console.error(`[lock] Event handler failed for ${event.type}: ${errorMessage(e)}`);
    }
  }

  private logDebug(message: string): void {
    if (this.verbose) {
      console.log(`[lock] DEBUG: ${message}`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

const LockRecordSchema = Type.Object({
  token: Type.String(),
  pid: Type.Integer(),
  hostname: Type.String(),
  acquiredAt: Type.String(),
});

export function parseLockRecord(raw: string): LockRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Value.Check(LockRecordSchema, parsed)) return null;

  const { token, pid, hostname, acquiredAt } = parsed;
  return { token, pid, hostname, acquiredAt };
}
