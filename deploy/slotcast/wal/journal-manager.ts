/**
 * Journal Manager - Segmented write-ahead log for schedule mutations
 *
 * Every store mutation is appended here (checksummed JSON line, fsynced)
 * before it is applied in memory. Snapshots written by the store act as
 * checkpoints: once a snapshot covers a sequence number, closed segments
 * at or below it are dropped.
 *
 * Crash Semantics:
 * - Two-phase rotation: (1) write checkpoint, (2) rotate
 * - Interrupted rotation is completed on the next initialize()
 * - A torn tail (bad checksum or unparseable line) is truncated at the
 *   first bad line of the active segment
 *
 * @module deploy/slotcast/wal/journal-manager
 */

import { appendFile, readFile, writeFile, mkdir, rename, unlink, open } from 'fs/promises';
import { existsSync } from 'fs';
import { createHash } from 'crypto';
import { join } from 'path';
import { errnoCode } from '../errors.js';

export type JournalOperation = 'put' | 'transition';

export interface JournalEntry<T> {
  seq: number;
  timestamp: string;
  operation: JournalOperation;
  /** Id of the record the mutation applies to */
  key: string;
  body: T;
  entryChecksum: string; // SHA-256 of entry without this field
}

export interface JournalSegment {
  id: string;
  size: number;
  entries: number;
  lastSeq: number;
  createdAt: string;
  closedAt?: string;
}

export interface JournalCheckpoint {
  lastSeq: number;
  activeSegment: string;
  segments: JournalSegment[];
  lastCheckpointAt: string;
  rotationPhase: 'none' | 'checkpoint_written' | 'rotating';
}

export interface JournalConfig {
  journalDir: string;
  /** bytes, default 1MB */
  maxSegmentSize?: number;
  /** ms, default 24 hours */
  maxSegmentAge?: number;
  /** Load and replay only; never create, repair or rotate anything */
  readOnly?: boolean;
  verbose?: boolean;
}

type Clock = () => Date;

export class JournalManager<T> {
  private config: Required<JournalConfig>;
  private checkpoint: JournalCheckpoint | null = null;
  private currentSegmentSize = 0;
  private seq = 0;
  private initialized = false;
  private readonly clock: Clock;

  constructor(config: JournalConfig, clock: Clock = () => new Date()) {
    this.config = {
      journalDir: config.journalDir,
      maxSegmentSize: config.maxSegmentSize ?? 1024 * 1024,
      maxSegmentAge: config.maxSegmentAge ?? 24 * 60 * 60 * 1000,
      readOnly: config.readOnly ?? false,
      verbose: config.verbose ?? false,
    };
    this.clock = clock;
  }

  /**
   * Load checkpoint, finish any interrupted rotation and repair a torn tail.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.config.readOnly) {
      await this.initializeReadOnly();
      return;
    }

    if (!existsSync(this.config.journalDir)) {
      await mkdir(this.config.journalDir, { recursive: true });
    }

    const checkpoint = await this.loadCheckpoint();
    this.checkpoint = checkpoint;

    // The checkpoint's lastSeq is only as fresh as its last save; the
    // segments themselves are authoritative.
    this.seq = checkpoint.lastSeq;
    for (const segment of checkpoint.segments) {
      const lastSeq = await this.scanLastSeq(segment.id);
      segment.lastSeq = Math.max(segment.lastSeq, lastSeq);
      this.seq = Math.max(this.seq, segment.lastSeq);
    }
    checkpoint.lastSeq = this.seq;

    if (checkpoint.rotationPhase !== 'none') {
      await this.recoverFromInterruptedRotation(checkpoint);
    }

    if (!checkpoint.activeSegment) {
      await this.createNewSegment(checkpoint);
    } else {
      this.currentSegmentSize = await this.repairTail(checkpoint.activeSegment);
    }

    this.initialized = true;
    this.logDebug(`Initialized with seq=${this.seq}, segment=${checkpoint.activeSegment}`);
  }

  private async initializeReadOnly(): Promise<void> {
    const checkpointPath = join(this.config.journalDir, 'checkpoint.json');
    const checkpoint: JournalCheckpoint = existsSync(checkpointPath)
      ? (JSON.parse(await readFile(checkpointPath, 'utf-8')) as JournalCheckpoint)
      : { lastSeq: 0, activeSegment: '', segments: [], lastCheckpointAt: '', rotationPhase: 'none' };

    this.seq = checkpoint.lastSeq;
    for (const segment of checkpoint.segments) {
      segment.lastSeq = Math.max(segment.lastSeq, await this.scanLastSeq(segment.id));
      this.seq = Math.max(this.seq, segment.lastSeq);
    }

    this.checkpoint = checkpoint;
    this.initialized = true;
    this.logDebug(`Opened read-only at seq=${this.seq}`);
  }

  /**
   * Append a record and fsync it. Returns the record as written.
   *
   * `build` receives the sequence number so the body can embed it.
   */
  async append(
    operation: JournalOperation,
    key: string,
    build: (seq: number) => T
  ): Promise<JournalEntry<T>> {
    const checkpoint = this.requireWritable();

    await this.maybeRotate(checkpoint);

    const seq = this.seq + 1;
    const entry: Omit<JournalEntry<T>, 'entryChecksum'> = {
      seq,
      timestamp: this.clock().toISOString(),
      operation,
      key,
      body: build(seq),
    };
    const fullEntry: JournalEntry<T> = { ...entry, entryChecksum: this.computeEntryChecksum(entry) };

    const line = JSON.stringify(fullEntry) + '\n';
    const segmentPath = this.segmentPath(checkpoint.activeSegment);
    await appendFile(segmentPath, line, 'utf-8');
    await this.fsync(segmentPath);

    this.seq = seq;
    this.currentSegmentSize += Buffer.byteLength(line);

    checkpoint.lastSeq = seq;
    const active = checkpoint.segments.find((s) => s.id === checkpoint.activeSegment);
    if (active) {
      active.size = this.currentSegmentSize;
      active.entries++;
      active.lastSeq = seq;
    }

    return fullEntry;
  }

  /**
   * Replay entries with seq > sinceSeq in sequence order.
   */
  async replay(
    sinceSeq: number,
    callback: (entry: JournalEntry<T>) => void
  ): Promise<{ replayed: number; errors: number }> {
    const checkpoint = this.requireCheckpoint();

    let replayed = 0;
    let errors = 0;

    for (const segment of this.segmentsInOrder(checkpoint)) {
      if (segment.lastSeq <= sinceSeq) continue;

      const { entries, badLines } = await this.readSegment(segment.id);
      errors += badLines;

      for (const entry of entries) {
        if (entry.seq <= sinceSeq) continue;
        callback(entry);
        replayed++;
      }
    }

    if (replayed > 0 || errors > 0) {
      this.log(`Replayed ${replayed} entries, ${errors} errors`);
    }
    return { replayed, errors };
  }

  /**
   * Record that a snapshot now covers everything up to `coveredSeq`:
   * rotate to a fresh segment and drop closed segments it covers.
   */
  async compact(coveredSeq: number): Promise<number> {
    const checkpoint = this.requireWritable();

    if (coveredSeq >= this.seq && this.currentSegmentSize > 0) {
      await this.rotate(checkpoint);
    }

    const removable = checkpoint.segments.filter(
      (s) => s.closedAt && s.lastSeq <= coveredSeq
    );

    for (const segment of removable) {
      try {
        await unlink(this.segmentPath(segment.id));
      } catch (e) {
        if (errnoCode(e) !== 'ENOENT') {
          this.logError(`Failed to remove segment ${segment.id}: ${e}`);
          continue;
        }
      }
      checkpoint.segments = checkpoint.segments.filter((s) => s.id !== segment.id);
      this.logDebug(`Removed covered segment: ${segment.id}`);
    }

    await this.saveCheckpoint(checkpoint);
    return removable.length;
  }

  getStatus(): {
    seq: number;
    activeSegment: string;
    segmentCount: number;
    totalSize: number;
  } {
    const totalSize = this.checkpoint?.segments.reduce((sum, s) => sum + s.size, 0) ?? 0;

    return {
      seq: this.seq,
      activeSegment: this.checkpoint?.activeSegment ?? '',
      segmentCount: this.checkpoint?.segments.length ?? 0,
      totalSize,
    };
  }

  async close(): Promise<void> {
    if (!this.initialized || !this.checkpoint) return;

    if (!this.config.readOnly) {
      await this.saveCheckpoint(this.checkpoint);
    }
    this.initialized = false;
    this.logDebug('Closed');
  }

  // ---------------------------------------------------------------------------
  // Segments
  // ---------------------------------------------------------------------------

  private async loadCheckpoint(): Promise<JournalCheckpoint> {
    const checkpointPath = join(this.config.journalDir, 'checkpoint.json');

    if (existsSync(checkpointPath)) {
      const content = await readFile(checkpointPath, 'utf-8');
      return JSON.parse(content) as JournalCheckpoint;
    }

    const fresh: JournalCheckpoint = {
      lastSeq: 0,
      activeSegment: '',
      segments: [],
      lastCheckpointAt: this.clock().toISOString(),
      rotationPhase: 'none',
    };
    await this.saveCheckpoint(fresh);
    return fresh;
  }

  /**
   * Save checkpoint to disk (atomic)
   */
  private async saveCheckpoint(checkpoint: JournalCheckpoint): Promise<void> {
    const checkpointPath = join(this.config.journalDir, 'checkpoint.json');
    const tempPath = `${checkpointPath}.tmp.${process.pid}`;

    checkpoint.lastCheckpointAt = this.clock().toISOString();

    await writeFile(tempPath, JSON.stringify(checkpoint, null, 2), 'utf-8');
    await this.fsync(tempPath);
    await rename(tempPath, checkpointPath);
  }

  private async createNewSegment(checkpoint: JournalCheckpoint): Promise<void> {
    // Sequence-based ids sort correctly even when two rotations share a millisecond.
    const base = `segment-${String(this.seq + 1).padStart(12, '0')}-${this.clock().getTime()}`;
    let segmentId = `${base}.wal`;
    for (let n = 1; checkpoint.segments.some((s) => s.id === segmentId); n++) {
      segmentId = `${base}-${n}.wal`;
    }

    await writeFile(this.segmentPath(segmentId), '', 'utf-8');

    checkpoint.segments.push({
      id: segmentId,
      size: 0,
      entries: 0,
      lastSeq: this.seq,
      createdAt: this.clock().toISOString(),
    });
    checkpoint.activeSegment = segmentId;
    this.currentSegmentSize = 0;

    await this.saveCheckpoint(checkpoint);
    this.logDebug(`Created new segment: ${segmentId}`);
  }

  private async maybeRotate(checkpoint: JournalCheckpoint): Promise<void> {
    const active = checkpoint.segments.find((s) => s.id === checkpoint.activeSegment);
    if (!active || this.currentSegmentSize === 0) return;

    const age = this.clock().getTime() - new Date(active.createdAt).getTime();
    if (
      this.currentSegmentSize >= this.config.maxSegmentSize ||
      age >= this.config.maxSegmentAge
    ) {
      await this.rotate(checkpoint);
    }
  }

  /**
   * Two-phase segment rotation
   */
  private async rotate(checkpoint: JournalCheckpoint): Promise<void> {
    checkpoint.rotationPhase = 'checkpoint_written';
    await this.saveCheckpoint(checkpoint);

    checkpoint.rotationPhase = 'rotating';
    const active = checkpoint.segments.find((s) => s.id === checkpoint.activeSegment);
    if (active) {
      active.closedAt = this.clock().toISOString();
    }
    await this.createNewSegment(checkpoint);

    checkpoint.rotationPhase = 'none';
    await this.saveCheckpoint(checkpoint);
  }

  private async recoverFromInterruptedRotation(checkpoint: JournalCheckpoint): Promise<void> {
    this.log(`Recovering from interrupted rotation (phase: ${checkpoint.rotationPhase})`);

    if (checkpoint.rotationPhase === 'rotating') {
      // The new segment may or may not exist; starting another one is harmless.
      const active = checkpoint.segments.find((s) => s.id === checkpoint.activeSegment);
      if (active && !active.closedAt) {
        active.closedAt = this.clock().toISOString();
      }
      await this.createNewSegment(checkpoint);
    }

    checkpoint.rotationPhase = 'none';
    await this.saveCheckpoint(checkpoint);
  }

  /**
   * Truncate the active segment after its last valid line.
   * Returns the resulting size in bytes.
   */
  private async repairTail(segmentId: string): Promise<number> {
    const path = this.segmentPath(segmentId);
    if (!existsSync(path)) {
      await writeFile(path, '', 'utf-8');
      return 0;
    }

    const content = await readFile(path, 'utf-8');
    let validBytes = 0;
    let offset = 0;

    while (offset < content.length) {
      const newline = content.indexOf('\n', offset);
      if (newline === -1) break; // unterminated last line is a torn write
      const line = content.slice(offset, newline);
      if (line.length > 0 && !this.parseLine(line)) break;
      validBytes += Buffer.byteLength(content.slice(offset, newline + 1));
      offset = newline + 1;
    }

    const totalBytes = Buffer.byteLength(content);
    if (validBytes < totalBytes) {
      this.log(`Truncating torn tail of ${segmentId} (${totalBytes - validBytes} bytes)`);
      const handle = await open(path, 'r+');
      try {
        await handle.truncate(validBytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
    }

    return validBytes;
  }

  private async readSegment(
    segmentId: string
  ): Promise<{ entries: JournalEntry<T>[]; badLines: number }> {
    let content: string;
    try {
      content = await readFile(this.segmentPath(segmentId), 'utf-8');
    } catch (e) {
      // Compaction may remove a covered segment under a read-only reader
      if (errnoCode(e) === 'ENOENT') return { entries: [], badLines: 0 };
      throw e;
    }

    const entries: JournalEntry<T>[] = [];
    let badLines = 0;

    for (const line of content.split('\n').filter(Boolean)) {
      const entry = this.parseLine(line);
      if (!entry) {
        // Anything after a bad checksum is untrusted
        this.logError(`Entry checksum mismatch in ${segmentId}, truncating replay`);
        badLines++;
        break;
      }
      entries.push(entry);
    }

    return { entries, badLines };
  }

  private async scanLastSeq(segmentId: string): Promise<number> {
    const { entries } = await this.readSegment(segmentId);
    return entries.length > 0 ? entries[entries.length - 1].seq : 0;
  }

  private parseLine(line: string): JournalEntry<T> | null {
    try {
      const parsed = JSON.parse(line) as JournalEntry<T>;
      const { entryChecksum, ...rest } = parsed;
      if (typeof parsed.seq !== 'number' || this.computeEntryChecksum(rest) !== entryChecksum) {
        return null;
      }
      return parsed;
    } catch {
      return null;
    }
  }

  private segmentsInOrder(checkpoint: JournalCheckpoint): JournalSegment[] {
    return [...checkpoint.segments].sort((a, b) => a.id.localeCompare(b.id));
  }

  private segmentPath(segmentId: string): string {
    return join(this.config.journalDir, segmentId);
  }

  private requireCheckpoint(): JournalCheckpoint {
    if (!this.initialized || !this.checkpoint) {
      throw new Error('Journal not initialized; call initialize() first');
    }
    return this.checkpoint;
  }

  private requireWritable(): JournalCheckpoint {
    if (this.config.readOnly) {
      throw new Error('Journal opened read-only');
    }
    return this.requireCheckpoint();
  }

  /**
   * Force fsync on a file (data durability)
   */
  private async fsync(filePath: string): Promise<void> {
    const handle = await open(filePath, 'r');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  /**
   * Checksum over the entry with keys in a stable order
   */
  private computeEntryChecksum(entry: Omit<JournalEntry<T>, 'entryChecksum'>): string {
    const canonical = JSON.stringify({
      seq: entry.seq,
      timestamp: entry.timestamp,
      operation: entry.operation,
      key: entry.key,
      body: entry.body,
    });
    return createHash('sha256').update(canonical).digest('hex').substring(0, 16);
  }

  private log(message: string): void {
    console.log(`[journal] ${message}`);
  }

  private logError(message: string): void {
    console.error(`[journal] ${message}`);
  }

  private logDebug(message: string): void {
    if (this.config.verbose) {
      console.log(`[journal] DEBUG: ${message}`);
    }
  }
}
