/**
 * Snapshot files of the Schedule Store and their on-disk schema.
 *
 * @module deploy/slotcast/store/snapshots
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { loadJsonFile } from '../../../src/infra/json-file.js';
import { SnapshotFormatError } from '../errors.js';
import { isJsonObject, type OutcomeRecord, type ScheduleEntry } from '../types.js';

// =============================================================================
// Schema
// =============================================================================

const EntryErrorSchema = Type.Object({
  kind: Type.Union([
    Type.Literal('transient'),
    Type.Literal('auth'),
    Type.Literal('validation'),
    Type.Literal('timeout'),
  ]),
  message: Type.String(),
  at: Type.String(),
});

const ScheduleEntrySchema = Type.Object({
  id: Type.String(),
  contentKey: Type.String(),
  payload: Type.Record(Type.String(), Type.Unknown()),
  scheduledTime: Type.String(),
  state: Type.Union([
    Type.Literal('pending'),
    Type.Literal('in_progress'),
    Type.Literal('posted'),
    Type.Literal('failed'),
    Type.Literal('skipped'),
  ]),
  attemptCount: Type.Integer({ minimum: 0 }),
  lastError: Type.Union([EntryErrorSchema, Type.Null()]),
  source: Type.Union([Type.Literal('discovery'), Type.Literal('frontload')]),
  recoveryRounds: Type.Integer({ minimum: 0 }),
  externalPostId: Type.Union([Type.String(), Type.Null()]),
  revision: Type.Integer({ minimum: 0 }),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

const OutcomeRecordSchema = Type.Object({
  entryId: Type.String(),
  contentKey: Type.String(),
  outcome: Type.Union([Type.Literal('posted'), Type.Literal('failed')]),
  scheduledTime: Type.String(),
  at: Type.String(),
  attemptCount: Type.Integer({ minimum: 0 }),
  externalPostId: Type.Optional(Type.String()),
  error: Type.Optional(EntryErrorSchema),
});

const SnapshotHeader = {
  version: Type.Literal(1),
  throughSeq: Type.Integer({ minimum: 0 }),
  writtenAt: Type.String(),
};

const ScheduleSnapshotSchema = Type.Object({
  ...SnapshotHeader,
  entries: Type.Array(ScheduleEntrySchema),
});

const CompletedSnapshotSchema = Type.Object({
  ...SnapshotHeader,
  entries: Type.Array(ScheduleEntrySchema),
  outcomes: Type.Array(OutcomeRecordSchema),
});

const FailedSnapshotSchema = Type.Object({
  ...SnapshotHeader,
  outcomes: Type.Array(OutcomeRecordSchema),
});

// =============================================================================
// Types
// =============================================================================

export interface ScheduleSnapshot {
  version: 1;
  throughSeq: number;
  writtenAt: string;
  entries: ScheduleEntry[];
}

export interface CompletedSnapshot extends ScheduleSnapshot {
  outcomes: OutcomeRecord[];
}

export interface FailedSnapshot {
  version: 1;
  throughSeq: number;
  writtenAt: string;
  outcomes: OutcomeRecord[];
}

export interface SnapshotSet {
  schedule?: ScheduleSnapshot;
  completed?: CompletedSnapshot;
  failed?: FailedSnapshot;
}

export interface SnapshotPaths {
  schedulePath: string;
  completedPath: string;
  failedPath: string;
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Read all three snapshots. A missing file is simply absent; a file that
 * does not match its schema throws SnapshotFormatError.
 */
export function readSnapshots(paths: SnapshotPaths): SnapshotSet {
  const schedule = readChecked(paths.schedulePath, ScheduleSnapshotSchema);
  const completed = readChecked(paths.completedPath, CompletedSnapshotSchema);
  const failed = readChecked(paths.failedPath, FailedSnapshotSchema);

  return {
    schedule: schedule && {
      ...schedule,
      entries: schedule.entries.map((e, i) => toEntry(e, paths.schedulePath, i)),
    },
    completed: completed && {
      ...completed,
      entries: completed.entries.map((e, i) => toEntry(e, paths.completedPath, i)),
    },
    failed,
  };
}

/** Sequence numbers the snapshots cover, in schedule/completed/failed order. */
export function snapshotMarks(snapshots: SnapshotSet): [number, number, number] {
  return [
    snapshots.schedule?.throughSeq ?? 0,
    snapshots.completed?.throughSeq ?? 0,
    snapshots.failed?.throughSeq ?? 0,
  ];
}

function readChecked<S extends TSchema>(pathname: string, schema: S): Static<S> | undefined {
  const raw = loadJsonFile(pathname);
  if (raw === undefined) return undefined;
  if (Value.Check(schema, raw)) return raw;

  const issues = [...Value.Errors(schema, raw)]
    .slice(0, 5)
    .map((error) => `${error.path || '/'}: ${error.message}`);
  throw new SnapshotFormatError(pathname, issues);
}

function toEntry(entry: Static<typeof ScheduleEntrySchema>, pathname: string, index: number): ScheduleEntry {
  const payload = entry.payload;
  if (!isJsonObject(payload)) {
    throw new SnapshotFormatError(pathname, [`/entries/${index}/payload: Expected a JSON object`]);
  }
  return { ...entry, payload };
}
