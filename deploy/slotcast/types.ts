/**
 * Shared types for the slotcast publication orchestrator.
 *
 * @module deploy/slotcast/types
 */

// =============================================================================
// Schedule Entries
// =============================================================================

export type EntryState = 'pending' | 'in_progress' | 'posted' | 'failed' | 'skipped';

/** States that hold a slot on the grid. */
export const QUEUED_STATES: ReadonlySet<EntryState> = new Set(['pending', 'in_progress']);

/** States that claim a content key. Only `skipped` releases it. */
export const ACTIVE_STATES: ReadonlySet<EntryState> = new Set([
  'pending',
  'in_progress',
  'posted',
  'failed',
]);

export type EntrySource = 'discovery' | 'frontload';

export type FailureKind = 'transient' | 'auth' | 'validation' | 'timeout';

export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isJsonObject(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isJsonValue);
}

export interface EntryError {
  kind: FailureKind;
  message: string;
  /** ISO timestamp of the failure */
  at: string;
}

export interface ScheduleEntry {
  id: string;
  contentKey: string;
  payload: JsonObject;
  /** ISO instant aligned to the slot grid */
  scheduledTime: string;
  state: EntryState;
  attemptCount: number;
  lastError: EntryError | null;
  source: EntrySource;
  /** Times the recovery sweeper has re-enqueued this entry */
  recoveryRounds: number;
  externalPostId: string | null;
  /** Journal sequence number of the last mutation */
  revision: number;
  createdAt: string;
  updatedAt: string;
}

/** Terminal publish outcome, kept in the completed/failed archives. */
export interface OutcomeRecord {
  entryId: string;
  contentKey: string;
  outcome: 'posted' | 'failed';
  scheduledTime: string;
  at: string;
  attemptCount: number;
  externalPostId?: string;
  error?: EntryError;
}

export interface TimeWindow {
  since: Date;
  until: Date;
}

// =============================================================================
// Collaborators
// =============================================================================

export interface DiscoveredItem {
  contentKey: string;
  payload: JsonObject;
}

/** Produces zero or more items per cycle. */
export interface ContentDiscovery {
  discover(): Promise<DiscoveredItem[]>;
  /** Called once the last batch is durably scheduled */
  acknowledge?(): Promise<void>;
}

export interface PublishOptions {
  signal: AbortSignal;
  /** Stable per entry; lets the target deduplicate a replayed publish */
  idempotencyKey: string;
}

export interface PublishReceipt {
  externalPostId: string;
}

/**
 * Rejects with a PublishError subclass to classify the failure; any other
 * rejection is treated as transient.
 */
export interface Publisher {
  publish(payload: JsonObject, scheduledTime: Date, options: PublishOptions): Promise<PublishReceipt>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
