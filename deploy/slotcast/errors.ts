/**
 * Error taxonomy for the orchestrator.
 *
 * Allocator and store errors are handled by the executor; publish errors
 * carry a `kind` the retry policy classifies.
 *
 * @module deploy/slotcast/errors
 */

import type { EntryState, FailureKind } from './types.js';

export class SlotcastError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// Store / Allocator
// =============================================================================

export class DuplicateContentError extends SlotcastError {
  constructor(
    readonly contentKey: string,
    readonly existingId: string
  ) {
    super('DUPLICATE_CONTENT', `Content "${contentKey}" already scheduled as ${existingId}`);
  }
}

export class SlotCollisionError extends SlotcastError {
  constructor(
    readonly scheduledTime: string,
    readonly occupantId: string
  ) {
    super('SLOT_COLLISION', `Slot ${scheduledTime} already held by ${occupantId}`);
  }
}

export class SlotAlignmentError extends SlotcastError {
  constructor(readonly scheduledTime: string) {
    super('SLOT_ALIGNMENT', `Slot ${scheduledTime} is not on the cadence grid`);
  }
}

export class InvalidTransitionError extends SlotcastError {
  constructor(
    readonly entryId: string,
    readonly from: EntryState,
    readonly to: EntryState
  ) {
    super('INVALID_TRANSITION', `Entry ${entryId}: ${from} -> ${to} is not allowed`);
  }
}

export class EntryNotFoundError extends SlotcastError {
  constructor(readonly entryId: string) {
    super('ENTRY_NOT_FOUND', `No schedule entry with id ${entryId}`);
  }
}

export class SnapshotFormatError extends SlotcastError {
  constructor(
    readonly pathname: string,
    readonly issues: string[]
  ) {
    super('SNAPSHOT_FORMAT', `Unreadable snapshot ${pathname}:\n  ${issues.join('\n  ')}`);
  }
}

export class ScheduleFullError extends SlotcastError {
  constructor(readonly horizonSlots: number) {
    super('SCHEDULE_FULL', `No free slot within ${horizonSlots} cadence steps`);
  }
}

// =============================================================================
// Locking / Runs
// =============================================================================

export class LockHeldError extends SlotcastError {
  constructor(
    readonly holderPid: number,
    readonly acquiredAt: string
  ) {
    super('LOCK_HELD', `Lock held by live process ${holderPid} since ${acquiredAt}`);
  }
}

export class RunTimeoutError extends SlotcastError {
  constructor(readonly timeoutMs: number) {
    super('RUN_TIMEOUT', `Run exceeded ${timeoutMs}ms`);
  }
}

export class ConfigError extends SlotcastError {
  constructor(readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

// =============================================================================
// Publishing
// =============================================================================

export class PublishError extends SlotcastError {
  constructor(
    readonly kind: FailureKind,
    message: string
  ) {
    super(`PUBLISH_${kind.toUpperCase()}`, message);
  }
}

export class TransientPublishError extends PublishError {
  constructor(message: string) {
    super('transient', message);
  }
}

export class AuthPublishError extends PublishError {
  constructor(message: string) {
    super('auth', message);
  }
}

export class ValidationPublishError extends PublishError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class PublishTimeoutError extends PublishError {
  /** null when the publish was aborted by the enclosing run */
  constructor(readonly timeoutMs: number | null = null) {
    super('timeout', timeoutMs === null ? 'Publish aborted' : `Publish did not complete within ${timeoutMs}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `code` of a Node system error, if the value is one. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
