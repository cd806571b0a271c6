/**
 * slotcast - slot-scheduled publication orchestrator
 *
 * Main entry point for the orchestrator core.
 *
 * @module deploy/slotcast
 */

// Types & errors
export * from "./types.js";
export * from "./errors.js";

// Store
export { ScheduleStore, isTransitionAllowed } from "./store/schedule-store.js";
export type { NewScheduleEntry, TransitionPatch, EntryFilter, ScheduleStoreOptions } from "./store/schedule-store.js";
export { JournalManager } from "./wal/journal-manager.js";

// Scheduling
export { SlotGrid, DEFAULT_CADENCE_MS, SLOTS_PER_DAY } from "./scheduler/slot-grid.js";
export { SlotAllocator, DEFAULT_ALLOCATOR_CONFIG } from "./scheduler/slot-allocator.js";
export type { AllocationResult, AllocationMode, DuplicateRejection } from "./scheduler/slot-allocator.js";
export { RetryPolicy, DEFAULT_RETRY_POLICY } from "./scheduler/retry-policy.js";
export { RecoverySweeper } from "./scheduler/recovery-sweeper.js";
export type { SweepResult } from "./scheduler/recovery-sweeper.js";
export { Executor, DEFAULT_EXECUTOR_CONFIG } from "./scheduler/executor.js";
export type { RunResult, RunStatus, SlotOutcome } from "./scheduler/executor.js";
export { DiscoveryCycle } from "./scheduler/discovery-cycle.js";
export type { DiscoveryResult } from "./scheduler/discovery-cycle.js";
export { buildScheduleStatus, formatScheduleStatus } from "./scheduler/schedule-status.js";
export type { ScheduleStatus } from "./scheduler/schedule-status.js";

// Locking
export { LockManager, processLivenessProbe } from "./lock/lock-manager.js";
export type { LivenessProbe, LockEvent, LockRecord } from "./lock/lock-manager.js";

// Health
export { HealthMonitor, DEFAULT_HEALTH_CONFIG } from "./health/health-monitor.js";
export type { HealthReport } from "./health/health-monitor.js";
export {
  CompositeNotificationSink,
  NullNotificationSink,
  createNotificationSink,
  createNotificationSinkFromEnv,
} from "./health/notification-sink.js";
export type { NotificationSink, Severity } from "./health/notification-sink.js";

// Config
export { loadSlotcastConfig, resolvePaths, DEFAULT_SLOTCAST_CONFIG } from "./config/slotcast-config.js";
export type { SlotcastConfig } from "./config/slotcast-config.js";

// Collaborators
export { InboxDiscovery } from "./collaborators/inbox-discovery.js";
export { HttpPublisher } from "./collaborators/http-publisher.js";

// Wiring
export { createOrchestrator } from "./orchestrator.js";
export type { Orchestrator, OrchestratorOptions } from "./orchestrator.js";
