/**
 * Orchestrator - wires store, allocator, lock, sweeper, executor and
 * health monitor from one SlotcastConfig.
 *
 * @module deploy/slotcast/orchestrator
 */

import { HttpPublisher } from './collaborators/http-publisher.js';
import { InboxDiscovery } from './collaborators/inbox-discovery.js';
import { resolvePaths, type SlotcastConfig } from './config/slotcast-config.js';
import { ConfigError } from './errors.js';
import { HealthMonitor, type HealthReport } from './health/health-monitor.js';
import { NullNotificationSink, type NotificationSink } from './health/notification-sink.js';
import { LockManager, type LivenessProbe, type LockEvent } from './lock/lock-manager.js';
import { DiscoveryCycle } from './scheduler/discovery-cycle.js';
import { Executor } from './scheduler/executor.js';
import { RecoverySweeper } from './scheduler/recovery-sweeper.js';
import { RetryPolicy } from './scheduler/retry-policy.js';
import { buildScheduleStatus, type ScheduleStatus } from './scheduler/schedule-status.js';
import { SlotAllocator } from './scheduler/slot-allocator.js';
import { MINUTE_MS, SlotGrid } from './scheduler/slot-grid.js';
import { ScheduleStore } from './store/schedule-store.js';
import { systemClock, type Clock, type ContentDiscovery, type Publisher } from './types.js';

export interface OrchestratorOptions {
  publisher?: Publisher;
  discovery?: ContentDiscovery;
  sink?: NotificationSink;
  clock?: Clock;
  probe?: LivenessProbe;
}

export interface Orchestrator {
  readonly config: SlotcastConfig;
  readonly store: ScheduleStore;
  readonly allocator: SlotAllocator;
  readonly lock: LockManager;
  readonly sweeper: RecoverySweeper;
  readonly health: HealthMonitor;
  readonly policy: RetryPolicy;
  /** @throws ConfigError when no publisher is configured */
  executor(): Executor;
  discoveryCycle(): DiscoveryCycle;
  status(now?: Date): ScheduleStatus;
  healthReport(now?: Date): HealthReport;
  close(): Promise<void>;
}

export async function createOrchestrator(
  config: SlotcastConfig,
  options: OrchestratorOptions = {}
): Promise<Orchestrator> {
  const clock = options.clock ?? systemClock;
  const sink = options.sink ?? new NullNotificationSink();
  const paths = resolvePaths(config);
  const grid = new SlotGrid(config.cadenceMinutes * MINUTE_MS);

  const store = await ScheduleStore.open({
    dataDir: paths.dataDir,
    grid,
    clock,
    checkpointEvery: config.checkpointEvery,
    // Writes happen only inside lock sessions (attachWriter/detachWriter)
    readOnly: true,
    verbose: config.verbose,
  });

  const policy = new RetryPolicy({
    maxAttempts: config.retry.maxAttempts,
    maxRecoveryRounds: config.retry.maxRecoveryRounds,
  });
  const allocator = new SlotAllocator(store, grid, {
    frontloadLeadMs: config.frontloadLeadMinutes * MINUTE_MS,
    verbose: config.verbose,
  });
  const lock = new LockManager({
    lockPath: paths.lockPath,
    probe: options.probe,
    clock,
    verbose: config.verbose,
    onEvent: (event) => reportLockEvent(sink, event),
  });
  const sweeper = new RecoverySweeper(store, allocator, policy, {
    batchSize: config.retry.batchSize,
    verbose: config.verbose,
  });
  const health = new HealthMonitor(store, sink, config.health, clock);

  const publisher =
    options.publisher ??
    (config.publisher.endpoint
      ? new HttpPublisher({ endpoint: config.publisher.endpoint, token: config.publisher.token })
      : null);
  const discovery = options.discovery ?? new InboxDiscovery(paths.inboxPath, config.verbose);

  let executor: Executor | null = null;

  return {
    config,
    store,
    allocator,
    lock,
    sweeper,
    health,
    policy,
    executor() {
      if (!publisher) {
        throw new ConfigError(['/publisher/endpoint: required to publish (or SLOTCAST_PUBLISH_ENDPOINT)']);
      }
      executor ??= new Executor(
        { store, lock, sweeper, policy, publisher, health, clock },
        {
          publishTimeoutMs: config.timeouts.publishMs,
          runTimeoutMs: config.timeouts.runMs,
          verbose: config.verbose,
        }
      );
      return executor;
    },
    discoveryCycle() {
      return new DiscoveryCycle(store, discovery, allocator, lock, clock);
    },
    status(now = clock.now()) {
      return buildScheduleStatus(store, now);
    },
    healthReport(now = clock.now()) {
      return health.report(now);
    },
    close() {
      return store.close();
    },
  };
}

async function reportLockEvent(sink: NotificationSink, event: LockEvent): Promise<void> {
  if (event.type !== 'stale_lock_reclaimed') return;
  await sink.notify('warning', 'Reclaimed stale run lock', {
    previousPid: event.previous?.pid ?? null,
    previousHost: event.previous?.hostname ?? null,
    previousAcquiredAt: event.previous?.acquiredAt ?? null,
  });
}
