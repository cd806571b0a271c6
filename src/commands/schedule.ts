import {
  createNotificationSinkFromEnv,
  createOrchestrator,
  formatScheduleStatus,
  loadSlotcastConfig,
  type DiscoveryResult,
  type HealthReport,
  type Orchestrator,
  type RunResult,
} from "../../deploy/slotcast/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { parsePositiveInt } from "../cli/cli-utils.js";

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export type ScheduleCommandOpts = {
  config?: string;
  json?: boolean;
};

export type CatchUpCommandOpts = ScheduleCommandOpts & {
  max?: string;
};

async function withOrchestrator(
  opts: ScheduleCommandOpts,
  fn: (orchestrator: Orchestrator) => Promise<void>,
): Promise<void> {
  const config = loadSlotcastConfig({ configPath: opts.config });
  const orchestrator = await createOrchestrator(config, { sink: createNotificationSinkFromEnv() });
  try {
    await fn(orchestrator);
  } finally {
    await orchestrator.close();
  }
}

export function formatRunResult(result: RunResult): string[] {
  const lines = [`${result.mode}: ${result.status}${result.message ? ` (${result.message})` : ""}`];

  const sweep = result.sweep;
  if (sweep && (sweep.reconciled.length > 0 || sweep.requeued.length > 0 || sweep.skipped.length > 0)) {
    lines.push(
      `  recovery: ${sweep.reconciled.length} orphan(s) settled, ${sweep.requeued.length} re-enqueued, ${sweep.skipped.length} need attention`,
    );
    for (const entry of sweep.requeued) {
      lines.push(`    ${entry.contentKey} -> ${entry.scheduledTime} (round ${entry.recoveryRounds})`);
    }
  }

  for (const slot of result.slots) {
    let line = `  ${slot.status} ${slot.contentKey} @ ${slot.scheduledTime} (attempt ${slot.attemptCount})`;
    if (slot.externalPostId) line += ` -> ${slot.externalPostId}`;
    if (slot.error) line += `: ${slot.error.kind}: ${slot.error.message}`;
    lines.push(line);
  }

  return lines;
}

function reportRun(result: RunResult, opts: ScheduleCommandOpts, runtime: RuntimeEnv): void {
  if (opts.json) {
    runtime.log(JSON.stringify(result, null, 2));
  } else {
    for (const line of formatRunResult(result)) runtime.log(line);
  }
  // A held lock or an empty queue is a normal outcome for a timer-driven run
  if (result.status === "failed" || result.status === "error") {
    runtime.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Run / Catch-up / Recover
// ---------------------------------------------------------------------------

export async function scheduleRunCommand(opts: ScheduleCommandOpts, runtime: RuntimeEnv): Promise<void> {
  await withOrchestrator(opts, async (orchestrator) => {
    reportRun(await orchestrator.executor().runOnce(), opts, runtime);
  });
}

export async function scheduleCatchUpCommand(opts: CatchUpCommandOpts, runtime: RuntimeEnv): Promise<void> {
  const requested = parsePositiveInt(opts.max, "--max");

  await withOrchestrator(opts, async (orchestrator) => {
    const { defaultMax, cap } = orchestrator.config.catchUp;
    let max = requested ?? defaultMax;
    if (max > cap) {
      runtime.log(`--max ${max} capped at ${cap}`);
      max = cap;
    }
    reportRun(await orchestrator.executor().catchUp(max), opts, runtime);
  });
}

export async function scheduleRecoverCommand(opts: ScheduleCommandOpts, runtime: RuntimeEnv): Promise<void> {
  await withOrchestrator(opts, async (orchestrator) => {
    reportRun(await orchestrator.executor().recoverOnly(), opts, runtime);
  });
}

// ---------------------------------------------------------------------------
// Discover
// ---------------------------------------------------------------------------

export function formatDiscoveryResult(result: DiscoveryResult): string[] {
  const lines = [`discover: ${result.status}${result.message ? ` (${result.message})` : ""}`];
  const allocation = result.allocation;
  if (!allocation) return lines;

  lines.push(
    `  discovered ${result.discovered}, scheduled ${allocation.scheduled.length} (${allocation.mode}), duplicates ${allocation.duplicates.length}`,
  );
  for (const entry of allocation.scheduled) {
    lines.push(`  + ${entry.contentKey} @ ${entry.scheduledTime}`);
  }
  for (const duplicate of allocation.duplicates) {
    lines.push(`  = ${duplicate.contentKey} already ${duplicate.existingId ? `scheduled as ${duplicate.existingId}` : "in batch"}`);
  }
  return lines;
}

export async function scheduleDiscoverCommand(opts: ScheduleCommandOpts, runtime: RuntimeEnv): Promise<void> {
  await withOrchestrator(opts, async (orchestrator) => {
    const result = await orchestrator.discoveryCycle().run();
    if (opts.json) {
      runtime.log(JSON.stringify(result, null, 2));
    } else {
      for (const line of formatDiscoveryResult(result)) runtime.log(line);
    }
    if (result.status === "error") {
      runtime.exit(1);
    }
  });
}

// ---------------------------------------------------------------------------
// Status / Health
// ---------------------------------------------------------------------------

export async function scheduleStatusCommand(opts: ScheduleCommandOpts, runtime: RuntimeEnv): Promise<void> {
  await withOrchestrator(opts, async (orchestrator) => {
    const status = orchestrator.status();
    const lock = await orchestrator.lock.inspect();

    if (opts.json) {
      runtime.log(JSON.stringify({ ...status, lock }, null, 2));
      return;
    }

    for (const line of formatScheduleStatus(status)) runtime.log(line);
    runtime.log(lock ? `Lock: held by pid ${lock.pid} on ${lock.hostname} since ${lock.acquiredAt}` : "Lock: free");
  });
}

export function formatHealthReport(report: HealthReport): string[] {
  const rate = report.successRate === null ? "n/a" : `${(report.successRate * 100).toFixed(1)}%`;
  return [
    `health: ${report.degraded ? "DEGRADED" : "ok"}`,
    `  success rate: ${rate} (${report.posted} posted, ${report.failed} failed)`,
    `  window: ${report.window.since} .. ${report.window.until}`,
    `  threshold: ${report.threshold * 100}% with at least ${report.minSamples} samples`,
  ];
}

export async function scheduleHealthCommand(opts: ScheduleCommandOpts, runtime: RuntimeEnv): Promise<void> {
  await withOrchestrator(opts, async (orchestrator) => {
    const report = orchestrator.healthReport();
    if (opts.json) {
      runtime.log(JSON.stringify(report, null, 2));
    } else {
      for (const line of formatHealthReport(report)) runtime.log(line);
    }
    if (report.degraded) {
      runtime.exit(1);
    }
  });
}
