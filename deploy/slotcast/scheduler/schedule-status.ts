/**
 * Read-only status view over the schedule.
 *
 * @module deploy/slotcast/scheduler/schedule-status
 */

import type { ScheduleStore } from '../store/schedule-store.js';
import type { EntryState, ScheduleEntry } from '../types.js';

export interface UpcomingSlot {
  entryId: string;
  contentKey: string;
  scheduledTime: string;
  state: EntryState;
  attemptCount: number;
}

export interface NextPost extends UpcomingSlot {
  /** Minutes past the slot; negative while still ahead */
  delayMinutes: number;
  isOverdue: boolean;
}

export interface ScheduleStatus {
  generatedAt: string;
  counts: Record<EntryState, number>;
  overdue: number;
  next: NextPost | null;
  upcoming: UpcomingSlot[];
  today: { posted: number; failed: number };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildScheduleStatus(store: ScheduleStore, now: Date, upcomingLimit = 5): ScheduleStatus {
  const nowMs = now.getTime();
  const queued = store.list({ states: ['pending', 'in_progress'] });
  const pending = queued.filter((e) => e.state === 'pending');

  const overdue = pending.filter((e) => new Date(e.scheduledTime).getTime() <= nowMs).length;
  const upcoming = queued.filter((e) => new Date(e.scheduledTime).getTime() > nowMs).slice(0, upcomingLimit);

  const first = pending[0];
  const next: NextPost | null = first
    ? {
        ...toUpcoming(first),
        delayMinutes: Math.round(((nowMs - new Date(first.scheduledTime).getTime()) / 60_000) * 10) / 10,
        isOverdue: new Date(first.scheduledTime).getTime() <= nowMs,
      }
    : null;

  // Current UTC day
  const since = new Date(Math.floor(nowMs / DAY_MS) * DAY_MS);
  const until = new Date(since.getTime() + DAY_MS);
  const today = { posted: 0, failed: 0 };
  for (const outcome of store.outcomes({ since, until })) {
    today[outcome.outcome]++;
  }

  return {
    generatedAt: now.toISOString(),
    counts: store.countByState(),
    overdue,
    next,
    upcoming: upcoming.map(toUpcoming),
    today,
  };
}

export function formatScheduleStatus(status: ScheduleStatus): string[] {
  const lines = [
    `Schedule status (${status.generatedAt})`,
    `  pending: ${status.counts.pending}  in_progress: ${status.counts.in_progress}  overdue: ${status.overdue}`,
    `  posted: ${status.counts.posted}  failed: ${status.counts.failed}  skipped: ${status.counts.skipped}`,
    `  today: ${status.today.posted} posted, ${status.today.failed} failed`,
  ];

  if (status.next) {
    const flag = status.next.isOverdue ? ` (overdue by ${status.next.delayMinutes} min)` : '';
    lines.push(`Next due: ${status.next.scheduledTime} ${status.next.contentKey}${flag}`);
  } else {
    lines.push('Next due: none');
  }

  if (status.upcoming.length > 0) {
    lines.push('Upcoming:');
    for (const slot of status.upcoming) {
      lines.push(`  ${slot.scheduledTime}  ${slot.contentKey}  [${slot.state}]`);
    }
  }

  return lines;
}

function toUpcoming(entry: ScheduleEntry): UpcomingSlot {
  return {
    entryId: entry.id,
    contentKey: entry.contentKey,
    scheduledTime: entry.scheduledTime,
    state: entry.state,
    attemptCount: entry.attemptCount,
  };
}
