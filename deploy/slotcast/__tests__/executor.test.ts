/**
 * Executor Tests
 *
 * End-to-end runs over a real store and lock in a temp directory, with a
 * scripted publisher and a fake clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ScheduleStore } from '../store/schedule-store.js';
import { SlotAllocator } from '../scheduler/slot-allocator.js';
import { SlotGrid } from '../scheduler/slot-grid.js';
import { RetryPolicy } from '../scheduler/retry-policy.js';
import { RecoverySweeper } from '../scheduler/recovery-sweeper.js';
import { Executor, type ExecutorConfig } from '../scheduler/executor.js';
import { LockManager } from '../lock/lock-manager.js';
import { HealthMonitor } from '../health/health-monitor.js';
import { AuthPublishError, TransientPublishError } from '../errors.js';
import { FakeClock, FakePublisher, hangUntilAborted, item, iso, makeTempDir, removeTempDir } from './test-helpers.js';

describe('Executor', () => {
  let tempDir: string;
  let clock: FakeClock;
  let store: ScheduleStore;
  let allocator: SlotAllocator;
  let lock: LockManager;
  let health: HealthMonitor;
  let publisher: FakePublisher;

  const executor = (config?: Partial<ExecutorConfig>) => {
    const policy = new RetryPolicy();
    const sweeper = new RecoverySweeper(store, allocator, policy);
    return new Executor({ store, lock, sweeper, policy, publisher, health, clock }, config);
  };

  beforeEach(async () => {
    tempDir = await makeTempDir();
    clock = new FakeClock('2026-03-02T09:58:00Z');
    store = await ScheduleStore.open({ dataDir: tempDir, clock });
    allocator = new SlotAllocator(store, new SlotGrid());
    lock = new LockManager({ lockPath: path.join(tempDir, 'slotcast.lock'), clock });
    health = new HealthMonitor(store, undefined, {}, clock);
    publisher = new FakePublisher();
  });

  afterEach(async () => {
    await store.close();
    await removeTempDir(tempDir);
  });

  describe('runOnce', () => {
    it('should change nothing when no slot is due', async () => {
      await allocator.allocate([item('a')], clock.now());
      const before = store.list();
      const seq = store.getJournalStatus().seq;

      const result = await executor().runOnce();

      expect(result.status).toBe('no_action');
      expect(result.slots).toEqual([]);
      expect(result.sweep).toEqual({ reconciled: [], requeued: [], skipped: [] });
      expect(store.list()).toEqual(before);
      expect(store.getJournalStatus().seq).toBe(seq);
      expect(publisher.calls).toEqual([]);
      expect(fs.existsSync(lock.lockPath)).toBe(false);
    });

    it('should publish the due slot and record the post', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor().runOnce();

      expect(result.status).toBe('posted');
      expect(result.slots).toEqual([
        {
          entryId: entry.id,
          contentKey: 'a',
          scheduledTime: iso('2026-03-02T10:15:00Z'),
          status: 'posted',
          attemptCount: 1,
          externalPostId: 'post-1',
        },
      ]);
      expect(publisher.calls).toEqual([
        {
          payload: { title: 'Title for a' },
          scheduledTime: iso('2026-03-02T10:15:00Z'),
          idempotencyKey: entry.id,
        },
      ]);
      expect(store.get(entry.id)).toMatchObject({ state: 'posted', externalPostId: 'post-1' });
      expect(health.successRate()).toBe(1);
      expect(result.health?.successRate).toBe(1);
    });

    it('should publish at most one slot per run', async () => {
      await allocator.allocate([item('a'), item('b')], clock.now());
      clock.set('2026-03-02T10:30:00Z');

      const result = await executor().runOnce();

      expect(result.slots.map((s) => s.contentKey)).toEqual(['a']);
      expect(store.list({ states: ['pending'] }).map((e) => e.contentKey)).toEqual(['b']);
    });

    it('should retry transient failures on the same slot, then fail, then re-enqueue', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      publisher.enqueue(
        new TransientPublishError('Publish failed: 503 Service Unavailable'),
        new TransientPublishError('Publish failed: 503 Service Unavailable'),
        new TransientPublishError('Publish failed: 503 Service Unavailable')
      );
      clock.set('2026-03-02T10:15:00Z');
      const runner = executor();

      const first = await runner.runOnce();
      const second = await runner.runOnce();
      const third = await runner.runOnce();

      expect([first.status, second.status, third.status]).toEqual(['retry_scheduled', 'retry_scheduled', 'failed']);
      expect(third.slots[0]).toMatchObject({ attemptCount: 3, scheduledTime: iso('2026-03-02T10:15:00Z') });
      expect(store.get(entry.id)).toMatchObject({
        state: 'failed',
        lastError: { kind: 'transient', message: 'Publish failed: 503 Service Unavailable' },
      });
      expect(health.successRate()).toBe(0);

      clock.set('2026-03-02T10:20:00Z');
      const recovery = await runner.recoverOnly();

      expect(recovery.status).toBe('recovered');
      expect(recovery.sweep?.requeued).toEqual([
        { entryId: entry.id, contentKey: 'a', scheduledTime: iso('2026-03-02T10:30:00Z'), recoveryRounds: 1 },
      ]);
      expect(store.get(entry.id)).toMatchObject({ state: 'pending', attemptCount: 0, recoveryRounds: 1 });
    });

    it('should fail a fatal error at once and leave it out of recovery', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      publisher.enqueue(new AuthPublishError('Publish rejected: 401 Unauthorized'));
      clock.set('2026-03-02T10:15:00Z');
      const runner = executor();

      const result = await runner.runOnce();
      const next = await runner.runOnce();

      expect(result.status).toBe('failed');
      expect(result.slots[0].error).toEqual({
        kind: 'auth',
        message: 'Publish rejected: 401 Unauthorized',
        at: '2026-03-02T10:15:00.000Z',
      });
      expect(next.status).toBe('no_action');
      expect(next.sweep?.skipped).toEqual([{ entryId: entry.id, reason: 'fatal' }]);
      expect(publisher.calls).toHaveLength(1);
    });

    it('should treat a publish that outlives its timeout as a timeout failure', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      publisher.enqueue(hangUntilAborted);
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor({ publishTimeoutMs: 20 }).runOnce();

      expect(result.status).toBe('retry_scheduled');
      expect(result.slots[0].error).toMatchObject({ kind: 'timeout', message: 'Publish did not complete within 20ms' });
      expect(store.get(entry.id)?.state).toBe('pending');
    });

    it('should abort the publish and fail the run when the run timeout passes', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      publisher.enqueue(hangUntilAborted);
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor({ publishTimeoutMs: 5_000, runTimeoutMs: 30 }).runOnce();

      expect(result.status).toBe('failed');
      expect(result.message).toBe('Run exceeded 30ms');
      expect(fs.existsSync(lock.lockPath)).toBe(false);
      await vi.waitFor(() => {
        expect(store.get(entry.id)).toMatchObject({
          state: 'pending',
          lastError: { kind: 'timeout', message: 'Publish aborted' },
        });
      });
    });

    it('should report locked and touch nothing while another run holds the lock', async () => {
      await allocator.allocate([item('a')], clock.now());
      clock.set('2026-03-02T10:15:00Z');
      const other = new LockManager({ lockPath: lock.lockPath, clock });
      await other.acquire();

      const result = await executor().runOnce();
      await other.release();

      expect(result.status).toBe('locked');
      expect(result.sweep).toBeNull();
      expect(result.message).toContain(`Lock held by live process ${process.pid}`);
      expect(publisher.calls).toEqual([]);
      expect(store.list({ states: ['pending'] })).toHaveLength(1);
    });

    it('should settle an entry left in progress by a crashed run before publishing it', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      await store.transition(entry.id, 'in_progress');
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor().runOnce();

      expect(result.sweep?.reconciled).toEqual([{ entryId: entry.id, contentKey: 'a', outcome: 'retry_scheduled' }]);
      expect(result.slots[0]).toMatchObject({ status: 'posted', attemptCount: 2 });
    });
  });

  describe('catchUp', () => {
    it('should publish due slots in order up to the limit', async () => {
      await allocator.allocate([item('a'), item('b'), item('c')], clock.now());
      clock.set('2026-03-02T10:45:00Z');

      const result = await executor().catchUp(2);

      expect(result.mode).toBe('catch_up');
      expect(result.status).toBe('posted');
      expect(result.slots.map((s) => [s.contentKey, s.scheduledTime])).toEqual([
        ['a', iso('2026-03-02T10:00:00Z')],
        ['b', iso('2026-03-02T10:15:00Z')],
      ]);
      expect(store.list({ states: ['pending'] }).map((e) => e.contentKey)).toEqual(['c']);
    });

    it('should stop at the first fatal failure', async () => {
      await allocator.allocate([item('a'), item('b'), item('c')], clock.now());
      publisher.enqueue(new AuthPublishError('Publish rejected: 403 Forbidden'));
      clock.set('2026-03-02T10:45:00Z');

      const result = await executor().catchUp(4);

      expect(result.status).toBe('failed');
      expect(result.slots).toHaveLength(1);
      expect(publisher.calls).toHaveLength(1);
    });

    it('should report the worst slot outcome', async () => {
      await allocator.allocate([item('a'), item('b')], clock.now());
      publisher.enqueue({ externalPostId: 'ext-a' }, new TransientPublishError('Publish failed: 502 Bad Gateway'));
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor().catchUp(2);

      expect(result.slots.map((s) => s.status)).toEqual(['posted', 'retry_scheduled']);
      expect(result.status).toBe('retry_scheduled');
    });

    it('should leave a transient retry for the next invocation', async () => {
      const [entry] = (await allocator.allocate([item('a')], clock.now())).scheduled;
      publisher.enqueue(
        new TransientPublishError('Publish failed: 503 Service Unavailable'),
        new TransientPublishError('Publish failed: 503 Service Unavailable'),
        new TransientPublishError('Publish failed: 503 Service Unavailable')
      );
      clock.set('2026-03-02T10:15:00Z');
      const runner = executor();

      const first = await runner.catchUp(4);

      expect(first.status).toBe('retry_scheduled');
      expect(first.slots).toHaveLength(1);
      expect(publisher.calls).toHaveLength(1);
      expect(store.get(entry.id)).toMatchObject({
        state: 'pending',
        attemptCount: 1,
        scheduledTime: iso('2026-03-02T10:00:00Z'),
      });

      const second = await runner.catchUp(4);

      expect(second.slots).toEqual([
        expect.objectContaining({ entryId: entry.id, status: 'retry_scheduled', attemptCount: 2 }),
      ]);
      expect(publisher.calls).toHaveLength(2);
    });

    it('should move on to the next due slot after a transient failure', async () => {
      await allocator.allocate([item('a'), item('b')], clock.now());
      publisher.enqueue(new TransientPublishError('Publish failed: 502 Bad Gateway'));
      clock.set('2026-03-02T10:15:00Z');

      const result = await executor().catchUp(4);

      expect(result.slots.map((s) => [s.contentKey, s.status])).toEqual([
        ['a', 'retry_scheduled'],
        ['b', 'posted'],
      ]);
      expect(store.list({ states: ['pending'] }).map((e) => e.contentKey)).toEqual(['a']);
    });
  });

  describe('recoverOnly', () => {
    it('should report no_action when there is nothing to recover', async () => {
      const result = await executor().recoverOnly();

      expect(result.mode).toBe('recover');
      expect(result.status).toBe('no_action');
    });
  });
});
