/**
 * Schedule Store Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ScheduleStore, isTransitionAllowed } from '../store/schedule-store.js';
import { JournalManager } from '../wal/journal-manager.js';
import {
  DuplicateContentError,
  InvalidTransitionError,
  SlotAlignmentError,
  SlotCollisionError,
  SnapshotFormatError,
} from '../errors.js';
import { FakeClock, iso, makeTempDir, removeTempDir } from './test-helpers.js';

const payload = { title: 'Launch notes' };

describe('ScheduleStore', () => {
  let tempDir: string;
  let clock: FakeClock;
  let store: ScheduleStore;

  const open = (readOnly = false) => ScheduleStore.open({ dataDir: tempDir, clock, readOnly });

  const put = (contentKey: string, slot: string) =>
    store.put({ contentKey, payload, scheduledTime: new Date(slot), source: 'discovery' });

  beforeEach(async () => {
    tempDir = await makeTempDir();
    clock = new FakeClock('2026-03-02T09:58:00Z');
    store = await open();
  });

  afterEach(async () => {
    await store.close();
    await removeTempDir(tempDir);
  });

  describe('put', () => {
    it('should insert a pending entry', async () => {
      const entry = await put('post-a', '2026-03-02T10:00:00Z');

      expect(entry).toMatchObject({
        contentKey: 'post-a',
        payload,
        scheduledTime: '2026-03-02T10:00:00.000Z',
        state: 'pending',
        attemptCount: 0,
        lastError: null,
        source: 'discovery',
        recoveryRounds: 0,
        externalPostId: null,
        revision: 1,
        createdAt: '2026-03-02T09:58:00.000Z',
      });
      expect(store.get(entry.id)).toEqual(entry);
    });

    it('should reject a second active entry for the same content', async () => {
      const first = await put('post-a', '2026-03-02T10:00:00Z');

      const attempt = put('post-a', '2026-03-02T10:15:00Z');

      await expect(attempt).rejects.toBeInstanceOf(DuplicateContentError);
      await expect(attempt).rejects.toMatchObject({ contentKey: 'post-a', existingId: first.id });
    });

    it('should reject a slot held by a queued entry', async () => {
      const first = await put('post-a', '2026-03-02T10:00:00Z');

      const attempt = put('post-b', '2026-03-02T10:00:00Z');

      await expect(attempt).rejects.toBeInstanceOf(SlotCollisionError);
      await expect(attempt).rejects.toMatchObject({ occupantId: first.id });
    });

    it('should reject a slot off the cadence grid', async () => {
      await expect(put('post-a', '2026-03-02T10:07:00Z')).rejects.toBeInstanceOf(SlotAlignmentError);
    });

    it('should free content key and slot once the entry is skipped', async () => {
      const first = await put('post-a', '2026-03-02T10:00:00Z');
      await store.transition(first.id, 'skipped');

      const again = await put('post-a', '2026-03-02T10:00:00Z');

      expect(again.id).not.toBe(first.id);
      expect(store.findActiveByContentKey('post-a')?.id).toBe(again.id);
    });

    it('should keep the content key of a posted entry but free its slot', async () => {
      const first = await put('post-a', '2026-03-02T10:00:00Z');
      await store.transition(first.id, 'in_progress');
      await store.transition(first.id, 'posted', { externalPostId: 'ext-1' });

      await expect(put('post-a', '2026-03-02T10:15:00Z')).rejects.toBeInstanceOf(DuplicateContentError);
      await expect(put('post-b', '2026-03-02T10:00:00Z')).resolves.toMatchObject({ state: 'pending' });
    });
  });

  describe('transition', () => {
    it('should count an attempt on entering in_progress', async () => {
      const entry = await put('post-a', '2026-03-02T10:00:00Z');

      const running = await store.transition(entry.id, 'in_progress');
      const retried = await store.transition(running.id, 'pending', {
        lastError: { kind: 'transient', message: 'Publish failed: 503', at: '2026-03-02T10:00:05.000Z' },
      });
      const again = await store.transition(retried.id, 'in_progress');

      expect(running.attemptCount).toBe(1);
      expect(retried.attemptCount).toBe(1);
      expect(retried.lastError?.kind).toBe('transient');
      expect(again.attemptCount).toBe(2);
    });

    it('should clear lastError and archive the outcome on posted', async () => {
      const entry = await put('post-a', '2026-03-02T10:00:00Z');
      await store.transition(entry.id, 'in_progress');
      await store.transition(entry.id, 'pending', {
        lastError: { kind: 'timeout', message: 'Publish aborted', at: '2026-03-02T10:00:05.000Z' },
      });
      await store.transition(entry.id, 'in_progress');
      clock.set('2026-03-02T10:01:00Z');

      const posted = await store.transition(entry.id, 'posted', { externalPostId: 'ext-9' });

      expect(posted.lastError).toBeNull();
      expect(posted.externalPostId).toBe('ext-9');
      expect(
        store.outcomes({ since: new Date('2026-03-02T00:00:00Z'), until: new Date('2026-03-03T00:00:00Z') })
      ).toEqual([
        {
          entryId: entry.id,
          contentKey: 'post-a',
          outcome: 'posted',
          scheduledTime: '2026-03-02T10:00:00.000Z',
          at: '2026-03-02T10:01:00.000Z',
          attemptCount: 2,
          externalPostId: 'ext-9',
        },
      ]);
    });

    it('should reject transitions the state machine does not allow', async () => {
      const entry = await put('post-a', '2026-03-02T10:00:00Z');

      await expect(store.transition(entry.id, 'posted')).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(store.get(entry.id)?.state).toBe('pending');
    });

    it('should move a failed entry to a new slot and reset attempts on requeue', async () => {
      const entry = await put('post-a', '2026-03-02T09:30:00Z');
      await store.transition(entry.id, 'in_progress');
      await store.transition(entry.id, 'failed', {
        lastError: { kind: 'transient', message: 'Publish failed: 502', at: '2026-03-02T09:30:04.000Z' },
      });

      const requeued = await store.transition(entry.id, 'pending', {
        scheduledTime: new Date('2026-03-02T10:00:00Z'),
        attemptCount: 0,
        lastError: null,
        recoveryRounds: 1,
      });

      expect(requeued).toMatchObject({
        state: 'pending',
        scheduledTime: '2026-03-02T10:00:00.000Z',
        attemptCount: 0,
        lastError: null,
        recoveryRounds: 1,
      });
    });

    it('should refuse a requeue onto an occupied slot', async () => {
      const failed = await put('post-a', '2026-03-02T09:30:00Z');
      await store.transition(failed.id, 'in_progress');
      await store.transition(failed.id, 'failed');
      await put('post-b', '2026-03-02T10:00:00Z');

      await expect(
        store.transition(failed.id, 'pending', { scheduledTime: new Date('2026-03-02T10:00:00Z') })
      ).rejects.toBeInstanceOf(SlotCollisionError);
    });

    it('should expose the allowed transition table', () => {
      expect(isTransitionAllowed('pending', 'in_progress')).toBe(true);
      expect(isTransitionAllowed('in_progress', 'pending')).toBe(true);
      expect(isTransitionAllowed('failed', 'pending')).toBe(true);
      expect(isTransitionAllowed('posted', 'pending')).toBe(false);
      expect(isTransitionAllowed('skipped', 'pending')).toBe(false);
    });
  });

  describe('queries', () => {
    it('should return the earliest due pending entry', async () => {
      const early = await put('post-a', '2026-03-02T10:00:00Z');
      await put('post-b', '2026-03-02T10:15:00Z');

      expect(store.nextDue(new Date('2026-03-02T09:59:00Z'))).toBeNull();
      expect(store.nextDue(new Date('2026-03-02T10:00:00Z'))?.id).toBe(early.id);
      expect(store.nextDue(new Date('2026-03-02T10:20:00Z'))?.id).toBe(early.id);
    });

    it('should skip excluded entries when picking the next due one', async () => {
      const early = await put('post-a', '2026-03-02T10:00:00Z');
      const late = await put('post-b', '2026-03-02T10:15:00Z');
      const now = new Date('2026-03-02T10:20:00Z');

      expect(store.nextDue(now, new Set([early.id]))?.id).toBe(late.id);
      expect(store.nextDue(now, new Set([early.id, late.id]))).toBeNull();
    });

    it('should report the latest queued slot as the tail', async () => {
      expect(store.tail()).toBeNull();

      await put('post-a', '2026-03-02T10:00:00Z');
      const last = await put('post-b', '2026-03-02T11:00:00Z');
      expect(store.tail()?.toISOString()).toBe('2026-03-02T11:00:00.000Z');

      await store.transition(last.id, 'skipped');
      expect(store.tail()?.toISOString()).toBe('2026-03-02T10:00:00.000Z');
    });

    it('should list entries in slot order with filters', async () => {
      await put('post-b', '2026-03-02T10:15:00Z');
      const a = await put('post-a', '2026-03-02T10:00:00Z');
      await store.transition(a.id, 'in_progress');

      expect(store.list().map((e) => e.contentKey)).toEqual(['post-a', 'post-b']);
      expect(store.list({ states: ['pending'] }).map((e) => e.contentKey)).toEqual(['post-b']);
      expect(store.list({ contentKey: 'post-a' })).toHaveLength(1);
      expect(store.countByState()).toEqual({ pending: 1, in_progress: 1, posted: 0, failed: 0, skipped: 0 });
      expect([...store.occupiedSlots()].sort()).toEqual([iso('2026-03-02T10:00:00Z'), iso('2026-03-02T10:15:00Z')]);
    });
  });

  describe('persistence', () => {
    it('should reload entries after a clean close', async () => {
      const a = await put('post-a', '2026-03-02T10:00:00Z');
      const b = await put('post-b', '2026-03-02T10:15:00Z');
      await store.transition(a.id, 'in_progress');
      await store.transition(a.id, 'posted', { externalPostId: 'ext-1' });
      await store.close();

      store = await open();

      expect(store.get(a.id)?.state).toBe('posted');
      expect(store.get(b.id)?.state).toBe('pending');
      const schedule = JSON.parse(await fs.promises.readFile(path.join(tempDir, 'schedule.json'), 'utf-8')) as {
        entries: Array<{ id: string }>;
      };
      const completed = JSON.parse(await fs.promises.readFile(path.join(tempDir, 'completed.json'), 'utf-8')) as {
        entries: Array<{ id: string }>;
        outcomes: unknown[];
      };
      expect(schedule.entries.map((e) => e.id)).toEqual([b.id]);
      expect(completed.entries.map((e) => e.id)).toEqual([a.id]);
      expect(completed.outcomes).toHaveLength(1);
    });

    it('should recover mutations from the journal when the process died before a snapshot', async () => {
      const a = await put('post-a', '2026-03-02T10:00:00Z');
      await store.transition(a.id, 'in_progress');
      // No close(): the first store simply stops
      const abandoned = store;

      store = await open();

      expect(store.get(a.id)).toEqual(abandoned.get(a.id));
      expect(store.get(a.id)?.attemptCount).toBe(1);
    });

    it('should drop a torn journal line and keep appending', async () => {
      const a = await put('post-a', '2026-03-02T10:00:00Z');
      const b = await put('post-b', '2026-03-02T10:15:00Z');
      const journalDir = path.join(tempDir, 'journal');
      const [segment] = fs.readdirSync(journalDir).filter((f) => f.endsWith('.wal'));
      await fs.promises.appendFile(path.join(journalDir, segment), '{"seq":3,"operation":"put"');

      store = await open();
      const c = await put('post-c', '2026-03-02T10:30:00Z');

      expect(store.list().map((e) => e.id)).toEqual([a.id, b.id, c.id]);
      expect(c.revision).toBe(3);
    });
  });

  describe('snapshot validation', () => {
    it('should refuse a snapshot of another format version', async () => {
      await store.close();
      await fs.promises.writeFile(
        path.join(tempDir, 'schedule.json'),
        JSON.stringify({ version: 2, throughSeq: 0, writtenAt: '2026-03-02T09:00:00.000Z', entries: [] })
      );

      await expect(open()).rejects.toThrow(SnapshotFormatError);
    });

    it('should name the field an entry is missing', async () => {
      const a = await put('post-a', '2026-03-02T10:00:00Z');
      await store.close();
      const schedulePath = path.join(tempDir, 'schedule.json');
      const snapshot = JSON.parse(await fs.promises.readFile(schedulePath, 'utf-8')) as {
        entries: Array<Record<string, unknown>>;
      };
      expect(snapshot.entries[0].id).toBe(a.id);
      delete snapshot.entries[0].revision;
      await fs.promises.writeFile(schedulePath, JSON.stringify(snapshot));

      await expect(open()).rejects.toThrow('/entries/0/revision');
    });
  });

  describe('read-only mode', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should reload when a writer checkpoints while a reader is loading', async () => {
      await put('post-a', '2026-03-02T10:00:00Z');
      await store.checkpoint();
      await put('post-b', '2026-03-02T10:15:00Z');

      // The writer snapshots post-b and drops its journal segment between
      // the reader's snapshot read and its journal replay
      const replay = JournalManager.prototype.replay;
      vi.spyOn(JournalManager.prototype, 'replay').mockImplementationOnce(async function (
        this: JournalManager<unknown>,
        ...args
      ) {
        await store.checkpoint();
        return replay.apply(this, args);
      });

      const reader = await open(true);

      expect(reader.list().map((e) => e.contentKey)).toEqual(['post-a', 'post-b']);
      await reader.close();
    });

    it('should refuse writes until attached as writer', async () => {
      await put('post-a', '2026-03-02T10:00:00Z');
      await store.close();

      store = await open(true);
      expect(store.list()).toHaveLength(1);
      await expect(put('post-b', '2026-03-02T10:15:00Z')).rejects.toThrow('Schedule store opened read-only');

      await store.attachWriter();
      await put('post-b', '2026-03-02T10:15:00Z');
      await store.detachWriter();

      await expect(put('post-c', '2026-03-02T10:30:00Z')).rejects.toThrow('Schedule store opened read-only');
    });

    it('should see changes another writer made when attaching', async () => {
      const reader = await open(true);
      await put('post-a', '2026-03-02T10:00:00Z');
      await store.close();

      expect(reader.list()).toHaveLength(0);
      await reader.attachWriter();
      expect(reader.list().map((e) => e.contentKey)).toEqual(['post-a']);
      await reader.detachWriter();
      await reader.close();

      store = await open();
      expect(store.list()).toHaveLength(1);
    });
  });
});
