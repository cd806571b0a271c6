/**
 * Discovery cycle - pulls a batch from ContentDiscovery and allocates it
 *
 * Runs on its own (slower) timer but under the same run lock as the
 * executor, so allocation never races a publish. The inbox claim is
 * acknowledged only after every put is journaled.
 *
 * @module deploy/slotcast/scheduler/discovery-cycle
 */

import { LockHeldError, errorMessage } from '../errors.js';
import type { LockManager } from '../lock/lock-manager.js';
import type { ScheduleStore } from '../store/schedule-store.js';
import { systemClock, type Clock, type ContentDiscovery } from '../types.js';
import type { AllocationResult, SlotAllocator } from './slot-allocator.js';

export type DiscoveryStatus = 'locked' | 'no_action' | 'scheduled' | 'error';

export interface DiscoveryResult {
  status: DiscoveryStatus;
  discovered: number;
  allocation: AllocationResult | null;
  message?: string;
}

export class DiscoveryCycle {
  constructor(
    private readonly store: ScheduleStore,
    private readonly discovery: ContentDiscovery,
    private readonly allocator: SlotAllocator,
    private readonly lock: LockManager,
    private readonly clock: Clock = systemClock
  ) {}

  async run(): Promise<DiscoveryResult> {
    try {
      return await this.lock.withLock<DiscoveryResult>(async () => {
        await this.store.attachWriter();
        try {
          const items = await this.discovery.discover();
          const allocation = await this.allocator.allocate(items, this.clock.now());
          await this.discovery.acknowledge?.();

          return {
            status: allocation.scheduled.length > 0 ? 'scheduled' : 'no_action',
            discovered: items.length,
            allocation,
          };
        } finally {
          await this.store.detachWriter();
        }
      });
    } catch (e) {
      if (e instanceof LockHeldError) {
        console.log(`[discovery] ${e.message}; skipping this cycle`);
        return { status: 'locked', discovered: 0, allocation: null, message: e.message };
      }
      const message = errorMessage(e);
      console.error(`[discovery] Cycle failed: ${message}`);
      return { status: 'error', discovered: 0, allocation: null, message };
    }
  }
}
