/**
 * InboxDiscovery - file-backed ContentDiscovery
 *
 * Producers write a JSON array of `{ contentKey, payload }` records to the
 * inbox file. A cycle claims the inbox by renaming it aside; the claimed
 * file is removed only on acknowledge, so a crash between discovery and
 * allocation replays the batch (and the allocator drops what it already
 * scheduled).
 *
 * @module deploy/slotcast/collaborators/inbox-discovery
 */

import { existsSync, renameSync, unlinkSync } from 'fs';
import { loadJsonFile, saveJsonFile } from '../../../src/infra/json-file.js';
import { isJsonObject, type ContentDiscovery, type DiscoveredItem } from '../types.js';

export class InboxDiscovery implements ContentDiscovery {
  constructor(
    readonly inboxPath: string,
    private readonly verbose = false
  ) {}

  get claimedPath(): string {
    return `${this.inboxPath}.claimed`;
  }

  async discover(): Promise<DiscoveredItem[]> {
    if (existsSync(this.inboxPath)) {
      if (existsSync(this.claimedPath)) {
        // Leftover claim from an interrupted cycle: fold the new inbox into it
        const merged = [...readRecords(this.claimedPath), ...readRecords(this.inboxPath)];
        saveJsonFile(this.claimedPath, merged);
        unlinkSync(this.inboxPath);
      } else {
        renameSync(this.inboxPath, this.claimedPath);
      }
    }

    if (!existsSync(this.claimedPath)) {
      this.logDebug('inbox empty');
      return [];
    }

    const items: DiscoveredItem[] = [];
    for (const [index, record] of readRecords(this.claimedPath).entries()) {
      const item = toItem(record);
      if (item) {
        items.push(item);
      } else {
        console.warn(`[inbox] Skipping malformed record #${index} in ${this.claimedPath}`);
      }
    }

    this.logDebug(`claimed ${items.length} item(s)`);
    return items;
  }

  async acknowledge(): Promise<void> {
    if (existsSync(this.claimedPath)) {
      unlinkSync(this.claimedPath);
    }
  }

  private logDebug(message: string): void {
    if (this.verbose) {
      console.log(`[inbox] DEBUG: ${message}`);
    }
  }
}

function readRecords(path: string): unknown[] {
  const data = loadJsonFile(path);
  if (data === undefined) return [];
  if (!Array.isArray(data)) {
    throw new Error(`Inbox ${path} must hold a JSON array`);
  }
  return data;
}

function toItem(record: unknown): DiscoveredItem | null {
  if (!isJsonObject(record)) return null;
  const { contentKey, payload } = record;
  if (typeof contentKey !== 'string' || contentKey.length === 0) return null;
  if (!isJsonObject(payload)) return null;
  return { contentKey, payload };
}
