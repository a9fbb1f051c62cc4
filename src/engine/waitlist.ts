import { comparePriority } from './priorityScorer.js';
import type { WaitlistEntry } from './types.js';

export type WaitlistSnapshot = readonly WaitlistEntry[];

/**
 * Per-slot waitlists kept in priority order (highest first)
 *
 * Entries without a slot (no preference given) sit in a separate
 * backlog that is only ever cleared by manual assignment.
 *
 * Performance:
 * - enqueue: O(n) insertion to maintain sorted order
 * - remove: O(n) search within the entry's slot
 */
export class Waitlist {
  private readonly queues = new Map<string, WaitlistEntry[]>();
  private readonly unslotted: WaitlistEntry[] = [];
  private readonly byRequest = new Map<string, WaitlistEntry>();

  /**
   * Add an entry at its ordered position. Re-enqueueing a request replaces its old entry.
   */
  enqueue(entry: WaitlistEntry): void {
    this.remove(entry.requestId);

    const queue = this.queueFor(entry.slotId);

    // First position whose occupant ranks after the new entry
    let insertIndex = queue.length;
    for (let i = 0; i < queue.length; i++) {
      if (comparePriority(entry.score, queue[i].score) < 0) {
        insertIndex = i;
        break;
      }
    }

    queue.splice(insertIndex, 0, entry);
    this.byRequest.set(entry.requestId, entry);
  }

  /**
   * @returns The removed entry, or null when the request was not waiting
   */
  remove(requestId: string): WaitlistEntry | null {
    const entry = this.byRequest.get(requestId);
    if (!entry) return null;

    const queue = this.queueFor(entry.slotId);
    const index = queue.findIndex((e) => e.requestId === requestId);
    if (index !== -1) queue.splice(index, 1);
    if (entry.slotId !== null && queue.length === 0) this.queues.delete(entry.slotId);

    this.byRequest.delete(requestId);
    return entry;
  }

  get(requestId: string): WaitlistEntry | null {
    return this.byRequest.get(requestId) ?? null;
  }

  entriesFor(slotId: string): WaitlistEntry[] {
    return [...(this.queues.get(slotId) ?? [])];
  }

  unslottedEntries(): WaitlistEntry[] {
    return [...this.unslotted];
  }

  /**
   * 1-based position within the entry's own waitlist
   */
  positionOf(requestId: string): number | null {
    const entry = this.byRequest.get(requestId);
    if (!entry) return null;
    return this.queueFor(entry.slotId).findIndex((e) => e.requestId === requestId) + 1;
  }

  all(): WaitlistEntry[] {
    return [...this.byRequest.values()];
  }

  get size(): number {
    return this.byRequest.size;
  }

  snapshot(): WaitlistSnapshot {
    return this.all();
  }

  restore(snapshot: WaitlistSnapshot): void {
    this.queues.clear();
    this.unslotted.length = 0;
    this.byRequest.clear();
    for (const entry of snapshot) {
      this.enqueue(entry);
    }
  }

  private queueFor(slotId: string | null): WaitlistEntry[] {
    if (slotId === null) return this.unslotted;

    let queue = this.queues.get(slotId);
    if (!queue) {
      queue = [];
      this.queues.set(slotId, queue);
    }
    return queue;
  }
}
