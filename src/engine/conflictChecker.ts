import { areIntervalsOverlapping } from 'date-fns';
import type { SlotWindow } from './types.js';

export interface GuardianBooking {
  guardianId: string;
  assignmentId: string;
  slotId: string;
  window: SlotWindow;
}

/**
 * Half-open windows: a consultation ending at 10:30 does not clash with one starting at 10:30.
 */
export function windowsOverlap(a: SlotWindow, b: SlotWindow): boolean {
  return areIntervalsOverlapping(
    { start: a.startsAt, end: a.endsAt },
    { start: b.startsAt, end: b.endsAt },
  );
}

/**
 * True when the guardian already holds a booking overlapping the candidate window.
 * Same-slot bookings overlap too: siblings are never consulted simultaneously.
 */
export function conflicts(
  guardianId: string,
  candidate: SlotWindow,
  existing: readonly GuardianBooking[],
): boolean {
  return existing.some(
    (booking) => booking.guardianId === guardianId && windowsOverlap(booking.window, candidate),
  );
}

export type ConflictSnapshot = ReadonlyMap<string, readonly GuardianBooking[]>;

/**
 * Per-guardian index of committed booking windows.
 * A hard constraint: the allocator never relaxes it for priority.
 */
export class ConflictChecker {
  private readonly byGuardian = new Map<string, GuardianBooking[]>();

  conflicts(guardianId: string, candidate: SlotWindow): boolean {
    return conflicts(guardianId, candidate, this.byGuardian.get(guardianId) ?? []);
  }

  book(booking: GuardianBooking): void {
    const bookings = this.byGuardian.get(booking.guardianId) ?? [];
    bookings.push(booking);
    this.byGuardian.set(booking.guardianId, bookings);
  }

  /**
   * @returns False when the guardian held no booking for that assignment
   */
  unbook(guardianId: string, assignmentId: string): boolean {
    const bookings = this.byGuardian.get(guardianId);
    if (!bookings) return false;

    const index = bookings.findIndex((b) => b.assignmentId === assignmentId);
    if (index === -1) return false;

    bookings.splice(index, 1);
    if (bookings.length === 0) this.byGuardian.delete(guardianId);
    return true;
  }

  bookingsFor(guardianId: string): GuardianBooking[] {
    return [...(this.byGuardian.get(guardianId) ?? [])];
  }

  snapshot(): ConflictSnapshot {
    const copy = new Map<string, readonly GuardianBooking[]>();
    for (const [guardianId, bookings] of this.byGuardian) {
      copy.set(guardianId, [...bookings]);
    }
    return copy;
  }

  restore(snapshot: ConflictSnapshot): void {
    this.byGuardian.clear();
    for (const [guardianId, bookings] of snapshot) {
      this.byGuardian.set(guardianId, [...bookings]);
    }
  }
}
