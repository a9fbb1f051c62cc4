import { AppError, ErrorCode } from '../utils/appError.js';
import { compareIds } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { SlotWindow, TimeSlot, TimeSlotDefinition } from './types.js';

interface SlotState {
  readonly definition: Readonly<TimeSlotDefinition>;
  occupancy: number;
  blackout: boolean;
}

export type CalendarSnapshot = ReadonlyMap<string, { occupancy: number; blackout: boolean }>;

/**
 * Reject definitions that cannot form a slot: empty window or non-positive capacity.
 */
export function assertValidSlotDefinition(definition: TimeSlotDefinition): void {
  if (definition.endsAt.getTime() <= definition.startsAt.getTime()) {
    throw AppError.badRequest(`Slot ${definition.id} must end after it starts`);
  }
  if (!Number.isInteger(definition.capacity) || definition.capacity < 1) {
    throw AppError.badRequest(`Slot ${definition.id} capacity must be a positive integer`);
  }
}

/**
 * Owns every time slot of the admission cycle.
 *
 * Occupancy is never exposed for direct mutation: `reserve` and `release`
 * are the only writers, and callers receive copies.
 *
 * Invariant: occupancy <= capacity for every slot, at every point in time
 */
export class SlotCalendar {
  private readonly slots = new Map<string, SlotState>();

  /**
   * Add a slot. Capacity is fixed from here on.
   *
   * @param occupancy Existing bookings when rebuilding from storage
   */
  register(definition: TimeSlotDefinition, occupancy = 0): TimeSlot {
    if (this.slots.has(definition.id)) {
      throw AppError.conflict(`Slot ${definition.id} already exists`, ErrorCode.DUPLICATE_ENTRY);
    }
    assertValidSlotDefinition(definition);
    if (!Number.isInteger(occupancy) || occupancy < 0 || occupancy > definition.capacity) {
      throw AppError.badRequest(
        `Slot ${definition.id} occupancy ${occupancy} is outside 0..${definition.capacity}`,
      );
    }

    this.slots.set(definition.id, {
      definition: {
        id: definition.id,
        startsAt: new Date(definition.startsAt),
        endsAt: new Date(definition.endsAt),
        capacity: definition.capacity,
        blackout: definition.blackout,
      },
      occupancy,
      blackout: definition.blackout,
    });

    return this.get(definition.id);
  }

  has(slotId: string): boolean {
    return this.slots.has(slotId);
  }

  get(slotId: string): TimeSlot {
    const state = this.lookup(slotId);
    return {
      ...state.definition,
      startsAt: new Date(state.definition.startsAt),
      endsAt: new Date(state.definition.endsAt),
      blackout: state.blackout,
      occupancy: state.occupancy,
    };
  }

  /**
   * All slots, ordered by start time then id
   */
  list(): TimeSlot[] {
    return [...this.slots.keys()]
      .map((id) => this.get(id))
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime() || compareIds(a.id, b.id));
  }

  window(slotId: string): SlotWindow {
    const { definition } = this.lookup(slotId);
    return { startsAt: new Date(definition.startsAt), endsAt: new Date(definition.endsAt) };
  }

  /**
   * Blackout slots report zero regardless of configured capacity
   */
  remainingCapacity(slotId: string): number {
    const state = this.lookup(slotId);
    if (state.blackout) return 0;
    return state.definition.capacity - state.occupancy;
  }

  isBlackout(slotId: string): boolean {
    return this.lookup(slotId).blackout;
  }

  setBlackout(slotId: string, blackout: boolean): void {
    this.lookup(slotId).blackout = blackout;
  }

  /**
   * Compare-and-increment. Check and write happen in one synchronous step,
   * so two callers can never both take the last seat.
   */
  reserve(slotId: string): void {
    const state = this.lookup(slotId);
    if (state.blackout || state.occupancy >= state.definition.capacity) {
      throw AppError.capacityExceeded(slotId);
    }
    state.occupancy += 1;
  }

  release(slotId: string): void {
    const state = this.lookup(slotId);
    if (state.occupancy === 0) {
      logger.warn(`Release on empty slot ${slotId} ignored`);
      return;
    }
    state.occupancy -= 1;
  }

  snapshot(): CalendarSnapshot {
    const copy = new Map<string, { occupancy: number; blackout: boolean }>();
    for (const [id, state] of this.slots) {
      copy.set(id, { occupancy: state.occupancy, blackout: state.blackout });
    }
    return copy;
  }

  /**
   * Put occupancy and blackout flags back to a snapshot taken earlier
   */
  restore(snapshot: CalendarSnapshot): void {
    for (const [id, saved] of snapshot) {
      const state = this.slots.get(id);
      if (state) {
        state.occupancy = saved.occupancy;
        state.blackout = saved.blackout;
      }
    }
  }

  private lookup(slotId: string): SlotState {
    const state = this.slots.get(slotId);
    if (!state) throw AppError.unknownSlot(slotId);
    return state;
  }
}
