import { v4 as uuidv4 } from 'uuid';
import { AppError, ErrorCode, isAppError } from '../utils/appError.js';
import {
  AssignmentOrigin,
  AssignmentStatus,
  UNKNOWN_SLOT_REASON,
  WaitlistReason,
  type ScoringWeights,
} from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import type { ConflictChecker } from './conflictChecker.js';
import { rankRequests, type PriorityScore } from './priorityScorer.js';
import type { SlotCalendar } from './slotCalendar.js';
import type {
  AllocationOutcome,
  Assignment,
  AssignmentReason,
  ConsultationRequest,
  WaitlistEntry,
} from './types.js';
import type { Waitlist } from './waitlist.js';

export interface AllocatorOptions {
  weights: ScoringWeights;
  now?: () => Date;
  newId?: () => string;
}

export interface CancellationOutcome {
  cancelled: Assignment;
  promoted: Assignment[];
}

interface SkipTally {
  blackout: number;
  full: number;
  conflict: number;
}

/**
 * Greedy, deterministic allocation of consultation requests to slots
 *
 * Requests are taken in priority order; each gets the first viable slot
 * in its own preference order or a waitlist entry. No search, no
 * backtracking - committed assignments never move.
 *
 * Mutates the calendar, conflict index and waitlist it was built with;
 * request statuses are left to the caller.
 */
export class Allocator {
  private readonly weights: ScoringWeights;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly calendar: SlotCalendar,
    private readonly conflictChecker: ConflictChecker,
    private readonly waitlist: Waitlist,
    options: AllocatorOptions,
  ) {
    this.weights = options.weights;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => uuidv4());
  }

  /**
   * Run one batch pass over the pool
   *
   * Steps:
   * 1. Score and rank every request
   * 2. Per request, walk desired slots in preference order and take the first viable one
   * 3. Otherwise wait-list it against its most-preferred usable slot
   *
   * @returns One outcome per distinct request, in ranked order
   */
  allocate(requests: readonly ConsultationRequest[]): AllocationOutcome[] {
    if (requests.length === 0) {
      throw AppError.unprocessable('No consultation requests to allocate', ErrorCode.EMPTY_REQUEST_POOL);
    }

    const outcomes: AllocationOutcome[] = [];
    const seen = new Set<string>();

    for (const { request, score } of rankRequests(requests, this.weights)) {
      if (seen.has(request.id)) {
        logger.warn(`Request ${request.id} appears twice in the pool; later copy ignored`);
        continue;
      }
      seen.add(request.id);

      // Unregistered slot ids are a caller error, fatal to this request only
      const unknownSlotIds = request.desiredSlotIds.filter((slotId) => !this.calendar.has(slotId));
      if (unknownSlotIds.length > 0) {
        logger.warn(`Request ${request.id} references unknown slots: ${unknownSlotIds.join(', ')}`);
        outcomes.push({
          kind: 'rejected',
          requestId: request.id,
          score,
          reason: UNKNOWN_SLOT_REASON,
          unknownSlotIds,
        });
        continue;
      }

      outcomes.push(this.place(request, score));
    }

    return outcomes;
  }

  /**
   * Fill free capacity in one slot from its waitlist, in stored order.
   * No re-scoring and no other slot is touched.
   *
   * Entries that never auto-promote, or whose guardian now clashes with the
   * slot, are passed over and keep their position.
   */
  promote(slotId: string, replacesAssignmentId: string | null = null): Assignment[] {
    const window = this.calendar.window(slotId);
    const promoted: Assignment[] = [];

    for (const entry of this.waitlist.entriesFor(slotId)) {
      if (this.calendar.remainingCapacity(slotId) <= 0) break;
      if (!entry.autoPromote) continue;
      if (this.conflictChecker.conflicts(entry.guardianId, window)) continue;

      this.calendar.reserve(slotId);
      this.waitlist.remove(entry.requestId);

      const assignment = this.book(
        entry.requestId,
        entry.guardianId,
        slotId,
        AssignmentOrigin.PROMOTED,
        promoted.length === 0 ? replacesAssignmentId : null,
      );
      promoted.push(assignment);

      logger.info(`Promoted request ${entry.requestId} into slot ${slotId}`);
    }

    return promoted;
  }

  /**
   * Revoke an assignment: free the seat, drop the guardian booking, then
   * promote from that slot's waitlist. All three happen together.
   */
  cancel(assignment: Assignment): CancellationOutcome {
    if (assignment.status !== AssignmentStatus.ACTIVE) {
      throw AppError.badRequest(
        `Assignment ${assignment.id} is already ${assignment.status}`,
        ErrorCode.INVALID_TRANSITION,
        { from: assignment.status, to: AssignmentStatus.CANCELLED },
      );
    }

    this.calendar.release(assignment.slotId);
    this.conflictChecker.unbook(assignment.guardianId, assignment.id);

    const cancelled: Assignment = {
      ...assignment,
      status: AssignmentStatus.CANCELLED,
      cancelledAt: this.now(),
    };

    return { cancelled, promoted: this.promote(assignment.slotId, assignment.id) };
  }

  /**
   * Staff override. Capacity, blackout and guardian conflicts still apply.
   */
  assignManually(request: ConsultationRequest, slotId: string): Assignment {
    const window = this.calendar.window(slotId);

    if (this.calendar.isBlackout(slotId)) {
      throw AppError.conflict(`Slot ${slotId} is blacked out`, ErrorCode.SLOT_UNAVAILABLE, { slotId });
    }
    if (this.conflictChecker.conflicts(request.guardianId, window)) {
      throw AppError.conflict(
        `Guardian ${request.guardianId} already has a consultation overlapping slot ${slotId}`,
        ErrorCode.GUARDIAN_CONFLICT,
        { guardianId: request.guardianId, slotId },
      );
    }

    this.calendar.reserve(slotId);
    this.waitlist.remove(request.id);

    return this.book(request.id, request.guardianId, slotId, AssignmentOrigin.MANUAL, null);
  }

  private place(request: ConsultationRequest, score: PriorityScore): AllocationOutcome {
    const tally: SkipTally = { blackout: 0, full: 0, conflict: 0 };

    for (let i = 0; i < request.desiredSlotIds.length; i++) {
      const slotId = request.desiredSlotIds[i];

      if (this.calendar.isBlackout(slotId)) {
        tally.blackout++;
        continue;
      }
      if (this.calendar.remainingCapacity(slotId) <= 0) {
        tally.full++;
        continue;
      }
      if (this.conflictChecker.conflicts(request.guardianId, this.calendar.window(slotId))) {
        tally.conflict++;
        continue;
      }

      try {
        this.calendar.reserve(slotId);
      } catch (error) {
        // Lost a race for the last seat: skip the slot, never fail the batch
        if (isAppError(error, ErrorCode.CAPACITY_EXCEEDED) || isAppError(error, ErrorCode.UNKNOWN_SLOT)) {
          logger.warn(`Reservation of slot ${slotId} for request ${request.id} failed: ${error.message}`);
          tally.full++;
          continue;
        }
        throw error;
      }

      const assignment = this.book(
        request.id,
        request.guardianId,
        slotId,
        `matched-preference-${i + 1}`,
        null,
      );
      return { kind: 'assigned', requestId: request.id, score, assignment };
    }

    const entry = this.waitlistEntry(request, score, tally);
    this.waitlist.enqueue(entry);
    return { kind: 'waitlisted', requestId: request.id, score, entry };
  }

  private waitlistEntry(request: ConsultationRequest, score: PriorityScore, tally: SkipTally): WaitlistEntry {
    const base = {
      requestId: request.id,
      guardianId: request.guardianId,
      score,
      decidedAt: this.now(),
    };

    if (request.desiredSlotIds.length === 0) {
      return { ...base, slotId: null, reason: WaitlistReason.NO_PREFERENCE, autoPromote: false };
    }

    if (tally.blackout === request.desiredSlotIds.length) {
      return {
        ...base,
        slotId: request.desiredSlotIds[0],
        reason: WaitlistReason.ALL_BLACKOUT,
        autoPromote: false,
      };
    }

    // Promote into the most-preferred slot that can actually open up
    const target = request.desiredSlotIds.find((slotId) => !this.calendar.isBlackout(slotId));

    return {
      ...base,
      slotId: target ?? request.desiredSlotIds[0],
      reason: tally.full === 0 && tally.conflict > 0 ? WaitlistReason.ALL_CONFLICTS : WaitlistReason.NO_CAPACITY,
      autoPromote: true,
    };
  }

  private book(
    requestId: string,
    guardianId: string,
    slotId: string,
    reason: AssignmentReason,
    replacesAssignmentId: string | null,
  ): Assignment {
    const assignment: Assignment = {
      id: this.newId(),
      requestId,
      guardianId,
      slotId,
      decidedAt: this.now(),
      reason,
      status: AssignmentStatus.ACTIVE,
      cancelledAt: null,
      replacesAssignmentId,
    };

    this.conflictChecker.book({
      guardianId,
      assignmentId: assignment.id,
      slotId,
      window: this.calendar.window(slotId),
    });

    return assignment;
  }
}
