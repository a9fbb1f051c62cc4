import type {
  AssignmentOrigin,
  AssignmentStatus,
  RequestStatus,
  UNKNOWN_SLOT_REASON,
  WaitlistReason,
} from '../utils/constants.js';
import type { PriorityScore } from './priorityScorer.js';

/**
 * Attributes the priority tuple is derived from.
 * Ranges are enforced at the HTTP boundary, never here.
 */
export interface ScoringAttributes {
  gradeLevel: number;
  siblingEnrolled: boolean;
  distanceTier: number;
  applicationComplete: boolean;
}

/**
 * A digitized application awaiting a consultation slot.
 * Everything except `status` (and `archivedAt`) is fixed at intake.
 */
export interface ConsultationRequest {
  readonly id: string;
  readonly guardianId: string;
  readonly studentId: string;
  /** Acceptable slots, most preferred first */
  readonly desiredSlotIds: readonly string[];
  readonly submittedAt: Date;
  readonly attributes: Readonly<ScoringAttributes>;
  status: RequestStatus;
  archivedAt: Date | null;
}

export interface SlotWindow {
  startsAt: Date;
  endsAt: Date;
}

export interface TimeSlotDefinition extends SlotWindow {
  id: string;
  capacity: number;
  blackout: boolean;
}

/**
 * Invariant: 0 <= occupancy <= capacity
 */
export interface TimeSlot extends TimeSlotDefinition {
  occupancy: number;
}

export type PreferenceReason = `matched-preference-${number}`;
export type AssignmentReason = PreferenceReason | AssignmentOrigin;

export interface Assignment {
  readonly id: string;
  readonly requestId: string;
  readonly guardianId: string;
  readonly slotId: string;
  readonly decidedAt: Date;
  readonly reason: AssignmentReason;
  readonly status: AssignmentStatus;
  readonly cancelledAt: Date | null;
  /** Set on promotions triggered by a cancellation */
  readonly replacesAssignmentId: string | null;
}

export interface WaitlistEntry {
  readonly requestId: string;
  readonly guardianId: string;
  /** null only for requests without any preference (manual assignment only) */
  readonly slotId: string | null;
  /** Ordering key captured when the entry was created */
  readonly score: PriorityScore;
  readonly reason: WaitlistReason;
  readonly autoPromote: boolean;
  readonly decidedAt: Date;
}

export type AllocationOutcome =
  | { kind: 'assigned'; requestId: string; score: PriorityScore; assignment: Assignment }
  | { kind: 'waitlisted'; requestId: string; score: PriorityScore; entry: WaitlistEntry }
  | {
      kind: 'rejected';
      requestId: string;
      score: PriorityScore;
      reason: typeof UNKNOWN_SLOT_REASON;
      unknownSlotIds: string[];
    };
