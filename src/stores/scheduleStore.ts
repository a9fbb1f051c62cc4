import type { Assignment, ConsultationRequest, TimeSlot, WaitlistEntry } from '../engine/types.js';
import type { AuditAction, CycleStatus, RequestStatus, ScoringWeights } from '../utils/constants.js';

export interface CycleState {
  status: CycleStatus;
  closedAt: Date | null;
}

/**
 * Everything needed to rebuild the engine after a restart
 */
export interface ScheduleState {
  slots: TimeSlot[];
  requests: ConsultationRequest[];
  assignments: Assignment[];
  waitlist: WaitlistEntry[];
  /** null until weights were saved once */
  weights: ScoringWeights | null;
  cycle: CycleState;
}

/**
 * Compare-and-set: applied only while the stored occupancy still equals `from`
 */
export interface OccupancyChange {
  slotId: string;
  from: number;
  to: number;
}

export interface BlackoutChange {
  slotId: string;
  blackout: boolean;
}

export interface RequestStatusChange {
  requestId: string;
  status: RequestStatus;
}

export type AuditTarget = 'request' | 'slot' | 'assignment' | 'config' | 'cycle';

export interface AuditEntry {
  action: AuditAction;
  targetType: AuditTarget;
  targetId: string | null;
  details: Record<string, unknown>;
  at: Date;
}

/**
 * One all-or-nothing write
 */
export interface ScheduleCommit {
  /** Upserted by id; cancellations arrive here with their new status */
  assignments: Assignment[];
  waitlistUpserts: WaitlistEntry[];
  /** Request ids whose waitlist entry is gone */
  waitlistRemovals: string[];
  requestStatuses: RequestStatusChange[];
  occupancy: OccupancyChange[];
  blackout?: BlackoutChange;
  cycle?: CycleState;
  audit?: AuditEntry;
}

/**
 * Durable side of the scheduling engine.
 * Implementations own their transaction boundary; `commit` either applies
 * every part of the batch or none of it.
 */
export interface ScheduleStore {
  loadState(): Promise<ScheduleState>;
  /** Fails with DUPLICATE_ENTRY when any id is already stored */
  insertRequests(requests: readonly ConsultationRequest[]): Promise<void>;
  /** Fails with DUPLICATE_ENTRY when the id is already stored */
  insertSlot(slot: TimeSlot): Promise<void>;
  saveWeights(weights: ScoringWeights): Promise<void>;
  archiveRequest(requestId: string, at: Date): Promise<void>;
  commit(batch: ScheduleCommit): Promise<void>;
  appendAudit(entry: AuditEntry): Promise<void>;
}

export function emptyCommit(): ScheduleCommit {
  return {
    assignments: [],
    waitlistUpserts: [],
    waitlistRemovals: [],
    requestStatuses: [],
    occupancy: [],
  };
}
