import type { Assignment, ConsultationRequest, TimeSlot, WaitlistEntry } from '../engine/types.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { CycleStatus, type ScoringWeights } from '../utils/constants.js';
import type { AuditEntry, CycleState, ScheduleCommit, ScheduleState, ScheduleStore } from './scheduleStore.js';

/**
 * In-process ScheduleStore for tests and local runs (STORE_DRIVER=memory).
 * Values cross the boundary as deep copies, never as shared references.
 */
export class MemoryScheduleStore implements ScheduleStore {
  private readonly slots = new Map<string, TimeSlot>();
  private readonly requests = new Map<string, ConsultationRequest>();
  private readonly assignments = new Map<string, Assignment>();
  private readonly waitlist = new Map<string, WaitlistEntry>();
  private readonly audit: AuditEntry[] = [];
  private weights: ScoringWeights | null = null;
  private cycle: CycleState = { status: CycleStatus.OPEN, closedAt: null };

  async loadState(): Promise<ScheduleState> {
    return structuredClone({
      slots: [...this.slots.values()],
      requests: [...this.requests.values()],
      assignments: [...this.assignments.values()],
      waitlist: [...this.waitlist.values()],
      weights: this.weights,
      cycle: this.cycle,
    });
  }

  async insertRequests(requests: readonly ConsultationRequest[]): Promise<void> {
    const duplicate = requests.find((r) => this.requests.has(r.id));
    if (duplicate) {
      throw AppError.conflict(`Request ${duplicate.id} already exists`, ErrorCode.DUPLICATE_ENTRY);
    }
    for (const request of requests) {
      this.requests.set(request.id, structuredClone(request));
    }
  }

  async insertSlot(slot: TimeSlot): Promise<void> {
    if (this.slots.has(slot.id)) {
      throw AppError.conflict(`Slot ${slot.id} already exists`, ErrorCode.DUPLICATE_ENTRY);
    }
    this.slots.set(slot.id, structuredClone(slot));
  }

  async saveWeights(weights: ScoringWeights): Promise<void> {
    this.weights = { ...weights };
  }

  async archiveRequest(requestId: string, at: Date): Promise<void> {
    const request = this.requests.get(requestId);
    if (!request) throw AppError.notFound(`Request ${requestId} not found`);
    request.archivedAt = new Date(at);
  }

  async commit(batch: ScheduleCommit): Promise<void> {
    // Check every precondition before the first write
    for (const change of batch.occupancy) {
      const stored = this.slotOrThrow(change.slotId).occupancy;
      if (stored !== change.from) {
        throw AppError.conflict(
          `Slot ${change.slotId} occupancy is ${stored}, expected ${change.from}`,
          ErrorCode.CONFLICT,
          { slotId: change.slotId },
        );
      }
    }
    if (batch.blackout) this.slotOrThrow(batch.blackout.slotId);
    for (const { requestId } of batch.requestStatuses) {
      if (!this.requests.has(requestId)) throw AppError.notFound(`Request ${requestId} not found`);
    }

    for (const change of batch.occupancy) {
      this.slotOrThrow(change.slotId).occupancy = change.to;
    }
    if (batch.blackout) this.slotOrThrow(batch.blackout.slotId).blackout = batch.blackout.blackout;
    for (const assignment of batch.assignments) {
      this.assignments.set(assignment.id, structuredClone(assignment));
    }
    for (const requestId of batch.waitlistRemovals) {
      this.waitlist.delete(requestId);
    }
    for (const entry of batch.waitlistUpserts) {
      this.waitlist.set(entry.requestId, structuredClone(entry));
    }
    for (const { requestId, status } of batch.requestStatuses) {
      const request = this.requests.get(requestId);
      if (request) request.status = status;
    }
    if (batch.cycle) this.cycle = structuredClone(batch.cycle);
    if (batch.audit) this.audit.push(structuredClone(batch.audit));
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    this.audit.push(structuredClone(entry));
  }

  auditTrail(): AuditEntry[] {
    return structuredClone(this.audit);
  }

  private slotOrThrow(slotId: string): TimeSlot {
    const slot = this.slots.get(slotId);
    if (!slot) throw AppError.unknownSlot(slotId);
    return slot;
  }
}
