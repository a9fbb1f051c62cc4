import { v4 as uuidv4 } from 'uuid';
import { Allocator } from '../engine/allocator.js';
import { ConflictChecker, type ConflictSnapshot } from '../engine/conflictChecker.js';
import { priorityTuple, rankRequests, scoreRequest, type PriorityTuple } from '../engine/priorityScorer.js';
import { SlotCalendar, assertValidSlotDefinition, type CalendarSnapshot } from '../engine/slotCalendar.js';
import type {
  AllocationOutcome,
  Assignment,
  ConsultationRequest,
  TimeSlot,
  TimeSlotDefinition,
  WaitlistEntry,
} from '../engine/types.js';
import { Waitlist, type WaitlistSnapshot } from '../engine/waitlist.js';
import {
  emptyCommit,
  type AuditEntry,
  type CycleState,
  type ScheduleCommit,
  type ScheduleStore,
} from '../stores/scheduleStore.js';
import { AppError, ErrorCode, isAppError } from '../utils/appError.js';
import {
  AssignmentStatus,
  AuditAction,
  CycleStatus,
  RequestStatus,
  UNKNOWN_SLOT_REASON,
  type ScoringWeights,
} from '../utils/constants.js';
import { compareIds, formatSlotWindow } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import { requestStateMachine } from '../utils/stateMachine.js';

export interface SchedulingServiceOptions {
  /** Used when the store holds no weights yet */
  defaultWeights: ScoringWeights;
  timeZone: string;
  demandThreshold: number;
  now?: () => Date;
  newId?: () => string;
}

export type NewConsultationRequest = Omit<ConsultationRequest, 'status' | 'archivedAt'>;

export interface RequestFilter {
  status?: RequestStatus;
  guardianId?: string;
  includeArchived?: boolean;
}

/**
 * One row of the staff-facing decision report
 */
export interface DecisionView {
  requestId: string;
  guardianId: string;
  studentId: string;
  status: RequestStatus;
  slotId: string | null;
  slotLabel: string | null;
  reason: string | null;
  assignmentId: string | null;
  waitlistPosition: number | null;
  priority: PriorityTuple;
}

export interface RequestView extends NewConsultationRequest {
  status: RequestStatus;
  archivedAt: Date | null;
  decision: DecisionView;
}

export interface SlotView extends TimeSlot {
  label: string;
  remainingCapacity: number;
  waitlistLength: number;
}

export interface WaitlistRowView {
  position: number;
  requestId: string;
  guardianId: string;
  reason: WaitlistEntry['reason'];
  autoPromote: boolean;
  decidedAt: Date;
  priority: PriorityTuple;
}

export interface DemandRow {
  slotId: string;
  label: string;
  count: number;
  requestIds: string[];
  highlight: boolean;
  remainingCapacity: number;
}

export interface OutcomeView {
  requestId: string;
  outcome: AllocationOutcome['kind'];
  slotId: string | null;
  reason: string;
  assignmentId: string | null;
  priority: PriorityTuple;
  unknownSlotIds?: string[];
}

export interface AllocationRunReport {
  summary: { assigned: number; waitlisted: number; rejected: number };
  outcomes: OutcomeView[];
}

export interface CancellationReport {
  cancelled: Assignment;
  promoted: Assignment[];
}

export interface CycleCloseReport {
  closedAt: Date;
  expiredRequestIds: string[];
}

interface EngineSnapshot {
  calendar: CalendarSnapshot;
  conflicts: ConflictSnapshot;
  waitlist: WaitlistSnapshot;
  statuses: ReadonlyMap<string, RequestStatus>;
  assignments: ReadonlyMap<string, Assignment>;
  cycle: CycleState;
}

interface Decision<T> {
  result: T;
  batch: ScheduleCommit;
  /** Reported back inside COMMIT_FAILED when the store refuses the batch */
  provisional: unknown;
}

/**
 * Live scheduling state for one admission cycle.
 *
 * The engine decides in memory; every decision is then written through the
 * store in a single commit. A failed commit restores the in-memory state
 * captured before the operation, so memory and store never drift apart.
 * Mutations and reads are serialised through one in-process queue.
 */
export class SchedulingService {
  private readonly calendar = new SlotCalendar();
  private readonly conflicts = new ConflictChecker();
  private readonly waitlist = new Waitlist();
  private readonly requests = new Map<string, ConsultationRequest>();
  private readonly assignments = new Map<string, Assignment>();
  private weights: ScoringWeights;
  private cycle: CycleState = { status: CycleStatus.OPEN, closedAt: null };
  private queue: Promise<unknown> = Promise.resolve();

  private readonly now: () => Date;
  private readonly newId: () => string;

  private constructor(
    private readonly store: ScheduleStore,
    private readonly options: SchedulingServiceOptions,
  ) {
    this.weights = { ...options.defaultWeights };
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => uuidv4());
  }

  /**
   * Build a service from whatever the store already holds
   */
  static async create(store: ScheduleStore, options: SchedulingServiceOptions): Promise<SchedulingService> {
    const service = new SchedulingService(store, options);
    await service.hydrate();
    return service;
  }

  // ── Requests ──

  async submitRequests(inputs: readonly NewConsultationRequest[]): Promise<RequestView[]> {
    return this.exclusive(async () => {
      this.assertCycleOpen();

      const seen = new Set<string>();
      for (const input of inputs) {
        if (seen.has(input.id) || this.requests.has(input.id)) {
          throw AppError.conflict(`Request ${input.id} already exists`, ErrorCode.DUPLICATE_ENTRY, {
            requestId: input.id,
          });
        }
        seen.add(input.id);
      }

      const created: ConsultationRequest[] = inputs.map((input) => ({
        id: input.id,
        guardianId: input.guardianId,
        studentId: input.studentId,
        desiredSlotIds: [...input.desiredSlotIds],
        submittedAt: new Date(input.submittedAt),
        attributes: { ...input.attributes },
        status: RequestStatus.PENDING,
        archivedAt: null,
      }));

      await this.store.insertRequests(created);
      for (const request of created) {
        this.requests.set(request.id, request);
      }

      await this.store.appendAudit(
        this.audit(AuditAction.REQUESTS_SUBMITTED, 'request', null, {
          requestIds: created.map((r) => r.id),
        }),
      );

      logger.info(`Accepted ${created.length} consultation request(s)`);
      return created.map((r) => this.requestView(r));
    });
  }

  async listRequests(filter: RequestFilter = {}): Promise<RequestView[]> {
    return this.read(() =>
      [...this.requests.values()]
        .filter((r) => filter.includeArchived || r.archivedAt === null)
        .filter((r) => !filter.status || r.status === filter.status)
        .filter((r) => !filter.guardianId || r.guardianId === filter.guardianId)
        .sort((a, b) => a.submittedAt.getTime() - b.submittedAt.getTime() || compareIds(a.id, b.id))
        .map((r) => this.requestView(r)),
    );
  }

  async getRequest(requestId: string): Promise<RequestView> {
    return this.read(() => this.requestView(this.requestOrThrow(requestId)));
  }

  /**
   * Archival never deletes; the request only drops out of default listings
   */
  async archiveRequest(requestId: string): Promise<RequestView> {
    return this.exclusive(async () => {
      const request = this.requestOrThrow(requestId);
      if (this.cycle.status !== CycleStatus.CLOSED) {
        throw AppError.conflict('Requests can only be archived after the admission cycle closes', ErrorCode.CONFLICT, {
          requestId,
        });
      }
      if (request.archivedAt) {
        throw AppError.conflict(`Request ${requestId} is already archived`, ErrorCode.CONFLICT, { requestId });
      }

      const at = this.now();
      await this.store.archiveRequest(requestId, at);
      request.archivedAt = at;
      await this.store.appendAudit(this.audit(AuditAction.REQUEST_ARCHIVED, 'request', requestId, {}));

      return this.requestView(request);
    });
  }

  // ── Slots ──

  async registerSlot(definition: TimeSlotDefinition): Promise<SlotView> {
    return this.exclusive(async () => {
      this.assertCycleOpen();
      assertValidSlotDefinition(definition);
      if (this.calendar.has(definition.id)) {
        throw AppError.conflict(`Slot ${definition.id} already exists`, ErrorCode.DUPLICATE_ENTRY, {
          slotId: definition.id,
        });
      }

      await this.store.insertSlot({ ...definition, occupancy: 0 });
      this.calendar.register(definition);
      await this.store.appendAudit(
        this.audit(AuditAction.SLOT_REGISTERED, 'slot', definition.id, {
          capacity: definition.capacity,
          blackout: definition.blackout,
        }),
      );

      return this.slotView(definition.id);
    });
  }

  /**
   * Lifting a blackout hands the freed seats to the slot's waitlist in
   * stored order, in the same commit as the flag.
   */
  async setBlackout(slotId: string, blackout: boolean): Promise<SlotView> {
    return this.exclusive(async () => {
      const previous = this.calendar.isBlackout(slotId);
      if (previous === blackout) return this.slotView(slotId);

      const promoted = await this.apply(() => {
        this.calendar.setBlackout(slotId, blackout);
        const batch = emptyCommit();
        batch.blackout = { slotId, blackout };

        const filled = blackout ? [] : this.allocator().promote(slotId);
        this.recordPromotions(filled, batch);

        batch.audit = this.audit(AuditAction.SLOT_BLACKOUT_CHANGED, 'slot', slotId, {
          from: previous,
          to: blackout,
          promotedRequestIds: filled.map((a) => a.requestId),
        });
        return { result: filled, batch, provisional: { slotId, blackout, promoted: filled } };
      });

      logger.info(
        `Slot ${slotId} blackout ${blackout ? 'set' : `lifted; ${promoted.length} request(s) promoted`}`,
      );
      return this.slotView(slotId);
    });
  }

  async listSlots(): Promise<SlotView[]> {
    return this.read(() => this.calendar.list().map((slot) => this.slotView(slot.id)));
  }

  async slotWaitlist(slotId: string): Promise<WaitlistRowView[]> {
    return this.read(() => this.waitlistRows(slotId));
  }

  private waitlistRows(slotId: string): WaitlistRowView[] {
    if (!this.calendar.has(slotId)) throw AppError.unknownSlot(slotId);

    return this.waitlist.entriesFor(slotId).map((entry, index) => ({
      position: index + 1,
      requestId: entry.requestId,
      guardianId: entry.guardianId,
      reason: entry.reason,
      autoPromote: entry.autoPromote,
      decidedAt: entry.decidedAt,
      priority: priorityTuple(entry.score),
    }));
  }

  /**
   * Per-slot applicant counts over active requests, highest priority first.
   * A slot is highlighted once its count reaches the configured threshold.
   */
  async demandReport(): Promise<DemandRow[]> {
    return this.read(() => this.demandRows());
  }

  private demandRows(): DemandRow[] {
    const active = [...this.requests.values()].filter(
      (r) =>
        r.archivedAt === null &&
        (r.status === RequestStatus.PENDING ||
          r.status === RequestStatus.WAITLISTED ||
          r.status === RequestStatus.ASSIGNED),
    );
    const ranked = rankRequests(active, this.weights);

    return this.calendar.list().map((slot) => {
      const requestIds = ranked
        .filter(({ request }) => request.desiredSlotIds.includes(slot.id))
        .map(({ request }) => request.id);
      return {
        slotId: slot.id,
        label: formatSlotWindow(slot, this.options.timeZone),
        count: requestIds.length,
        requestIds,
        highlight: requestIds.length >= this.options.demandThreshold,
        remainingCapacity: this.calendar.remainingCapacity(slot.id),
      };
    });
  }

  // ── Allocation ──

  /**
   * Batch pass over every pending request
   */
  async runAllocation(): Promise<AllocationRunReport> {
    return this.exclusive(() =>
      this.apply(() => {
        this.assertCycleOpen();

        const pending = [...this.requests.values()].filter(
          (r) => r.status === RequestStatus.PENDING && r.archivedAt === null,
        );
        const outcomes = this.allocator().allocate(pending);
        const batch = emptyCommit();

        for (const outcome of outcomes) {
          const request = this.requestOrThrow(outcome.requestId);
          if (outcome.kind === 'assigned') {
            this.transition(request, RequestStatus.ASSIGNED, batch);
            this.assignments.set(outcome.assignment.id, outcome.assignment);
            batch.assignments.push(outcome.assignment);
          } else if (outcome.kind === 'waitlisted') {
            this.transition(request, RequestStatus.WAITLISTED, batch);
            batch.waitlistUpserts.push(outcome.entry);
          }
        }

        const report: AllocationRunReport = {
          summary: {
            assigned: outcomes.filter((o) => o.kind === 'assigned').length,
            waitlisted: outcomes.filter((o) => o.kind === 'waitlisted').length,
            rejected: outcomes.filter((o) => o.kind === 'rejected').length,
          },
          outcomes: outcomes.map((o) => this.outcomeView(o)),
        };

        batch.audit = this.audit(AuditAction.ALLOCATION_RUN, 'cycle', null, { ...report.summary });
        logger.info(
          `Allocation run: ${report.summary.assigned} assigned, ${report.summary.waitlisted} waitlisted, ${report.summary.rejected} rejected`,
        );

        return { result: report, batch, provisional: report };
      }),
    );
  }

  /**
   * Release, unbook and promote as one unit. Cancellation stays possible
   * after the cycle closes; by then the waitlists are empty.
   */
  async cancelAssignment(assignmentId: string): Promise<CancellationReport> {
    return this.exclusive(() =>
      this.apply(() => {
        const assignment = this.assignments.get(assignmentId);
        if (!assignment) throw AppError.notFound(`Assignment ${assignmentId} not found`);

        const { cancelled, promoted } = this.allocator().cancel(assignment);
        const batch = emptyCommit();

        this.assignments.set(cancelled.id, cancelled);
        batch.assignments.push(cancelled);
        this.transition(this.requestOrThrow(cancelled.requestId), RequestStatus.CANCELLED, batch);
        this.recordPromotions(promoted, batch);

        batch.audit = this.audit(AuditAction.ASSIGNMENT_CANCELLED, 'assignment', assignmentId, {
          slotId: cancelled.slotId,
          promotedRequestIds: promoted.map((a) => a.requestId),
        });

        const report: CancellationReport = { cancelled, promoted };
        return { result: report, batch, provisional: report };
      }),
    );
  }

  /**
   * Staff override for a pending or waitlisted request
   */
  async assignManually(requestId: string, slotId: string): Promise<Assignment> {
    return this.exclusive(() =>
      this.apply(() => {
        this.assertCycleOpen();

        const request = this.requestOrThrow(requestId);
        requestStateMachine.assertTransition(request.status, RequestStatus.ASSIGNED);

        const wasWaiting = this.waitlist.get(requestId) !== null;
        const assignment = this.allocator().assignManually(request, slotId);
        const batch = emptyCommit();

        this.assignments.set(assignment.id, assignment);
        batch.assignments.push(assignment);
        if (wasWaiting) batch.waitlistRemovals.push(requestId);
        this.transition(request, RequestStatus.ASSIGNED, batch);

        batch.audit = this.audit(AuditAction.MANUAL_ASSIGNMENT, 'assignment', assignment.id, {
          requestId,
          slotId,
        });

        logger.info(`Request ${requestId} manually assigned to slot ${slotId}`);
        return { result: assignment, batch, provisional: assignment };
      }),
    );
  }

  /**
   * Every non-archived request with its current decision, in priority order
   */
  async decisionReport(): Promise<DecisionView[]> {
    return this.read(() => {
      const current = [...this.requests.values()].filter((r) => r.archivedAt === null);
      return rankRequests(current, this.weights).map(({ request }) => this.decisionFor(request));
    });
  }

  /**
   * Expire every waitlisted request. Allocation, manual assignment and
   * configuration changes are refused from here on.
   */
  async closeCycle(): Promise<CycleCloseReport> {
    return this.exclusive(() =>
      this.apply(() => {
        this.assertCycleOpen();

        const closedAt = this.now();
        const batch = emptyCommit();
        const expiredRequestIds: string[] = [];

        for (const entry of this.waitlist.all()) {
          this.waitlist.remove(entry.requestId);
          batch.waitlistRemovals.push(entry.requestId);
          this.transition(this.requestOrThrow(entry.requestId), RequestStatus.EXPIRED, batch);
          expiredRequestIds.push(entry.requestId);
        }
        expiredRequestIds.sort(compareIds);

        this.cycle = { status: CycleStatus.CLOSED, closedAt };
        batch.cycle = { ...this.cycle };
        batch.audit = this.audit(AuditAction.CYCLE_CLOSED, 'cycle', null, { expired: expiredRequestIds.length });

        logger.info(`Admission cycle closed; ${expiredRequestIds.length} waitlisted request(s) expired`);
        const report: CycleCloseReport = { closedAt, expiredRequestIds };
        return { result: report, batch, provisional: report };
      }),
    );
  }

  // ── Configuration ──

  async getWeights(): Promise<ScoringWeights> {
    return this.read(() => ({ ...this.weights }));
  }

  async getCycle(): Promise<CycleState> {
    return this.read(() => ({ ...this.cycle }));
  }

  /**
   * Applies to requests scored from now on; existing waitlist order keeps
   * the scores captured when each entry was made.
   */
  async updateWeights(weights: ScoringWeights): Promise<ScoringWeights> {
    return this.exclusive(async () => {
      this.assertCycleOpen();

      const previous = this.weights;
      await this.store.saveWeights(weights);
      this.weights = { ...weights };
      await this.store.appendAudit(
        this.audit(AuditAction.WEIGHTS_UPDATED, 'config', null, { from: { ...previous }, to: { ...weights } }),
      );

      return { ...this.weights };
    });
  }

  // ── Internals ──

  private async hydrate(): Promise<void> {
    const state = await this.store.loadState();

    if (state.weights) {
      this.weights = { ...state.weights };
    } else {
      await this.store.saveWeights(this.weights);
    }
    this.cycle = { ...state.cycle };

    for (const slot of state.slots) {
      this.calendar.register(slot, slot.occupancy);
    }
    for (const request of state.requests) {
      this.requests.set(request.id, request);
    }
    for (const assignment of state.assignments) {
      this.assignments.set(assignment.id, assignment);
      if (assignment.status === AssignmentStatus.ACTIVE) {
        this.conflicts.book({
          guardianId: assignment.guardianId,
          assignmentId: assignment.id,
          slotId: assignment.slotId,
          window: this.calendar.window(assignment.slotId),
        });
      }
    }
    for (const entry of state.waitlist) {
      this.waitlist.enqueue(entry);
    }

    logger.info(
      `Scheduling state loaded: ${state.slots.length} slot(s), ${state.requests.length} request(s), ${state.assignments.length} assignment(s), ${state.waitlist.length} waitlist entr(ies)`,
    );
  }

  /**
   * Runs tasks one after another. A failed task rejects its own promise
   * and leaves the queue usable for the next one.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Reads wait their turn in the same queue, so they never see a decision
   * whose commit is still in flight.
   */
  private read<T>(view: () => T): Promise<T> {
    return this.exclusive(async () => view());
  }

  /**
   * Decide in memory, then commit. Any failure restores the state captured
   * before the decision.
   */
  private async apply<T>(decide: () => Decision<T>): Promise<T> {
    const snapshot = this.capture();

    let decision: Decision<T>;
    try {
      decision = decide();
      decision.batch.occupancy = this.occupancyChanges(snapshot.calendar);
    } catch (error) {
      this.restore(snapshot);
      throw error;
    }

    try {
      await this.store.commit(decision.batch);
    } catch (error) {
      this.restore(snapshot);
      logger.error('Schedule commit failed; in-memory state rolled back', error);
      if (isAppError(error, ErrorCode.CONFLICT)) await this.resyncCalendar();
      throw AppError.commitFailed('Schedule commit failed; no decision was saved', {
        cause: error instanceof Error ? error.message : String(error),
        provisional: decision.provisional,
      });
    }

    return decision.result;
  }

  /**
   * Another writer moved a stored counter. Take occupancy and blackout flags
   * from the store so later commits compare against current values.
   */
  private async resyncCalendar(): Promise<void> {
    try {
      const state = await this.store.loadState();
      const stored = new Map<string, { occupancy: number; blackout: boolean }>();
      for (const slot of state.slots) {
        stored.set(slot.id, { occupancy: slot.occupancy, blackout: slot.blackout });
      }
      this.calendar.restore(stored);
      logger.warn('Slot occupancy reloaded from the store after a lost compare-and-set');
    } catch (error) {
      logger.error('Slot occupancy reload failed', error);
    }
  }

  private recordPromotions(promoted: readonly Assignment[], batch: ScheduleCommit): void {
    for (const next of promoted) {
      this.assignments.set(next.id, next);
      batch.assignments.push(next);
      batch.waitlistRemovals.push(next.requestId);
      this.transition(this.requestOrThrow(next.requestId), RequestStatus.ASSIGNED, batch);
    }
  }

  private capture(): EngineSnapshot {
    const statuses = new Map<string, RequestStatus>();
    for (const [id, request] of this.requests) {
      statuses.set(id, request.status);
    }
    return {
      calendar: this.calendar.snapshot(),
      conflicts: this.conflicts.snapshot(),
      waitlist: this.waitlist.snapshot(),
      statuses,
      assignments: new Map(this.assignments),
      cycle: { ...this.cycle },
    };
  }

  private restore(snapshot: EngineSnapshot): void {
    this.calendar.restore(snapshot.calendar);
    this.conflicts.restore(snapshot.conflicts);
    this.waitlist.restore(snapshot.waitlist);
    for (const [id, status] of snapshot.statuses) {
      const request = this.requests.get(id);
      if (request) request.status = status;
    }
    this.assignments.clear();
    for (const [id, assignment] of snapshot.assignments) {
      this.assignments.set(id, assignment);
    }
    this.cycle = { ...snapshot.cycle };
  }

  private occupancyChanges(before: CalendarSnapshot): ScheduleCommit['occupancy'] {
    const changes: ScheduleCommit['occupancy'] = [];
    for (const [slotId, saved] of before) {
      const occupancy = this.calendar.get(slotId).occupancy;
      if (occupancy !== saved.occupancy) {
        changes.push({ slotId, from: saved.occupancy, to: occupancy });
      }
    }
    return changes;
  }

  private transition(request: ConsultationRequest, to: RequestStatus, batch: ScheduleCommit): void {
    requestStateMachine.assertTransition(request.status, to);
    request.status = to;
    batch.requestStatuses.push({ requestId: request.id, status: to });
  }

  private allocator(): Allocator {
    return new Allocator(this.calendar, this.conflicts, this.waitlist, {
      weights: this.weights,
      now: this.now,
      newId: this.newId,
    });
  }

  private assertCycleOpen(): void {
    if (this.cycle.status === CycleStatus.CLOSED) {
      throw AppError.conflict('The admission cycle is closed', ErrorCode.CYCLE_CLOSED, {
        closedAt: this.cycle.closedAt,
      });
    }
  }

  private requestOrThrow(requestId: string): ConsultationRequest {
    const request = this.requests.get(requestId);
    if (!request) throw AppError.notFound(`Request ${requestId} not found`, ErrorCode.NOT_FOUND, { requestId });
    return request;
  }

  private audit(
    action: AuditAction,
    targetType: AuditEntry['targetType'],
    targetId: string | null,
    details: Record<string, unknown>,
  ): AuditEntry {
    return { action, targetType, targetId, details, at: this.now() };
  }

  private activeAssignmentFor(requestId: string): Assignment | null {
    for (const assignment of this.assignments.values()) {
      if (assignment.requestId === requestId && assignment.status === AssignmentStatus.ACTIVE) {
        return assignment;
      }
    }
    return null;
  }

  private slotLabel(slotId: string): string | null {
    if (!this.calendar.has(slotId)) return null;
    return formatSlotWindow(this.calendar.window(slotId), this.options.timeZone);
  }

  private decisionFor(request: ConsultationRequest): DecisionView {
    const base = {
      requestId: request.id,
      guardianId: request.guardianId,
      studentId: request.studentId,
      status: request.status,
      priority: priorityTuple(scoreRequest(request, this.weights)),
    };
    const none = { slotId: null, slotLabel: null, reason: null, assignmentId: null, waitlistPosition: null };

    switch (request.status) {
      case RequestStatus.ASSIGNED: {
        const assignment = this.activeAssignmentFor(request.id);
        if (!assignment) return { ...base, ...none };
        return {
          ...base,
          ...none,
          slotId: assignment.slotId,
          slotLabel: this.slotLabel(assignment.slotId),
          reason: assignment.reason,
          assignmentId: assignment.id,
        };
      }
      case RequestStatus.WAITLISTED: {
        const entry = this.waitlist.get(request.id);
        if (!entry) return { ...base, ...none };
        return {
          ...base,
          ...none,
          slotId: entry.slotId,
          slotLabel: entry.slotId === null ? null : this.slotLabel(entry.slotId),
          reason: entry.reason,
          waitlistPosition: this.waitlist.positionOf(request.id),
        };
      }
      case RequestStatus.PENDING: {
        const unknown = request.desiredSlotIds.some((slotId) => !this.calendar.has(slotId));
        return { ...base, ...none, reason: unknown ? UNKNOWN_SLOT_REASON : null };
      }
      default:
        return { ...base, ...none };
    }
  }

  private requestView(request: ConsultationRequest): RequestView {
    return {
      id: request.id,
      guardianId: request.guardianId,
      studentId: request.studentId,
      desiredSlotIds: [...request.desiredSlotIds],
      submittedAt: request.submittedAt,
      attributes: { ...request.attributes },
      status: request.status,
      archivedAt: request.archivedAt,
      decision: this.decisionFor(request),
    };
  }

  private slotView(slotId: string): SlotView {
    const slot = this.calendar.get(slotId);
    return {
      ...slot,
      label: formatSlotWindow(slot, this.options.timeZone),
      remainingCapacity: this.calendar.remainingCapacity(slotId),
      waitlistLength: this.waitlist.entriesFor(slotId).length,
    };
  }

  private outcomeView(outcome: AllocationOutcome): OutcomeView {
    const priority = priorityTuple(outcome.score);
    switch (outcome.kind) {
      case 'assigned':
        return {
          requestId: outcome.requestId,
          outcome: outcome.kind,
          slotId: outcome.assignment.slotId,
          reason: outcome.assignment.reason,
          assignmentId: outcome.assignment.id,
          priority,
        };
      case 'waitlisted':
        return {
          requestId: outcome.requestId,
          outcome: outcome.kind,
          slotId: outcome.entry.slotId,
          reason: outcome.entry.reason,
          assignmentId: null,
          priority,
        };
      case 'rejected':
        return {
          requestId: outcome.requestId,
          outcome: outcome.kind,
          slotId: null,
          reason: outcome.reason,
          assignmentId: null,
          priority,
          unknownSlotIds: outcome.unknownSlotIds,
        };
    }
  }
}
