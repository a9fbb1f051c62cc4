import mongoose, { type ClientSession } from 'mongoose';
import type {
  Assignment,
  AssignmentReason,
  ConsultationRequest,
  TimeSlot,
  WaitlistEntry,
} from '../engine/types.js';
import {
  Assignment as AssignmentModel,
  AuditLog,
  Config,
  ConsultationRequest as ConsultationRequestModel,
  TimeSlot as TimeSlotModel,
  WaitlistEntry as WaitlistEntryModel,
} from '../models/index.js';
import { cycleStateSchema, scoringWeightsSchema } from '../modules/config/config.validation.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { AssignmentOrigin, CONFIG_KEYS, CycleStatus, type ScoringWeights } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import type { AuditEntry, CycleState, ScheduleCommit, ScheduleState, ScheduleStore } from './scheduleStore.js';

const PREFERENCE_REASON = /^matched-preference-\d+$/;

function isAssignmentReason(value: string): value is AssignmentReason {
  return value === AssignmentOrigin.PROMOTED || value === AssignmentOrigin.MANUAL || PREFERENCE_REASON.test(value);
}

/**
 * MongoDB-backed ScheduleStore. `commit` runs inside one multi-document
 * transaction, so the deployment must be a replica set.
 */
export class MongoScheduleStore implements ScheduleStore {
  async loadState(): Promise<ScheduleState> {
    const [slots, requests, assignments, waitlist, weightsConfig, cycleConfig] = await Promise.all([
      TimeSlotModel.find().sort({ startsAt: 1, slotId: 1 }).lean(),
      ConsultationRequestModel.find().sort({ submittedAt: 1 }).lean(),
      AssignmentModel.find().sort({ decidedAt: 1 }).lean(),
      WaitlistEntryModel.find().lean(),
      Config.findOne({ key: CONFIG_KEYS.SCORING_WEIGHTS }).lean(),
      Config.findOne({ key: CONFIG_KEYS.CYCLE }).lean(),
    ]);

    return {
      slots: slots.map((doc) => ({
        id: doc.slotId,
        startsAt: doc.startsAt,
        endsAt: doc.endsAt,
        capacity: doc.capacity,
        occupancy: doc.occupancy,
        blackout: doc.blackout,
      })),
      requests: requests.map((doc) => ({
        id: doc.requestId,
        guardianId: doc.guardianId,
        studentId: doc.studentId,
        desiredSlotIds: [...doc.desiredSlotIds],
        submittedAt: doc.submittedAt,
        attributes: {
          gradeLevel: doc.attributes.gradeLevel,
          siblingEnrolled: doc.attributes.siblingEnrolled,
          distanceTier: doc.attributes.distanceTier,
          applicationComplete: doc.attributes.applicationComplete,
        },
        status: doc.status,
        archivedAt: doc.archivedAt ?? null,
      })),
      assignments: assignments.map((doc) => {
        if (!isAssignmentReason(doc.reason)) {
          throw AppError.internal(`Assignment ${doc.assignmentId} has unrecognised reason ${doc.reason}`);
        }
        return {
          id: doc.assignmentId,
          requestId: doc.requestId,
          guardianId: doc.guardianId,
          slotId: doc.slotId,
          decidedAt: doc.decidedAt,
          reason: doc.reason,
          status: doc.status,
          cancelledAt: doc.cancelledAt ?? null,
          replacesAssignmentId: doc.replacesAssignmentId ?? null,
        };
      }),
      waitlist: waitlist.map((doc) => ({
        requestId: doc.requestId,
        guardianId: doc.guardianId,
        slotId: doc.slotId ?? null,
        score: { ...doc.score },
        reason: doc.reason,
        autoPromote: doc.autoPromote,
        decidedAt: doc.decidedAt,
      })),
      weights: weightsConfig ? scoringWeightsSchema.parse(weightsConfig.value) : null,
      cycle: cycleConfig ? cycleStateSchema.parse(cycleConfig.value) : { status: CycleStatus.OPEN, closedAt: null },
    };
  }

  async insertRequests(requests: readonly ConsultationRequest[]): Promise<void> {
    const existing = await ConsultationRequestModel.findOne({
      requestId: { $in: requests.map((r) => r.id) },
    }).lean();
    if (existing) {
      throw AppError.conflict(`Request ${existing.requestId} already exists`, ErrorCode.DUPLICATE_ENTRY);
    }

    await ConsultationRequestModel.insertMany(
      requests.map((r) => ({
        requestId: r.id,
        guardianId: r.guardianId,
        studentId: r.studentId,
        desiredSlotIds: [...r.desiredSlotIds],
        submittedAt: r.submittedAt,
        attributes: { ...r.attributes },
        status: r.status,
        archivedAt: r.archivedAt,
      })),
    );
  }

  async insertSlot(slot: TimeSlot): Promise<void> {
    if (await TimeSlotModel.exists({ slotId: slot.id })) {
      throw AppError.conflict(`Slot ${slot.id} already exists`, ErrorCode.DUPLICATE_ENTRY);
    }

    await TimeSlotModel.create({
      slotId: slot.id,
      startsAt: slot.startsAt,
      endsAt: slot.endsAt,
      capacity: slot.capacity,
      occupancy: slot.occupancy,
      blackout: slot.blackout,
    });
  }

  async saveWeights(weights: ScoringWeights): Promise<void> {
    await Config.updateOne(
      { key: CONFIG_KEYS.SCORING_WEIGHTS },
      { $set: { value: { ...weights } } },
      { upsert: true },
    );
  }

  async archiveRequest(requestId: string, at: Date): Promise<void> {
    const result = await ConsultationRequestModel.updateOne({ requestId }, { $set: { archivedAt: at } });
    if (result.matchedCount === 0) throw AppError.notFound(`Request ${requestId} not found`);
  }

  async commit(batch: ScheduleCommit): Promise<void> {
    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        await this.applyOccupancy(batch, session);

        if (batch.blackout) {
          const { slotId, blackout } = batch.blackout;
          const result = await TimeSlotModel.updateOne({ slotId }, { $set: { blackout } }, { session });
          if (result.matchedCount === 0) throw AppError.unknownSlot(slotId);
        }

        if (batch.assignments.length > 0) {
          await AssignmentModel.bulkWrite(
            batch.assignments.map((a) => ({
              updateOne: {
                filter: { assignmentId: a.id },
                update: { $set: toAssignmentFields(a) },
                upsert: true,
              },
            })),
            { session },
          );
        }

        if (batch.waitlistRemovals.length > 0) {
          await WaitlistEntryModel.deleteMany({ requestId: { $in: batch.waitlistRemovals } }, { session });
        }

        if (batch.waitlistUpserts.length > 0) {
          await WaitlistEntryModel.bulkWrite(
            batch.waitlistUpserts.map((entry) => ({
              updateOne: {
                filter: { requestId: entry.requestId },
                update: { $set: toWaitlistFields(entry) },
                upsert: true,
              },
            })),
            { session },
          );
        }

        if (batch.requestStatuses.length > 0) {
          await ConsultationRequestModel.bulkWrite(
            batch.requestStatuses.map(({ requestId, status }) => ({
              updateOne: {
                filter: { requestId },
                update: { $set: { status } },
              },
            })),
            { session },
          );
        }

        if (batch.cycle) {
          await this.saveCycle(batch.cycle, session);
        }

        if (batch.audit) {
          await AuditLog.create([toAuditFields(batch.audit)], { session });
        }
      });
    } finally {
      await session.endSession();
    }
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    await AuditLog.create(toAuditFields(entry));
  }

  // Another writer moved the counter: abort the whole transaction
  private async applyOccupancy(batch: ScheduleCommit, session: ClientSession): Promise<void> {
    for (const change of batch.occupancy) {
      if (change.from === change.to) continue;

      const result = await TimeSlotModel.updateOne(
        { slotId: change.slotId, occupancy: change.from },
        { $set: { occupancy: change.to } },
        { session },
      );
      if (result.matchedCount === 0) {
        logger.warn(`Occupancy compare-and-set lost on slot ${change.slotId} (expected ${change.from})`);
        throw AppError.conflict(
          `Slot ${change.slotId} occupancy no longer ${change.from}`,
          ErrorCode.CONFLICT,
          { slotId: change.slotId },
        );
      }
    }
  }

  private async saveCycle(cycle: CycleState, session: ClientSession): Promise<void> {
    await Config.updateOne(
      { key: CONFIG_KEYS.CYCLE },
      { $set: { value: { status: cycle.status, closedAt: cycle.closedAt } } },
      { upsert: true, session },
    );
  }
}

function toAssignmentFields(a: Assignment) {
  return {
    assignmentId: a.id,
    requestId: a.requestId,
    guardianId: a.guardianId,
    slotId: a.slotId,
    decidedAt: a.decidedAt,
    reason: a.reason,
    status: a.status,
    cancelledAt: a.cancelledAt,
    replacesAssignmentId: a.replacesAssignmentId,
  };
}

function toWaitlistFields(entry: WaitlistEntry) {
  return {
    requestId: entry.requestId,
    guardianId: entry.guardianId,
    slotId: entry.slotId,
    score: { ...entry.score },
    reason: entry.reason,
    autoPromote: entry.autoPromote,
    decidedAt: entry.decidedAt,
  };
}

function toAuditFields(entry: AuditEntry) {
  return {
    action: entry.action,
    targetType: entry.targetType,
    targetId: entry.targetId ?? undefined,
    details: entry.details,
    createdAt: entry.at,
  };
}
