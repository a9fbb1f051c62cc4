import { describe, expect, it } from 'vitest';
import { MemoryScheduleStore } from './memoryScheduleStore.js';
import { emptyCommit } from './scheduleStore.js';
import type { ConsultationRequest, TimeSlot } from '../engine/types.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { AuditAction, RequestStatus } from '../utils/constants.js';

const slot: TimeSlot = {
  id: 'S1',
  startsAt: new Date('2025-03-03T05:00:00.000Z'),
  endsAt: new Date('2025-03-03T05:30:00.000Z'),
  capacity: 2,
  occupancy: 0,
  blackout: false,
};

const request: ConsultationRequest = {
  id: 'r1',
  guardianId: 'g1',
  studentId: 's1',
  desiredSlotIds: ['S1'],
  submittedAt: new Date('2025-02-01T09:00:00.000Z'),
  attributes: { gradeLevel: 2, siblingEnrolled: false, distanceTier: 1, applicationComplete: true },
  status: RequestStatus.PENDING,
  archivedAt: null,
};

describe('MemoryScheduleStore', () => {
  it('hands out copies rather than its own records', async () => {
    const store = new MemoryScheduleStore();
    await store.insertSlot(slot);

    const first = await store.loadState();
    first.slots[0].occupancy = 2;

    expect((await store.loadState()).slots[0].occupancy).toBe(0);
  });

  it('refuses duplicate slots and requests', async () => {
    const store = new MemoryScheduleStore();
    await store.insertSlot(slot);
    await store.insertRequests([request]);

    await expect(store.insertSlot(slot)).rejects.toBeInstanceOf(AppError);
    await expect(store.insertRequests([request])).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_ENTRY });
  });

  it('applies a commit whose occupancy precondition holds', async () => {
    const store = new MemoryScheduleStore();
    await store.insertSlot(slot);
    await store.insertRequests([request]);

    await store.commit({
      ...emptyCommit(),
      occupancy: [{ slotId: 'S1', from: 0, to: 1 }],
      requestStatuses: [{ requestId: 'r1', status: RequestStatus.ASSIGNED }],
      audit: { action: AuditAction.ALLOCATION_RUN, targetType: 'cycle', targetId: null, details: {}, at: new Date(0) },
    });

    const state = await store.loadState();
    expect(state.slots[0].occupancy).toBe(1);
    expect(state.requests[0].status).toBe(RequestStatus.ASSIGNED);
    expect(store.auditTrail().map((e) => e.action)).toEqual([AuditAction.ALLOCATION_RUN]);
  });

  it('rejects the whole batch when another writer moved the occupancy', async () => {
    const store = new MemoryScheduleStore();
    await store.insertSlot(slot);
    await store.insertRequests([request]);

    await expect(
      store.commit({
        ...emptyCommit(),
        occupancy: [{ slotId: 'S1', from: 1, to: 2 }],
        requestStatuses: [{ requestId: 'r1', status: RequestStatus.ASSIGNED }],
      }),
    ).rejects.toMatchObject({ code: ErrorCode.CONFLICT });

    const state = await store.loadState();
    expect(state.slots[0].occupancy).toBe(0);
    expect(state.requests[0].status).toBe(RequestStatus.PENDING);
  });

  it('marks archived requests without deleting them', async () => {
    const store = new MemoryScheduleStore();
    await store.insertRequests([request]);

    await store.archiveRequest('r1', new Date('2025-04-01T00:00:00.000Z'));

    const [stored] = (await store.loadState()).requests;
    expect(stored.archivedAt).toEqual(new Date('2025-04-01T00:00:00.000Z'));
  });
});
