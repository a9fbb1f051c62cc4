import { beforeEach, describe, expect, it } from 'vitest';
import { Allocator } from './allocator.js';
import { ConflictChecker } from './conflictChecker.js';
import { SlotCalendar } from './slotCalendar.js';
import { Waitlist } from './waitlist.js';
import type { AllocationOutcome, ConsultationRequest, TimeSlotDefinition } from './types.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import {
  AssignmentStatus,
  DEFAULT_SCORING_WEIGHTS,
  RequestStatus,
  WaitlistReason,
} from '../utils/constants.js';

const DECIDED_AT = new Date('2025-03-01T00:00:00.000Z');

const createRequest = (
  id: string,
  desiredSlotIds: string[],
  overrides: Partial<ConsultationRequest> = {},
): ConsultationRequest => ({
  id,
  guardianId: `guardian-${id}`,
  studentId: `student-${id}`,
  desiredSlotIds,
  // Later ids submit later, so with equal attributes a < b < c in rank
  submittedAt: new Date(Date.UTC(2025, 1, 1, 9, id.charCodeAt(0) - 96)),
  attributes: {
    gradeLevel: 3,
    siblingEnrolled: false,
    distanceTier: 2,
    applicationComplete: true,
  },
  status: RequestStatus.PENDING,
  archivedAt: null,
  ...overrides,
});

const slot = (
  id: string,
  start: string,
  end: string,
  capacity: number,
  blackout = false,
): TimeSlotDefinition => ({
  id,
  startsAt: new Date(`2025-03-03T${start}:00.000Z`),
  endsAt: new Date(`2025-03-03T${end}:00.000Z`),
  capacity,
  blackout,
});

function thrownCode(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof AppError ? error.code : undefined;
  }
  return undefined;
}

function project(outcomes: AllocationOutcome[]) {
  return outcomes.map((outcome) => {
    switch (outcome.kind) {
      case 'assigned':
        return [outcome.requestId, outcome.assignment.slotId, outcome.assignment.reason];
      case 'waitlisted':
        return [outcome.requestId, outcome.entry.slotId, outcome.entry.reason];
      case 'rejected':
        return [outcome.requestId, null, outcome.reason];
    }
  });
}

describe('Allocator', () => {
  let calendar: SlotCalendar;
  let conflicts: ConflictChecker;
  let waitlist: Waitlist;
  let allocator: Allocator;
  let nextId: number;

  beforeEach(() => {
    calendar = new SlotCalendar();
    conflicts = new ConflictChecker();
    waitlist = new Waitlist();
    nextId = 0;
    allocator = new Allocator(calendar, conflicts, waitlist, {
      weights: DEFAULT_SCORING_WEIGHTS,
      now: () => DECIDED_AT,
      newId: () => `asg-${++nextId}`,
    });
  });

  describe('allocate', () => {
    it('fills a slot in priority order and wait-lists the overflow', () => {
      calendar.register(slot('S1', '05:00', '05:30', 2));

      const outcomes = allocator.allocate([
        createRequest('c', ['S1']),
        createRequest('a', ['S1']),
        createRequest('b', ['S1']),
      ]);

      expect(project(outcomes)).toEqual([
        ['a', 'S1', 'matched-preference-1'],
        ['b', 'S1', 'matched-preference-1'],
        ['c', 'S1', WaitlistReason.NO_CAPACITY],
      ]);
      expect(calendar.get('S1').occupancy).toBe(2);
      expect(waitlist.entriesFor('S1').map((e) => e.requestId)).toEqual(['c']);
    });

    it('ranks a sibling-enrolled request ahead of an earlier submission', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1));

      const outcomes = allocator.allocate([
        createRequest('a', ['S1']),
        createRequest('b', ['S1'], {
          attributes: { gradeLevel: 3, siblingEnrolled: true, distanceTier: 2, applicationComplete: true },
        }),
      ]);

      expect(project(outcomes)).toEqual([
        ['b', 'S1', 'matched-preference-1'],
        ['a', 'S1', WaitlistReason.NO_CAPACITY],
      ]);
    });

    it('records the preference rank that was consumed', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1));
      calendar.register(slot('S2', '06:00', '06:30', 1));
      calendar.register(slot('S3', '07:00', '07:30', 1));

      const outcomes = allocator.allocate([
        createRequest('a', ['S1']),
        createRequest('b', ['S1', 'S2']),
        createRequest('c', ['S1', 'S2', 'S3']),
      ]);

      expect(project(outcomes)).toEqual([
        ['a', 'S1', 'matched-preference-1'],
        ['b', 'S2', 'matched-preference-2'],
        ['c', 'S3', 'matched-preference-3'],
      ]);
    });

    it("skips a slot overlapping the guardian's booking even when it has capacity", () => {
      calendar.register(slot('S2', '10:00', '10:30', 3));
      calendar.register(slot('S3', '10:15', '10:45', 3));
      calendar.register(slot('S4', '11:00', '11:30', 3));

      const outcomes = allocator.allocate([
        createRequest('a', ['S2'], { guardianId: 'G' }),
        createRequest('b', ['S3', 'S4'], { guardianId: 'G' }),
      ]);

      expect(project(outcomes)).toEqual([
        ['a', 'S2', 'matched-preference-1'],
        ['b', 'S4', 'matched-preference-2'],
      ]);
      expect(calendar.remainingCapacity('S3')).toBe(3);
    });

    it('wait-lists with all-conflicts when only guardian clashes blocked the request', () => {
      calendar.register(slot('S2', '10:00', '10:30', 3));
      calendar.register(slot('S3', '10:15', '10:45', 3));

      const outcomes = allocator.allocate([
        createRequest('a', ['S2'], { guardianId: 'G' }),
        createRequest('b', ['S3'], { guardianId: 'G' }),
      ]);

      expect(project(outcomes)[1]).toEqual(['b', 'S3', WaitlistReason.ALL_CONFLICTS]);
    });

    it('wait-lists against the most-preferred slot that is not blacked out', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1, true));
      calendar.register(slot('S2', '06:00', '06:30', 1));

      const outcomes = allocator.allocate([
        createRequest('a', ['S2']),
        createRequest('b', ['S1', 'S2']),
      ]);

      expect(project(outcomes)[1]).toEqual(['b', 'S2', WaitlistReason.NO_CAPACITY]);
      expect(waitlist.get('b')?.autoPromote).toBe(true);
    });

    it('wait-lists all-blackout requests without auto-promotion', () => {
      calendar.register(slot('S1', '05:00', '05:30', 5, true));
      calendar.register(slot('S2', '06:00', '06:30', 5, true));

      const [outcome] = allocator.allocate([createRequest('a', ['S1', 'S2'])]);

      expect(outcome.kind).toBe('waitlisted');
      if (outcome.kind !== 'waitlisted') return;
      expect(outcome.entry).toMatchObject({
        slotId: 'S1',
        reason: WaitlistReason.ALL_BLACKOUT,
        autoPromote: false,
      });
    });

    it('wait-lists requests without preferences against no slot', () => {
      calendar.register(slot('S1', '05:00', '05:30', 5));

      const [outcome] = allocator.allocate([createRequest('a', [])]);

      expect(project([outcome])).toEqual([['a', null, WaitlistReason.NO_PREFERENCE]]);
      expect(waitlist.unslottedEntries().map((e) => e.requestId)).toEqual(['a']);
      expect(waitlist.get('a')?.autoPromote).toBe(false);
    });

    it('rejects a request naming an unregistered slot without failing the batch', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1));

      const outcomes = allocator.allocate([
        createRequest('a', ['S1', 'S9']),
        createRequest('b', ['S1']),
      ]);

      expect(outcomes[0]).toMatchObject({
        kind: 'rejected',
        requestId: 'a',
        reason: 'unknown-slot',
        unknownSlotIds: ['S9'],
      });
      expect(project(outcomes)[1]).toEqual(['b', 'S1', 'matched-preference-1']);
    });

    it('throws EMPTY_REQUEST_POOL for an empty pool', () => {
      expect(thrownCode(() => allocator.allocate([]))).toBe(ErrorCode.EMPTY_REQUEST_POOL);
    });

    it('produces the same outcome set on repeated runs', () => {
      const run = () => {
        const runCalendar = new SlotCalendar();
        runCalendar.register(slot('S1', '05:00', '05:30', 1));
        runCalendar.register(slot('S2', '05:15', '05:45', 2));
        runCalendar.register(slot('S3', '06:00', '06:30', 1));
        const runWaitlist = new Waitlist();
        const runAllocator = new Allocator(runCalendar, new ConflictChecker(), runWaitlist, {
          weights: DEFAULT_SCORING_WEIGHTS,
        });
        const outcomes = runAllocator.allocate([
          createRequest('e', ['S1', 'S3']),
          createRequest('d', ['S2'], { guardianId: 'G' }),
          createRequest('c', ['S1', 'S2'], { guardianId: 'G' }),
          createRequest('b', ['S3']),
          createRequest('a', ['S1', 'S2']),
        ]);
        return {
          outcomes: project(outcomes),
          waitlists: ['S1', 'S2', 'S3'].map((id) => runWaitlist.entriesFor(id).map((e) => e.requestId)),
        };
      };

      expect(run()).toEqual(run());
    });

    it('never lets occupancy exceed capacity', () => {
      calendar.register(slot('S1', '05:00', '05:30', 2));
      calendar.register(slot('S2', '06:00', '06:30', 1));
      const pool = 'abcdefghij'.split('').map((id, i) =>
        createRequest(id, i % 2 === 0 ? ['S1', 'S2'] : ['S2', 'S1']),
      );

      const outcomes = allocator.allocate(pool);

      expect(calendar.get('S1').occupancy).toBe(2);
      expect(calendar.get('S2').occupancy).toBe(1);
      expect(outcomes.filter((o) => o.kind === 'assigned')).toHaveLength(3);
      expect(outcomes.filter((o) => o.kind === 'waitlisted')).toHaveLength(7);
    });
  });

  describe('cancel', () => {
    it('promotes the head of the waitlist into the freed seat', () => {
      calendar.register(slot('S1', '05:00', '05:30', 2));
      const outcomes = allocator.allocate([
        createRequest('a', ['S1']),
        createRequest('b', ['S1']),
        createRequest('c', ['S1']),
      ]);
      const first = outcomes[0];
      if (first.kind !== 'assigned') throw new Error('expected a to be assigned');

      const { cancelled, promoted } = allocator.cancel(first.assignment);

      expect(cancelled.status).toBe(AssignmentStatus.CANCELLED);
      expect(cancelled.cancelledAt).toEqual(DECIDED_AT);
      expect(promoted).toHaveLength(1);
      expect(promoted[0]).toMatchObject({
        requestId: 'c',
        slotId: 'S1',
        reason: 'promoted-from-waitlist',
        replacesAssignmentId: first.assignment.id,
      });
      expect(calendar.get('S1').occupancy).toBe(2);
      expect(waitlist.entriesFor('S1')).toEqual([]);
    });

    it('decrements occupancy when nobody is waiting', () => {
      calendar.register(slot('S1', '05:00', '05:30', 2));
      const [outcome] = allocator.allocate([createRequest('a', ['S1'])]);
      if (outcome.kind !== 'assigned') throw new Error('expected a to be assigned');

      const { promoted } = allocator.cancel(outcome.assignment);

      expect(promoted).toEqual([]);
      expect(calendar.get('S1').occupancy).toBe(0);
      expect(conflicts.bookingsFor(outcome.assignment.guardianId)).toEqual([]);
    });

    it('passes over a waiting guardian who now clashes and promotes the next entry', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1));
      calendar.register(slot('S2', '05:15', '05:45', 1));
      const outcomes = allocator.allocate([
        createRequest('a', ['S1']),
        createRequest('b', ['S1', 'S2'], { guardianId: 'G' }),
        createRequest('c', ['S1']),
      ]);
      // b got S2 through its second preference and is not waiting on S1
      expect(project(outcomes)).toEqual([
        ['a', 'S1', 'matched-preference-1'],
        ['b', 'S2', 'matched-preference-2'],
        ['c', 'S1', WaitlistReason.NO_CAPACITY],
      ]);

      // d outranks c but its guardian already holds the overlapping S2
      const [extra] = allocator.allocate([
        createRequest('d', ['S1'], {
          guardianId: 'G',
          attributes: { gradeLevel: 3, siblingEnrolled: true, distanceTier: 2, applicationComplete: true },
        }),
      ]);
      expect(project([extra])).toEqual([['d', 'S1', WaitlistReason.NO_CAPACITY]]);
      expect(waitlist.entriesFor('S1').map((e) => e.requestId)).toEqual(['d', 'c']);

      const first = outcomes[0];
      if (first.kind !== 'assigned') throw new Error('expected a to be assigned');
      const { promoted } = allocator.cancel(first.assignment);

      expect(promoted.map((p) => p.requestId)).toEqual(['c']);
      expect(waitlist.entriesFor('S1').map((e) => e.requestId)).toEqual(['d']);
    });

    it('refuses to cancel an assignment twice', () => {
      calendar.register(slot('S1', '05:00', '05:30', 1));
      const [outcome] = allocator.allocate([createRequest('a', ['S1'])]);
      if (outcome.kind !== 'assigned') throw new Error('expected a to be assigned');
      const { cancelled } = allocator.cancel(outcome.assignment);

      expect(() => allocator.cancel(cancelled)).toThrow(/already cancelled/);
      expect(calendar.get('S1').occupancy).toBe(0);
    });
  });

  describe('assignManually', () => {
    beforeEach(() => {
      calendar.register(slot('S1', '05:00', '05:30', 1));
      calendar.register(slot('S2', '05:00', '05:30', 1, true));
      calendar.register(slot('S3', '05:15', '05:45', 1));
    });

    it('assigns a wait-listed request and clears its waitlist entry', () => {
      allocator.allocate([createRequest('a', ['S1']), createRequest('b', ['S1'])]);

      const assignment = allocator.assignManually(createRequest('b', ['S1']), 'S3');

      expect(assignment).toMatchObject({ requestId: 'b', slotId: 'S3', reason: 'manual-override' });
      expect(waitlist.get('b')).toBeNull();
      expect(calendar.get('S3').occupancy).toBe(1);
    });

    it('refuses a blacked-out slot', () => {
      expect(thrownCode(() => allocator.assignManually(createRequest('a', []), 'S2'))).toBe(
        ErrorCode.SLOT_UNAVAILABLE,
      );
    });

    it('refuses a slot overlapping the guardian booking', () => {
      allocator.allocate([createRequest('a', ['S1'], { guardianId: 'G' })]);

      expect(
        thrownCode(() => allocator.assignManually(createRequest('b', [], { guardianId: 'G' }), 'S3')),
      ).toBe(ErrorCode.GUARDIAN_CONFLICT);
    });

    it('refuses a full slot with CAPACITY_EXCEEDED', () => {
      allocator.allocate([createRequest('a', ['S1'])]);

      expect(thrownCode(() => allocator.assignManually(createRequest('b', []), 'S1'))).toBe(
        ErrorCode.CAPACITY_EXCEEDED,
      );
    });
  });
});
