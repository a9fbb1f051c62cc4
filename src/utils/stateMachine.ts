import { RequestStatus } from './constants.js';
import { AppError, ErrorCode } from './appError.js';

// ── Generic State Machine Type ──
type TransitionMap<T extends string> = Record<T, T[]>;

function createStateMachine<T extends string>(transitions: TransitionMap<T>) {
  return {
    canTransition(from: T, to: T): boolean {
      return transitions[from]?.includes(to) ?? false;
    },
    assertTransition(from: T, to: T): void {
      if (!this.canTransition(from, to)) {
        throw AppError.badRequest(
          `Invalid status transition: ${from} → ${to}`,
          ErrorCode.INVALID_TRANSITION,
          { from, to, allowed: transitions[from] || [] },
        );
      }
    },
    getAllowed(from: T): T[] {
      return transitions[from] || [];
    },
  };
}

// ── Consultation Request State Machine ──
// Forward only; cancellation is the one path that re-opens capacity.
export const requestStateMachine = createStateMachine<RequestStatus>({
  [RequestStatus.PENDING]: [
    RequestStatus.ASSIGNED,
    RequestStatus.WAITLISTED,
    RequestStatus.CANCELLED,
  ],
  [RequestStatus.WAITLISTED]: [
    RequestStatus.ASSIGNED,
    RequestStatus.EXPIRED,
    RequestStatus.CANCELLED,
  ],
  [RequestStatus.ASSIGNED]: [RequestStatus.CANCELLED],
  [RequestStatus.EXPIRED]: [],
  [RequestStatus.CANCELLED]: [],
});
