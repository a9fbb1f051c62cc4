// ── Consultation Request Status ──
export enum RequestStatus {
  PENDING = 'pending',
  ASSIGNED = 'assigned',
  WAITLISTED = 'waitlisted',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

// ── Assignment Status ──
export enum AssignmentStatus {
  ACTIVE = 'active',
  CANCELLED = 'cancelled',
}

// ── Waitlist Reasons ──
export enum WaitlistReason {
  NO_CAPACITY = 'no-capacity',
  ALL_CONFLICTS = 'all-conflicts',
  ALL_BLACKOUT = 'all-blackout',
  NO_PREFERENCE = 'no-preference',
}

// ── Assignment Reasons (besides matched-preference-N) ──
export enum AssignmentOrigin {
  PROMOTED = 'promoted-from-waitlist',
  MANUAL = 'manual-override',
}

export const UNKNOWN_SLOT_REASON = 'unknown-slot';

// ── Admission Cycle ──
export enum CycleStatus {
  OPEN = 'open',
  CLOSED = 'closed',
}

// ── Scoring Attribute Ranges ──
export const GRADE_LEVELS = [1, 2, 3, 4, 5, 6] as const;
export const MIN_GRADE_LEVEL = GRADE_LEVELS[0];
export const MAX_GRADE_LEVEL = GRADE_LEVELS[GRADE_LEVELS.length - 1];

// 1 = nearest to the academy
export const DISTANCE_TIERS = [1, 2, 3, 4] as const;
export const MIN_DISTANCE_TIER = DISTANCE_TIERS[0];
export const MAX_DISTANCE_TIER = DISTANCE_TIERS[DISTANCE_TIERS.length - 1];

// ── Scoring Weights ──
export interface ScoringWeights {
  sibling_bonus: number;
  completeness_bonus: number;
  distance_weight: number;
  urgency_weight: number;
}

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  sibling_bonus: 1000,
  completeness_bonus: 100,
  distance_weight: 10,
  urgency_weight: 1,
};

// ── Config Keys ──
export const CONFIG_KEYS = {
  SCORING_WEIGHTS: 'scoring_weights',
  CYCLE: 'admission_cycle',
} as const;

export const DEFAULT_DEMAND_HIGHLIGHT_THRESHOLD = 3;

// ── Audit Action ──
export enum AuditAction {
  REQUESTS_SUBMITTED = 'requests_submitted',
  REQUEST_ARCHIVED = 'request_archived',
  SLOT_REGISTERED = 'slot_registered',
  SLOT_BLACKOUT_CHANGED = 'slot_blackout_changed',
  ALLOCATION_RUN = 'allocation_run',
  ASSIGNMENT_CANCELLED = 'assignment_cancelled',
  MANUAL_ASSIGNMENT = 'manual_assignment',
  WEIGHTS_UPDATED = 'weights_updated',
  CYCLE_CLOSED = 'cycle_closed',
}
