import { MAX_DISTANCE_TIER, MAX_GRADE_LEVEL, type ScoringWeights } from '../utils/constants.js';
import type { ConsultationRequest } from './types.js';

/**
 * Priority of a consultation request, one tagged field per tuple position.
 * Compared lexicographically in declaration order; higher ranks first
 * except `submittedAt`, where earlier ranks first.
 */
export interface PriorityScore {
  readonly siblingBonus: number;
  readonly completenessBonus: number;
  readonly distanceRank: number;
  readonly urgency: number;
  /** Epoch milliseconds */
  readonly submittedAt: number;
  /** Fallback for identical tuples: ascending request id */
  readonly requestId: string;
}

export type PriorityTuple = readonly [
  siblingBonus: number,
  completenessBonus: number,
  distanceRank: number,
  urgency: number,
  negativeSubmittedAt: number,
];

/**
 * Calculate the priority score for a request
 *
 * Pure function - same request and weights always produce the same score.
 * Malformed attributes are rejected at intake, so there is no failure mode.
 *
 * Tuple positions:
 * - sibling already enrolled: sibling_bonus, else 0
 * - application complete: completeness_bonus, else 0
 * - distance: (5 - tier) * distance_weight, tier 1 being nearest
 * - grade urgency: (7 - grade) * urgency_weight, younger students first
 * - submission: earlier wins
 */
export function scoreRequest(request: ConsultationRequest, weights: ScoringWeights): PriorityScore {
  const { attributes } = request;

  return {
    siblingBonus: attributes.siblingEnrolled ? weights.sibling_bonus : 0,
    completenessBonus: attributes.applicationComplete ? weights.completeness_bonus : 0,
    distanceRank: (MAX_DISTANCE_TIER + 1 - attributes.distanceTier) * weights.distance_weight,
    urgency: (MAX_GRADE_LEVEL + 1 - attributes.gradeLevel) * weights.urgency_weight,
    submittedAt: request.submittedAt.getTime(),
    requestId: request.id,
  };
}

export function priorityTuple(score: PriorityScore): PriorityTuple {
  return [
    score.siblingBonus,
    score.completenessBonus,
    score.distanceRank,
    score.urgency,
    -score.submittedAt,
  ];
}

/**
 * Sort comparator: negative when `a` ranks ahead of `b`.
 * Total order - two scores only compare equal for the same request id.
 */
export function comparePriority(a: PriorityScore, b: PriorityScore): number {
  const left = priorityTuple(a);
  const right = priorityTuple(b);

  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) {
      return right[i] - left[i];
    }
  }

  if (a.requestId === b.requestId) return 0;
  return a.requestId < b.requestId ? -1 : 1;
}

export interface RankedRequest {
  request: ConsultationRequest;
  score: PriorityScore;
}

/**
 * Score every request and order the pool, highest priority first
 */
export function rankRequests(
  requests: readonly ConsultationRequest[],
  weights: ScoringWeights,
): RankedRequest[] {
  return requests
    .map((request) => ({ request, score: scoreRequest(request, weights) }))
    .sort((a, b) => comparePriority(a.score, b.score));
}
