/**
 * The board's quarterly confidence vote, rolled on a d20.
 * A threshold of N ousts the CEO on a roll of 1..N.
 */
import {
  OUSTER_AUTOMATIC,
  OUSTER_DIE,
  OUSTER_MAX_THRESHOLD,
  OUSTER_SAFE_FAVORABILITY,
} from '../data/gameConfig';
import type { Rng } from './rng';

export interface OusterFactors {
  readonly favorability: number;
  readonly pressure: number;
  readonly quartersSurvived?: number;
  readonly evilScore?: number;
  readonly directiveMet?: boolean;
  readonly profitPositive?: boolean;
  readonly profitImproving?: boolean;
  readonly consecutiveNegativeQuarters?: number;
  readonly consecutiveWeakProjectQuarters?: number;
  readonly cardsPlayedThisQuarter?: number;
}

function favorabilityZone(favorability: number): number {
  if (favorability >= 40) return 1;
  if (favorability >= 25) return 2;
  if (favorability >= 10) return 3;
  return 4;
}

export function getOusterThreshold(factors: OusterFactors): number {
  const {
    favorability,
    pressure,
    quartersSurvived = 0,
    evilScore = 0,
    directiveMet = false,
    profitPositive = false,
    profitImproving = false,
    consecutiveNegativeQuarters = 0,
    consecutiveWeakProjectQuarters = 0,
    cardsPlayedThisQuarter = 1,
  } = factors;

  if (favorability >= OUSTER_SAFE_FAVORABILITY) return 0;

  let threshold = favorabilityZone(favorability) + Math.trunc(pressure / 2);

  // Honeymoon fades out over the first two years
  if (quartersSurvived < 4) threshold = Math.max(0, threshold - 4);
  else if (quartersSurvived < 6) threshold = Math.max(0, threshold - 2);
  else if (quartersSurvived < 8) threshold = Math.max(0, threshold - 1);

  if (evilScore === 0) threshold = Math.max(0, threshold - 2);
  else if (evilScore < 5) threshold = Math.max(0, threshold - 1);

  // Performance only counts when the CEO actually ran projects
  if (cardsPlayedThisQuarter > 0) {
    if (directiveMet) threshold = Math.max(0, threshold - 2);
    if (profitPositive) threshold = Math.max(0, threshold - 1);
    if (profitImproving) threshold = Math.max(0, threshold - 1);
  }

  if (consecutiveNegativeQuarters >= 3) threshold += 4;
  else if (consecutiveNegativeQuarters >= 2) threshold += 2;

  if (consecutiveWeakProjectQuarters >= 6) return OUSTER_AUTOMATIC;
  if (consecutiveWeakProjectQuarters >= 4) threshold += 6;
  else if (consecutiveWeakProjectQuarters >= 2) threshold += 3;

  return Math.min(threshold, OUSTER_MAX_THRESHOLD);
}

/** Percent chance of ouster. */
export function getOusterRisk(factors: OusterFactors): number {
  return getOusterThreshold(factors) * (100 / OUSTER_DIE);
}

export function describeOusterRisk(threshold: number): string {
  if (threshold === 0) return 'Safe';
  if (threshold === 1) return 'Low';
  if (threshold === 2) return 'Moderate';
  if (threshold <= 4) return 'Elevated';
  if (threshold <= 8) return 'High';
  return 'Critical';
}

/** No draw at all when the threshold is 0; otherwise exactly one d20. */
export function rollForOuster(factors: OusterFactors, rng: Rng): boolean {
  const threshold = getOusterThreshold(factors);
  if (threshold === 0) return false;
  return rng.nextInt(1, OUSTER_DIE + 1) <= threshold;
}
