/**
 * CEO tenure state: favorability, pressure, profit history, streaks and the
 * bonus pool that unlocks retirement. Every transform returns a new object.
 */
import {
  FAVORABILITY_MAX,
  FAVORABILITY_MIN,
  MAX_PRESSURE,
  MIN_PARACHUTE,
  MOMENTUM_TIERS,
  PARACHUTE_EVIL_PENALTY,
  PARACHUTE_PER_QUARTER,
  PROFIT_HISTORY_SIZE,
} from '../data/gameConfig';
import type { CeoState, DifficultySettings } from './types';

export function createCeo(settings: DifficultySettings): CeoState {
  return {
    pressure: 1,
    quartersSurvived: 0,
    favorability: settings.startingFavorability,
    isOusted: false,
    hasRetired: false,
    totalProfit: 0,
    evilScore: 0,
    evilScoreLastQuarter: 0,
    lastQuarterProfit: 0,
    currentQuarterProfit: 0,
    recentProfits: [],
    consecutiveSuccesses: 0,
    consecutiveNegativeQuarters: 0,
    consecutiveWeakProjectQuarters: 0,
    totalCardsPlayed: 0,
    accumulatedBonus: 0,
    quarterlyBonusAwarded: 0,
  };
}

export function isTerminal(ceo: CeoState): boolean {
  return ceo.isOusted || ceo.hasRetired;
}

// ── Derived ──

export function getMomentumBonus(ceo: CeoState): number {
  return MOMENTUM_TIERS.find((t) => ceo.consecutiveSuccesses >= t.minStreak)?.bonus ?? 0;
}

function truncatedMean(values: readonly number[]): number {
  return Math.trunc(values.reduce((sum, v) => sum + v, 0) / values.length);
}

export function getSmoothedProfit(ceo: CeoState): number {
  if (ceo.recentProfits.length === 0) return ceo.currentQuarterProfit;
  return truncatedMean(ceo.recentProfits);
}

/** Latest recorded profit minus the mean of the older entries. */
export function getProfitTrajectory(ceo: CeoState): number {
  const profits = ceo.recentProfits;
  if (profits.length < 2) return 0;
  return profits[profits.length - 1] - truncatedMean(profits.slice(0, -1));
}

export function isProfitImproving(ceo: CeoState): boolean {
  return getProfitTrajectory(ceo) > 0;
}

export function getEvilDeltaThisQuarter(ceo: CeoState): number {
  return ceo.evilScore - ceo.evilScoreLastQuarter;
}

export function canRetire(ceo: CeoState, settings: DifficultySettings): boolean {
  return ceo.accumulatedBonus >= settings.retirementThreshold;
}

export function getParachutePayout(ceo: CeoState): number {
  if (ceo.totalCardsPlayed === 0) return MIN_PARACHUTE;
  const tenureBonus = ceo.quartersSurvived * PARACHUTE_PER_QUARTER;
  const ethicsPenalty = ceo.evilScore * PARACHUTE_EVIL_PENALTY;
  return Math.max(MIN_PARACHUTE, MIN_PARACHUTE + tenureBonus - ethicsPenalty);
}

export function describeParachute(ceo: CeoState): string {
  return ceo.totalCardsPlayed === 0
    ? `minimal severance ($${MIN_PARACHUTE}M) - no strategic initiatives`
    : `$${getParachutePayout(ceo)}M`;
}

// ── Transforms ──

export function withFavorabilityChange(ceo: CeoState, delta: number): CeoState {
  const favorability = Math.max(FAVORABILITY_MIN, Math.min(FAVORABILITY_MAX, ceo.favorability + delta));
  return { ...ceo, favorability };
}

export function withEvilScoreChange(ceo: CeoState, delta: number): CeoState {
  return { ...ceo, evilScore: ceo.evilScore + delta };
}

/** Good extends the streak, bad resets it. */
export function withSuccessResult(ceo: CeoState, wasSuccess: boolean): CeoState {
  return { ...ceo, consecutiveSuccesses: wasSuccess ? ceo.consecutiveSuccesses + 1 : 0 };
}

export function withProjectImpact(ceo: CeoState, delta: number): CeoState {
  return { ...ceo, currentQuarterProfit: ceo.currentQuarterProfit + delta };
}

export function withProfitAdded(ceo: CeoState, profit: number): CeoState {
  return { ...ceo, totalProfit: ceo.totalProfit + profit };
}

export function withProfitRecorded(ceo: CeoState, profit: number): CeoState {
  const recentProfits = [...ceo.recentProfits, profit].slice(-PROFIT_HISTORY_SIZE);
  return {
    ...ceo,
    recentProfits,
    consecutiveNegativeQuarters: profit < 0 ? ceo.consecutiveNegativeQuarters + 1 : 0,
  };
}

export function withProjectPerformanceRecorded(ceo: CeoState, projectRevenue: number): CeoState {
  return {
    ...ceo,
    consecutiveWeakProjectQuarters: projectRevenue <= 0 ? ceo.consecutiveWeakProjectQuarters + 1 : 0,
  };
}

export function withCardsPlayedRecorded(ceo: CeoState, count: number): CeoState {
  return { ...ceo, totalCardsPlayed: ceo.totalCardsPlayed + count };
}

/** Pressure rises every two quarters survived, capped. */
export function withQuarterComplete(ceo: CeoState): CeoState {
  const quartersSurvived = ceo.quartersSurvived + 1;
  return {
    ...ceo,
    quartersSurvived,
    pressure: Math.min(Math.floor(quartersSurvived / 2), MAX_PRESSURE),
  };
}

export function withBonusAwarded(ceo: CeoState, bonus: number): CeoState {
  return { ...ceo, accumulatedBonus: ceo.accumulatedBonus + bonus, quarterlyBonusAwarded: bonus };
}

export function withEvilSnapshot(ceo: CeoState): CeoState {
  return { ...ceo, evilScoreLastQuarter: ceo.evilScore };
}

export function withOusted(ceo: CeoState): CeoState {
  return { ...ceo, isOusted: true };
}

export function withRetirement(ceo: CeoState): CeoState {
  return { ...ceo, hasRetired: true };
}
