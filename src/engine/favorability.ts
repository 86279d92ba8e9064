/**
 * Board favorability: how a quarter's results move the board's confidence.
 *
 * `computeFavorabilityDelta` classifies the quarter (full success, partial
 * success, failure) and returns the raw change. The resolution phase then
 * layers tenure decay, the initiative bonus and the low-meter / low-activity
 * caps on top, in that order.
 */
import {
  BASE_SUCCESS_REWARD,
  DIRECTIVE_FAILURE_PENALTY,
  MAX_FAVORABILITY_LOSS,
  MAX_TENURE_LOSS_EXTRA,
  METER_ORDER,
  NEGATIVE_PROFIT_BASE_PENALTY,
  STREAK_MAX_GAINS,
  STREAK_PENALTIES,
  TENURE_REWARD_FLOOR,
  TENURE_THRESHOLD,
} from '../data/gameConfig';
import { meterLabel } from './log';
import type { DifficultySettings, OrgState } from './types';

const CRITICAL_METER = 5;
const LOW_METER = 15;
const EARLY_QUARTERS = 2;

export interface FavorabilityAdjustment {
  /** Ceiling on a positive change; Infinity when uncapped. */
  readonly maxGain: number;
  readonly penalty: number;
  readonly reason: string | null;
}

const NO_ADJUSTMENT: FavorabilityAdjustment = { maxGain: Number.POSITIVE_INFINITY, penalty: 0, reason: null };

export interface FavorabilityInput {
  readonly lastProfit: number;
  readonly currentProfit: number;
  readonly directiveMet: boolean;
  readonly pressure: number;
  readonly evilScore?: number;
  readonly weakProjectStreak?: number;
  readonly quartersSurvived?: number;
}

function streakIndex(streak: number): number {
  return Math.min(Math.max(streak, 0), STREAK_PENALTIES.length - 1);
}

export function getStreakPenalty(weakProjectStreak: number): number {
  return STREAK_PENALTIES[streakIndex(weakProjectStreak)];
}

export function getStreakMaxGain(weakProjectStreak: number): number {
  return STREAK_MAX_GAINS[streakIndex(weakProjectStreak)];
}

export function getSuccessReward(pressure: number, quartersSurvived: number, settings: DifficultySettings): number {
  const base = BASE_SUCCESS_REWARD + settings.successRewardBonus;
  if (quartersSurvived < TENURE_THRESHOLD) return base;
  // Only a board with a negative reward bonus tightens further at high pressure
  const pressurePenalty = settings.successRewardBonus < 0 && pressure >= 5 ? 1 : 0;
  return Math.max(TENURE_REWARD_FLOOR, base - pressurePenalty);
}

export function getMaxLoss(quartersSurvived: number): number {
  if (quartersSurvived < TENURE_THRESHOLD) return MAX_FAVORABILITY_LOSS;
  const extra = Math.min(MAX_TENURE_LOSS_EXTRA, Math.trunc((quartersSurvived - TENURE_THRESHOLD) / 4) * 2);
  return MAX_FAVORABILITY_LOSS - extra;
}

function evilPenaltyOnSuccess(evilScore: number): number {
  if (evilScore >= 20) return 3;
  if (evilScore >= 10) return 1;
  return 0;
}

function evilScrutinyOnFailure(evilScore: number): number {
  if (evilScore >= 20) return 8;
  if (evilScore >= 10) return 4;
  if (evilScore >= 5) return 2;
  return 0;
}

export function computeFavorabilityDelta(input: FavorabilityInput, settings: DifficultySettings): number {
  const { lastProfit, currentProfit, directiveMet, pressure } = input;
  const evilScore = input.evilScore ?? 0;
  const streak = input.weakProjectStreak ?? 0;
  const quartersSurvived = input.quartersSurvived ?? 0;

  const streakPenalty = getStreakPenalty(streak);
  const maxGain = getStreakMaxGain(streak);
  const reward = getSuccessReward(pressure, quartersSurvived, settings);
  const isSuccess = currentProfit >= 0 && directiveMet;

  if (isSuccess) {
    const base = currentProfit > lastProfit ? reward : Math.trunc(reward / 2);
    return Math.min(base - evilPenaltyOnSuccess(evilScore) + streakPenalty, maxGain);
  }

  let change = 0;
  if (currentProfit < 0) {
    change += NEGATIVE_PROFIT_BASE_PENALTY - Math.min(4, Math.trunc(Math.abs(currentProfit) / 5));
  } else if (currentProfit < lastProfit) {
    const decline = lastProfit - currentProfit;
    if (decline > 10) change -= 6;
    else if (decline > 5) change -= 3;
    else change -= 1;
  }

  if (!directiveMet) change += DIRECTIVE_FAILURE_PENALTY;
  change -= pressure;
  change -= evilScrutinyOnFailure(evilScore);
  change += streakPenalty;

  return Math.max(change, getMaxLoss(quartersSurvived));
}

export function getTenureDecay(quartersSurvived: number, settings: DifficultySettings): number {
  if (!settings.decayEnabled) return 0;
  return quartersSurvived >= settings.decayStartQuarter ? -1 : 0;
}

export function getLowMeterAdjustment(org: OrgState): FavorabilityAdjustment {
  const critical = METER_ORDER.filter((m) => org[m] < CRITICAL_METER);
  const low = METER_ORDER.filter((m) => org[m] >= CRITICAL_METER && org[m] < LOW_METER);

  if (critical.length >= 2) {
    return {
      maxGain: 0,
      penalty: -5,
      reason: `Organization in crisis: ${critical.map(meterLabel).join(', ')} critically low`,
    };
  }
  if (critical.length === 1) {
    return { maxGain: 0, penalty: -2, reason: `${meterLabel(critical[0])} critically low - board concerned` };
  }
  if (low.length >= 3) {
    return { maxGain: 2, penalty: 0, reason: 'Multiple metrics concerning' };
  }
  return NO_ADJUSTMENT;
}

export function getExpectedProjectCount(quartersSurvived: number): number {
  return quartersSurvived < EARLY_QUARTERS ? 1 : 2;
}

export function getLowActivityAdjustment(projectsPlayed: number, quartersSurvived: number): FavorabilityAdjustment {
  const expected = getExpectedProjectCount(quartersSurvived);
  if (projectsPlayed >= expected || quartersSurvived < EARLY_QUARTERS) return NO_ADJUSTMENT;

  const multiplier = 1 + Math.trunc(quartersSurvived / 3);
  if (projectsPlayed === 0) {
    return { maxGain: 0, penalty: -5 * multiplier, reason: 'Board expects active strategic leadership' };
  }
  return {
    maxGain: 0,
    penalty: -4 * multiplier,
    reason: `Board expected ${expected}+ projects, only ${projectsPlayed} delivered`,
  };
}
