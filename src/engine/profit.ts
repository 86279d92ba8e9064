import {
  BASE_OPS_BAD_QUARTER_CHANCE,
  BASE_OPS_BAD_QUARTER_RANGE,
  BASE_OPS_GROWTH_PER_QUARTER,
  BASE_OPS_HIGH_METER,
  BASE_OPS_LOW_METER,
  BASE_OPS_MAX,
  BASE_OPS_METER_BONUS,
  BASE_OPS_METER_PENALTY,
  BASE_OPS_MIN,
  BASE_OPS_VARIANCE,
  REVENUE_BASELINE_TARGET,
  REVENUE_DIMINISHING_RETURNS,
  REVENUE_MIN_TARGET_SCALE,
} from '../data/gameConfig';
import type { Rng } from './rng';
import type { OrgState } from './types';

// ── Base Operations ──────────────────────────────────────────────

export function getGrowthMultiplier(quartersElapsed: number): number {
  return 1 + quartersElapsed * BASE_OPS_GROWTH_PER_QUARTER;
}

function meterModifier(value: number, bonus: number, penalty: number): number {
  if (value >= BASE_OPS_HIGH_METER) return bonus;
  if (value < BASE_OPS_LOW_METER) return -penalty;
  return 0;
}

/**
 * Profit from ongoing operations ($M), independent of projects.
 *
 * An 8% bad quarter short-circuits to a small (possibly negative) range.
 * Otherwise a base draw plus meter modifiers plus variance, all scaled by
 * organic growth of 2% per quarter survived.
 */
export function calculateBaseOperations(org: OrgState, rng: Rng, quartersElapsed = 0): number {
  const g = getGrowthMultiplier(quartersElapsed);

  if (rng.nextInt(0, 100) < BASE_OPS_BAD_QUARTER_CHANCE) {
    const [badMin, badMax] = BASE_OPS_BAD_QUARTER_RANGE;
    return rng.nextInt(Math.trunc(badMin * g), Math.trunc(badMax * g));
  }

  const base = rng.nextInt(Math.trunc(BASE_OPS_MIN * g), Math.trunc(BASE_OPS_MAX * g) + 1);

  const bonus = Math.trunc(BASE_OPS_METER_BONUS * g);
  const penalty = Math.trunc(BASE_OPS_METER_PENALTY * g);
  const modifiers = meterModifier(org.delivery, bonus, penalty)
    + meterModifier(org.runway, bonus, penalty)
    + meterModifier(org.governance, Math.trunc(bonus / 2), Math.trunc(penalty / 2));

  const v = Math.trunc(BASE_OPS_VARIANCE * g);
  const variance = rng.nextInt(-v, v + 1);

  return base + modifiers + variance;
}

// ── Revenue Scaling ──────────────────────────────────────────────

export function getDeliveryMultiplier(delivery: number): number {
  if (delivery >= 90) return 1.05;
  if (delivery >= 80) return 1.03;
  return 1.0;
}

export function getTargetScaling(targetAmount: number): number {
  return Math.max(REVENUE_MIN_TARGET_SCALE, targetAmount / REVENUE_BASELINE_TARGET);
}

export function getDiminishingReturns(revenueCardIndex: number): number {
  const index = Math.min(Math.max(revenueCardIndex, 0), REVENUE_DIMINISHING_RETURNS.length - 1);
  return REVENUE_DIMINISHING_RETURNS[index];
}

/** Revenue card profit after target scaling, delivery bonus and diminishing returns. */
export function scaleRevenueProfit(
  baseProfit: number,
  targetAmount: number,
  delivery: number,
  revenueCardsPlayedBefore = 0,
): number {
  return Math.trunc(
    baseProfit
      * getTargetScaling(targetAmount)
      * getDeliveryMultiplier(delivery)
      * getDiminishingReturns(revenueCardsPlayedBefore),
  );
}

// ── Formatting ───────────────────────────────────────────────────

/** $XM, or $X.XB at a billion and above. */
export function formatProfit(millions: number): string {
  const abs = Math.abs(millions);
  const sign = millions < 0 ? '-' : '';
  if (abs >= 1000) return `${sign}$${(abs / 1000).toFixed(1)}B`;
  return `${sign}$${abs}M`;
}

export function formatProfitWithSign(millions: number): string {
  return millions >= 0 ? `+$${millions}M` : `-$${Math.abs(millions)}M`;
}
