import {
  BAD_WEIGHT_RANGE,
  BASE_BAD_WEIGHT,
  BASE_GOOD_WEIGHT,
  CRISIS_WEIGHTS,
  EVIL_PATH_TIERS,
  EXPECTED_WEIGHT_RANGE,
  GOOD_WEIGHT_RANGE,
  HONEYMOON_BAD_REDUCTION,
  HONEYMOON_GOOD_BONUS,
  HONEYMOON_QUARTERS,
} from '../data/gameConfig';
import type { Rng } from './rng';
import type { Choice, Effect, OutcomeProfile, OutcomeTier } from './types';

export interface OutcomeWeights {
  readonly good: number;
  readonly expected: number;
  readonly bad: number;
}

export interface OutcomeModifiers {
  readonly alignment: number;
  readonly pressure: number;
  readonly evilScore: number;
  /** Position risk minus meter affinity; positive means riskier. */
  readonly riskModifier: number;
  readonly quarterNumber: number;
  readonly momentumBonus: number;
  readonly synergyBonus: number;
  readonly isCorporate: boolean;
}

const DEFAULT_MODIFIERS: OutcomeModifiers = {
  alignment: 50,
  pressure: 1,
  evilScore: 0,
  riskModifier: 0,
  quarterNumber: HONEYMOON_QUARTERS + 1,
  momentumBonus: 0,
  synergyBonus: 0,
  isCorporate: false,
};

function clamp(value: number, [min, max]: readonly [number, number]): number {
  return Math.max(min, Math.min(max, value));
}

export function getHoneymoonAdjustment(quarterNumber: number): { good: number; bad: number } {
  if (quarterNumber > HONEYMOON_QUARTERS) return { good: 0, bad: 0 };
  const fade = HONEYMOON_QUARTERS - quarterNumber + 1;
  return {
    good: Math.trunc((HONEYMOON_GOOD_BONUS * fade) / HONEYMOON_QUARTERS),
    bad: Math.trunc((HONEYMOON_BAD_REDUCTION * fade) / HONEYMOON_QUARTERS),
  };
}

export function getEvilPathBonus(evilScore: number, isCorporate: boolean): number {
  if (!isCorporate) return 0;
  return EVIL_PATH_TIERS.find((t) => evilScore >= t.minEvil)?.bonus ?? 0;
}

/**
 * Final Good/Expected/Bad weights for a card roll.
 *
 * Modifiers combine additively in this order: alignment, pressure, evil,
 * honeymoon, momentum, synergy, evil path, position/affinity risk. Good and
 * Bad are then clamped to [5, 60]. Expected takes the remainder; when that
 * falls under 10, the shortfall is taken from Bad (down to its floor) and
 * then from Good, so the three always sum to 100 and none is negative.
 */
export function getOutcomeWeights(modifiers: Partial<OutcomeModifiers> = {}): OutcomeWeights {
  const m = { ...DEFAULT_MODIFIERS, ...modifiers };

  const alignmentMod = Math.trunc((m.alignment - 50) / 5);
  const pressureMod = m.pressure - 1;
  const evilMod = Math.trunc(m.evilScore / 2);
  const honeymoon = getHoneymoonAdjustment(m.quarterNumber);
  const evilPath = getEvilPathBonus(m.evilScore, m.isCorporate);

  let good = BASE_GOOD_WEIGHT + alignmentMod - pressureMod - evilMod + honeymoon.good
    + m.momentumBonus + m.synergyBonus + evilPath;
  let bad = BASE_BAD_WEIGHT - alignmentMod + pressureMod + evilMod + m.riskModifier - honeymoon.bad;

  good = clamp(good, GOOD_WEIGHT_RANGE);
  bad = clamp(bad, BAD_WEIGHT_RANGE);

  const [minExpected] = EXPECTED_WEIGHT_RANGE;
  let shortfall = minExpected - (100 - good - bad);
  if (shortfall > 0) {
    const fromBad = Math.min(shortfall, bad - BAD_WEIGHT_RANGE[0]);
    bad -= fromBad;
    shortfall -= fromBad;
    good -= shortfall;
  }

  return { good, expected: 100 - good - bad, bad };
}

/** One integer draw over the weight sum. A zero total degrades to expected. */
export function rollTier(rng: Rng, weights: OutcomeWeights): OutcomeTier {
  const good = Math.max(0, weights.good);
  const expected = Math.max(0, weights.expected);
  const bad = Math.max(0, weights.bad);
  const total = good + expected + bad;
  if (total <= 0) return 'expected';

  const roll = rng.nextInt(0, total);
  if (roll < good) return 'good';
  if (roll < good + expected) return 'expected';
  return 'bad';
}

export function rollCardOutcome(modifiers: Partial<OutcomeModifiers>, rng: Rng): OutcomeTier {
  return rollTier(rng, getOutcomeWeights(modifiers));
}

export function getCrisisChoiceWeights(choice: Choice): OutcomeWeights {
  const [good, expected, bad] = choice.pcCost > 0
    ? CRISIS_WEIGHTS.capital
    : choice.corporateIntensityDelta > 0
      ? CRISIS_WEIGHTS.corporate
      : CRISIS_WEIGHTS.standard;
  return { good, expected, bad };
}

export function rollCrisisChoice(choice: Choice, rng: Rng): OutcomeTier {
  return rollTier(rng, getCrisisChoiceWeights(choice));
}

export function effectsForTier(profile: OutcomeProfile, tier: OutcomeTier): readonly Effect[] {
  return profile[tier];
}

/** Compact forecast string, e.g. "Good 25% / Expected 55% / Bad 20%". */
export function describeOutcomeWeights(weights: OutcomeWeights): string {
  return `Good ${weights.good}% / Expected ${weights.expected}% / Bad ${weights.bad}%`;
}
