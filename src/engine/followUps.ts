import {
  FOLLOW_UP_BASE_CHANCE,
  FOLLOW_UP_CHANCE_PER_QUARTER,
  FOLLOW_UP_GOOD_WEIGHT,
  FOLLOW_UP_MAX_CHANCE,
  FOLLOW_UP_MAX_QUARTERS,
  FOLLOW_UP_MEH_WEIGHT,
  FOLLOW_UP_METERS,
} from '../data/gameConfig';
import { pickOne, type Rng } from './rng';
import { createPendingSituation } from './situations';
import type {
  FollowUpKind,
  MeterName,
  OutcomeTier,
  PendingFollowUp,
  PendingSituation,
  PlayableCard,
  SituationPools,
} from './types';

export type FollowUpResult =
  | { readonly kind: 'good'; readonly meter: MeterName; readonly delta: number }
  | { readonly kind: 'meh'; readonly meter: MeterName; readonly delta: number }
  | { readonly kind: 'crisis'; readonly situation: PendingSituation | null };

export function createFollowUp(card: PlayableCard, quarter: number, outcome: OutcomeTier): PendingFollowUp {
  return { cardId: card.cardId, cardTitle: card.title, playedAtQuarter: quarter, originalOutcome: outcome };
}

export function quartersSince(followUp: PendingFollowUp, currentQuarter: number): number {
  return currentQuarter - followUp.playedAtQuarter;
}

export function hasExpired(followUp: PendingFollowUp, currentQuarter: number): boolean {
  return quartersSince(followUp, currentQuarter) > FOLLOW_UP_MAX_QUARTERS;
}

export function getFollowUpChance(followUp: PendingFollowUp, currentQuarter: number): number {
  return Math.min(
    FOLLOW_UP_MAX_CHANCE,
    FOLLOW_UP_BASE_CHANCE + FOLLOW_UP_CHANCE_PER_QUARTER * quartersSince(followUp, currentQuarter),
  );
}

/** Good origins lean good, bad origins lean toward trouble. */
export function getKindWeights(originalOutcome: OutcomeTier): { good: number; meh: number } {
  switch (originalOutcome) {
    case 'good':
      return { good: FOLLOW_UP_GOOD_WEIGHT + 10, meh: FOLLOW_UP_MEH_WEIGHT - 5 };
    case 'bad':
      return { good: FOLLOW_UP_GOOD_WEIGHT - 10, meh: FOLLOW_UP_MEH_WEIGHT - 10 };
    case 'expected':
      return { good: FOLLOW_UP_GOOD_WEIGHT, meh: FOLLOW_UP_MEH_WEIGHT };
  }
}

export function determineKind(originalOutcome: OutcomeTier, rng: Rng): FollowUpKind {
  const { good, meh } = getKindWeights(originalOutcome);
  const roll = rng.nextInt(1, 101);
  if (roll <= good) return 'good';
  if (roll <= good + meh) return 'meh';
  return 'crisis';
}

function pickMeter(rng: Rng): MeterName {
  return FOLLOW_UP_METERS[rng.nextInt(0, FOLLOW_UP_METERS.length)];
}

/**
 * Rolls one follow-up. Returns null when it stays quiet this quarter;
 * expired follow-ups should be dropped by the caller before rolling.
 */
export function rollFollowUp(
  followUp: PendingFollowUp,
  currentQuarter: number,
  pools: SituationPools,
  rng: Rng,
): FollowUpResult | null {
  if (rng.nextInt(1, 101) > getFollowUpChance(followUp, currentQuarter)) return null;

  switch (determineKind(followUp.originalOutcome, rng)) {
    case 'good':
      return { kind: 'good', meter: pickMeter(rng), delta: rng.nextInt(3, 8) };
    case 'meh': {
      const meter = pickMeter(rng);
      const positive = rng.nextInt(1, 101) <= 60;
      const magnitude = rng.nextInt(2, 6);
      return { kind: 'meh', meter, delta: positive ? magnitude : -magnitude };
    }
    case 'crisis': {
      const situationId = pickOne(rng, pools[followUp.originalOutcome]);
      return {
        kind: 'crisis',
        situation: situationId === undefined
          ? null
          : createPendingSituation(situationId, followUp.cardId, currentQuarter, 0),
      };
    }
  }
}

export function withFollowUpRemoved(followUps: readonly PendingFollowUp[], cardId: string): PendingFollowUp[] {
  return followUps.filter((f) => f.cardId !== cardId);
}
