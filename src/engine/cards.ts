import {
  AFFINITY_SYNERGY,
  MAX_CARDS_PER_QUARTER,
  MAX_HAND_SIZE,
  POSITION_PC_COST,
  POSITION_RISK,
} from '../data/gameConfig';
import { getMeter } from './org';
import { scaleRevenueProfit } from './profit';
import type { Effect, MeterImpact, OrgState, OutcomeProfile, PlayableCard } from './types';

// ── Position ─────────────────────────────────────────────────────

function checkPosition(position: number): void {
  if (!Number.isInteger(position) || position < 0 || position >= MAX_CARDS_PER_QUARTER) {
    throw new Error(`Invalid card position: ${position}`);
  }
}

/** PC cost of the card at this (0-based) position in the quarter. */
export function getPositionCost(position: number): number {
  checkPosition(position);
  return POSITION_PC_COST[position];
}

/** Extra bad-outcome weight for later plays in the same quarter. */
export function getPositionRisk(position: number): number {
  checkPosition(position);
  return POSITION_RISK[position];
}

// ── Affinity ─────────────────────────────────────────────────────

export function isCorporate(card: PlayableCard): boolean {
  return card.corporateIntensity > 0;
}

/** Positive reduces risk, negative increases it. */
export function getAffinityModifier(card: PlayableCard, org: OrgState): number {
  if (card.meterAffinity === null) return 0;
  const value = getMeter(org, card.meterAffinity);
  if (value >= 70) return 15;
  if (value >= 60) return 8;
  if (value < 25) return -15;
  if (value < 40) return -8;
  return 0;
}

export function getAffinitySynergyBonus(card: PlayableCard, playedThisQuarter: readonly PlayableCard[]): number {
  if (card.meterAffinity === null) return 0;
  const matching = playedThisQuarter.filter((c) => c.meterAffinity === card.meterAffinity).length;
  if (matching >= 2) return AFFINITY_SYNERGY.multiple;
  if (matching === 1) return AFFINITY_SYNERGY.single;
  return 0;
}

// ── Hand ─────────────────────────────────────────────────────────

export function handContains(hand: readonly string[], cardId: string): boolean {
  return hand.includes(cardId);
}

export function withCardRemoved(hand: readonly string[], cardId: string): string[] {
  if (!handContains(hand, cardId)) throw new Error(`Card ${cardId} not in hand`);
  return hand.filter((id) => id !== cardId);
}

/** Appends cards, dropping any beyond the hand limit. */
export function withCardsAdded(hand: readonly string[], cardIds: readonly string[]): string[] {
  return [...hand, ...cardIds].slice(0, MAX_HAND_SIZE);
}

// ── Forecasts ────────────────────────────────────────────────────

function profitOf(effects: readonly Effect[]): number {
  return effects.reduce((sum, e) => (e.kind === 'profit' ? sum + e.delta : sum), 0);
}

export interface RevenueProjection {
  readonly min: number;
  readonly max: number;
}

/** Scaled profit range across all tiers; null for non-revenue cards or cards without profit. */
export function getRevenueProjection(
  card: PlayableCard,
  targetAmount: number,
  delivery: number,
  revenueCardsPlayedBefore = 0,
): RevenueProjection | null {
  if (card.category !== 'revenue') return null;
  const raw = tiersOf(card.outcomes).map(profitOf);
  if (raw.every((p) => p === 0)) return null;
  const scaled = raw.map((p) => scaleRevenueProfit(p, targetAmount, delivery, revenueCardsPlayedBefore));
  return { min: Math.min(...scaled), max: Math.max(...scaled) };
}

/** Meters that the card's worst reduction would drive to zero. */
export function getZeroMeterWarnings(card: PlayableCard, org: OrgState): MeterImpact[] {
  const worst = new Map<MeterImpact['meter'], number>();
  for (const effect of tiersOf(card.outcomes).flat()) {
    if (effect.kind !== 'meter' || effect.delta >= 0) continue;
    const current = worst.get(effect.meter);
    if (current === undefined || effect.delta < current) worst.set(effect.meter, effect.delta);
  }
  return [...worst]
    .filter(([meter, delta]) => getMeter(org, meter) + delta <= 0)
    .map(([meter, delta]) => ({ meter, delta }));
}

function tiersOf(profile: OutcomeProfile): (readonly Effect[])[] {
  return [profile.bad, profile.expected, profile.good];
}
