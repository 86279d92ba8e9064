/**
 * Political Capital (PC): the one spendable currency.
 *
 * Balance is clamped to [0, PC_MAX] on every change. Spending is all or
 * nothing; an unaffordable spend throws and leaves the caller's state alone.
 */
import {
  EXCHANGE_RATES,
  PC_DECAY_THRESHOLD,
  PC_INITIAL,
  PC_MAX,
  PC_METER_BONUS_THRESHOLD,
  PC_MORALE_PENALTY_THRESHOLD,
  RESTRAINT_BONUS,
} from '../data/gameConfig';
import type { MeterName, OrgState, ResourceState } from './types';

export function clampCapital(value: number): number {
  return Math.max(0, Math.min(PC_MAX, value));
}

export function createResources(politicalCapital = PC_INITIAL): ResourceState {
  return { politicalCapital: clampCapital(politicalCapital) };
}

export function canAfford(resources: ResourceState, cost: number): boolean {
  return resources.politicalCapital >= cost;
}

export function spend(resources: ResourceState, cost: number): ResourceState {
  if (cost < 0) throw new Error(`Cannot spend a negative amount: ${cost}`);
  if (!canAfford(resources, cost)) {
    throw new Error(`Insufficient Political Capital: have ${resources.politicalCapital}, need ${cost}`);
  }
  return { politicalCapital: resources.politicalCapital - cost };
}

export function earn(resources: ResourceState, delta: number): ResourceState {
  return { politicalCapital: clampCapital(resources.politicalCapital + delta) };
}

/** Net PC change at quarter end, before clamping. */
export function getEndOfQuarterDelta(resources: ResourceState, org: OrgState): number {
  let delta = 0;
  if (org.governance >= PC_METER_BONUS_THRESHOLD) delta += 1;
  if (org.alignment >= PC_METER_BONUS_THRESHOLD) delta += 1;
  if (org.morale < PC_MORALE_PENALTY_THRESHOLD) delta -= 1;
  if (resources.politicalCapital > PC_DECAY_THRESHOLD) delta -= 1;
  return delta;
}

export function endOfQuarterAdjustment(resources: ResourceState, org: OrgState): ResourceState {
  return earn(resources, getEndOfQuarterDelta(resources, org));
}

/** 3/2/1/0 PC for playing 0/1/2/3+ cards. */
export function restraintBonus(cardsPlayed: number): number {
  const index = Math.min(Math.max(cardsPlayed, 0), RESTRAINT_BONUS.length - 1);
  return RESTRAINT_BONUS[index];
}

/** Meter points traded for one PC. */
export function getExchangeRate(meter: MeterName): number {
  return EXCHANGE_RATES[meter];
}

export function canExchange(org: OrgState, meter: MeterName): boolean {
  return org[meter] >= getExchangeRate(meter);
}
