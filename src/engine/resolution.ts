/**
 * Meter adjustments applied during the resolution phase: passive recovery
 * of the weakest meters, performance swings driven by the quarter's profit,
 * and the board's occasional award for an exceptional quarter.
 */
import {
  BOARD_AWARD_CHANCE,
  BOARD_AWARD_METER_CAP,
  EXCEPTIONAL_BONUS_THRESHOLD,
  OUTSTANDING_PROFIT_DELTA,
} from '../data/gameConfig';
import { event, meterChange, meterLabel } from './log';
import { metersByValue, withMeterChange } from './org';
import type { Rng } from './rng';
import type { LogEntry, MeterName, OrgState } from './types';

export interface MeterAdjustment {
  readonly org: OrgState;
  readonly entries: readonly LogEntry[];
}

function applyAll(org: OrgState, changes: readonly (readonly [MeterName, number])[]): MeterAdjustment {
  let current = org;
  const entries: LogEntry[] = [];
  for (const [meter, delta] of changes) {
    if (delta === 0) continue;
    current = withMeterChange(current, meter, delta);
    entries.push(meterChange(meter, delta));
  }
  return { org: current, entries };
}

// ── Passive Recovery ──

/** The three weakest meters drift back toward the middle. */
export function getPassiveRecovery(org: OrgState): [MeterName, number][] {
  const [lowest, second, third] = metersByValue(org);
  const changes: [MeterName, number][] = [];

  const v1 = org[lowest];
  if (v1 < 50) changes.push([lowest, Math.min(5, 50 - v1)]);
  else if (v1 < 60) changes.push([lowest, 3]);

  if (org[second] < 45) changes.push([second, Math.min(3, 45 - org[second])]);
  if (org[third] < 35) changes.push([third, Math.min(2, 35 - org[third])]);

  return changes;
}

export function applyPassiveRecovery(org: OrgState): MeterAdjustment {
  return applyAll(org, getPassiveRecovery(org));
}

// ── Performance ──

export function applyPerformanceEffects(
  org: OrgState,
  profitDelta: number,
  quarterProfit: number,
  cardsPlayed: number,
  rng: Rng,
): MeterAdjustment {
  const changes: [MeterName, number][] = [];

  if (profitDelta >= 15) {
    changes.push(['morale', rng.nextInt(2, 7)], ['alignment', rng.nextInt(1, 5)], ['runway', rng.nextInt(2, 6)]);
  } else if (profitDelta >= 5) {
    changes.push(['morale', rng.nextInt(1, 4)], ['alignment', rng.nextInt(0, 3)], ['runway', rng.nextInt(1, 4)]);
  } else if (profitDelta <= -15) {
    changes.push(['morale', -rng.nextInt(2, 7)], ['alignment', -rng.nextInt(1, 5)], ['runway', -rng.nextInt(2, 6)]);
  } else if (profitDelta <= -5) {
    changes.push(['morale', -rng.nextInt(1, 4)], ['alignment', -rng.nextInt(0, 3)], ['runway', -rng.nextInt(1, 4)]);
  }

  if (cardsPlayed > 0) {
    if (quarterProfit >= 20) changes.push(['delivery', rng.nextInt(2, 7)]);
    else if (quarterProfit >= 10) changes.push(['delivery', rng.nextInt(1, 4)]);
    else if (quarterProfit <= -10) changes.push(['delivery', -rng.nextInt(1, 4)]);
  }

  return applyAll(org, changes);
}

// ── Board Awards ──

export function applyExceptionalRewards(
  org: OrgState,
  bonus: number,
  directiveMet: boolean,
  profitDelta: number,
  rng: Rng,
): MeterAdjustment {
  const exceptional = bonus >= EXCEPTIONAL_BONUS_THRESHOLD && directiveMet;
  const outstanding = profitDelta >= OUTSTANDING_PROFIT_DELTA;
  if (!exceptional && !outstanding) return { org, entries: [] };
  if (rng.nextInt(0, 100) >= BOARD_AWARD_CHANCE) return { org, entries: [] };

  // picked before the runway award lands
  const lowest = metersByValue(org)[0];
  let current = org;
  const entries: LogEntry[] = [];
  const award = (meter: MeterName, delta: number) => {
    current = withMeterChange(current, meter, delta);
    entries.push(event(`Board Award: +${delta} ${meterLabel(meter)}`));
  };

  if (outstanding) award('runway', rng.nextInt(3, 8));
  if (exceptional && org[lowest] < BOARD_AWARD_METER_CAP) award(lowest, rng.nextInt(2, 6));

  return { org: current, entries };
}
