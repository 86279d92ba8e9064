/**
 * Effect application, split into two stages.
 *
 * Stage one: meter effects change the org directly (clamped).
 * Stage two: profit and fine effects never touch the org. They are summed
 * into an accumulator the caller folds into the quarter's project impact,
 * which the resolution phase later feeds into the financial calculation.
 */
import { formatSigned, info, meterChange } from './log';
import { withMeterChange } from './org';
import type { Effect, LogEntry, MeterName, OrgState } from './types';

export interface EffectResult {
  readonly org: OrgState;
  /** Sum of profit effects ($M). */
  readonly profitDelta: number;
  /** Sum of fines ($M, non-negative). */
  readonly fines: number;
  readonly entries: readonly LogEntry[];
}

export function meterEffect(meter: MeterName, delta: number): Effect {
  return { kind: 'meter', meter, delta };
}

export function profitEffect(delta: number): Effect {
  return { kind: 'profit', delta };
}

export function fineEffect(amount: number, reason = 'Legal settlement'): Effect {
  return { kind: 'fine', amount: Math.max(0, amount), reason };
}

export function applyEffect(effect: Effect, org: OrgState): EffectResult {
  switch (effect.kind) {
    case 'meter':
      return {
        org: withMeterChange(org, effect.meter, effect.delta),
        profitDelta: 0,
        fines: 0,
        entries: [meterChange(effect.meter, effect.delta)],
      };
    case 'profit':
      return {
        org,
        profitDelta: effect.delta,
        fines: 0,
        entries: [info(`Profit ${formatSigned(effect.delta)}M`)],
      };
    case 'fine': {
      const amount = Math.max(0, effect.amount);
      return {
        org,
        profitDelta: 0,
        fines: amount,
        entries: [info(`Fine: $${amount}M (${effect.reason})`)],
      };
    }
  }
}

export function applyEffects(effects: readonly Effect[], org: OrgState): EffectResult {
  let current = org;
  let profitDelta = 0;
  let fines = 0;
  const entries: LogEntry[] = [];
  for (const effect of effects) {
    const result = applyEffect(effect, current);
    current = result.org;
    profitDelta += result.profitDelta;
    fines += result.fines;
    entries.push(...result.entries);
  }
  return { org: current, profitDelta, fines, entries };
}
