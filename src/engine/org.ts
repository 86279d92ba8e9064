import { METER_DEFAULT, METER_MAX, METER_MIN, METER_ORDER } from '../data/gameConfig';
import type { MeterName, OrgState } from './types';

export function clampMeter(value: number): number {
  return Math.max(METER_MIN, Math.min(METER_MAX, value));
}

export function createOrg(overrides: Partial<Record<MeterName, number>> = {}): OrgState {
  return {
    delivery: clampMeter(overrides.delivery ?? METER_DEFAULT),
    morale: clampMeter(overrides.morale ?? METER_DEFAULT),
    governance: clampMeter(overrides.governance ?? METER_DEFAULT),
    alignment: clampMeter(overrides.alignment ?? METER_DEFAULT),
    runway: clampMeter(overrides.runway ?? METER_DEFAULT),
  };
}

export function getMeter(org: OrgState, meter: MeterName): number {
  return org[meter];
}

export function withMeterChange(org: OrgState, meter: MeterName, delta: number): OrgState {
  return { ...org, [meter]: clampMeter(org[meter] + delta) };
}

/** Meters sorted ascending by value; ties keep the canonical meter order. */
export function metersByValue(org: OrgState): MeterName[] {
  return [...METER_ORDER].sort((a, b) => org[a] - org[b]);
}

export function allMetersAtLeast(org: OrgState, threshold: number): boolean {
  return METER_ORDER.every((m) => org[m] >= threshold);
}
