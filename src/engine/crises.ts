/**
 * Lingering crises: a deferred situation that fades without being handled
 * keeps costing the organization until its deadline, then lands its base
 * impact once and closes.
 */
import { event, meterChange } from './log';
import { withMeterChange } from './org';
import type { CrisisInstance, LogEntry, MeterImpact, OrgState, PendingSituation, SituationDefinition } from './types';

export function openCrisis(
  definition: SituationDefinition,
  situation: PendingSituation,
  currentQuarter: number,
): CrisisInstance {
  return {
    instanceId: `${definition.situationId}@${situation.queuedAtQuarter}-${currentQuarter}`,
    situationId: definition.situationId,
    title: definition.title,
    createdQuarter: currentQuarter,
    deadlineQuarter: currentQuarter + definition.lingerQuarters,
    ongoingImpact: definition.ongoingImpact,
    baseImpact: definition.baseImpact,
  };
}

export function isExpired(crisis: CrisisInstance, currentQuarter: number): boolean {
  return currentQuarter > crisis.deadlineQuarter;
}

function applyImpacts(org: OrgState, impacts: readonly MeterImpact[], entries: LogEntry[]): OrgState {
  let current = org;
  for (const impact of impacts) {
    current = withMeterChange(current, impact.meter, impact.delta);
    entries.push(meterChange(impact.meter, impact.delta));
  }
  return current;
}

export interface CrisisUpdate {
  readonly org: OrgState;
  readonly crises: CrisisInstance[];
  readonly entries: LogEntry[];
}

/** Ongoing impact for every active crisis, then expiry with base impact. */
export function updateCrises(
  crises: readonly CrisisInstance[],
  org: OrgState,
  currentQuarter: number,
): CrisisUpdate {
  const entries: LogEntry[] = [];
  let current = org;
  const active: CrisisInstance[] = [];

  for (const crisis of crises) {
    if (!isExpired(crisis, currentQuarter)) current = applyImpacts(current, crisis.ongoingImpact, entries);
  }
  for (const crisis of crises) {
    if (isExpired(crisis, currentQuarter)) {
      entries.push(event(`Crisis expired: ${crisis.title}`));
      current = applyImpacts(current, crisis.baseImpact, entries);
    } else {
      active.push(crisis);
    }
  }

  return { org: current, crises: active, entries };
}
