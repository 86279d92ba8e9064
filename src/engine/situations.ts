/**
 * Situations: consequences of card plays that surface as crises later.
 *
 * Lifecycle of one entry:
 *   queued (pending) → due → erupts as the quarter's crisis
 *   erupts → deferred by the player → deferred queue, due again next quarter
 *   deferred & due → 30% chance per quarter to resurface into pending
 *   deferred for 4+ quarters → fades into a lingering crisis
 *
 * The deferred queue holds at most five entries. Deferring a sixth evicts the
 * oldest (by queued-at quarter) back into pending, due next quarter.
 */
import {
  DEFAULT_SITUATION_EVIL_DELTA,
  DEFAULT_SITUATION_PC_COST,
  GENERIC_SITUATION_MAX_CHANCE,
  MAX_DEFERRED_SITUATIONS,
  SITUATION_FADE_QUARTERS,
  SITUATION_NO_TRIGGER_ROLL,
  SITUATION_RESURFACE_CHANCE,
  SITUATION_SURVIVAL_BY_WAIT,
} from '../data/gameConfig';
import { pickOne, type Rng } from './rng';
import type {
  Choice,
  EventCard,
  OutcomeTier,
  PendingSituation,
  SituationDefinition,
  SituationPools,
  SituationResponse,
  SituationSeverity,
  SituationTrigger,
} from './types';

// ── Pending Entries ──────────────────────────────────────────────

export function createPendingSituation(
  situationId: string,
  originCardId: string,
  currentQuarter: number,
  delayQuarters: number,
): PendingSituation {
  return {
    situationId,
    originCardId,
    scheduledQuarter: currentQuarter + delayQuarters,
    queuedAtQuarter: currentQuarter,
    deferCount: 0,
  };
}

export function quartersWaiting(situation: PendingSituation, currentQuarter: number): number {
  return currentQuarter - situation.queuedAtQuarter;
}

export function isDueAt(situation: PendingSituation, quarter: number): boolean {
  return situation.scheduledQuarter <= quarter;
}

export function withDeferred(situation: PendingSituation, currentQuarter: number): PendingSituation {
  return { ...situation, scheduledQuarter: currentQuarter + 1, deferCount: situation.deferCount + 1 };
}

// ── Queue Operations ─────────────────────────────────────────────

export interface SituationQueues {
  readonly pending: readonly PendingSituation[];
  readonly deferred: readonly PendingSituation[];
}

export function queueSituation(pending: readonly PendingSituation[], situation: PendingSituation): PendingSituation[] {
  return [...pending, situation];
}

/** Removes every pending entry for this situation id. */
export function resolveSituation(pending: readonly PendingSituation[], situationId: string): PendingSituation[] {
  return pending.filter((s) => s.situationId !== situationId);
}

export function deferSituation(
  queues: SituationQueues,
  situation: PendingSituation,
  currentQuarter: number,
): SituationQueues & { readonly evicted: PendingSituation | null } {
  let pending = resolveSituation(queues.pending, situation.situationId);
  let deferred = [...queues.deferred, withDeferred(situation, currentQuarter)];
  let evicted: PendingSituation | null = null;

  if (deferred.length > MAX_DEFERRED_SITUATIONS) {
    let oldestIndex = 0;
    deferred.forEach((s, i) => {
      if (s.queuedAtQuarter < deferred[oldestIndex].queuedAtQuarter) oldestIndex = i;
    });
    const oldest = deferred[oldestIndex];
    evicted = { ...oldest, scheduledQuarter: currentQuarter + 1 };
    deferred = deferred.filter((_, i) => i !== oldestIndex);
    pending = [...pending, evicted];
  }

  return { pending, deferred, evicted };
}

// ── Triggers ─────────────────────────────────────────────────────

export function selectTrigger(
  triggers: readonly SituationTrigger[],
  outcome: OutcomeTier,
  rng: Rng,
): SituationTrigger | null {
  const matching = triggers.filter((t) => t.onOutcome === null || t.onOutcome === outcome);
  if (matching.length === 0) return null;

  const total = matching.reduce((sum, t) => sum + t.weight, 0);
  const roll = rng.nextInt(1, total + 1);
  let cumulative = 0;
  for (const trigger of matching) {
    cumulative += trigger.weight;
    if (roll <= cumulative) return trigger;
  }
  return matching[matching.length - 1];
}

function cardTriggerDelay(roll: number): number {
  if (roll <= 5) return 0;
  if (roll <= 10) return 1;
  if (roll <= 14) return 2;
  return 3;
}

/** d20: 18+ means nothing happens; the roll also sets the delay. */
export function checkCardTrigger(
  triggers: readonly SituationTrigger[],
  cardId: string,
  outcome: OutcomeTier,
  currentQuarter: number,
  rng: Rng,
): PendingSituation | null {
  const roll = rng.nextInt(1, 21);
  if (roll >= SITUATION_NO_TRIGGER_ROLL) return null;

  const trigger = selectTrigger(triggers, outcome, rng);
  if (trigger === null) return null;

  return createPendingSituation(trigger.situationId, cardId, currentQuarter, cardTriggerDelay(roll));
}

export function getGenericTriggerChance(currentQuarter: number): number {
  return Math.min(GENERIC_SITUATION_MAX_CHANCE, 5 + currentQuarter * 2);
}

function genericTriggerDelay(roll: number): number {
  if (roll <= 4) return 0;
  if (roll <= 7) return 1;
  if (roll <= 9) return 2;
  return 3;
}

export function checkGenericTrigger(
  pools: SituationPools,
  cardId: string,
  outcome: OutcomeTier,
  currentQuarter: number,
  rng: Rng,
): PendingSituation | null {
  if (rng.nextInt(1, 101) > getGenericTriggerChance(currentQuarter)) return null;

  const situationId = pickOne(rng, pools[outcome]);
  if (situationId === undefined) return null;

  const delay = genericTriggerDelay(rng.nextInt(1, 11));
  return createPendingSituation(situationId, cardId, currentQuarter, delay);
}

// ── Decay / Resurface / Fade ─────────────────────────────────────

/** Whether a due situation still erupts. Fresh ones always do; stale ones may fizzle. */
export function checkDecay(situation: PendingSituation, currentQuarter: number, rng: Rng): boolean {
  const waiting = quartersWaiting(situation, currentQuarter);
  if (waiting <= 0) return true;
  const index = Math.min(waiting, SITUATION_SURVIVAL_BY_WAIT.length - 1);
  return rng.nextInt(1, 101) <= SITUATION_SURVIVAL_BY_WAIT[index];
}

export function checkResurface(rng: Rng): boolean {
  return rng.nextInt(1, 101) <= SITUATION_RESURFACE_CHANCE;
}

export function shouldFade(situation: PendingSituation, currentQuarter: number): boolean {
  return quartersWaiting(situation, currentQuarter) >= SITUATION_FADE_QUARTERS;
}

// ── Definitions → Event Cards ────────────────────────────────────

/** Every deferral escalates severity by one step, up to critical. */
export function getEffectiveSeverity(definition: SituationDefinition, deferCount: number): SituationSeverity {
  const escalated = Math.min(4, definition.severity + deferCount);
  return escalated === 1 || escalated === 2 || escalated === 3 ? escalated : 4;
}

export function canDefer(definition: SituationDefinition, deferCount = 0): boolean {
  return getEffectiveSeverity(definition, deferCount) !== 4;
}

export function situationChoiceId(situationId: string, response: SituationResponse): string {
  return `${situationId}_${response.type}`;
}

function responseToChoice(situationId: string, response: SituationResponse): Choice {
  const base = {
    choiceId: situationChoiceId(situationId, response),
    label: response.label,
    effects: [],
    outcomeProfile: response.outcomes,
    corporateIntensityDelta: 0,
    pcCost: 0,
    isDefer: false,
  };
  switch (response.type) {
    case 'pc':
      return { ...base, pcCost: response.pcCost > 0 ? response.pcCost : DEFAULT_SITUATION_PC_COST };
    case 'evil':
      return {
        ...base,
        corporateIntensityDelta: response.evilDelta > 0 ? response.evilDelta : DEFAULT_SITUATION_EVIL_DELTA,
      };
    case 'risk':
      return base;
    case 'defer':
      return { ...base, outcomeProfile: null, isDefer: true };
  }
}

/** The situation as a crisis card; the defer choice is withheld once it is critical. */
export function toEventCard(definition: SituationDefinition, deferCount = 0): EventCard {
  const deferrable = canDefer(definition, deferCount);
  return {
    eventId: definition.situationId,
    title: definition.title,
    description: definition.description,
    choices: definition.responses
      .filter((r) => r.type !== 'defer' || deferrable)
      .map((r) => responseToChoice(definition.situationId, r)),
  };
}
