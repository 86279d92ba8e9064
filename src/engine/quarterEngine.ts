/**
 * The quarterly state machine.
 *
 * `advance(state, input, rng, env)` is the only entry point. Each call runs
 * one step of the current phase (Demand → PlayCards → Crisis → Resolution)
 * and returns the next state plus a log of what happened. The input state is
 * never mutated; all randomness comes from the `rng` passed in, so the same
 * state, inputs and seed always replay to the same result.
 *
 * Crisis preparation (follow-ups, deferred situations, due eruptions) runs
 * once, at the moment the PlayCards phase ends. The Crisis phase itself only
 * waits for and resolves a response.
 */
import {
  BOOST_AMOUNT,
  BOOST_COST,
  CRISIS_DRAW_CHANCE,
  IDLE_HAND_REPLACE_COUNT,
  INITIATIVE_BONUS,
  MAX_HAND_SIZE,
  PC_MAX,
  REDEEM_COST,
  REORG_COST,
  REVENUE_NEGLECT_FAVORABILITY_PENALTY,
  REVENUE_NEGLECT_METER_PENALTY,
  REVENUE_NEGLECT_THRESHOLD,
  SCHMOOZE_COST,
  SCHMOOZE_FAIL_CHANCE,
} from '../data/gameConfig';
import {
  getAffinityModifier,
  getAffinitySynergyBonus,
  getPositionCost,
  getPositionRisk,
  isCorporate,
  withCardRemoved,
  withCardsAdded,
} from './cards';
import { getCard, getCrisisEvent, getSituation } from './content';
import { openCrisis, updateCrises } from './crises';
import { deckSize, discard, draw, drawMultiple } from './decks';
import { describeDirective, getDirective, getRevenueTarget, nextDirective } from './directive';
import {
  canAfford,
  canExchange,
  earn,
  getEndOfQuarterDelta,
  getExchangeRate,
  restraintBonus,
  spend,
} from './economy';
import { applyEffect, applyEffects } from './effects';
import {
  computeFavorabilityDelta,
  getLowActivityAdjustment,
  getLowMeterAdjustment,
  getTenureDecay,
  type FavorabilityAdjustment,
} from './favorability';
import { createFollowUp, hasExpired, quartersSince, rollFollowUp, withFollowUpRemoved } from './followUps';
import { canAffordNextCard, canPlayCard, getAvailableInputs, getCurrentEvent, isGameOver } from './gameState';
import { formatSigned, LogBuilder, meterChange, meterLabel, outcome } from './log';
import { withMeterChange } from './org';
import { effectsForTier, rollCardOutcome, rollCrisisChoice } from './outcomes';
import { rollForOuster } from './ouster';
import { calculateBaseOperations, formatProfit, formatProfitWithSign, scaleRevenueProfit } from './profit';
import { nextPhase } from './quarter';
import { applyExceptionalRewards, applyPassiveRecovery, applyPerformanceEffects } from './resolution';
import type { Rng } from './rng';
import { calculateFinalScore, calculateQuarterlyBonus } from './scoring';
import {
  checkCardTrigger,
  checkDecay,
  checkGenericTrigger,
  checkResurface,
  deferSituation,
  isDueAt,
  queueSituation,
  resolveSituation,
  shouldFade,
} from './situations';
import {
  canRetire,
  describeParachute,
  getMomentumBonus,
  isProfitImproving,
  withBonusAwarded,
  withCardsPlayedRecorded,
  withEvilScoreChange,
  withEvilSnapshot,
  withFavorabilityChange,
  withOusted,
  withProfitAdded,
  withProfitRecorded,
  withProjectImpact,
  withProjectPerformanceRecorded,
  withQuarterComplete,
  withRetirement,
  withSuccessResult,
} from './tenure';
import type {
  AdvanceResult,
  EngineEnv,
  GameState,
  MeterName,
  OutcomeTier,
  PendingSituation,
  PlayableCard,
  QuarterInput,
  QuarterSnapshot,
} from './types';

type Input<K extends QuarterInput['kind']> = Extract<QuarterInput, { kind: K }>;

export function advance(state: GameState, input: QuarterInput, rng: Rng, env: EngineEnv): AdvanceResult {
  if (isGameOver(state)) throw new Error('Game is over');

  const { phase, quarterNumber } = state.quarter;
  if (!getAvailableInputs(state, env.settings).includes(input.kind)) {
    throw new Error(`Input '${input.kind}' is not valid during ${phase}`);
  }

  const log = new LogBuilder(quarterNumber, phase);
  const next = step(state, input, rng, env, log);
  return { state: next, log: log.build() };
}

function step(state: GameState, input: QuarterInput, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  switch (input.kind) {
    case 'continue':
      return runContinue(state, rng, env, log);
    case 'playCard':
      return playCard(state, input, rng, env, log);
    case 'endPlayPhase':
      return endPlayPhase(state, rng, env, log);
    case 'exchangeMeter':
      return exchangeMeter(state, input, log);
    case 'boostMeter':
      return boostMeter(state, input.meter, log);
    case 'schmoozeBoard':
      return schmoozeBoard(state, rng, log);
    case 'reorgHand':
      return reorgHand(state, rng, log);
    case 'redeemEvil':
      return redeemEvil(state, log);
    case 'chooseResponse':
      return chooseResponse(state, input.choiceId, rng, env, log);
    case 'retire':
      return retire(state, env, log);
  }
}

function runContinue(state: GameState, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  switch (state.quarter.phase) {
    case 'demand':
      return runDemand(state, rng, env, log);
    case 'crisis':
      return continueCrisis(state, env, log);
    case 'resolution':
      return runResolution(state, rng, env, log);
    case 'playCards':
      throw new Error(`Input 'continue' is not valid during playCards`);
  }
}

// ── Demand ───────────────────────────────────────────────────────

function runDemand(state: GameState, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  log.info(`Board Directive: ${describeDirective(state.currentDirective, state.ceo.pressure)}`);

  let crisisDeck = state.crisisDeck;
  let currentCrisis = state.currentCrisis;
  if (rng.nextInt(1, 101) <= CRISIS_DRAW_CHANCE && deckSize(crisisDeck) > 0) {
    const drawn = draw(crisisDeck, rng);
    crisisDeck = drawn.deck;
    currentCrisis = { source: 'event', eventId: getCrisisEvent(env.content, drawn.item).eventId };
    log.event('A situation is brewing...');
  }

  return { ...state, crisisDeck, currentCrisis, quarter: nextPhase(state.quarter) };
}

// ── Play Cards: economy actions ──────────────────────────────────

function exchangeMeter(state: GameState, input: Input<'exchangeMeter'>, log: LogBuilder): GameState {
  const { meter, amount } = input;
  if (!Number.isInteger(amount) || amount < 1) throw new Error(`Invalid exchange amount: ${amount}`);

  if (state.resources.politicalCapital + amount > PC_MAX) {
    throw new Error(`Exchange would exceed the PC cap: have ${state.resources.politicalCapital}, max ${PC_MAX}`);
  }

  const rate = getExchangeRate(meter);
  const cost = rate * amount;
  if (!canExchange(state.org, meter) || state.org[meter] < cost) {
    throw new Error(`Not enough ${meterLabel(meter)} to exchange: have ${state.org[meter]}, need ${cost}`);
  }

  log.info(`Exchanged ${cost} ${meterLabel(meter)} for ${amount} PC`);
  log.add([meterChange(meter, -cost)]);
  return {
    ...state,
    org: withMeterChange(state.org, meter, -cost),
    resources: earn(state.resources, amount),
  };
}

function boostMeter(state: GameState, meter: MeterName, log: LogBuilder): GameState {
  const resources = spend(state.resources, BOOST_COST);
  const org = withMeterChange(state.org, meter, BOOST_AMOUNT);
  log.info(`Spent ${BOOST_COST} PC to boost ${meterLabel(meter)}: ${state.org[meter]} → ${org[meter]}`);
  return { ...state, org, resources };
}

function schmoozeBoard(state: GameState, rng: Rng, log: LogBuilder): GameState {
  const resources = spend(state.resources, SCHMOOZE_COST);
  const delta = rng.nextInt(0, 100) >= SCHMOOZE_FAIL_CHANCE ? rng.nextInt(1, 6) : -rng.nextInt(1, 4);
  log.info(delta > 0
    ? `Schmoozed the board: Favorability ${formatSigned(delta)}`
    : `Schmoozing backfired: Favorability ${formatSigned(delta)}`);
  return { ...state, resources, ceo: withFavorabilityChange(state.ceo, delta) };
}

function reorgHand(state: GameState, rng: Rng, log: LogBuilder): GameState {
  const resources = spend(state.resources, REORG_COST);
  const discarded = discard(state.cardDeck, ...state.hand);
  const drawn = drawMultiple(discarded, MAX_HAND_SIZE, rng);
  log.info(`Reorganized: discarded ${state.hand.length} card(s), drew ${drawn.items.length}`);
  return { ...state, resources, cardDeck: drawn.deck, hand: drawn.items };
}

function redeemEvil(state: GameState, log: LogBuilder): GameState {
  if (state.ceo.evilScore <= 0) throw new Error('No EvilScore to redeem');
  const resources = spend(state.resources, REDEEM_COST);
  log.info(`Spent ${REDEEM_COST} PC on redemption: EvilScore -1`);
  return { ...state, resources, ceo: withEvilScoreChange(state.ceo, -1) };
}

// ── Play Cards: card play ────────────────────────────────────────

function playCard(
  state: GameState,
  input: Input<'playCard'>,
  rng: Rng,
  env: EngineEnv,
  log: LogBuilder,
): GameState {
  const card = getCard(env.content, input.cardId);
  const hand = withCardRemoved(state.hand, card.cardId);
  if (!canPlayCard(state)) throw new Error('Cannot play more cards this quarter');

  const quarterNumber = state.quarter.quarterNumber;
  const position = state.cardsPlayedThisQuarter.length;
  let resources = spend(state.resources, getPositionCost(position));
  let org = state.org;
  let ceo = state.ceo;

  log.info(`Played: ${card.title}`);

  const playedCards = state.cardsPlayedThisQuarter.map((id) => getCard(env.content, id));
  const totalRisk = getPositionRisk(position) - getAffinityModifier(card, org);

  let tier: OutcomeTier = 'expected';
  if (card.outcomes.expected.length > 0) {
    tier = rollCardOutcome({
      alignment: org.alignment,
      pressure: ceo.pressure,
      evilScore: ceo.evilScore,
      riskModifier: totalRisk,
      quarterNumber,
      momentumBonus: getMomentumBonus(ceo),
      synergyBonus: getAffinitySynergyBonus(card, playedCards),
      isCorporate: isCorporate(card),
    }, rng);
    log.add([outcome(tier, card.title, 'played')]);

    const revenueBefore = playedCards.filter((c) => c.category === 'revenue').length;
    const target = getRevenueTarget(ceo.pressure);
    let projectImpact = 0;
    for (const effect of effectsForTier(card.outcomes, tier)) {
      if (effect.kind === 'profit') {
        if (card.category === 'revenue') {
          projectImpact += scaleRevenueProfit(effect.delta, target, org.delivery, revenueBefore);
        }
        continue;
      }
      const result = applyEffect(effect, org);
      org = result.org;
      projectImpact -= result.fines;
      log.add(result.entries);
    }
    if (projectImpact !== 0) {
      log.info(`Profit impact: ${formatProfitWithSign(projectImpact)}`);
      ceo = withProjectImpact(ceo, projectImpact);
    }

    if (tier !== 'expected') ceo = withSuccessResult(ceo, tier === 'good');
  }

  if (isCorporate(card)) {
    ceo = withFavorabilityChange(withEvilScoreChange(ceo, card.corporateIntensity), card.corporateIntensity);
    log.info(`Corporate card: EvilScore +${card.corporateIntensity}`);
  }

  let pendingSituations = state.pendingSituations;
  const triggered = triggerSituation(card, tier, quarterNumber, rng, env);
  if (triggered !== null) {
    pendingSituations = queueSituation(pendingSituations, triggered);
    const title = getSituation(env.content, triggered.situationId).title;
    log.event(triggered.scheduledQuarter === quarterNumber
      ? `Situation triggered: ${title} (immediate)`
      : `Situation brewing: ${title} (Q${triggered.scheduledQuarter})`);
  }

  const next: GameState = {
    ...state,
    org,
    ceo,
    resources,
    hand,
    cardDeck: discard(state.cardDeck, card.cardId),
    cardsPlayedThisQuarter: [...state.cardsPlayedThisQuarter, card.cardId],
    pendingSituations,
    pendingFollowUps: [...state.pendingFollowUps, createFollowUp(card, quarterNumber, tier)],
  };

  const staying = canPlayCard(next) && canAffordNextCard(next) && input.endPlayPhase !== true;
  return staying ? next : endPlayPhase(next, rng, env, log);
}

function triggerSituation(
  card: PlayableCard,
  tier: OutcomeTier,
  quarterNumber: number,
  rng: Rng,
  env: EngineEnv,
): PendingSituation | null {
  const triggers = env.content.cardSituations.get(card.cardId) ?? [];
  const specific = triggers.length > 0
    ? checkCardTrigger(triggers, card.cardId, tier, quarterNumber, rng)
    : null;
  return specific ?? checkGenericTrigger(env.content.situationPools, card.cardId, tier, quarterNumber, rng);
}

function endPlayPhase(state: GameState, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  const played = state.cardsPlayedThisQuarter.length;
  let { org, ceo, resources, hand, cardDeck } = state;

  const bonus = restraintBonus(played);
  if (bonus > 0) {
    resources = earn(resources, bonus);
    log.info(`Restraint bonus: +${bonus} PC (played ${played} card(s))`);
  }

  const revenuePlayed = state.cardsPlayedThisQuarter
    .filter((id) => getCard(env.content, id).category === 'revenue').length;
  if (revenuePlayed >= REVENUE_NEGLECT_THRESHOLD) {
    for (const meter of ['morale', 'governance', 'alignment'] as const) {
      org = withMeterChange(org, meter, REVENUE_NEGLECT_METER_PENALTY);
    }
    ceo = withFavorabilityChange(ceo, REVENUE_NEGLECT_FAVORABILITY_PENALTY);
    log.event(
      `Organizational neglect: Revenue-only focus hurts meters (${REVENUE_NEGLECT_METER_PENALTY}) `
      + `and board favor (${REVENUE_NEGLECT_FAVORABILITY_PENALTY})`,
    );
  }

  if (played === 0 && hand.length >= IDLE_HAND_REPLACE_COUNT) {
    const replaced = rng.shuffle([...hand]).slice(0, IDLE_HAND_REPLACE_COUNT);
    hand = hand.filter((id) => !replaced.includes(id));
    const drawn = drawMultiple(discard(cardDeck, ...replaced), IDLE_HAND_REPLACE_COUNT, rng);
    cardDeck = drawn.deck;
    hand = withCardsAdded(hand, drawn.items);
    log.info(`No projects executed - refreshed ${IDLE_HAND_REPLACE_COUNT} cards from hand`);
  }

  log.info('Ending card play phase');
  return prepareCrisis({ ...state, org, ceo, resources, hand, cardDeck, quarter: nextPhase(state.quarter) }, rng, env, log);
}

// ── Crisis ───────────────────────────────────────────────────────

function prepareCrisis(state: GameState, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  const q = state.quarter.quarterNumber;
  let org = state.org;
  let pendingSituations = [...state.pendingSituations];

  // Follow-ups from earlier quarters
  let pendingFollowUps = state.pendingFollowUps.filter((f) => !hasExpired(f, q));
  for (const followUp of pendingFollowUps) {
    if (quartersSince(followUp, q) < 1) continue;
    const result = rollFollowUp(followUp, q, env.content.followUpPools, rng);
    if (result === null) continue;

    pendingFollowUps = withFollowUpRemoved(pendingFollowUps, followUp.cardId);
    switch (result.kind) {
      case 'good':
      case 'meh':
        org = withMeterChange(org, result.meter, result.delta);
        log.event(result.kind === 'good' ? `Good news on ${followUp.cardTitle}` : `Update on ${followUp.cardTitle}`);
        log.add([meterChange(result.meter, result.delta)]);
        break;
      case 'crisis':
        log.event(`Crisis brewing from ${followUp.cardTitle}`);
        if (result.situation !== null) pendingSituations.push(result.situation);
        break;
    }
  }

  // Deferred situations fade or resurface
  const deferredSituations: PendingSituation[] = [];
  let crises = state.crises;
  for (const deferred of state.deferredSituations) {
    const definition = getSituation(env.content, deferred.situationId);
    if (shouldFade(deferred, q)) {
      crises = [...crises, openCrisis(definition, deferred, q)];
      log.event(`${definition.title} faded, but the damage lingers`);
    } else if (isDueAt(deferred, q) && checkResurface(rng)) {
      pendingSituations.push(deferred);
      log.event(`Situation resurfaced: ${definition.title}`);
    } else {
      deferredSituations.push(deferred);
    }
  }

  // A due situation erupts unless a crisis event is already waiting
  let currentCrisis = state.currentCrisis;
  if (currentCrisis === null) {
    for (const situation of pendingSituations.filter((s) => isDueAt(s, q))) {
      const title = getSituation(env.content, situation.situationId).title;
      if (checkDecay(situation, q, rng)) {
        currentCrisis = { source: 'situation', situation };
        log.event(`Situation erupted: ${title}`);
        break;
      }
      pendingSituations = pendingSituations.filter((s) => s !== situation);
      log.info(`Situation fizzled out: ${title}`);
    }
  }

  return { ...state, org, pendingSituations, deferredSituations, pendingFollowUps, crises, currentCrisis };
}

function continueCrisis(state: GameState, env: EngineEnv, log: LogBuilder): GameState {
  const crisisEvent = getCurrentEvent(state, env.content);
  if (crisisEvent !== null) {
    log.info(`Awaiting response: ${crisisEvent.title}`);
    return state;
  }
  log.info('No situations requiring attention this quarter.');
  return { ...state, quarter: nextPhase(state.quarter) };
}

function chooseResponse(state: GameState, choiceId: string, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  const crisis = state.currentCrisis;
  const crisisEvent = getCurrentEvent(state, env.content);
  if (crisis === null || crisisEvent === null) throw new Error('No crisis awaiting a response');

  const choice = crisisEvent.choices.find((c) => c.choiceId === choiceId);
  if (choice === undefined) throw new Error(`Choice ${choiceId} is not available for ${crisisEvent.title}`);

  const q = state.quarter.quarterNumber;
  let { org, ceo, resources, pendingSituations, deferredSituations, crisisDeck } = state;

  log.info(`[${crisisEvent.title}] Response: ${choice.label}`);

  if (choice.pcCost > 0) {
    if (!canAfford(resources, choice.pcCost)) {
      throw new Error(
        `Insufficient PC to select this choice (need ${choice.pcCost} PC, have ${resources.politicalCapital})`,
      );
    }
    resources = spend(resources, choice.pcCost);
    log.info(`Spent ${choice.pcCost} PC to handle the situation`);
  }

  if (choice.isDefer && crisis.source === 'situation') {
    const queues = deferSituation({ pending: pendingSituations, deferred: deferredSituations }, crisis.situation, q);
    pendingSituations = queues.pending;
    deferredSituations = queues.deferred;
    log.info(`Deferred: ${crisisEvent.title} (returns Q${q + 1})`);
    if (queues.evicted !== null) {
      log.event(`Too many deferred issues: ${getSituation(env.content, queues.evicted.situationId).title} is back on the agenda`);
    }
  } else {
    let effects = choice.effects;
    if (choice.outcomeProfile !== null) {
      const tier = rollCrisisChoice(choice, rng);
      log.add([outcome(tier, crisisEvent.title, choice.label)]);
      effects = effectsForTier(choice.outcomeProfile, tier);
    }
    const result = applyEffects(effects, org);
    org = result.org;
    log.add(result.entries);
    const impact = result.profitDelta - result.fines;
    if (impact !== 0) ceo = withProjectImpact(ceo, impact);

    if (choice.corporateIntensityDelta > 0) {
      const d = choice.corporateIntensityDelta;
      ceo = withFavorabilityChange(withEvilScoreChange(ceo, d), d);
      log.info(`Corporate choice: EvilScore +${d}, Favorability +${d}`);
    }

    if (crisis.source === 'situation') {
      pendingSituations = resolveSituation(pendingSituations, crisis.situation.situationId);
    }
  }

  if (crisis.source === 'event') crisisDeck = discard(crisisDeck, crisis.eventId);

  return {
    ...state,
    org,
    ceo,
    resources,
    crisisDeck,
    pendingSituations,
    deferredSituations,
    currentCrisis: null,
    quarter: nextPhase(state.quarter),
  };
}

// ── Resolution ───────────────────────────────────────────────────

function retire(state: GameState, env: EngineEnv, log: LogBuilder): GameState {
  if (!canRetire(state.ceo, env.settings)) throw new Error('Retirement is not available yet');
  const ceo = withRetirement(state.ceo);
  log.event('CEO RETIRES IN GLORY!');
  log.info(`Final Score: ${calculateFinalScore(ceo, state.resources)}`);
  return { ...state, ceo, currentCrisis: null };
}

function applyAdjustment(change: number, adjustment: FavorabilityAdjustment, log: LogBuilder): number {
  if (adjustment.reason === null) return change;
  log.info(adjustment.reason);
  return Math.min(change + adjustment.penalty, adjustment.maxGain);
}

function runResolution(state: GameState, rng: Rng, env: EngineEnv, log: LogBuilder): GameState {
  const { settings, content } = env;
  const q = state.quarter.quarterNumber;
  const played = state.cardsPlayedThisQuarter.length;
  let { org, ceo, resources } = state;

  log.info(`Quarter ${q} Resolution`);

  const crisisUpdate = updateCrises(state.crises, org, q);
  org = crisisUpdate.org;
  log.add(crisisUpdate.entries);

  const recovery = applyPassiveRecovery(org);
  org = recovery.org;
  log.add(recovery.entries);

  // ── Financials ──
  const baseOps = calculateBaseOperations(org, rng, ceo.quartersSurvived);
  const projectImpact = ceo.currentQuarterProfit;
  const profit = baseOps + projectImpact;

  if (played > 0) {
    log.info(`Projects Completed: ${played}`);
    for (const id of state.cardsPlayedThisQuarter) log.info(`  • ${getCard(content, id).title}`);
  } else {
    log.info('Projects Completed: 0 (no strategic initiatives)');
  }
  log.info(`Base Operations: ${formatProfitWithSign(baseOps)}`);
  if (projectImpact !== 0) log.info(`Project Impact: ${formatProfitWithSign(projectImpact)}`);
  log.info(`Total Quarterly Profit: ${formatProfit(profit)}`);

  const profitDelta = profit - ceo.lastQuarterProfit;
  const performance = applyPerformanceEffects(org, profitDelta, profit, played, rng);
  org = performance.org;
  log.add(performance.entries);

  // ── Directive ──
  const directive = getDirective(state.currentDirective);
  let directiveMet = directive.isMet(ceo.lastQuarterProfit, profit, ceo.pressure);
  if (directiveMet && (played === 0 || projectImpact <= 0) && ceo.consecutiveWeakProjectQuarters >= 1) {
    directiveMet = false;
    log.event('Board Override: Sustained lack of strategic initiative');
  }
  log.info(`Directive ${directiveMet ? 'Met' : 'Failed'}: ${describeDirective(directive.id, ceo.pressure)}`);

  // ── Favorability ──
  let favChange = computeFavorabilityDelta({
    lastProfit: ceo.lastQuarterProfit,
    currentProfit: profit,
    directiveMet,
    pressure: ceo.pressure,
    evilScore: ceo.evilScore,
    weakProjectStreak: ceo.consecutiveWeakProjectQuarters,
    quartersSurvived: ceo.quartersSurvived,
  }, settings) + getTenureDecay(ceo.quartersSurvived, settings);

  if (played === 0 && favChange > 0) {
    favChange = 0;
    log.info('Board unimpressed: No strategic initiatives executed');
  }
  log.info(`Board Favorability: ${formatSigned(favChange)}`);
  if (played > 0) {
    favChange += INITIATIVE_BONUS;
    log.info(`Initiative Bonus: +${INITIATIVE_BONUS} Favor (active leadership)`);
  }
  favChange = applyAdjustment(favChange, getLowMeterAdjustment(org), log);
  favChange = applyAdjustment(favChange, getLowActivityAdjustment(played, ceo.quartersSurvived), log);

  // ── Bonus ──
  let bonus = 0;
  if (played === 0) {
    log.info('No Bonus: No strategic initiatives executed this quarter');
  } else {
    const quarterly = calculateQuarterlyBonus(ceo, org, directiveMet, profitDelta);
    bonus = quarterly.bonus;
    log.info(`Quarterly Bonus: $${bonus}M`);
    for (const reason of quarterly.reasons) log.info(`  ${reason}`);
  }

  ceo = withProfitAdded(ceo, profit);
  ceo = withProfitRecorded(ceo, profit);
  ceo = withProjectPerformanceRecorded(ceo, projectImpact);
  ceo = withCardsPlayedRecorded(ceo, played);
  ceo = withFavorabilityChange(ceo, favChange);
  ceo = withQuarterComplete(ceo);
  ceo = withBonusAwarded(ceo, bonus);
  ceo = withEvilSnapshot(ceo);
  ceo = { ...ceo, lastQuarterProfit: profit, currentQuarterProfit: 0 };

  const rewards = applyExceptionalRewards(org, bonus, directiveMet, profitDelta, rng);
  org = rewards.org;
  log.add(rewards.entries);

  const snapshot = (pc: number): QuarterSnapshot => ({
    quarter: q,
    profit,
    totalProfit: ceo.totalProfit,
    favorability: ceo.favorability,
    evilScore: ceo.evilScore,
    bonus,
    directiveMet,
    cardsPlayed: played,
    politicalCapital: pc,
    org,
  });

  // ── Board vote ──
  const ousted = rollForOuster({
    favorability: ceo.favorability,
    pressure: ceo.pressure,
    quartersSurvived: ceo.quartersSurvived,
    evilScore: ceo.evilScore,
    directiveMet,
    profitPositive: profit >= 0,
    profitImproving: isProfitImproving(ceo),
    consecutiveNegativeQuarters: ceo.consecutiveNegativeQuarters,
    consecutiveWeakProjectQuarters: ceo.consecutiveWeakProjectQuarters,
    cardsPlayedThisQuarter: played,
  }, rng);

  if (ousted) {
    ceo = withOusted(ceo);
    log.event(`CEO OUSTED! Golden Parachute: ${describeParachute(ceo)}`);
    return {
      ...state,
      org,
      ceo,
      crises: crisisUpdate.crises,
      currentCrisis: null,
      history: [...state.history, snapshot(resources.politicalCapital)],
    };
  }

  log.info(`Survived Quarter ${q}. Favorability: ${ceo.favorability}, Pressure: ${ceo.pressure}`);
  if (canRetire(ceo, settings)) {
    log.event(`RETIREMENT AVAILABLE! Accumulated Bonus: $${ceo.accumulatedBonus}M`);
  } else {
    log.info(`Accumulated Bonus: $${ceo.accumulatedBonus}M ($${settings.retirementThreshold}M to retire)`);
  }

  const pcDelta = getEndOfQuarterDelta(resources, org);
  resources = earn(resources, pcDelta);
  if (pcDelta !== 0) log.info(`Political Capital: ${formatSigned(pcDelta)} (now ${resources.politicalCapital})`);

  const refill = drawMultiple(state.cardDeck, MAX_HAND_SIZE - state.hand.length, rng);

  return {
    ...state,
    org,
    ceo,
    resources,
    quarter: nextPhase(state.quarter),
    currentDirective: nextDirective(),
    cardDeck: refill.deck,
    hand: withCardsAdded(state.hand, refill.items),
    cardsPlayedThisQuarter: [],
    crises: crisisUpdate.crises,
    history: [...state.history, snapshot(resources.politicalCapital)],
  };
}
