import { MAX_CARDS_PER_QUARTER, MAX_HAND_SIZE, SAVE_VERSION } from '../data/gameConfig';
import { getPositionCost } from './cards';
import { getCrisisEvent, getSituation } from './content';
import { createDeck, drawMultiple } from './decks';
import { nextDirective } from './directive';
import { canAfford, createResources } from './economy';
import { createOrg } from './org';
import { createCursor } from './quarter';
import type { Rng } from './rng';
import { toEventCard } from './situations';
import { canRetire, createCeo, isTerminal } from './tenure';
import type { DifficultySettings, EventCard, GameContent, GameState, InputKind } from './types';

/** Fresh game: shuffled decks, a full opening hand, quarter 1 demand phase. */
export function newGame(seed: number, settings: DifficultySettings, content: GameContent, rng: Rng): GameState {
  const cardDeck = createDeck([...content.cards.keys()], rng);
  const crisisDeck = createDeck([...content.crisisEvents.keys()], rng);
  const opening = drawMultiple(cardDeck, MAX_HAND_SIZE, rng);

  return {
    version: SAVE_VERSION,
    seed,
    difficulty: settings.id,
    org: createOrg(),
    quarter: createCursor(1),
    ceo: createCeo(settings),
    resources: createResources(),
    crisisDeck,
    cardDeck: opening.deck,
    hand: opening.items,
    currentCrisis: null,
    currentDirective: nextDirective(),
    cardsPlayedThisQuarter: [],
    pendingSituations: [],
    deferredSituations: [],
    pendingFollowUps: [],
    crises: [],
    history: [],
  };
}

// ── Queries ──

export function isGameOver(state: GameState): boolean {
  return isTerminal(state.ceo);
}

export function canPlayCard(state: GameState): boolean {
  return state.cardsPlayedThisQuarter.length < MAX_CARDS_PER_QUARTER && state.hand.length > 0;
}

export function canAffordNextCard(state: GameState): boolean {
  const position = state.cardsPlayedThisQuarter.length;
  if (position >= MAX_CARDS_PER_QUARTER) return false;
  return canAfford(state.resources, getPositionCost(position));
}

/** The crisis awaiting a response, as the player sees it. */
export function getCurrentEvent(state: GameState, content: GameContent): EventCard | null {
  const crisis = state.currentCrisis;
  if (crisis === null) return null;
  if (crisis.source === 'event') return getCrisisEvent(content, crisis.eventId);
  return toEventCard(getSituation(content, crisis.situation.situationId), crisis.situation.deferCount);
}

/** Input kinds `advance` accepts in the state's current phase. */
export function getAvailableInputs(state: GameState, settings: DifficultySettings): InputKind[] {
  if (isGameOver(state)) return [];
  switch (state.quarter.phase) {
    case 'demand':
      return ['continue'];
    case 'playCards':
      return ['playCard', 'endPlayPhase', 'exchangeMeter', 'boostMeter', 'schmoozeBoard', 'reorgHand', 'redeemEvil'];
    case 'crisis':
      return state.currentCrisis === null ? ['continue'] : ['continue', 'chooseResponse'];
    case 'resolution':
      return canRetire(state.ceo, settings) ? ['continue', 'retire'] : ['continue'];
  }
}
