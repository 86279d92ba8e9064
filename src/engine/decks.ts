/**
 * Immutable draw/discard deck. Every operation returns a new deck; the only
 * randomness is the shuffle when an empty draw pile takes the discards back.
 */
import type { Rng } from './rng';
import type { Deck } from './types';

export function createDeck<T>(items: readonly T[], rng: Rng): Deck<T> {
  return { drawPile: rng.shuffle([...items]), discardPile: [] };
}

export function deckSize<T>(deck: Deck<T>): number {
  return deck.drawPile.length + deck.discardPile.length;
}

export function reshuffle<T>(deck: Deck<T>, rng: Rng): Deck<T> {
  return { drawPile: rng.shuffle([...deck.drawPile, ...deck.discardPile]), discardPile: [] };
}

export function draw<T>(deck: Deck<T>, rng: Rng): { deck: Deck<T>; item: T } {
  if (deckSize(deck) === 0) throw new Error('No cards to draw');
  const source = deck.drawPile.length === 0 ? reshuffle(deck, rng) : deck;
  const [item, ...rest] = source.drawPile;
  return { deck: { drawPile: rest, discardPile: source.discardPile }, item };
}

/** Draws up to `count`, stopping early when the deck runs dry. */
export function drawMultiple<T>(deck: Deck<T>, count: number, rng: Rng): { deck: Deck<T>; items: T[] } {
  const items: T[] = [];
  let current = deck;
  for (let i = 0; i < count && deckSize(current) > 0; i++) {
    const result = draw(current, rng);
    items.push(result.item);
    current = result.deck;
  }
  return { deck: current, items };
}

export function discard<T>(deck: Deck<T>, ...items: T[]): Deck<T> {
  return { drawPile: deck.drawPile, discardPile: [...deck.discardPile, ...items] };
}
