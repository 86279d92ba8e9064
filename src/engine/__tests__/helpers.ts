/**
 * Shared test helpers and mock factories for engine tests
 */
import { getDifficultySettings } from '../difficulty';
import { createCeo } from '../tenure';
import type { Rng } from '../rng';
import type {
  CeoState,
  DifficultySettings,
  EngineEnv,
  EventCard,
  GameContent,
  GameState,
  OrgState,
  OutcomeProfile,
  PendingSituation,
  PlayableCard,
  SituationDefinition,
  SituationResponse,
  SituationTrigger,
} from '../types';

/**
 * Rng that replays a fixed script of nextInt results. Each scripted value
 * must fall inside the requested range; running out throws so a test fails
 * loudly when the engine draws more than expected. shuffle is the identity.
 */
export class ScriptedRng implements Rng {
  private readonly ints: number[];
  readonly calls: [number, number][] = [];

  constructor(ints: number[] = []) {
    this.ints = [...ints];
  }

  nextInt(minInclusive: number, maxExclusive: number): number {
    this.calls.push([minInclusive, maxExclusive]);
    const value = this.ints.shift();
    if (value === undefined) throw new Error(`Script exhausted at nextInt(${minInclusive}, ${maxExclusive})`);
    if (value < minInclusive || value >= maxExclusive) {
      throw new Error(`Scripted ${value} outside [${minInclusive}, ${maxExclusive})`);
    }
    return value;
  }

  nextDouble(): number {
    return 0;
  }

  shuffle<T>(list: T[]): T[] {
    return list;
  }

  get remaining(): number {
    return this.ints.length;
  }
}

export function createMockSettings(overrides: Partial<DifficultySettings> = {}): DifficultySettings {
  return { ...getDifficultySettings('nadella'), ...overrides };
}

export function createMockOrg(overrides: Partial<OrgState> = {}): OrgState {
  return {
    delivery: 60,
    morale: 60,
    governance: 60,
    alignment: 60,
    runway: 60,
    ...overrides,
  };
}

export function createMockCeo(overrides: Partial<CeoState> = {}): CeoState {
  return { ...createCeo(createMockSettings()), ...overrides };
}

export function createMockCard(overrides: Partial<PlayableCard> = {}): PlayableCard {
  return {
    cardId: 'test_card',
    title: 'Test Card',
    description: '',
    outcomes: {
      good: [{ kind: 'meter', meter: 'morale', delta: 6 }],
      expected: [{ kind: 'meter', meter: 'morale', delta: 3 }],
      bad: [{ kind: 'meter', meter: 'morale', delta: -4 }],
    },
    corporateIntensity: 0,
    category: 'action',
    meterAffinity: null,
    riskLevel: 1,
    ...overrides,
  };
}

export function createMockResponses(): SituationResponse[] {
  const profile: OutcomeProfile = {
    good: [{ kind: 'meter', meter: 'governance', delta: 4 }],
    expected: [{ kind: 'meter', meter: 'governance', delta: -2 }],
    bad: [{ kind: 'meter', meter: 'governance', delta: -6 }],
  };
  return [
    { type: 'pc', label: 'Spend capital', outcomes: profile, pcCost: 2, evilDelta: 0 },
    { type: 'risk', label: 'Take the risk', outcomes: profile, pcCost: 0, evilDelta: 0 },
    { type: 'evil', label: 'Cut corners', outcomes: profile, pcCost: 0, evilDelta: 3 },
    { type: 'defer', label: 'Deal with it later', outcomes: null, pcCost: 0, evilDelta: 0 },
  ];
}

export function createMockSituation(overrides: Partial<SituationDefinition> = {}): SituationDefinition {
  return {
    situationId: 'test_situation',
    title: 'Test Situation',
    description: '',
    severity: 2,
    responses: createMockResponses(),
    baseImpact: [{ meter: 'governance', delta: -6 }],
    ongoingImpact: [{ meter: 'governance', delta: -2 }],
    lingerQuarters: 2,
    ...overrides,
  };
}

export function createMockPending(overrides: Partial<PendingSituation> = {}): PendingSituation {
  return {
    situationId: 'test_situation',
    originCardId: 'test_card',
    scheduledQuarter: 1,
    queuedAtQuarter: 1,
    deferCount: 0,
    ...overrides,
  };
}

export function createMockEvent(overrides: Partial<EventCard> = {}): EventCard {
  return {
    eventId: 'test_event',
    title: 'Test Event',
    description: '',
    choices: [
      {
        choiceId: 'test_event_pay',
        label: 'Pay up',
        effects: [],
        outcomeProfile: {
          good: [{ kind: 'meter', meter: 'delivery', delta: 3 }],
          expected: [],
          bad: [{ kind: 'meter', meter: 'delivery', delta: -3 }],
        },
        corporateIntensityDelta: 0,
        pcCost: 2,
        isDefer: false,
      },
      {
        choiceId: 'test_event_absorb',
        label: 'Absorb it',
        effects: [{ kind: 'meter', meter: 'delivery', delta: -5 }, { kind: 'profit', delta: -4 }],
        outcomeProfile: null,
        corporateIntensityDelta: 0,
        pcCost: 0,
        isDefer: false,
      },
    ],
    ...overrides,
  };
}

/** Small catalog: three plain cards, one revenue card, one event, one situation. */
export function createMockContent(overrides: Partial<GameContent> = {}): GameContent {
  const cards = [
    createMockCard({ cardId: 'card_a', title: 'Card A' }),
    createMockCard({ cardId: 'card_b', title: 'Card B' }),
    createMockCard({ cardId: 'card_c', title: 'Card C' }),
    createMockCard({
      cardId: 'card_rev',
      title: 'Revenue Card',
      category: 'revenue',
      outcomes: {
        good: [{ kind: 'profit', delta: 30 }],
        expected: [{ kind: 'profit', delta: 20 }],
        bad: [{ kind: 'profit', delta: 5 }],
      },
    }),
  ];
  const situation = createMockSituation();
  return {
    cards: new Map(cards.map((c): [string, PlayableCard] => [c.cardId, c])),
    crisisEvents: new Map([['test_event', createMockEvent()]]),
    situations: new Map([[situation.situationId, situation]]),
    cardSituations: new Map<string, readonly SituationTrigger[]>(),
    situationPools: { good: [], expected: [], bad: [] },
    followUpPools: { good: [], expected: [], bad: [] },
    ...overrides,
  };
}

export function createMockEnv(overrides: Partial<EngineEnv> = {}): EngineEnv {
  return { settings: createMockSettings(), content: createMockContent(), ...overrides };
}

export function createMockGameState(overrides: Partial<GameState> = {}): GameState {
  return {
    version: 2,
    seed: 1,
    difficulty: 'nadella',
    org: createMockOrg(),
    quarter: { quarterNumber: 1, phase: 'demand' },
    ceo: createMockCeo(),
    resources: { politicalCapital: 10 },
    crisisDeck: { drawPile: ['test_event'], discardPile: [] },
    cardDeck: { drawPile: [], discardPile: [] },
    hand: ['card_a', 'card_b', 'card_c', 'card_rev'],
    currentCrisis: null,
    currentDirective: 'profitFloor',
    cardsPlayedThisQuarter: [],
    pendingSituations: [],
    deferredSituations: [],
    pendingFollowUps: [],
    crises: [],
    history: [],
    ...overrides,
  };
}
