import { describe, it, expect } from 'vitest';
import { getCard, getCrisisEvent, getSituation, loadContent, loadDefaultContent, type RawContent } from '../content';

function rawContent(overrides: Partial<RawContent> = {}): RawContent {
  return {
    cards: [{
      id: 'card_a',
      title: 'Card A',
      category: 'action',
      outcomes: { good: [], expected: [{ kind: 'meter', meter: 'morale', delta: 2 }], bad: [] },
    }],
    crisisEvents: [{
      id: 'ev',
      title: 'Event',
      choices: [{ id: 'ev_a', label: 'A' }, { id: 'ev_b', label: 'B', pcCost: 1 }],
    }],
    situations: [{
      id: 'sit',
      title: 'Situation',
      severity: 2,
      responses: [
        { type: 'pc', label: 'Pay' },
        { type: 'risk', label: 'Gamble' },
        { type: 'evil', label: 'Cheat' },
        { type: 'defer', label: 'Later' },
      ],
    }],
    triggers: {
      cardSituations: { card_a: [{ situationId: 'sit', weight: 1 }] },
      situationPools: { good: ['sit'], expected: [], bad: [] },
      followUpPools: { good: [], expected: [], bad: ['sit'] },
    },
    ...overrides,
  };
}

describe('loadContent', () => {
  it('fills in defaults', () => {
    const content = loadContent(rawContent());
    expect(content.cards.get('card_a')).toEqual({
      cardId: 'card_a',
      title: 'Card A',
      description: '',
      outcomes: { good: [], expected: [{ kind: 'meter', meter: 'morale', delta: 2 }], bad: [] },
      corporateIntensity: 0,
      category: 'action',
      meterAffinity: null,
      riskLevel: 1,
    });
    expect(content.crisisEvents.get('ev')?.choices[1]).toEqual({
      choiceId: 'ev_b',
      label: 'B',
      effects: [],
      outcomeProfile: null,
      corporateIntensityDelta: 0,
      pcCost: 1,
      isDefer: false,
    });
    expect(content.situations.get('sit')?.lingerQuarters).toBe(2);
    expect(content.cardSituations.get('card_a')).toEqual([{ situationId: 'sit', weight: 1, onOutcome: null }]);
    expect(content.followUpPools.bad).toEqual(['sit']);
  });

  it('defaults a fine reason', () => {
    const cards = [{
      id: 'card_a',
      title: 'Card A',
      category: 'action',
      outcomes: { good: [], expected: [], bad: [{ kind: 'fine', amount: 5 }] },
    }];
    const content = loadContent(rawContent({ cards }));
    expect(content.cards.get('card_a')?.outcomes.bad).toEqual([{ kind: 'fine', amount: 5, reason: 'Legal settlement' }]);
  });

  describe('rejects', () => {
    it('malformed ids', () => {
      const cards = [{ id: 'Card-A', title: 'A', category: 'action', outcomes: { good: [], expected: [], bad: [] } }];
      expect(() => loadContent(rawContent({ cards })))
        .toThrow('Invalid cards at 0.id: ID must be lowercase letters, numbers or underscores');
    });

    it('unknown meters', () => {
      const cards = [{
        id: 'card_a',
        title: 'A',
        category: 'action',
        outcomes: { good: [], expected: [{ kind: 'meter', meter: 'vibes', delta: 1 }], bad: [] },
      }];
      expect(() => loadContent(rawContent({ cards }))).toThrow(/^Invalid cards at 0\.outcomes\.expected\.0\.meter: /);
    });

    it('duplicate cards', () => {
      const card = { id: 'card_a', title: 'A', category: 'action', outcomes: { good: [], expected: [], bad: [] } };
      expect(() => loadContent(rawContent({ cards: [card, card] }))).toThrow('Duplicate card id: card_a');
    });

    it('events with too few choices', () => {
      const crisisEvents = [{ id: 'ev', title: 'Event', choices: [{ id: 'ev_a', label: 'A' }] }];
      expect(() => loadContent(rawContent({ crisisEvents })))
        .toThrow('Invalid crisis events at 0.choices: needs at least 2 choices');
    });

    it('duplicate choices', () => {
      const crisisEvents = [{ id: 'ev', title: 'Event', choices: [{ id: 'ev_a', label: 'A' }, { id: 'ev_a', label: 'B' }] }];
      expect(() => loadContent(rawContent({ crisisEvents }))).toThrow('Duplicate choice in ev id: ev_a');
    });

    it('situations without exactly four responses', () => {
      const situations = [{ id: 'sit', title: 'S', severity: 2, responses: [{ type: 'pc', label: 'Pay' }] }];
      expect(() => loadContent(rawContent({ situations })))
        .toThrow('Invalid situations at 0.responses: needs exactly 4 responses');
    });

    it('situations missing a response type', () => {
      const situations = [{
        id: 'sit',
        title: 'S',
        severity: 2,
        responses: ['pc', 'pc', 'risk', 'evil'].map((type) => ({ type, label: type })),
      }];
      expect(() => loadContent(rawContent({ situations })))
        .toThrow('Situation sit needs one response of each type (pc, risk, evil, defer)');
    });

    it('mappings for unknown cards', () => {
      const triggers = {
        cardSituations: { ghost: [] },
        situationPools: { good: [], expected: [], bad: [] },
        followUpPools: { good: [], expected: [], bad: [] },
      };
      expect(() => loadContent(rawContent({ triggers }))).toThrow('Unknown card "ghost" in situation mappings');
    });

    it('references to unknown situations', () => {
      const triggers = {
        cardSituations: { card_a: [{ situationId: 'nope', weight: 1 }] },
        situationPools: { good: [], expected: [], bad: [] },
        followUpPools: { good: [], expected: [], bad: [] },
      };
      expect(() => loadContent(rawContent({ triggers })))
        .toThrow('Unknown situation "nope" referenced by card card_a');
    });

    it('pools naming unknown situations', () => {
      const triggers = {
        cardSituations: {},
        situationPools: { good: [], expected: ['nope'], bad: [] },
        followUpPools: { good: [], expected: [], bad: [] },
      };
      expect(() => loadContent(rawContent({ triggers })))
        .toThrow('Unknown situation "nope" referenced by situation pools');
    });
  });
});

describe('loadDefaultContent', () => {
  const content = loadDefaultContent();

  it('loads the bundled catalog', () => {
    expect(content.cards.size).toBe(14);
    expect(content.crisisEvents.size).toBe(5);
    expect(content.situations.size).toBe(8);
  });

  it('every crisis event offers a free choice', () => {
    for (const crisisEvent of content.crisisEvents.values()) {
      expect(crisisEvent.choices.some((c) => c.pcCost === 0)).toBe(true);
    }
  });

  it('includes revenue and corporate cards', () => {
    const cards = [...content.cards.values()];
    expect(cards.filter((c) => c.category === 'revenue').length).toBeGreaterThanOrEqual(3);
    expect(cards.some((c) => c.corporateIntensity > 0)).toBe(true);
  });
});

describe('lookups', () => {
  const content = loadContent(rawContent());

  it('find known ids', () => {
    expect(getCard(content, 'card_a').title).toBe('Card A');
    expect(getCrisisEvent(content, 'ev').title).toBe('Event');
    expect(getSituation(content, 'sit').title).toBe('Situation');
  });

  it('throw on unknown ids', () => {
    expect(() => getCard(content, 'x')).toThrow('Unknown card: x');
    expect(() => getCrisisEvent(content, 'x')).toThrow('Unknown crisis event: x');
    expect(() => getSituation(content, 'x')).toThrow('Unknown situation: x');
  });
});
