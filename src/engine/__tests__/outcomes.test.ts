import { describe, it, expect } from 'vitest';
import {
  describeOutcomeWeights,
  getCrisisChoiceWeights,
  getEvilPathBonus,
  getHoneymoonAdjustment,
  getOutcomeWeights,
  rollCrisisChoice,
  rollTier,
} from '../outcomes';
import { createMockEvent, ScriptedRng } from './helpers';

describe('rollTier', () => {
  it('maps the single draw onto good, expected, bad bands', () => {
    const weights = { good: 20, expected: 60, bad: 20 };
    expect(rollTier(new ScriptedRng([0]), weights)).toBe('good');
    expect(rollTier(new ScriptedRng([19]), weights)).toBe('good');
    expect(rollTier(new ScriptedRng([20]), weights)).toBe('expected');
    expect(rollTier(new ScriptedRng([79]), weights)).toBe('expected');
    expect(rollTier(new ScriptedRng([80]), weights)).toBe('bad');
  });

  it('never yields bad when the bad weight is zero', () => {
    const weights = { good: 30, expected: 70, bad: 0 };
    const rng = new ScriptedRng([0, 29, 30, 69, 99]);
    const tiers = Array.from({ length: 5 }, () => rollTier(rng, weights));
    expect(tiers).toEqual(['good', 'good', 'expected', 'expected', 'expected']);
  });

  it('returns expected without drawing when all weights are zero', () => {
    const rng = new ScriptedRng();
    expect(rollTier(rng, { good: 0, expected: 0, bad: 0 })).toBe('expected');
    expect(rng.calls).toEqual([]);
  });
});

describe('getHoneymoonAdjustment', () => {
  it('fades over the first three quarters', () => {
    expect(getHoneymoonAdjustment(1)).toEqual({ good: 15, bad: 10 });
    expect(getHoneymoonAdjustment(2)).toEqual({ good: 10, bad: 6 });
    expect(getHoneymoonAdjustment(3)).toEqual({ good: 5, bad: 3 });
    expect(getHoneymoonAdjustment(4)).toEqual({ good: 0, bad: 0 });
  });
});

describe('getEvilPathBonus', () => {
  it('only applies to corporate cards', () => {
    expect(getEvilPathBonus(25, false)).toBe(0);
    expect(getEvilPathBonus(25, true)).toBe(10);
    expect(getEvilPathBonus(10, true)).toBe(5);
    expect(getEvilPathBonus(9, true)).toBe(0);
  });
});

describe('getOutcomeWeights', () => {
  it('neutral modifiers after the honeymoon give 20/60/20', () => {
    expect(getOutcomeWeights({ quarterNumber: 5 })).toEqual({ good: 20, expected: 60, bad: 20 });
  });

  it('applies alignment, pressure and honeymoon together', () => {
    // align +2, pressure 2 → mod 1, honeymoon Q1 +15 / -10
    // good = 20 + 2 - 1 + 15 = 36; bad = 20 - 2 + 1 - 10 = 9
    expect(getOutcomeWeights({ alignment: 60, pressure: 2, quarterNumber: 1 }))
      .toEqual({ good: 36, expected: 55, bad: 9 });
  });

  it('adds position risk to bad only', () => {
    expect(getOutcomeWeights({ quarterNumber: 5, riskModifier: 20 })).toEqual({ good: 20, expected: 40, bad: 40 });
  });

  it('clamps good and bad into [5, 60]', () => {
    const w = getOutcomeWeights({ quarterNumber: 5, alignment: 0, evilScore: 40, pressure: 8, riskModifier: 20 });
    expect(w.good).toBe(5);
    expect(w.bad).toBe(60);
    expect(w.expected).toBe(35);
  });

  it('keeps expected at its floor by trimming bad, then good', () => {
    const w = getOutcomeWeights({
      quarterNumber: 5,
      alignment: 100,
      momentumBonus: 15,
      synergyBonus: 10,
      riskModifier: 60,
    });
    // good = 20 + 10 + 15 + 10 = 55; bad = 20 - 10 + 60 = 70 → 60
    // expected would be -15; shortfall 25 taken from bad (60 → 35)
    expect(w).toEqual({ good: 55, expected: 10, bad: 35 });
    expect(w.good + w.expected + w.bad).toBe(100);
  });

  it('always sums to 100 with no negative weight', () => {
    const samples = [
      { alignment: 0, pressure: 8, evilScore: 30, riskModifier: 35 },
      { alignment: 100, momentumBonus: 5, synergyBonus: 10, quarterNumber: 1 },
      { alignment: 100, riskModifier: 100, momentumBonus: 40, quarterNumber: 1 },
    ];
    for (const mods of samples) {
      const w = getOutcomeWeights(mods);
      expect(w.good + w.expected + w.bad).toBe(100);
      expect(Math.min(w.good, w.expected, w.bad)).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('crisis choice weights', () => {
  const [payChoice, absorbChoice] = createMockEvent().choices;

  it('uses the capital table for PC choices', () => {
    expect(getCrisisChoiceWeights(payChoice)).toEqual({ good: 70, expected: 20, bad: 10 });
  });

  it('uses the corporate table for evil choices', () => {
    expect(getCrisisChoiceWeights({ ...absorbChoice, corporateIntensityDelta: 2 }))
      .toEqual({ good: 70, expected: 10, bad: 20 });
  });

  it('uses the standard table otherwise', () => {
    expect(getCrisisChoiceWeights(absorbChoice)).toEqual({ good: 20, expected: 70, bad: 10 });
  });

  it('rolls a single draw over 100', () => {
    const rng = new ScriptedRng([95]);
    expect(rollCrisisChoice(payChoice, rng)).toBe('bad');
    expect(rng.calls).toEqual([[0, 100]]);
  });
});

describe('describeOutcomeWeights', () => {
  it('formats a compact forecast', () => {
    expect(describeOutcomeWeights({ good: 25, expected: 55, bad: 20 })).toBe('Good 25% / Expected 55% / Bad 20%');
  });
});
