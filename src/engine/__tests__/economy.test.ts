import { describe, it, expect } from 'vitest';
import {
  canAfford,
  canExchange,
  clampCapital,
  createResources,
  earn,
  endOfQuarterAdjustment,
  getEndOfQuarterDelta,
  getExchangeRate,
  restraintBonus,
  spend,
} from '../economy';
import { createMockOrg } from './helpers';

describe('political capital', () => {
  it('starts at 10 and clamps into [0, 20]', () => {
    expect(createResources()).toEqual({ politicalCapital: 10 });
    expect(createResources(35)).toEqual({ politicalCapital: 20 });
    expect(clampCapital(-4)).toBe(0);
  });

  it('spends exactly the cost', () => {
    expect(spend({ politicalCapital: 5 }, 3)).toEqual({ politicalCapital: 2 });
    expect(spend({ politicalCapital: 3 }, 3)).toEqual({ politicalCapital: 0 });
  });

  it('refuses an unaffordable spend', () => {
    expect(canAfford({ politicalCapital: 2 }, 3)).toBe(false);
    expect(() => spend({ politicalCapital: 2 }, 3)).toThrow('Insufficient Political Capital: have 2, need 3');
  });

  it('refuses a negative spend', () => {
    expect(() => spend({ politicalCapital: 2 }, -1)).toThrow('Cannot spend a negative amount: -1');
  });

  it('earning clamps at the cap', () => {
    expect(earn({ politicalCapital: 19 }, 4)).toEqual({ politicalCapital: 20 });
    expect(earn({ politicalCapital: 1 }, -3)).toEqual({ politicalCapital: 0 });
  });
});

describe('end of quarter capital', () => {
  it('rewards strong governance and alignment', () => {
    expect(getEndOfQuarterDelta({ politicalCapital: 5 }, createMockOrg())).toBe(2);
  });

  it('penalizes low morale and hoarding', () => {
    const org = createMockOrg({ morale: 20, governance: 40, alignment: 40 });
    expect(getEndOfQuarterDelta({ politicalCapital: 12 }, org)).toBe(-2);
  });

  it('hoarding decay only applies above 10', () => {
    expect(getEndOfQuarterDelta({ politicalCapital: 10 }, createMockOrg({ governance: 59, alignment: 59 }))).toBe(0);
    expect(getEndOfQuarterDelta({ politicalCapital: 11 }, createMockOrg({ governance: 59, alignment: 59 }))).toBe(-1);
  });

  it('applies the delta with clamping', () => {
    expect(endOfQuarterAdjustment({ politicalCapital: 20 }, createMockOrg())).toEqual({ politicalCapital: 20 });
  });
});

describe('restraintBonus', () => {
  it('pays 3/2/1/0 for 0/1/2/3+ cards', () => {
    expect([0, 1, 2, 3, 4].map(restraintBonus)).toEqual([3, 2, 1, 0, 0]);
  });
});

describe('exchange', () => {
  it('uses the per-meter rate', () => {
    expect(getExchangeRate('morale')).toBe(10);
    expect(getExchangeRate('governance')).toBe(15);
    expect(getExchangeRate('runway')).toBe(20);
  });

  it('requires at least one full unit of the meter', () => {
    expect(canExchange(createMockOrg({ runway: 19 }), 'runway')).toBe(false);
    expect(canExchange(createMockOrg({ runway: 20 }), 'runway')).toBe(true);
  });
});
