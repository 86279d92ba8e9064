import { describe, it, expect } from 'vitest';
import {
  computeFavorabilityDelta,
  getLowActivityAdjustment,
  getLowMeterAdjustment,
  getMaxLoss,
  getStreakMaxGain,
  getStreakPenalty,
  getSuccessReward,
  getTenureDecay,
} from '../favorability';
import { getDifficultySettings } from '../difficulty';
import { createMockOrg, createMockSettings } from './helpers';

const settings = createMockSettings();

describe('computeFavorabilityDelta', () => {
  describe('success', () => {
    it('full reward when profit grows', () => {
      expect(computeFavorabilityDelta({ lastProfit: 10, currentProfit: 20, directiveMet: true, pressure: 1 }, settings))
        .toBe(8);
    });

    it('half reward when profit holds', () => {
      expect(computeFavorabilityDelta({ lastProfit: 10, currentProfit: 10, directiveMet: true, pressure: 1 }, settings))
        .toBe(4);
    });

    it('evil score trims the reward', () => {
      expect(computeFavorabilityDelta(
        { lastProfit: 10, currentProfit: 20, directiveMet: true, pressure: 1, evilScore: 12 },
        settings,
      )).toBe(7);
    });

    it('weak project streak caps the gain', () => {
      // 8 - 3 = 5, capped at 2
      expect(computeFavorabilityDelta(
        { lastProfit: 10, currentProfit: 20, directiveMet: true, pressure: 1, weakProjectStreak: 2 },
        settings,
      )).toBe(2);
    });
  });

  describe('failure', () => {
    it('negative profit hits hard, floored at the max loss', () => {
      // -10 - 2 - 1 = -13 → -12
      expect(computeFavorabilityDelta({ lastProfit: 0, currentProfit: -12, directiveMet: true, pressure: 1 }, settings))
        .toBe(-12);
    });

    it('a loss stacked with a missed directive stops at the max loss', () => {
      // -10 - 3 = -13, directive -4, pressure -1 → -18 → -12
      const change = computeFavorabilityDelta(
        { lastProfit: 0, currentProfit: -15, directiveMet: false, pressure: 1 },
        settings,
      );
      expect(change).toBe(-12);
      expect(change).toBeLessThanOrEqual(-10);
    });

    it('a moderate decline plus a missed directive', () => {
      // decline 8 → -3, directive -4, pressure -1
      expect(computeFavorabilityDelta({ lastProfit: 30, currentProfit: 22, directiveMet: false, pressure: 1 }, settings))
        .toBe(-8);
    });

    it('a small decline costs one point', () => {
      expect(computeFavorabilityDelta({ lastProfit: 30, currentProfit: 27, directiveMet: false, pressure: 0 }, settings))
        .toBe(-5);
    });

    it('evil scrutiny stacks on failure', () => {
      // -4 directive, -2 pressure, -4 scrutiny
      expect(computeFavorabilityDelta(
        { lastProfit: 10, currentProfit: 12, directiveMet: false, pressure: 2, evilScore: 10 },
        settings,
      )).toBe(-10);
    });

    it('long tenure widens the max loss', () => {
      expect(computeFavorabilityDelta(
        { lastProfit: 50, currentProfit: -40, directiveMet: false, pressure: 8, quartersSurvived: 20 },
        settings,
      )).toBe(-18);
    });
  });
});

describe('streak tables', () => {
  it('penalty and max gain grow with the streak', () => {
    expect([0, 1, 2, 3, 4, 9].map(getStreakPenalty)).toEqual([0, -1, -3, -5, -7, -7]);
    expect([1, 2, 3].map(getStreakMaxGain)).toEqual([6, 2, 0]);
    expect(getStreakMaxGain(0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('getSuccessReward', () => {
  it('adds the difficulty bonus', () => {
    expect(getSuccessReward(1, 0, getDifficultySettings('welch'))).toBe(9);
    expect(getSuccessReward(1, 0, settings)).toBe(8);
  });

  it('an activist board tightens at high pressure after tenure', () => {
    expect(getSuccessReward(5, 4, getDifficultySettings('icahn'))).toBe(6);
    expect(getSuccessReward(5, 3, getDifficultySettings('icahn'))).toBe(7);
  });
});

describe('getMaxLoss', () => {
  it('widens by 2 every 4 quarters past tenure, up to 6', () => {
    expect(getMaxLoss(3)).toBe(-12);
    expect(getMaxLoss(8)).toBe(-14);
    expect(getMaxLoss(40)).toBe(-18);
  });
});

describe('getTenureDecay', () => {
  it('starts at the difficulty decay quarter', () => {
    expect(getTenureDecay(15, settings)).toBe(0);
    expect(getTenureDecay(16, settings)).toBe(-1);
  });

  it('never applies on a patient board', () => {
    expect(getTenureDecay(200, getDifficultySettings('welch'))).toBe(0);
  });
});

describe('getLowMeterAdjustment', () => {
  it('two critical meters block gains and cost 5', () => {
    expect(getLowMeterAdjustment(createMockOrg({ delivery: 3, morale: 4 }))).toEqual({
      maxGain: 0,
      penalty: -5,
      reason: 'Organization in crisis: Delivery, Morale critically low',
    });
  });

  it('one critical meter costs 2', () => {
    expect(getLowMeterAdjustment(createMockOrg({ runway: 0 }))).toEqual({
      maxGain: 0,
      penalty: -2,
      reason: 'Runway critically low - board concerned',
    });
  });

  it('three low meters cap gains at 2', () => {
    expect(getLowMeterAdjustment(createMockOrg({ delivery: 10, morale: 12, governance: 14 }))).toEqual({
      maxGain: 2,
      penalty: 0,
      reason: 'Multiple metrics concerning',
    });
  });

  it('healthy org has no adjustment', () => {
    expect(getLowMeterAdjustment(createMockOrg()).reason).toBeNull();
  });
});

describe('getLowActivityAdjustment', () => {
  it('is lenient in the first two quarters', () => {
    expect(getLowActivityAdjustment(0, 1).reason).toBeNull();
  });

  it('zero projects cost 5 per tenure band', () => {
    expect(getLowActivityAdjustment(0, 3)).toEqual({
      maxGain: 0,
      penalty: -10,
      reason: 'Board expects active strategic leadership',
    });
  });

  it('too few projects cost 4 per tenure band', () => {
    expect(getLowActivityAdjustment(1, 3)).toEqual({
      maxGain: 0,
      penalty: -8,
      reason: 'Board expected 2+ projects, only 1 delivered',
    });
  });

  it('meeting the expectation has no adjustment', () => {
    expect(getLowActivityAdjustment(2, 6).reason).toBeNull();
  });
});
