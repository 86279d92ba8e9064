import { describe, it, expect } from 'vitest';
import {
  canRetire,
  createCeo,
  describeParachute,
  getMomentumBonus,
  getParachutePayout,
  getProfitTrajectory,
  getSmoothedProfit,
  withFavorabilityChange,
  withProfitRecorded,
  withProjectPerformanceRecorded,
  withQuarterComplete,
  withSuccessResult,
} from '../tenure';
import { getDifficultySettings } from '../difficulty';
import { createMockCeo, createMockSettings } from './helpers';

describe('createCeo', () => {
  it('starts at the difficulty favorability', () => {
    expect(createCeo(getDifficultySettings('icahn')).favorability).toBe(65);
    expect(createCeo(getDifficultySettings('welch')).favorability).toBe(80);
  });
});

describe('pressure', () => {
  it('rises every two quarters survived', () => {
    let ceo = createMockCeo();
    const pressures: number[] = [];
    for (let i = 0; i < 5; i++) {
      ceo = withQuarterComplete(ceo);
      pressures.push(ceo.pressure);
    }
    expect(pressures).toEqual([0, 1, 1, 2, 2]);
  });

  it('caps at 8', () => {
    expect(withQuarterComplete(createMockCeo({ quartersSurvived: 30 })).pressure).toBe(8);
  });
});

describe('favorability', () => {
  it('clamps into [0, 100]', () => {
    expect(withFavorabilityChange(createMockCeo({ favorability: 95 }), 10).favorability).toBe(100);
    expect(withFavorabilityChange(createMockCeo({ favorability: 5 }), -10).favorability).toBe(0);
  });
});

describe('profit history', () => {
  it('keeps the last three quarters and counts negative streaks', () => {
    let ceo = createMockCeo();
    for (const p of [10, -5, -2, 30]) ceo = withProfitRecorded(ceo, p);
    expect(ceo.recentProfits).toEqual([-5, -2, 30]);
    expect(ceo.consecutiveNegativeQuarters).toBe(0);
    expect(withProfitRecorded(ceo, -1).consecutiveNegativeQuarters).toBe(1);
  });

  it('smoothed profit is the truncated mean', () => {
    expect(getSmoothedProfit(createMockCeo({ recentProfits: [10, 20, 25] }))).toBe(18);
    expect(getSmoothedProfit(createMockCeo({ currentQuarterProfit: 7 }))).toBe(7);
  });

  it('trajectory compares the latest to the mean before it', () => {
    expect(getProfitTrajectory(createMockCeo({ recentProfits: [10, 20, 40] }))).toBe(25);
    expect(getProfitTrajectory(createMockCeo({ recentProfits: [40] }))).toBe(0);
  });

  it('weak project streak resets on positive revenue', () => {
    const weak = withProjectPerformanceRecorded(createMockCeo({ consecutiveWeakProjectQuarters: 2 }), 0);
    expect(weak.consecutiveWeakProjectQuarters).toBe(3);
    expect(withProjectPerformanceRecorded(weak, 12).consecutiveWeakProjectQuarters).toBe(0);
  });
});

describe('momentum', () => {
  it('good outcomes build the streak, bad resets it', () => {
    let ceo = createMockCeo();
    ceo = withSuccessResult(ceo, true);
    expect(getMomentumBonus(ceo)).toBe(0);
    ceo = withSuccessResult(ceo, true);
    expect(getMomentumBonus(ceo)).toBe(3);
    ceo = withSuccessResult(ceo, true);
    expect(getMomentumBonus(ceo)).toBe(5);
    expect(withSuccessResult(ceo, false).consecutiveSuccesses).toBe(0);
  });
});

describe('retirement', () => {
  it('unlocks at the bonus threshold', () => {
    const settings = createMockSettings();
    expect(canRetire(createMockCeo({ accumulatedBonus: 139 }), settings)).toBe(false);
    expect(canRetire(createMockCeo({ accumulatedBonus: 140 }), settings)).toBe(true);
  });
});

describe('parachute', () => {
  it('minimal severance without any cards played', () => {
    const ceo = createMockCeo({ quartersSurvived: 12 });
    expect(getParachutePayout(ceo)).toBe(10);
    expect(describeParachute(ceo)).toBe('minimal severance ($10M) - no strategic initiatives');
  });

  it('grows with tenure and shrinks with evil', () => {
    const ceo = createMockCeo({ quartersSurvived: 8, totalCardsPlayed: 5, evilScore: 3 });
    expect(getParachutePayout(ceo)).toBe(28);
    expect(describeParachute(ceo)).toBe('$28M');
  });

  it('never drops below the minimum', () => {
    expect(getParachutePayout(createMockCeo({ totalCardsPlayed: 1, evilScore: 40 }))).toBe(10);
  });
});
