import {
  CARD_SCORE_VALUE,
  METER_ORDER,
  OUSTER_MULTIPLIER,
  PC_SCORE_VALUE,
  RETIREMENT_MULTIPLIER,
} from '../data/gameConfig';
import { meterLabel } from './log';
import { allMetersAtLeast } from './org';
import { getEvilDeltaThisQuarter, getParachutePayout } from './tenure';
import type { CeoState, OrgState, ResourceState } from './types';

export interface QuarterlyBonus {
  readonly bonus: number;
  readonly reasons: readonly string[];
}

export interface FinalScoreBreakdown {
  readonly accumulatedBonus: number;
  readonly goldenParachute: number;
  readonly politicalCapital: number;
  readonly pcConversion: number;
  readonly totalProjects: number;
  readonly projectsBonus: number;
  readonly subtotal: number;
  readonly multiplier: number;
  readonly multiplierReason: 'Graceful Retirement' | 'Ousted';
  readonly finalScore: number;
}

/**
 * Quarterly bonus ($M) toward the retirement threshold.
 * Awards and penalties are itemised in `reasons`; the total never goes below 0.
 */
export function calculateQuarterlyBonus(
  ceo: CeoState,
  org: OrgState,
  directiveMet: boolean,
  profitDelta: number,
): QuarterlyBonus {
  let bonus = 0;
  const reasons: string[] = [];
  const award = (amount: number, reason: string) => {
    bonus += amount;
    reasons.push(amount >= 0 ? `+$${amount}M: ${reason}` : `-$${-amount}M: ${reason}`);
  };

  award(2, 'Quarterly base compensation');
  if (directiveMet) award(4, 'Met board directive');
  if (profitDelta > 0) award(3, 'Profit growth quarter-over-quarter');
  if (allMetersAtLeast(org, 40)) award(3, 'All organizational metrics healthy');
  if (ceo.favorability >= 70) award(2, 'Strong board confidence');
  if (getEvilDeltaThisQuarter(ceo) <= 0) award(2, 'Maintained ethical standards');

  // ── Penalties ──
  if (!directiveMet) award(-3, 'Failed board directive');

  const critical = METER_ORDER.filter((m) => org[m] < 20);
  if (critical.length > 0) {
    award(-2 * critical.length, `Critical metrics (${critical.map(meterLabel).join(', ')})`);
  }

  if (ceo.evilScore >= 15) award(-3, 'Reputation concerns (Evil 15+)');

  return { bonus: Math.max(0, bonus), reasons };
}

export function getScoreBreakdown(ceo: CeoState, resources: ResourceState): FinalScoreBreakdown {
  const goldenParachute = getParachutePayout(ceo);
  const pcConversion = resources.politicalCapital * PC_SCORE_VALUE;
  const projectsBonus = ceo.totalCardsPlayed * CARD_SCORE_VALUE;
  const subtotal = ceo.accumulatedBonus + goldenParachute + pcConversion + projectsBonus;
  const multiplier = ceo.hasRetired ? RETIREMENT_MULTIPLIER : OUSTER_MULTIPLIER;

  return {
    accumulatedBonus: ceo.accumulatedBonus,
    goldenParachute,
    politicalCapital: resources.politicalCapital,
    pcConversion,
    totalProjects: ceo.totalCardsPlayed,
    projectsBonus,
    subtotal,
    multiplier,
    multiplierReason: ceo.hasRetired ? 'Graceful Retirement' : 'Ousted',
    finalScore: Math.max(0, Math.trunc(subtotal * multiplier)),
  };
}

export function calculateFinalScore(ceo: CeoState, resources: ResourceState): number {
  return getScoreBreakdown(ceo, resources).finalScore;
}
