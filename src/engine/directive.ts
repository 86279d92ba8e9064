import type { DirectiveId } from './types';

export interface DirectiveDefinition {
  readonly id: DirectiveId;
  readonly code: string;
  readonly title: string;
  requiredAmount(pressure: number): number;
  isMet(lastProfit: number, currentProfit: number, pressure: number): boolean;
}

const profitFloor: DirectiveDefinition = {
  id: 'profitFloor',
  code: 'DIR_PROFIT_FLOOR',
  title: 'Achieve Quarterly Profit',
  requiredAmount: (pressure) => Math.min(21, 5 + pressure * 2),
  isMet: (_lastProfit, currentProfit, pressure) => currentProfit >= profitFloor.requiredAmount(pressure),
};

const profitIncrease: DirectiveDefinition = {
  id: 'profitIncrease',
  code: 'DIR_PROFIT_INCREASE',
  title: 'Increase Quarterly Profit',
  requiredAmount: (pressure) => 5 + Math.floor(Math.sqrt(pressure * 8)),
  isMet: (lastProfit, currentProfit, pressure) =>
    currentProfit - lastProfit >= profitIncrease.requiredAmount(pressure),
};

export const DIRECTIVES: Readonly<Record<DirectiveId, DirectiveDefinition>> = {
  profitFloor,
  profitIncrease,
};

export function getDirective(id: DirectiveId): DirectiveDefinition {
  return DIRECTIVES[id];
}

export function describeDirective(id: DirectiveId, pressure: number): string {
  const directive = getDirective(id);
  return `${directive.title}: $${directive.requiredAmount(pressure)}M target`;
}

/**
 * The board currently always issues the profit floor. The increase target
 * is still used to scale revenue cards.
 */
export function nextDirective(): DirectiveId {
  return 'profitFloor';
}

/** Profit target revenue cards are balanced against at this pressure. */
export function getRevenueTarget(pressure: number): number {
  return profitIncrease.requiredAmount(pressure);
}
