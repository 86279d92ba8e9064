import type { QuarterCursor } from './types';

export function createCursor(quarterNumber = 1): QuarterCursor {
  return { quarterNumber, phase: 'demand' };
}

/** Demand → PlayCards → Crisis → Resolution → Demand of the next quarter. */
export function nextPhase(cursor: QuarterCursor): QuarterCursor {
  switch (cursor.phase) {
    case 'demand':
      return { ...cursor, phase: 'playCards' };
    case 'playCards':
      return { ...cursor, phase: 'crisis' };
    case 'crisis':
      return { ...cursor, phase: 'resolution' };
    case 'resolution':
      return { quarterNumber: cursor.quarterNumber + 1, phase: 'demand' };
  }
}

/** Quarter 1 → "Y1Q1", quarter 6 → "Y2Q2". */
export function formatQuarter(quarterNumber: number): string {
  const year = Math.floor((quarterNumber - 1) / 4) + 1;
  const q = ((quarterNumber - 1) % 4) + 1;
  return `Y${year}Q${q}`;
}
