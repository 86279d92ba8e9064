import { DEFAULT_DIFFICULTY, DIFFICULTY_CONFIG } from '../data/gameConfig';
import type { DifficultyId, DifficultySettings } from './types';

export function getDifficultySettings(id: DifficultyId = DEFAULT_DIFFICULTY): DifficultySettings {
  const config = DIFFICULTY_CONFIG[id];
  return {
    id,
    label: config.label,
    retirementThreshold: config.retirementThreshold,
    decayStartQuarter: config.decayStartQuarter,
    decayEnabled: config.decayEnabled,
    successRewardBonus: config.successRewardBonus,
    startingFavorability: config.startingFavorability,
  };
}
