import type { DifficultyId, MeterName } from '../engine/types';

export const DIFFICULTY_CONFIG = {
  welch: {
    retirementThreshold: 120,
    decayStartQuarter: 99,
    decayEnabled: false,
    successRewardBonus: 1,
    startingFavorability: 80,
    label: 'Patient Board',
    description: 'A forgiving board. No tenure fatigue, generous rewards.',
  },
  nadella: {
    retirementThreshold: 140,
    decayStartQuarter: 16,
    decayEnabled: true,
    successRewardBonus: 0,
    startingFavorability: 75,
    label: 'Balanced Board',
    description: 'The standard experience. Patience thins after four years.',
  },
  icahn: {
    retirementThreshold: 180,
    decayStartQuarter: 6,
    decayEnabled: true,
    successRewardBonus: -1,
    startingFavorability: 65,
    label: 'Activist Board',
    description: 'An activist board that expects results from the first year.',
  },
} as const;

export const DEFAULT_DIFFICULTY: DifficultyId = 'nadella';

// ── Organization ──

export const METER_MIN = 0;
export const METER_MAX = 100;
export const METER_DEFAULT = 60;
/** Tie-break order for lowest-meter lookups. */
export const METER_ORDER: readonly MeterName[] = ['delivery', 'morale', 'governance', 'alignment', 'runway'];

// ── Political Capital ──

export const PC_INITIAL = 10;
export const PC_MAX = 20;
export const PC_DECAY_THRESHOLD = 10;
export const PC_METER_BONUS_THRESHOLD = 60;   // governance / alignment earn +1 at or above
export const PC_MORALE_PENALTY_THRESHOLD = 30;
export const RESTRAINT_BONUS = [3, 2, 1, 0] as const; // by cards played, 3+ → last entry

export const EXCHANGE_RATES: Readonly<Record<MeterName, number>> = {
  morale: 10,
  alignment: 10,
  delivery: 10,
  governance: 15,
  runway: 20,
};

export const BOOST_COST = 1;
export const BOOST_AMOUNT = 5;
export const SCHMOOZE_COST = 2;
export const SCHMOOZE_FAIL_CHANCE = 15;      // percent
export const REORG_COST = 3;
export const REDEEM_COST = 2;

// ── Cards ──

export const MAX_HAND_SIZE = 7;
export const MAX_CARDS_PER_QUARTER = 3;
export const POSITION_PC_COST = [0, 0, 0] as const;
export const POSITION_RISK = [0, 10, 20] as const;
export const REVENUE_DIMINISHING_RETURNS = [1.0, 0.65, 0.35] as const;
export const REVENUE_NEGLECT_THRESHOLD = 3;
export const REVENUE_NEGLECT_METER_PENALTY = -8;
export const REVENUE_NEGLECT_FAVORABILITY_PENALTY = -15;
export const IDLE_HAND_REPLACE_COUNT = 3;

// ── Outcome Weights ──

export const BASE_GOOD_WEIGHT = 20;
export const BASE_BAD_WEIGHT = 20;
export const GOOD_WEIGHT_RANGE = [5, 60] as const;
export const BAD_WEIGHT_RANGE = [5, 60] as const;
export const EXPECTED_WEIGHT_RANGE = [10, 90] as const;
export const HONEYMOON_QUARTERS = 3;
export const HONEYMOON_GOOD_BONUS = 15;
export const HONEYMOON_BAD_REDUCTION = 10;
export const EVIL_PATH_TIERS = [
  { minEvil: 20, bonus: 10 },
  { minEvil: 10, bonus: 5 },
] as const;
export const AFFINITY_SYNERGY = { single: 5, multiple: 10 } as const;

/** Crisis choice tables: [good, expected, bad]. */
export const CRISIS_WEIGHTS = {
  capital: [70, 20, 10],
  corporate: [70, 10, 20],
  standard: [20, 70, 10],
} as const;

// ── Momentum ──

export const MOMENTUM_TIERS = [
  { minStreak: 3, bonus: 5 },
  { minStreak: 2, bonus: 3 },
] as const;

// ── Crisis Draw ──

export const CRISIS_DRAW_CHANCE = 33; // percent, rolled in the demand phase

// ── Base Operations ──

export const BASE_OPS_MIN = 80;
export const BASE_OPS_MAX = 140;
export const BASE_OPS_BAD_QUARTER_CHANCE = 8;
export const BASE_OPS_BAD_QUARTER_RANGE = [-30, 21] as const; // [min, max)
export const BASE_OPS_GROWTH_PER_QUARTER = 0.02;
export const BASE_OPS_HIGH_METER = 60;
export const BASE_OPS_LOW_METER = 35;
export const BASE_OPS_METER_BONUS = 10;
export const BASE_OPS_METER_PENALTY = 15;
export const BASE_OPS_VARIANCE = 15;
export const REVENUE_BASELINE_TARGET = 25;
export const REVENUE_MIN_TARGET_SCALE = 0.5;

// ── CEO ──

export const MAX_PRESSURE = 8;
export const PROFIT_HISTORY_SIZE = 3;
export const MIN_PARACHUTE = 10;
export const PARACHUTE_PER_QUARTER = 3;
export const PARACHUTE_EVIL_PENALTY = 2;

// ── Favorability ──

export const FAVORABILITY_MIN = 0;
export const FAVORABILITY_MAX = 100;
export const BASE_SUCCESS_REWARD = 8;
export const TENURE_REWARD_FLOOR = 5;
export const TENURE_THRESHOLD = 4;
export const STREAK_PENALTIES = [0, -1, -3, -5, -7] as const;
export const STREAK_MAX_GAINS = [Number.POSITIVE_INFINITY, 6, 2, 0, 0] as const;
export const MAX_FAVORABILITY_LOSS = -12;
export const MAX_TENURE_LOSS_EXTRA = 6;
export const NEGATIVE_PROFIT_BASE_PENALTY = -10;
export const DIRECTIVE_FAILURE_PENALTY = -4;
export const INITIATIVE_BONUS = 1;

// ── Ouster ──

export const OUSTER_SAFE_FAVORABILITY = 55;
export const OUSTER_MAX_THRESHOLD = 14;
export const OUSTER_AUTOMATIC = 20;
export const OUSTER_DIE = 20;

// ── Resolution ──

export const EXCEPTIONAL_BONUS_THRESHOLD = 10;
export const OUTSTANDING_PROFIT_DELTA = 30;
export const BOARD_AWARD_CHANCE = 40; // percent
export const BOARD_AWARD_METER_CAP = 70;

// ── Situations ──

export const MAX_DEFERRED_SITUATIONS = 5;
export const SITUATION_NO_TRIGGER_ROLL = 18;
export const GENERIC_SITUATION_MAX_CHANCE = 25;
export const SITUATION_RESURFACE_CHANCE = 30;
export const SITUATION_FADE_QUARTERS = 4;
export const SITUATION_SURVIVAL_BY_WAIT = [100, 80, 60, 40, 20] as const; // percent, index = quarters waiting
export const DEFAULT_SITUATION_PC_COST = 2;
export const DEFAULT_SITUATION_EVIL_DELTA = 2;

// ── Follow-ups ──

export const FOLLOW_UP_BASE_CHANCE = 20;
export const FOLLOW_UP_CHANCE_PER_QUARTER = 5;
export const FOLLOW_UP_MAX_CHANCE = 40;
export const FOLLOW_UP_MAX_QUARTERS = 3;
export const FOLLOW_UP_GOOD_WEIGHT = 20;
export const FOLLOW_UP_MEH_WEIGHT = 50;
export const FOLLOW_UP_METERS: readonly MeterName[] = ['delivery', 'morale', 'governance', 'alignment'];

// ── Scoring ──

export const PC_SCORE_VALUE = 5;
export const CARD_SCORE_VALUE = 1;
export const RETIREMENT_MULTIPLIER = 2;
export const OUSTER_MULTIPLIER = 0.5;

// ── Persistence ──

export const SAVE_VERSION = 2;
