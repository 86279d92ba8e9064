/**
 * Save format. A game is plain JSON; loading validates every field with zod
 * after upgrading older save versions one step at a time.
 */
import { z } from 'zod';
import {
  FAVORABILITY_MAX,
  FAVORABILITY_MIN,
  MAX_PRESSURE,
  METER_MAX,
  METER_MIN,
  PC_MAX,
  SAVE_VERSION,
} from '../data/gameConfig';
import type { GameState, QuarterLog } from './types';

// ── Schema ───────────────────────────────────────────────────────

const MeterSchema = z.enum(['delivery', 'morale', 'governance', 'alignment', 'runway']);
const TierSchema = z.enum(['good', 'expected', 'bad']);
const IntSchema = z.number().int();
const MeterValueSchema = IntSchema.min(METER_MIN).max(METER_MAX);
const FavorabilitySchema = IntSchema.min(FAVORABILITY_MIN).max(FAVORABILITY_MAX);
const CapitalSchema = IntSchema.min(0).max(PC_MAX);

const OrgSchema = z.object({
  delivery: MeterValueSchema,
  morale: MeterValueSchema,
  governance: MeterValueSchema,
  alignment: MeterValueSchema,
  runway: MeterValueSchema,
});

const CeoSchema = z.object({
  pressure: IntSchema.min(0).max(MAX_PRESSURE),
  quartersSurvived: IntSchema,
  favorability: FavorabilitySchema,
  isOusted: z.boolean(),
  hasRetired: z.boolean(),
  totalProfit: IntSchema,
  evilScore: IntSchema,
  evilScoreLastQuarter: IntSchema,
  lastQuarterProfit: IntSchema,
  currentQuarterProfit: IntSchema,
  recentProfits: z.array(IntSchema),
  consecutiveSuccesses: IntSchema,
  consecutiveNegativeQuarters: IntSchema,
  consecutiveWeakProjectQuarters: IntSchema,
  totalCardsPlayed: IntSchema,
  accumulatedBonus: IntSchema,
  quarterlyBonusAwarded: IntSchema,
});

const DeckSchema = z.object({
  drawPile: z.array(z.string()),
  discardPile: z.array(z.string()),
});

const PendingSituationSchema = z.object({
  situationId: z.string(),
  originCardId: z.string(),
  scheduledQuarter: IntSchema,
  queuedAtQuarter: IntSchema,
  deferCount: IntSchema.min(0),
});

const PendingFollowUpSchema = z.object({
  cardId: z.string(),
  cardTitle: z.string(),
  playedAtQuarter: IntSchema,
  originalOutcome: TierSchema,
});

const MeterImpactSchema = z.object({ meter: MeterSchema, delta: IntSchema });

const CrisisInstanceSchema = z.object({
  instanceId: z.string(),
  situationId: z.string(),
  title: z.string(),
  createdQuarter: IntSchema,
  deadlineQuarter: IntSchema,
  ongoingImpact: z.array(MeterImpactSchema),
  baseImpact: z.array(MeterImpactSchema),
});

const CrisisRefSchema = z.discriminatedUnion('source', [
  z.object({ source: z.literal('event'), eventId: z.string() }),
  z.object({ source: z.literal('situation'), situation: PendingSituationSchema }),
]);

const SnapshotSchema = z.object({
  quarter: IntSchema,
  profit: IntSchema,
  totalProfit: IntSchema,
  favorability: FavorabilitySchema,
  evilScore: IntSchema,
  bonus: IntSchema,
  directiveMet: z.boolean(),
  cardsPlayed: IntSchema,
  politicalCapital: CapitalSchema,
  org: OrgSchema,
});

export const GameStateSchema = z.object({
  version: z.literal(SAVE_VERSION),
  seed: IntSchema,
  difficulty: z.enum(['welch', 'nadella', 'icahn']),
  org: OrgSchema,
  quarter: z.object({
    quarterNumber: IntSchema.min(1),
    phase: z.enum(['demand', 'playCards', 'crisis', 'resolution']),
  }),
  ceo: CeoSchema,
  resources: z.object({ politicalCapital: CapitalSchema }),
  crisisDeck: DeckSchema,
  cardDeck: DeckSchema,
  hand: z.array(z.string()),
  currentCrisis: CrisisRefSchema.nullable(),
  currentDirective: z.enum(['profitFloor', 'profitIncrease']),
  cardsPlayedThisQuarter: z.array(z.string()),
  pendingSituations: z.array(PendingSituationSchema),
  deferredSituations: z.array(PendingSituationSchema),
  pendingFollowUps: z.array(PendingFollowUpSchema),
  crises: z.array(CrisisInstanceSchema),
  history: z.array(SnapshotSchema),
});

const LogEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('info'), message: z.string() }),
  z.object({ kind: z.literal('event'), message: z.string() }),
  z.object({ kind: z.literal('meterChange'), meter: MeterSchema, delta: IntSchema, message: z.string() }),
  z.object({ kind: z.literal('outcome'), tier: TierSchema, source: z.string(), message: z.string() }),
]);

export const QuarterLogSchema = z.object({
  quarterNumber: IntSchema,
  phase: z.enum(['demand', 'playCards', 'crisis', 'resolution']),
  entries: z.array(LogEntrySchema),
});

export function parseQuarterLog(data: unknown): QuarterLog {
  return QuarterLogSchema.parse(data);
}

// ── Migrations ───────────────────────────────────────────────────

type SaveData = Record<string, unknown>;

function isSaveData(value: unknown): value is SaveData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Upgrades keyed by the version they start from. */
const MIGRATIONS: Readonly<Record<number, (data: SaveData) => SaveData>> = {
  // v1 → v2: lingering crises and quarter history
  1: (data) => ({ ...data, crises: data.crises ?? [], history: data.history ?? [], version: 2 }),
};

export function migrateSaveData(data: unknown): unknown {
  if (!isSaveData(data)) return data;
  let current = data;
  while (typeof current.version === 'number' && current.version < SAVE_VERSION) {
    const migrate = MIGRATIONS[current.version];
    if (migrate === undefined) throw new Error(`No migration from save version ${current.version}`);
    current = migrate(current);
  }
  return current;
}

// ── Serialize / Deserialize ──────────────────────────────────────

export function serializeGame(state: GameState): string {
  return JSON.stringify(state);
}

export function parseGameState(data: unknown): GameState {
  const result = GameStateSchema.safeParse(migrateSaveData(data));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid save data at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return result.data;
}

export function deserializeGame(text: string): GameState {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new Error(`Save data is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseGameState(data);
}
