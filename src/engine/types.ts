// ── Core Enums ───────────────────────────────────────────────────

export type MeterName = 'delivery' | 'morale' | 'governance' | 'alignment' | 'runway';

export type OutcomeTier = 'good' | 'expected' | 'bad';

export type Phase = 'demand' | 'playCards' | 'crisis' | 'resolution';

export type DifficultyId = 'welch' | 'nadella' | 'icahn';

export type CardCategory = 'action' | 'response' | 'corporate' | 'email' | 'revenue';

export type RiskLevel = 1 | 2 | 3; // safe, moderate, volatile

export type ResponseType = 'pc' | 'risk' | 'evil' | 'defer';

export type SituationSeverity = 1 | 2 | 3 | 4; // minor, moderate, major, critical

export type DirectiveId = 'profitFloor' | 'profitIncrease';

export type FollowUpKind = 'good' | 'meh' | 'crisis';

// ── Organization ─────────────────────────────────────────────────

export type OrgState = Readonly<Record<MeterName, number>>;

// ── Effects ──────────────────────────────────────────────────────

export type Effect =
  | { readonly kind: 'meter'; readonly meter: MeterName; readonly delta: number }
  | { readonly kind: 'profit'; readonly delta: number }
  | { readonly kind: 'fine'; readonly amount: number; readonly reason: string };

export interface OutcomeProfile {
  readonly good: readonly Effect[];
  readonly expected: readonly Effect[];
  readonly bad: readonly Effect[];
}

// ── Content ──────────────────────────────────────────────────────

export interface Choice {
  readonly choiceId: string;
  readonly label: string;
  /** Flat effects, used when there is no outcome profile. */
  readonly effects: readonly Effect[];
  readonly outcomeProfile: OutcomeProfile | null;
  readonly corporateIntensityDelta: number;
  readonly pcCost: number;
  readonly isDefer: boolean;
}

export interface EventCard {
  readonly eventId: string;
  readonly title: string;
  readonly description: string;
  readonly choices: readonly Choice[];
}

export interface PlayableCard {
  readonly cardId: string;
  readonly title: string;
  readonly description: string;
  readonly outcomes: OutcomeProfile;
  readonly corporateIntensity: number;
  readonly category: CardCategory;
  readonly meterAffinity: MeterName | null;
  readonly riskLevel: RiskLevel;
}

export interface SituationResponse {
  readonly type: ResponseType;
  readonly label: string;
  readonly outcomes: OutcomeProfile | null;
  readonly pcCost: number;
  readonly evilDelta: number;
}

export interface SituationDefinition {
  readonly situationId: string;
  readonly title: string;
  readonly description: string;
  readonly severity: SituationSeverity;
  readonly responses: readonly SituationResponse[];
  /** Applied once when a lingering crisis from this situation expires. */
  readonly baseImpact: readonly MeterImpact[];
  /** Applied every resolution while a lingering crisis is active. */
  readonly ongoingImpact: readonly MeterImpact[];
  readonly lingerQuarters: number;
}

export interface MeterImpact {
  readonly meter: MeterName;
  readonly delta: number;
}

export interface SituationTrigger {
  readonly situationId: string;
  readonly weight: number;
  /** null matches any outcome tier */
  readonly onOutcome: OutcomeTier | null;
}

export type SituationPools = Readonly<Record<OutcomeTier, readonly string[]>>;

export interface GameContent {
  readonly cards: ReadonlyMap<string, PlayableCard>;
  readonly crisisEvents: ReadonlyMap<string, EventCard>;
  readonly situations: ReadonlyMap<string, SituationDefinition>;
  readonly cardSituations: ReadonlyMap<string, readonly SituationTrigger[]>;
  readonly situationPools: SituationPools;
  readonly followUpPools: SituationPools;
}

// ── Configuration ────────────────────────────────────────────────

export interface DifficultySettings {
  readonly id: DifficultyId;
  readonly label: string;
  readonly retirementThreshold: number;
  readonly decayStartQuarter: number;
  readonly decayEnabled: boolean;
  readonly successRewardBonus: number;
  readonly startingFavorability: number;
}

/** Everything `advance` needs besides state, input and randomness. */
export interface EngineEnv {
  readonly settings: DifficultySettings;
  readonly content: GameContent;
}

// ── Tenure ───────────────────────────────────────────────────────

export interface CeoState {
  readonly pressure: number;
  readonly quartersSurvived: number;
  readonly favorability: number;
  readonly isOusted: boolean;
  readonly hasRetired: boolean;
  readonly totalProfit: number;
  readonly evilScore: number;
  readonly evilScoreLastQuarter: number;
  readonly lastQuarterProfit: number;
  /** Project impact accumulated during the current quarter. */
  readonly currentQuarterProfit: number;
  readonly recentProfits: readonly number[];
  readonly consecutiveSuccesses: number;
  readonly consecutiveNegativeQuarters: number;
  readonly consecutiveWeakProjectQuarters: number;
  readonly totalCardsPlayed: number;
  readonly accumulatedBonus: number;
  readonly quarterlyBonusAwarded: number;
}

export interface ResourceState {
  readonly politicalCapital: number;
}

export interface QuarterCursor {
  readonly quarterNumber: number;
  readonly phase: Phase;
}

// ── Deferred Records ─────────────────────────────────────────────

export interface PendingSituation {
  readonly situationId: string;
  readonly originCardId: string;
  readonly scheduledQuarter: number;
  readonly queuedAtQuarter: number;
  readonly deferCount: number;
}

export interface PendingFollowUp {
  readonly cardId: string;
  readonly cardTitle: string;
  readonly playedAtQuarter: number;
  readonly originalOutcome: OutcomeTier;
}

export interface CrisisInstance {
  readonly instanceId: string;
  readonly situationId: string;
  readonly title: string;
  readonly createdQuarter: number;
  readonly deadlineQuarter: number;
  readonly ongoingImpact: readonly MeterImpact[];
  readonly baseImpact: readonly MeterImpact[];
}

// ── Decks ────────────────────────────────────────────────────────

export interface Deck<T> {
  readonly drawPile: readonly T[];
  readonly discardPile: readonly T[];
}

/** The crisis awaiting a response this quarter. */
export type CrisisRef =
  | { readonly source: 'event'; readonly eventId: string }
  | { readonly source: 'situation'; readonly situation: PendingSituation };

// ── Game State ───────────────────────────────────────────────────

export interface QuarterSnapshot {
  readonly quarter: number;
  readonly profit: number;
  readonly totalProfit: number;
  readonly favorability: number;
  readonly evilScore: number;
  readonly bonus: number;
  readonly directiveMet: boolean;
  readonly cardsPlayed: number;
  readonly politicalCapital: number;
  readonly org: OrgState;
}

export interface GameState {
  readonly version: number;
  readonly seed: number;
  readonly difficulty: DifficultyId;
  readonly org: OrgState;
  readonly quarter: QuarterCursor;
  readonly ceo: CeoState;
  readonly resources: ResourceState;
  /** Card and event decks hold content ids. */
  readonly crisisDeck: Deck<string>;
  readonly cardDeck: Deck<string>;
  readonly hand: readonly string[];
  readonly currentCrisis: CrisisRef | null;
  readonly currentDirective: DirectiveId;
  readonly cardsPlayedThisQuarter: readonly string[];
  readonly pendingSituations: readonly PendingSituation[];
  readonly deferredSituations: readonly PendingSituation[];
  readonly pendingFollowUps: readonly PendingFollowUp[];
  readonly crises: readonly CrisisInstance[];
  readonly history: readonly QuarterSnapshot[];
}

// ── Input ────────────────────────────────────────────────────────

export type QuarterInput =
  | { readonly kind: 'continue' }
  | { readonly kind: 'playCard'; readonly cardId: string; readonly endPlayPhase?: boolean }
  | { readonly kind: 'endPlayPhase' }
  | { readonly kind: 'exchangeMeter'; readonly meter: MeterName; readonly amount: number }
  | { readonly kind: 'boostMeter'; readonly meter: MeterName }
  | { readonly kind: 'schmoozeBoard' }
  | { readonly kind: 'reorgHand' }
  | { readonly kind: 'redeemEvil' }
  | { readonly kind: 'chooseResponse'; readonly choiceId: string }
  | { readonly kind: 'retire' };

export type InputKind = QuarterInput['kind'];

// ── Log ──────────────────────────────────────────────────────────

export type LogEntry =
  | { readonly kind: 'info'; readonly message: string }
  | { readonly kind: 'meterChange'; readonly meter: MeterName; readonly delta: number; readonly message: string }
  | { readonly kind: 'outcome'; readonly tier: OutcomeTier; readonly source: string; readonly message: string }
  | { readonly kind: 'event'; readonly message: string };

export interface QuarterLog {
  readonly quarterNumber: number;
  readonly phase: Phase;
  readonly entries: readonly LogEntry[];
}

export interface AdvanceResult {
  readonly state: GameState;
  readonly log: QuarterLog;
}
