/**
 * Content catalog loading. Raw JSON is validated with zod, then checked for
 * cross-references (trigger mappings and pools naming real cards and
 * situations). Any problem throws before a game can start.
 */
import { z } from 'zod';
import cardsJson from '../data/content/cards.json';
import crisisEventsJson from '../data/content/crisisEvents.json';
import situationsJson from '../data/content/situations.json';
import triggersJson from '../data/content/triggers.json';
import type {
  EventCard,
  GameContent,
  PlayableCard,
  SituationDefinition,
  SituationPools,
  SituationTrigger,
} from './types';

// ── Schemas ──────────────────────────────────────────────────────

const MeterSchema = z.enum(['delivery', 'morale', 'governance', 'alignment', 'runway']);
const TierSchema = z.enum(['good', 'expected', 'bad']);
const IdSchema = z.string().min(1).regex(/^[a-z0-9_]+$/, 'ID must be lowercase letters, numbers or underscores');

const EffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('meter'), meter: MeterSchema, delta: z.number().int() }),
  z.object({ kind: z.literal('profit'), delta: z.number().int() }),
  z.object({ kind: z.literal('fine'), amount: z.number().int().min(0), reason: z.string().default('Legal settlement') }),
]);

const OutcomeProfileSchema = z.object({
  good: z.array(EffectSchema),
  expected: z.array(EffectSchema),
  bad: z.array(EffectSchema),
});

const MeterImpactSchema = z.object({ meter: MeterSchema, delta: z.number().int() });

const CardSchema = z.object({
  id: IdSchema,
  title: z.string().min(1),
  description: z.string().default(''),
  category: z.enum(['action', 'response', 'corporate', 'email', 'revenue']),
  riskLevel: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(1),
  meterAffinity: MeterSchema.nullable().default(null),
  corporateIntensity: z.number().int().min(0).default(0),
  outcomes: OutcomeProfileSchema,
});

const ChoiceSchema = z.object({
  id: IdSchema,
  label: z.string().min(1),
  effects: z.array(EffectSchema).default([]),
  outcomes: OutcomeProfileSchema.nullable().default(null),
  corporateIntensityDelta: z.number().int().min(0).default(0),
  pcCost: z.number().int().min(0).default(0),
});

const CrisisEventSchema = z.object({
  id: IdSchema,
  title: z.string().min(1),
  description: z.string().default(''),
  choices: z.array(ChoiceSchema).min(2, 'needs at least 2 choices').max(4, 'allows at most 4 choices'),
});

const ResponseSchema = z.object({
  type: z.enum(['pc', 'risk', 'evil', 'defer']),
  label: z.string().min(1),
  outcomes: OutcomeProfileSchema.nullable().default(null),
  pcCost: z.number().int().min(0).default(0),
  evilDelta: z.number().int().min(0).default(0),
});

const SituationSchema = z.object({
  id: IdSchema,
  title: z.string().min(1),
  description: z.string().default(''),
  severity: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  responses: z.array(ResponseSchema).length(4, 'needs exactly 4 responses'),
  baseImpact: z.array(MeterImpactSchema).default([]),
  ongoingImpact: z.array(MeterImpactSchema).default([]),
  lingerQuarters: z.number().int().min(0).default(2),
});

const TriggerSchema = z.object({
  situationId: IdSchema,
  weight: z.number().int().positive(),
  onOutcome: TierSchema.nullable().default(null),
});

const PoolsSchema = z.object({
  good: z.array(IdSchema),
  expected: z.array(IdSchema),
  bad: z.array(IdSchema),
});

const TriggersSchema = z.object({
  cardSituations: z.record(IdSchema, z.array(TriggerSchema)),
  situationPools: PoolsSchema,
  followUpPools: PoolsSchema,
});

export interface RawContent {
  readonly cards: unknown;
  readonly crisisEvents: unknown;
  readonly situations: unknown;
  readonly triggers: unknown;
}

// ── Validation Helpers ───────────────────────────────────────────

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Invalid ${label}${path}: ${issue.message}`);
  }
  return result.data;
}

function indexById<T>(items: readonly T[], idOf: (item: T) => string, label: string): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    const id = idOf(item);
    if (map.has(id)) throw new Error(`Duplicate ${label} id: ${id}`);
    map.set(id, item);
  }
  return map;
}

function checkKnown(ids: Iterable<string>, known: ReadonlyMap<string, unknown>, where: string): void {
  for (const id of ids) {
    if (!known.has(id)) throw new Error(`Unknown situation "${id}" referenced by ${where}`);
  }
}

// ── Loader ───────────────────────────────────────────────────────

export function loadContent(raw: RawContent): GameContent {
  const cardList = parseOrThrow(z.array(CardSchema), raw.cards, 'cards');
  const eventList = parseOrThrow(z.array(CrisisEventSchema), raw.crisisEvents, 'crisis events');
  const situationList = parseOrThrow(z.array(SituationSchema), raw.situations, 'situations');
  const triggers = parseOrThrow(TriggersSchema, raw.triggers, 'triggers');

  const cards = indexById<PlayableCard>(
    cardList.map((c) => ({
      cardId: c.id,
      title: c.title,
      description: c.description,
      outcomes: c.outcomes,
      corporateIntensity: c.corporateIntensity,
      category: c.category,
      meterAffinity: c.meterAffinity,
      riskLevel: c.riskLevel,
    })),
    (c) => c.cardId,
    'card',
  );

  const crisisEvents = indexById<EventCard>(
    eventList.map((e) => {
      indexById(e.choices, (c) => c.id, `choice in ${e.id}`);
      return {
        eventId: e.id,
        title: e.title,
        description: e.description,
        choices: e.choices.map((c) => ({
          choiceId: c.id,
          label: c.label,
          effects: c.effects,
          outcomeProfile: c.outcomes,
          corporateIntensityDelta: c.corporateIntensityDelta,
          pcCost: c.pcCost,
          isDefer: false,
        })),
      };
    }),
    (e) => e.eventId,
    'crisis event',
  );

  const situations = indexById<SituationDefinition>(
    situationList.map((s) => {
      const types = new Set(s.responses.map((r) => r.type));
      if (types.size !== 4) throw new Error(`Situation ${s.id} needs one response of each type (pc, risk, evil, defer)`);
      return {
        situationId: s.id,
        title: s.title,
        description: s.description,
        severity: s.severity,
        responses: s.responses,
        baseImpact: s.baseImpact,
        ongoingImpact: s.ongoingImpact,
        lingerQuarters: s.lingerQuarters,
      };
    }),
    (s) => s.situationId,
    'situation',
  );

  const cardSituations = new Map<string, readonly SituationTrigger[]>();
  for (const [cardId, list] of Object.entries(triggers.cardSituations)) {
    if (!cards.has(cardId)) throw new Error(`Unknown card "${cardId}" in situation mappings`);
    checkKnown(list.map((t) => t.situationId), situations, `card ${cardId}`);
    cardSituations.set(cardId, list);
  }

  const pools = (p: z.infer<typeof PoolsSchema>, label: string): SituationPools => {
    checkKnown([...p.good, ...p.expected, ...p.bad], situations, label);
    return { good: p.good, expected: p.expected, bad: p.bad };
  };

  return {
    cards,
    crisisEvents,
    situations,
    cardSituations,
    situationPools: pools(triggers.situationPools, 'situation pools'),
    followUpPools: pools(triggers.followUpPools, 'follow-up pools'),
  };
}

/** The bundled starter catalog. */
export function loadDefaultContent(): GameContent {
  return loadContent({
    cards: cardsJson,
    crisisEvents: crisisEventsJson,
    situations: situationsJson,
    triggers: triggersJson,
  });
}

// ── Lookups ──────────────────────────────────────────────────────

export function getCard(content: GameContent, cardId: string): PlayableCard {
  const card = content.cards.get(cardId);
  if (card === undefined) throw new Error(`Unknown card: ${cardId}`);
  return card;
}

export function getCrisisEvent(content: GameContent, eventId: string): EventCard {
  const crisisEvent = content.crisisEvents.get(eventId);
  if (crisisEvent === undefined) throw new Error(`Unknown crisis event: ${eventId}`);
  return crisisEvent;
}

export function getSituation(content: GameContent, situationId: string): SituationDefinition {
  const situation = content.situations.get(situationId);
  if (situation === undefined) throw new Error(`Unknown situation: ${situationId}`);
  return situation;
}
