import { getIntentDefinition, registryOrder } from './registry';
import type {
  Clarification,
  ClarificationSuggestion,
  ClarificationTier,
  EntityKey,
  IntentScore,
  IntentType,
} from './types';

export const MAX_SUGGESTIONS = 3;

export const DEFAULT_SUGGESTIONS: readonly IntentType[] = Object.freeze([
  'SHOT_RECOMMENDATION',
  'HELP_REQUEST',
  'STATS_LOOKUP',
]);

const TIER_MESSAGES: Readonly<Record<Exclude<ClarificationTier, 'missing_entity'>, string>> = Object.freeze({
  low: "I'm not quite sure what you meant. Did you mean one of these?",
  very_low: "Sorry, I didn't catch that. Here are some things I can help with:",
  offline: "I'm offline and need a bit more clarity. Did you mean:",
});

const ENTITY_LABELS: Readonly<Record<EntityKey, string>> = Object.freeze({
  club: 'club',
  yardage: 'distance',
  lie: 'lie',
  holeNumber: 'hole number',
  score: 'score',
  wind: 'wind',
  fatigue: 'fatigue level',
  pain: 'pain area',
  scoreContext: 'score',
});

export interface ClarificationOptions {
  /** Intent awaiting entities, for the `missing_entity` tier. */
  intent?: IntentType;
  missing?: readonly EntityKey[];
}

export function missingEntityMessage(intent: IntentType, missing: readonly EntityKey[]): string {
  const labels = missing.map((key) => ENTITY_LABELS[key]);
  const list = labels.length > 0 ? labels.join(' and ') : 'a few details';
  return `To ${getIntentDefinition(intent).displayName.toLowerCase()}, I need the ${list}. Which did you mean?`;
}

function toSuggestion(intent: IntentType): ClarificationSuggestion {
  const definition = getIntentDefinition(intent);
  return { intent, label: definition.chipLabel, description: definition.description };
}

/** Top distinct intents by their best score; zero scores never count. */
export function rankSuggestions(candidates: readonly IntentScore[], limit = MAX_SUGGESTIONS): IntentType[] {
  const best = new Map<IntentType, number>();
  for (const candidate of candidates) {
    if (!(candidate.score > 0)) {
      continue;
    }
    const previous = best.get(candidate.intent);
    if (previous === undefined || candidate.score > previous) {
      best.set(candidate.intent, candidate.score);
    }
  }
  return Array.from(best.entries())
    .sort(([a, scoreA], [b, scoreB]) => scoreB - scoreA || registryOrder(a) - registryOrder(b))
    .slice(0, Math.max(0, limit))
    .map(([intent]) => intent);
}

export function generateClarification(
  candidates: readonly IntentScore[],
  tier: ClarificationTier,
  options: ClarificationOptions = {},
): Clarification {
  const ranked = rankSuggestions(candidates);
  const intents = ranked.length > 0 ? ranked : [...DEFAULT_SUGGESTIONS];
  const message =
    tier === 'missing_entity'
      ? options.intent
        ? missingEntityMessage(options.intent, options.missing ?? [])
        : TIER_MESSAGES.low
      : TIER_MESSAGES[tier];
  return { tier, message, suggestions: intents.map(toSuggestion) };
}
