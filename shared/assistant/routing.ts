import { prerequisiteMessage, type PrerequisiteChecker } from './prerequisites';
import { getIntentDefinition } from './registry';
import { buildRoute, canonicalParameters } from './routeBuilder';
import type {
  ClassificationVerdict,
  EntityKey,
  ExtractedEntities,
  Intent,
  IntentType,
  ParameterValue,
  Prerequisite,
  RoutingResult,
  RoutingTarget,
} from './types';

/** Route parameter name for each entity. */
export const PARAMETER_KEYS: Readonly<Record<EntityKey, string>> = Object.freeze({
  club: 'club',
  yardage: 'yardage',
  lie: 'lie',
  holeNumber: 'hole',
  score: 'score',
  wind: 'wind',
  fatigue: 'fatigue',
  pain: 'pain',
  scoreContext: 'result',
});

const NO_NAVIGATION_RESPONSES: Partial<Record<IntentType, string>> = Object.freeze({
  PATTERN_QUERY: "Here's what I've noticed about your misses.",
  HELP_REQUEST:
    'I can enter scores, look up your stats, show your bag, suggest shots and drills, and check your recovery. Just ask.',
  FEEDBACK: "Thanks for the feedback. I've passed it along.",
});

export function noNavigationResponse(type: IntentType): string {
  return NO_NAVIGATION_RESPONSES[type] ?? getIntentDefinition(type).description;
}

function entityDetails(entities: ExtractedEntities): string[] {
  const details: string[] = [];
  if (entities.club) details.push(`with ${entities.club}`);
  if (entities.yardage !== undefined) details.push(`at ${entities.yardage} yards`);
  if (entities.holeNumber !== undefined) details.push(`on hole ${entities.holeNumber}`);
  if (entities.score !== undefined) details.push(`score ${entities.score}`);
  return details;
}

/** Fixed yes/no question for mid-confidence intents, e.g. "Did you want to enter score (on hole 5)?" */
export function confirmationMessage(intent: Pick<Intent, 'type' | 'entities'>): string {
  const name = getIntentDefinition(intent.type).displayName.toLowerCase();
  const details = entityDetails(intent.entities);
  return details.length > 0 ? `Did you want to ${name} (${details.join(', ')})?` : `Did you want to ${name}?`;
}

/** Static destination plus accepted entities, or `null` for inline intents. */
export function buildTarget(intent: Intent): RoutingTarget | null {
  const definition = getIntentDefinition(intent.type);
  if (!definition.destination) {
    return null;
  }
  const parameters: Record<string, ParameterValue> = { ...(definition.destination.defaults ?? {}) };
  for (const key of definition.acceptedEntities) {
    const value = intent.entities[key];
    if (value !== undefined) {
      parameters[PARAMETER_KEYS[key]] = value;
    }
  }
  return {
    module: definition.destination.module,
    screen: definition.destination.screen,
    parameters: canonicalParameters(parameters),
  };
}

export interface RoutingOrchestratorConfig {
  prerequisites: PrerequisiteChecker;
}

/**
 * Turns a classification verdict into exactly one routing result. The only
 * collaborator read is the prerequisite checker, asked about the intent's
 * declared prerequisites and nothing else.
 */
export class RoutingOrchestrator {
  private readonly checker: PrerequisiteChecker;

  constructor(cfg: RoutingOrchestratorConfig) {
    this.checker = cfg.prerequisites;
  }

  async route(verdict: ClassificationVerdict): Promise<RoutingResult> {
    switch (verdict.kind) {
      case 'clarify':
        return {
          kind: 'confirmation_required',
          intent: verdict.intent,
          message: verdict.clarification.message,
          suggestions: verdict.clarification.suggestions.map((suggestion) => suggestion.intent),
        };
      case 'inline':
        return { kind: 'no_navigation', intent: verdict.intent, response: verdict.message };
      case 'route':
      case 'confirm':
        return this.routeIntent(verdict.intent, verdict.kind === 'confirm' ? verdict.message : null);
    }
  }

  private async routeIntent(intent: Intent, confirmation: string | null): Promise<RoutingResult> {
    const declared = getIntentDefinition(intent.type).prerequisites;
    const missing = declared.length > 0 ? await this.unmet(declared) : [];
    if (missing.length > 0) {
      return { kind: 'prerequisite_missing', intent, missing, message: prerequisiteMessage(missing) };
    }
    if (confirmation !== null) {
      return { kind: 'confirmation_required', intent, message: confirmation, suggestions: [intent.type] };
    }
    const target = buildTarget(intent);
    if (!target) {
      return { kind: 'no_navigation', intent, response: noNavigationResponse(intent.type) };
    }
    return { kind: 'navigate', intent, target, route: buildRoute(target) };
  }

  private async unmet(declared: readonly Prerequisite[]): Promise<Prerequisite[]> {
    const reported = new Set(await this.checker.checkAll([...declared]));
    // keep declared order and ignore anything the checker was not asked about
    return declared.filter((prerequisite) => reported.has(prerequisite));
  }
}
