export const INTENT_TYPES = [
  'CLUB_ADJUSTMENT',
  'RECOVERY_CHECK',
  'SHOT_RECOMMENDATION',
  'SCORE_ENTRY',
  'PATTERN_QUERY',
  'DRILL_REQUEST',
  'WEATHER_CHECK',
  'STATS_LOOKUP',
  'ROUND_START',
  'ROUND_END',
  'EQUIPMENT_INFO',
  'COURSE_INFO',
  'SETTINGS_CHANGE',
  'HELP_REQUEST',
  'FEEDBACK',
  'BAILOUT_QUERY',
  'READINESS_CHECK',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export function isIntentType(value: unknown): value is IntentType {
  return typeof value === 'string' && (INTENT_TYPES as readonly string[]).includes(value);
}

export type Module = 'CADDY' | 'COACH' | 'RECOVERY' | 'SETTINGS';

export type Prerequisite = 'RECOVERY_DATA' | 'ROUND_ACTIVE' | 'BAG_CONFIGURED' | 'COURSE_SELECTED';

export const LIES = ['tee', 'fairway', 'rough', 'bunker', 'green', 'fringe', 'trees', 'hazard'] as const;

export type Lie = (typeof LIES)[number];

export type EntityKey =
  | 'club'
  | 'yardage'
  | 'lie'
  | 'holeNumber'
  | 'score'
  | 'wind'
  | 'fatigue'
  | 'pain'
  | 'scoreContext';

export interface ExtractedEntities {
  club?: string;
  yardage?: number;
  lie?: Lie;
  holeNumber?: number;
  score?: number;
  wind?: string;
  fatigue?: number;
  pain?: string;
  scoreContext?: string;
}

export interface Intent {
  readonly id: string;
  readonly type: IntentType;
  readonly confidence: number;
  readonly entities: Readonly<ExtractedEntities>;
  readonly rawInput: string;
}

export type ParameterValue = string | number | boolean;

export interface RoutingTarget {
  module: Module;
  screen: string;
  parameters: Record<string, ParameterValue>;
}

export type InputMode = 'text' | 'voice';

export interface IntentScore {
  intent: IntentType;
  score: number;
}

export type ClarificationTier = 'low' | 'very_low' | 'offline' | 'missing_entity';

export interface ClarificationSuggestion {
  intent: IntentType;
  label: string;
  description: string;
}

export interface Clarification {
  tier: ClarificationTier;
  message: string;
  suggestions: ClarificationSuggestion[];
}

export type ClassificationSource = 'online' | 'offline';

export type ClassificationVerdict =
  | { kind: 'route'; intent: Intent; source: ClassificationSource }
  | { kind: 'confirm'; intent: Intent; message: string; source: ClassificationSource }
  | {
      kind: 'clarify';
      intent: Intent | null;
      clarification: Clarification;
      source: ClassificationSource;
    }
  | { kind: 'inline'; intent: Intent | null; message: string; source: ClassificationSource };

export type RoutingResult =
  | { kind: 'navigate'; intent: Intent; target: RoutingTarget; route: string }
  | { kind: 'no_navigation'; intent: Intent | null; response: string }
  | {
      kind: 'confirmation_required';
      intent: Intent | null;
      message: string;
      suggestions: IntentType[];
    }
  | {
      kind: 'prerequisite_missing';
      intent: Intent;
      missing: Prerequisite[];
      message: string;
    };

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
  timestamp: number;
}
