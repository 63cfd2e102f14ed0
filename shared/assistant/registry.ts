import type {
  EntityKey,
  IntentType,
  Module,
  ParameterValue,
  Prerequisite,
} from './types';

export interface IntentDestination {
  module: Module;
  screen: string;
  defaults?: Record<string, ParameterValue>;
}

export interface IntentDefinition {
  type: IntentType;
  displayName: string;
  description: string;
  /** Short label shown on clarification chips. */
  chipLabel: string;
  requiredEntities: EntityKey[];
  acceptedEntities: EntityKey[];
  /** `null` for intents answered inline without navigation. */
  destination: IntentDestination | null;
  prerequisites: Prerequisite[];
  offlineAvailable: boolean;
  /** Shown when the intent is recognised offline but needs the network. */
  offlineLimitation?: string;
  examplePhrases: string[];
}

const DEFINITIONS: readonly IntentDefinition[] = [
  {
    type: 'CLUB_ADJUSTMENT',
    displayName: 'Adjust Club',
    description: 'Update a club distance or setting in your bag',
    chipLabel: 'Adjust Club',
    requiredEntities: ['club'],
    acceptedEntities: ['club', 'yardage'],
    destination: { module: 'CADDY', screen: 'club_adjustment' },
    prerequisites: ['BAG_CONFIGURED'],
    offlineAvailable: true,
    examplePhrases: ['my 7-iron goes 160 now', 'adjust my driver distance'],
  },
  {
    type: 'RECOVERY_CHECK',
    displayName: 'Check Recovery',
    description: 'Review sleep, HRV and readiness',
    chipLabel: 'Check Recovery',
    requiredEntities: [],
    acceptedEntities: ['fatigue', 'pain'],
    destination: { module: 'RECOVERY', screen: 'overview' },
    prerequisites: ['RECOVERY_DATA'],
    offlineAvailable: false,
    offlineLimitation: 'Recovery insights need an internet connection. Try again when you are back online.',
    examplePhrases: ["how's my recovery", 'am I recovered'],
  },
  {
    type: 'SHOT_RECOMMENDATION',
    displayName: 'Get Shot Advice',
    description: 'Club and target advice for the next shot',
    chipLabel: 'Shot Advice',
    requiredEntities: [],
    acceptedEntities: ['club', 'yardage', 'lie', 'wind'],
    destination: { module: 'CADDY', screen: 'shot_recommendation' },
    prerequisites: ['BAG_CONFIGURED'],
    offlineAvailable: false,
    offlineLimitation: "Shot recommendations need an internet connection. I can't give advice offline.",
    examplePhrases: ['what should I hit from 150', 'which club here'],
  },
  {
    type: 'SCORE_ENTRY',
    displayName: 'Enter Score',
    description: 'Record a score for a hole',
    chipLabel: 'Enter Score',
    requiredEntities: [],
    acceptedEntities: ['holeNumber', 'score', 'scoreContext'],
    destination: { module: 'CADDY', screen: 'score_entry' },
    prerequisites: ['ROUND_ACTIVE'],
    offlineAvailable: true,
    examplePhrases: ['enter score for hole 5', 'I made a bogey'],
  },
  {
    type: 'PATTERN_QUERY',
    displayName: 'Check Miss Patterns',
    description: 'Your recurring miss tendencies',
    chipLabel: 'Miss Patterns',
    requiredEntities: [],
    acceptedEntities: ['club'],
    destination: null,
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ['where do I usually miss', 'do I slice my driver'],
  },
  {
    type: 'DRILL_REQUEST',
    displayName: 'Find a Drill',
    description: 'Practice drills for your game',
    chipLabel: 'Find Drill',
    requiredEntities: [],
    acceptedEntities: ['club'],
    destination: { module: 'COACH', screen: 'drills' },
    prerequisites: [],
    offlineAvailable: false,
    offlineLimitation: 'Drill suggestions need an internet connection. Try again when you reconnect.',
    examplePhrases: ['give me a putting drill', 'how do I practice'],
  },
  {
    type: 'WEATHER_CHECK',
    displayName: 'Check Weather',
    description: 'Wind and conditions on the course',
    chipLabel: 'Check Weather',
    requiredEntities: [],
    acceptedEntities: ['wind'],
    destination: { module: 'CADDY', screen: 'weather', defaults: { view: 'current' } },
    prerequisites: [],
    offlineAvailable: false,
    offlineLimitation: "Weather data needs an internet connection. I can't check conditions offline.",
    examplePhrases: ["what's the wind doing", 'is it going to rain'],
  },
  {
    type: 'STATS_LOOKUP',
    displayName: 'View Stats',
    description: 'Scoring and shot statistics',
    chipLabel: 'View Stats',
    requiredEntities: [],
    acceptedEntities: ['club'],
    destination: { module: 'CADDY', screen: 'stats', defaults: { period: 'recent' } },
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ['show my stats', 'what is my average'],
  },
  {
    type: 'ROUND_START',
    displayName: 'Start Round',
    description: 'Begin a new round',
    chipLabel: 'Start Round',
    requiredEntities: [],
    acceptedEntities: [],
    destination: { module: 'CADDY', screen: 'round_start' },
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ['start a new round', "let's tee off"],
  },
  {
    type: 'ROUND_END',
    displayName: 'End Round',
    description: 'Finish the current round',
    chipLabel: 'End Round',
    requiredEntities: [],
    acceptedEntities: [],
    destination: { module: 'CADDY', screen: 'round_summary' },
    prerequisites: ['ROUND_ACTIVE'],
    offlineAvailable: true,
    examplePhrases: ['end my round', "I'm done for the day"],
  },
  {
    type: 'EQUIPMENT_INFO',
    displayName: 'View Equipment',
    description: 'Clubs and distances in your bag',
    chipLabel: 'My Bag',
    requiredEntities: [],
    acceptedEntities: ['club'],
    destination: { module: 'CADDY', screen: 'bag' },
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ["what's in my bag", 'show my clubs'],
  },
  {
    type: 'COURSE_INFO',
    displayName: 'Course Info',
    description: 'Hole layouts and course details',
    chipLabel: 'Course Info',
    requiredEntities: [],
    acceptedEntities: ['holeNumber'],
    destination: { module: 'CADDY', screen: 'course_info' },
    prerequisites: ['COURSE_SELECTED'],
    offlineAvailable: false,
    offlineLimitation: 'Course details need an internet connection. Try again when you are back online.',
    examplePhrases: ['tell me about this hole', 'what does hole 7 look like'],
  },
  {
    type: 'SETTINGS_CHANGE',
    displayName: 'Change Settings',
    description: 'Units, voice and app preferences',
    chipLabel: 'Settings',
    requiredEntities: [],
    acceptedEntities: [],
    destination: { module: 'SETTINGS', screen: 'preferences' },
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ['switch to meters', 'change my settings'],
  },
  {
    type: 'HELP_REQUEST',
    displayName: 'Get Help',
    description: 'What I can do for you',
    chipLabel: 'Help',
    requiredEntities: [],
    acceptedEntities: [],
    destination: null,
    prerequisites: [],
    offlineAvailable: true,
    examplePhrases: ['what can you do', 'help'],
  },
  {
    type: 'FEEDBACK',
    displayName: 'Send Feedback',
    description: 'Tell us how the assistant is doing',
    chipLabel: 'Feedback',
    requiredEntities: [],
    acceptedEntities: [],
    destination: null,
    prerequisites: [],
    offlineAvailable: false,
    offlineLimitation: 'Feedback is sent once you are back online. Try again when you reconnect.',
    examplePhrases: ['that was wrong', 'report a problem'],
  },
  {
    type: 'BAILOUT_QUERY',
    displayName: 'Find Bailout',
    description: 'Safe miss areas for this hole',
    chipLabel: 'Bailout Area',
    requiredEntities: [],
    acceptedEntities: ['holeNumber'],
    destination: { module: 'CADDY', screen: 'bailout' },
    prerequisites: [],
    offlineAvailable: false,
    offlineLimitation: 'Bailout areas need live course data. Try again when you are back online.',
    examplePhrases: ["where's the safe miss", 'where should I bail out'],
  },
  {
    type: 'READINESS_CHECK',
    displayName: 'Check Readiness',
    description: 'How ready you are to play today',
    chipLabel: 'Readiness',
    requiredEntities: [],
    acceptedEntities: ['fatigue', 'pain'],
    destination: { module: 'RECOVERY', screen: 'readiness' },
    prerequisites: [],
    offlineAvailable: false,
    offlineLimitation: 'Readiness scoring needs an internet connection. Try again when you reconnect.',
    examplePhrases: ['am I ready to play', 'how ready am I'],
  },
];

const BY_TYPE: ReadonlyMap<IntentType, IntentDefinition> = new Map(
  DEFINITIONS.map((definition) => [definition.type, definition]),
);

export function getIntentDefinition(type: IntentType): IntentDefinition {
  const definition = BY_TYPE.get(type);
  if (!definition) {
    // every IntentType is listed above; reaching this means the table drifted
    throw new Error(`No registry entry for intent ${type}`);
  }
  return definition;
}

export function listIntentDefinitions(): readonly IntentDefinition[] {
  return DEFINITIONS;
}

export function registryOrder(type: IntentType): number {
  return DEFINITIONS.findIndex((definition) => definition.type === type);
}
