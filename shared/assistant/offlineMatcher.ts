import keywordData from './data/keywords.json';
import { ContractViolationError } from './errors';
import { getIntentDefinition, listIntentDefinitions, registryOrder } from './registry';
import { INTENT_TYPES, isIntentType, type IntentScore, type IntentType } from './types';

export type KeywordTable = Partial<Record<IntentType, Record<string, number>>>;

export const OFFLINE_STRONG_THRESHOLD = 0.7;
export const OFFLINE_WEAK_THRESHOLD = 0.4;
export const OFFLINE_MAX_SUGGESTIONS = 3;

export const OFFLINE_MODE_MESSAGE =
  "You're offline. I can help with scores, stats, equipment, and settings. Full features will be back when you reconnect.";

export type OfflineMatchResult =
  | { status: 'match'; intent: IntentType; score: number }
  | { status: 'clarify'; candidates: IntentScore[] }
  | { status: 'requires_online'; intent: IntentType; score: number; message: string }
  | { status: 'no_match'; message: string };

export interface OfflineMatcherConfig {
  strongThreshold?: number;
  weakThreshold?: number;
  maxSuggestions?: number;
  keywords?: KeywordTable;
}

interface CompiledKeyword {
  pattern: RegExp;
  weight: number;
}

interface CompiledIntent {
  intent: IntentType;
  keywords: CompiledKeyword[];
  totalWeight: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function readDefaultKeywords(): KeywordTable {
  const table: KeywordTable = {};
  const source: Record<string, Record<string, number>> = keywordData;
  for (const [intent, keywords] of Object.entries(source)) {
    if (isIntentType(intent)) {
      table[intent] = { ...keywords };
    }
  }
  return table;
}

const DEFAULT_KEYWORDS: KeywordTable = readDefaultKeywords();

function compile(table: KeywordTable): CompiledIntent[] {
  const compiled: CompiledIntent[] = [];
  for (const intent of INTENT_TYPES) {
    const keywords = table[intent];
    if (!keywords) {
      continue;
    }
    const entries = Object.entries(keywords)
      .filter(([keyword, weight]) => keyword.trim().length > 0 && Number.isFinite(weight) && weight > 0)
      .map(([keyword, weight]) => ({
        pattern: new RegExp(`(?<![\\w'-])${escapeRegExp(keyword.trim().toLowerCase())}(?![\\w'-])`),
        weight,
      }));
    const totalWeight = entries.reduce((sum, entry) => sum + entry.weight, 0);
    if (totalWeight > 0) {
      compiled.push({ intent, keywords: entries, totalWeight });
    }
  }
  return compiled;
}

function sortScores(scores: IntentScore[]): IntentScore[] {
  return scores.sort((a, b) => b.score - a.score || registryOrder(a.intent) - registryOrder(b.intent));
}

/**
 * Deterministic keyword scorer used when the remote classifier cannot be
 * reached. Only intents that work without a connection can match; the
 * online-only ones are scored to explain why a request can't be served.
 */
export class OfflineIntentMatcher {
  readonly strongThreshold: number;
  readonly weakThreshold: number;
  private readonly maxSuggestions: number;
  private readonly compiled: CompiledIntent[];

  constructor(cfg: OfflineMatcherConfig = {}) {
    this.strongThreshold = cfg.strongThreshold ?? OFFLINE_STRONG_THRESHOLD;
    this.weakThreshold = cfg.weakThreshold ?? OFFLINE_WEAK_THRESHOLD;
    if (!(this.weakThreshold >= 0 && this.weakThreshold <= this.strongThreshold && this.strongThreshold <= 1)) {
      throw new ContractViolationError('thresholds', 'expected 0 <= weak <= strong <= 1');
    }
    this.maxSuggestions = Math.max(1, Math.floor(cfg.maxSuggestions ?? OFFLINE_MAX_SUGGESTIONS));
    this.compiled = compile(cfg.keywords ?? DEFAULT_KEYWORDS);
  }

  /** Scores every intent in `intents` against the text. Zero scores are dropped. */
  score(normalizedText: string, intents: readonly IntentType[] = INTENT_TYPES): IntentScore[] {
    const text = normalizedText.toLowerCase();
    if (!text.trim()) {
      return [];
    }
    const wanted = new Set(intents);
    const scores: IntentScore[] = [];
    for (const entry of this.compiled) {
      if (!wanted.has(entry.intent)) {
        continue;
      }
      const matched = entry.keywords.reduce((sum, keyword) => (keyword.pattern.test(text) ? sum + keyword.weight : sum), 0);
      if (matched > 0) {
        scores.push({ intent: entry.intent, score: Math.min(1, matched / entry.totalWeight) });
      }
    }
    return sortScores(scores);
  }

  /** Scores over the intents available offline, best first. */
  match(normalizedText: string): IntentScore[] {
    return this.score(normalizedText, this.offlineIntents());
  }

  resolve(normalizedText: string): OfflineMatchResult {
    const scores = this.match(normalizedText);
    const strong = scores.filter((entry) => entry.score >= this.strongThreshold);
    const [first] = strong;
    if (strong.length === 1 && first) {
      return { status: 'match', intent: first.intent, score: first.score };
    }
    const best = scores[0];
    if (best && best.score >= this.weakThreshold) {
      return { status: 'clarify', candidates: scores.slice(0, this.maxSuggestions) };
    }

    const onlineOnly = this.score(normalizedText, this.onlineOnlyIntents());
    const online = onlineOnly[0];
    if (online && online.score >= this.weakThreshold) {
      const limitation = getIntentDefinition(online.intent).offlineLimitation ?? OFFLINE_MODE_MESSAGE;
      return { status: 'requires_online', intent: online.intent, score: online.score, message: limitation };
    }
    return { status: 'no_match', message: OFFLINE_MODE_MESSAGE };
  }

  private offlineIntents(): IntentType[] {
    return listIntentDefinitions()
      .filter((definition) => definition.offlineAvailable)
      .map((definition) => definition.type);
  }

  private onlineOnlyIntents(): IntentType[] {
    return listIntentDefinitions()
      .filter((definition) => !definition.offlineAvailable)
      .map((definition) => definition.type);
  }
}
