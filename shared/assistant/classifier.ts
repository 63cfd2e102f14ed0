import { ensureId } from '../core/ids';
import { emitReliabilityEvent } from '../reliability/events';
import { emitClassificationTelemetry, type TelemetryEmitter } from '../telemetry/assistant';
import { silentLogger, type Logger } from '../telemetry/logger';
import { generateClarification } from './clarification';
import { extractEntities, mergeEntities, missingEntities, sanitizeEntities } from './entities';
import { ClassifierUnavailableError, ContractViolationError, describeError, type UnavailableReason } from './errors';
import type { ClassifierCapability, ClassifierResponse } from './llmClient';
import type { NormalizedInput } from './normalizer';
import { OfflineIntentMatcher } from './offlineMatcher';
import { getIntentDefinition } from './registry';
import { confirmationMessage } from './routing';
import type { SessionSnapshot } from './session';
import {
  isIntentType,
  type ClassificationSource,
  type ClassificationVerdict,
  type ExtractedEntities,
  type InputMode,
  type Intent,
  type IntentScore,
  type IntentType,
} from './types';

export const ROUTE_THRESHOLD = 0.75;
export const CONFIRM_THRESHOLD = 0.5;
/** Below this the clarification uses the "didn't catch that" wording. */
export const VERY_LOW_THRESHOLD = 0.25;
export const TEXT_TIMEOUT_MS = 3000;
export const VOICE_TIMEOUT_MS = 4500;

const EMPTY_SNAPSHOT: SessionSnapshot = Object.freeze({
  turns: [],
  round: null,
  lastShot: null,
  lastRecommendation: null,
});

export interface IntentClassifierConfig {
  /** `null` runs every request through the offline matcher. */
  capability: ClassifierCapability | null;
  offlineMatcher?: OfflineIntentMatcher;
  routeThreshold?: number;
  confirmThreshold?: number;
  textTimeoutMs?: number;
  voiceTimeoutMs?: number;
  idFactory?: () => string;
  clock?: () => number;
  logger?: Logger;
  telemetry?: TelemetryEmitter | null;
}

export interface ClassifyInput {
  normalized: NormalizedInput;
  mode?: InputMode;
  session?: SessionSnapshot;
}

export interface ClassificationOutcome {
  verdict: ClassificationVerdict;
  source: ClassificationSource;
  /** Why the offline matcher answered instead of the remote classifier. */
  fallbackReason: UnavailableReason | null;
  latencyMs: number;
}

type OnlineAnswer = Extract<ClassifierResponse, { status: 'ok' }>;

export function createIntent(
  id: string,
  type: IntentType,
  confidence: number,
  entities: ExtractedEntities,
  rawInput: string,
): Intent {
  return Object.freeze({
    id,
    type,
    confidence,
    entities: Object.freeze({ ...entities }),
    rawInput,
  });
}

/**
 * Wraps the remote classifier with a timeout budget, gates its confidence
 * into route / confirm / clarify, and falls back once to the offline matcher
 * when the remote side cannot answer. Never throws for a classifier failure.
 */
export class IntentClassifier {
  readonly routeThreshold: number;
  readonly confirmThreshold: number;
  private readonly capability: ClassifierCapability | null;
  private readonly matcher: OfflineIntentMatcher;
  private readonly textTimeoutMs: number;
  private readonly voiceTimeoutMs: number;
  private readonly idFactory: () => string;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly telemetry: TelemetryEmitter | null;

  constructor(cfg: IntentClassifierConfig) {
    this.capability = cfg.capability;
    this.matcher = cfg.offlineMatcher ?? new OfflineIntentMatcher();
    this.routeThreshold = cfg.routeThreshold ?? ROUTE_THRESHOLD;
    this.confirmThreshold = cfg.confirmThreshold ?? CONFIRM_THRESHOLD;
    if (!(this.confirmThreshold >= 0 && this.confirmThreshold <= this.routeThreshold && this.routeThreshold <= 1)) {
      throw new ContractViolationError('thresholds', 'expected 0 <= confirm <= route <= 1');
    }
    this.textTimeoutMs = Math.max(1, cfg.textTimeoutMs ?? TEXT_TIMEOUT_MS);
    this.voiceTimeoutMs = Math.max(1, cfg.voiceTimeoutMs ?? VOICE_TIMEOUT_MS);
    this.idFactory = cfg.idFactory ?? (() => ensureId('intent'));
    this.clock = cfg.clock ?? (() => Date.now());
    this.logger = cfg.logger ?? silentLogger;
    this.telemetry = cfg.telemetry ?? null;
  }

  timeoutFor(mode: InputMode): number {
    return mode === 'voice' ? this.voiceTimeoutMs : this.textTimeoutMs;
  }

  async classify(input: ClassifyInput): Promise<ClassificationOutcome> {
    const mode = input.mode ?? 'text';
    const session = input.session ?? EMPTY_SNAPSHOT;
    const startedAt = this.clock();
    const text = input.normalized.normalizedText;

    let verdict: ClassificationVerdict;
    let fallbackReason: UnavailableReason | null = null;
    if (!this.capability) {
      fallbackReason = 'unavailable';
      verdict = this.offline(input.normalized, session, fallbackReason);
    } else {
      try {
        const answer = await this.callCapability(this.capability, text, session, mode);
        verdict = this.gate(answer, input.normalized, session);
      } catch (error) {
        fallbackReason = error instanceof ClassifierUnavailableError ? error.reason : 'error';
        this.logger.warn('classifier unavailable, using offline matcher', {
          reason: fallbackReason,
          error: describeError(error),
          mode,
        });
        verdict = this.offline(input.normalized, session, fallbackReason);
      }
    }

    const outcome: ClassificationOutcome = {
      verdict,
      source: verdict.source,
      fallbackReason,
      latencyMs: Math.max(0, this.clock() - startedAt),
    };
    emitClassificationTelemetry(this.telemetry, {
      source: outcome.source,
      verdict: verdict.kind,
      intent: verdict.intent?.type ?? null,
      confidence: verdict.intent?.confidence ?? null,
      latencyMs: outcome.latencyMs,
      fallbackReason,
      mode,
    });
    return outcome;
  }

  private async callCapability(
    capability: ClassifierCapability,
    text: string,
    session: SessionSnapshot,
    mode: InputMode,
  ): Promise<OnlineAnswer> {
    if (!text) {
      throw new ClassifierUnavailableError('invalid_response', 'nothing to classify');
    }
    const budgetMs = this.timeoutFor(mode);
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ClassifierUnavailableError('timeout', `classifier exceeded ${budgetMs}ms`));
      }, budgetMs);
    });

    let response: ClassifierResponse;
    try {
      response = await Promise.race([capability.classify(text, session, { signal: controller.signal }), timeout]);
    } catch (error) {
      if (error instanceof ClassifierUnavailableError) {
        if (error.reason === 'timeout') {
          emitReliabilityEvent({ type: 'classifier:timeout', timestamp: this.clock(), mode, budgetMs });
        }
        throw error;
      }
      emitReliabilityEvent({ type: 'classifier:unavailable', timestamp: this.clock(), reason: describeError(error) });
      throw new ClassifierUnavailableError('network', describeError(error));
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }

    if (response.status === 'unavailable') {
      emitReliabilityEvent({ type: 'classifier:unavailable', timestamp: this.clock(), reason: response.reason });
      throw new ClassifierUnavailableError(response.reason, response.detail);
    }
    if (!isIntentType(response.intentType) || !Number.isFinite(response.confidence)) {
      throw new ClassifierUnavailableError('invalid_response', 'unknown intent or confidence');
    }
    if (response.confidence < 0 || response.confidence > 1) {
      throw new ClassifierUnavailableError('invalid_response', `confidence ${response.confidence} outside [0, 1]`);
    }
    return response;
  }

  private gate(answer: OnlineAnswer, normalized: NormalizedInput, session: SessionSnapshot): ClassificationVerdict {
    const local = extractEntities(normalized.normalizedText, { par: session.round?.par ?? null });
    const entities = mergeEntities(sanitizeEntities(answer.entities), local);
    const intent = createIntent(this.idFactory(), answer.intentType, answer.confidence, entities, normalized.originalText);

    if (answer.confidence >= this.confirmThreshold) {
      const missingVerdict = this.missingEntityVerdict(intent, normalized.normalizedText, 'online');
      if (missingVerdict) {
        return missingVerdict;
      }
      if (answer.confidence >= this.routeThreshold) {
        return { kind: 'route', intent, source: 'online' };
      }
      return { kind: 'confirm', intent, message: confirmationMessage(intent), source: 'online' };
    }

    const candidates: IntentScore[] = [
      { intent: intent.type, score: intent.confidence },
      ...this.matcher.score(normalized.normalizedText),
    ];
    const tier = answer.confidence < VERY_LOW_THRESHOLD ? 'very_low' : 'low';
    return { kind: 'clarify', intent, clarification: generateClarification(candidates, tier), source: 'online' };
  }

  private missingEntityVerdict(
    intent: Intent,
    text: string,
    source: ClassificationSource,
  ): ClassificationVerdict | null {
    const missing = missingEntities(intent.entities, getIntentDefinition(intent.type).requiredEntities);
    if (missing.length === 0) {
      return null;
    }
    const candidates: IntentScore[] = [{ intent: intent.type, score: intent.confidence }, ...this.matcher.score(text)];
    return {
      kind: 'clarify',
      intent,
      clarification: generateClarification(candidates, 'missing_entity', { intent: intent.type, missing }),
      source,
    };
  }

  private offline(
    normalized: NormalizedInput,
    session: SessionSnapshot,
    reason: UnavailableReason,
  ): ClassificationVerdict {
    const text = normalized.normalizedText;
    const result = this.matcher.resolve(text);
    emitReliabilityEvent({ type: 'classifier:fallback', timestamp: this.clock(), reason, outcome: result.status });

    switch (result.status) {
      case 'match': {
        const entities = extractEntities(text, { par: session.round?.par ?? null });
        const intent = createIntent(this.idFactory(), result.intent, result.score, entities, normalized.originalText);
        return this.missingEntityVerdict(intent, text, 'offline') ?? { kind: 'route', intent, source: 'offline' };
      }
      case 'clarify':
        return {
          kind: 'clarify',
          intent: null,
          clarification: generateClarification(result.candidates, 'offline'),
          source: 'offline',
        };
      case 'requires_online': {
        const intent = createIntent(this.idFactory(), result.intent, result.score, {}, normalized.originalText);
        return { kind: 'inline', intent, message: result.message, source: 'offline' };
      }
      case 'no_match':
        return { kind: 'inline', intent: null, message: result.message, source: 'offline' };
    }
  }
}
