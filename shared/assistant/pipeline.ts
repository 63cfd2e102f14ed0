import { KeyValueMissRepository } from '../memory/repository';
import { summarizePatterns } from '../memory/insights';
import { MissPatternStore } from '../memory/store';
import type { MissPattern } from '../memory/types';
import type { AsyncStorageLike } from '../core/pstore';
import {
  emitPatternQueryTelemetry,
  emitRoutingTelemetry,
  type TelemetryEmitter,
} from '../telemetry/assistant';
import { createLogger, silentLogger, type LogSink, type Logger } from '../telemetry/logger';
import { IntentClassifier } from './classifier';
import type { AssistantConfig } from './config';
import { describeError, type UnavailableReason } from './errors';
import { HttpClassifierCapability, type ClassifierCapability } from './llmClient';
import { normalize, type NormalizedInput } from './normalizer';
import { OfflineIntentMatcher } from './offlineMatcher';
import type { PrerequisiteChecker } from './prerequisites';
import { getIntentDefinition } from './registry';
import { RoutingOrchestrator } from './routing';
import { SessionContextManager } from './session';
import type { ClassificationSource, InputMode, RoutingResult } from './types';

export const FAILURE_MESSAGE = 'Something went wrong on my side. Please try that again.';

export interface AssistantRequest {
  text: string;
  mode?: InputMode;
}

export interface AssistantResponse {
  result: RoutingResult;
  /** Deep link for `navigate` results, otherwise `null`. */
  route: string | null;
  /** Text the assistant says back. */
  reply: string;
  normalization: NormalizedInput;
  source: ClassificationSource;
  fallbackReason: UnavailableReason | null;
  patterns: MissPattern[];
}

export interface AssistantPipelineDeps {
  classifier: IntentClassifier;
  orchestrator: RoutingOrchestrator;
  session: SessionContextManager;
  patterns?: MissPatternStore | null;
  logger?: Logger;
  telemetry?: TelemetryEmitter | null;
}

function replyFor(result: RoutingResult, patterns: readonly MissPattern[]): string {
  switch (result.kind) {
    case 'navigate':
      return `Opening ${getIntentDefinition(result.intent.type).displayName}.`;
    case 'no_navigation':
      return result.intent?.type === 'PATTERN_QUERY'
        ? `${result.response} ${summarizePatterns(patterns)}`
        : result.response;
    case 'confirmation_required':
    case 'prerequisite_missing':
      return result.message;
  }
}

/**
 * One utterance in, one routing decision out: normalize, classify, route,
 * then record the exchange in the session.
 */
export class AssistantPipeline {
  private readonly classifier: IntentClassifier;
  private readonly orchestrator: RoutingOrchestrator;
  private readonly session: SessionContextManager;
  private readonly patterns: MissPatternStore | null;
  private readonly logger: Logger;
  private readonly telemetry: TelemetryEmitter | null;

  constructor(deps: AssistantPipelineDeps) {
    this.classifier = deps.classifier;
    this.orchestrator = deps.orchestrator;
    this.session = deps.session;
    this.patterns = deps.patterns ?? null;
    this.logger = deps.logger ?? silentLogger;
    this.telemetry = deps.telemetry ?? null;
  }

  get sessionContext(): SessionContextManager {
    return this.session;
  }

  get missPatterns(): MissPatternStore | null {
    return this.patterns;
  }

  async handle(request: AssistantRequest): Promise<AssistantResponse> {
    const normalization = normalize(request.text);
    const snapshot = this.session.snapshot();
    await this.session.addTurn('user', normalization.normalizedText);

    const outcome = await this.classifier.classify({
      normalized: normalization,
      mode: request.mode ?? 'text',
      session: snapshot,
    });

    let result: RoutingResult;
    try {
      result = await this.orchestrator.route(outcome.verdict);
    } catch (error) {
      this.logger.error('routing failed', { error: describeError(error), intent: outcome.verdict.intent?.type ?? null });
      result = { kind: 'no_navigation', intent: outcome.verdict.intent, response: FAILURE_MESSAGE };
    }

    const patterns = await this.patternsFor(result);
    const reply = replyFor(result, patterns);
    await this.session.addTurn('assistant', reply);

    const route = result.kind === 'navigate' ? result.route : null;
    emitRoutingTelemetry(this.telemetry, {
      kind: result.kind,
      intent: result.intent?.type ?? null,
      route: route ?? undefined,
      missing: result.kind === 'prerequisite_missing' ? result.missing : undefined,
    });
    this.logger.info('utterance routed', {
      kind: result.kind,
      source: outcome.source,
      fallbackReason: outcome.fallbackReason,
      text: normalization.originalText,
    });

    return {
      result,
      route,
      reply,
      normalization,
      source: outcome.source,
      fallbackReason: outcome.fallbackReason,
      patterns,
    };
  }

  private async patternsFor(result: RoutingResult): Promise<MissPattern[]> {
    if (!this.patterns || result.kind !== 'no_navigation') {
      return [];
    }
    const intent = result.intent;
    if (!intent || intent.type !== 'PATTERN_QUERY') {
      return [];
    }
    const club = intent.entities.club;
    try {
      const patterns = await this.patterns.getPatterns(club ? { club } : {});
      emitPatternQueryTelemetry(this.telemetry, { club: club ?? null, patterns: patterns.length });
      return patterns;
    } catch (error) {
      this.logger.warn('miss pattern lookup failed', { error: describeError(error) });
      return [];
    }
  }
}

export interface AssistantOverrides {
  capability?: ClassifierCapability | null;
  prerequisites: PrerequisiteChecker;
  session?: SessionContextManager;
  storage?: AsyncStorageLike;
  clock?: () => number;
  idFactory?: () => string;
  logSink?: LogSink;
  telemetry?: TelemetryEmitter | null;
}

/** Wires a pipeline from resolved configuration. */
export function createAssistantPipeline(config: AssistantConfig, overrides: AssistantOverrides): AssistantPipeline {
  const logger = createLogger('assistant', {
    sink: overrides.logSink,
    buildId: config.log.buildId,
    minLevel: config.log.level,
    clock: overrides.clock,
  });
  const capability =
    overrides.capability !== undefined
      ? overrides.capability
      : config.classifier.baseUrl
        ? new HttpClassifierCapability({ baseUrl: config.classifier.baseUrl, apiKey: config.classifier.apiKey })
        : null;
  const classifier = new IntentClassifier({
    capability,
    offlineMatcher: new OfflineIntentMatcher({
      strongThreshold: config.offline.strongThreshold,
      weakThreshold: config.offline.weakThreshold,
    }),
    routeThreshold: config.classifier.routeThreshold,
    confirmThreshold: config.classifier.confirmThreshold,
    textTimeoutMs: config.classifier.textTimeoutMs,
    voiceTimeoutMs: config.classifier.voiceTimeoutMs,
    idFactory: overrides.idFactory,
    clock: overrides.clock,
    logger: logger.child('classifier'),
    telemetry: overrides.telemetry,
  });
  const patterns = new MissPatternStore({
    repository: new KeyValueMissRepository(overrides.storage),
    clock: overrides.clock,
    logger: logger.child('memory'),
    halfLifeDays: config.memory.halfLifeDays,
    retentionDays: config.memory.retentionDays,
    maxEvents: config.memory.maxEvents,
    minSamples: config.memory.minSamples,
    minShare: config.memory.minShare,
  });
  return new AssistantPipeline({
    classifier,
    orchestrator: new RoutingOrchestrator({ prerequisites: overrides.prerequisites }),
    session:
      overrides.session ?? new SessionContextManager({ capacity: config.session.historyCapacity, clock: overrides.clock }),
    patterns,
    logger,
    telemetry: overrides.telemetry,
  });
}
