import { beforeEach, describe, expect, it, vi } from 'vitest';

import { IntentClassifier, VOICE_TIMEOUT_MS } from '../../../shared/assistant/classifier';
import { ContractViolationError } from '../../../shared/assistant/errors';
import type { ClassifierCapability, ClassifierResponse } from '../../../shared/assistant/llmClient';
import { normalize } from '../../../shared/assistant/normalizer';
import { OFFLINE_MODE_MESSAGE } from '../../../shared/assistant/offlineMatcher';
import type { IntentType } from '../../../shared/assistant/types';
import {
  __resetReliabilityEventsForTests,
  recentReliabilityEvents,
} from '../../../shared/reliability/events';

function capabilityReturning(response: ClassifierResponse) {
  const classify = vi.fn<ClassifierCapability['classify']>(async () => response);
  const capability: ClassifierCapability = { classify };
  return { capability, classify };
}

function ok(intentType: IntentType, confidence: number, entities: Record<string, unknown> = {}): ClassifierResponse {
  return { status: 'ok', intentType, confidence, entities };
}

function classifierWith(capability: ClassifierCapability | null, telemetry = vi.fn()) {
  return new IntentClassifier({
    capability,
    idFactory: () => 'intent-1',
    clock: () => 1_000,
    telemetry,
  });
}

describe('IntentClassifier', () => {
  beforeEach(() => {
    __resetReliabilityEventsForTests();
  });

  it('routes confident answers and merges locally extracted entities', async () => {
    const { capability, classify } = capabilityReturning(ok('SCORE_ENTRY', 0.9));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('enter score for hole 5') });

    expect(outcome.source).toBe('online');
    expect(outcome.fallbackReason).toBeNull();
    expect(outcome.verdict).toEqual({
      kind: 'route',
      source: 'online',
      intent: {
        id: 'intent-1',
        type: 'SCORE_ENTRY',
        confidence: 0.9,
        entities: { holeNumber: 5 },
        rawInput: 'enter score for hole 5',
      },
    });
    expect(classify).toHaveBeenCalledWith(
      'enter score for hole 5',
      expect.objectContaining({ turns: [] }),
      { signal: expect.any(AbortSignal) },
    );
  });

  it('lets remote entities win over local ones', async () => {
    const { capability } = capabilityReturning(ok('SCORE_ENTRY', 0.9, { holeNumber: 7 }));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('enter score for hole 5') });
    expect(outcome.verdict.intent?.entities).toEqual({ holeNumber: 7 });
  });

  it('applies the thresholds inclusively', async () => {
    const kindAt = async (confidence: number) => {
      const { capability } = capabilityReturning(ok('SCORE_ENTRY', confidence));
      const outcome = await classifierWith(capability).classify({ normalized: normalize('enter score for hole 5') });
      return outcome.verdict.kind;
    };
    expect(await kindAt(0.75)).toBe('route');
    expect(await kindAt(0.74)).toBe('confirm');
    expect(await kindAt(0.5)).toBe('confirm');
    expect(await kindAt(0.49)).toBe('clarify');
  });

  it('phrases mid-confidence answers as a question', async () => {
    const { capability } = capabilityReturning(ok('SCORE_ENTRY', 0.6));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('enter score for hole 5') });
    expect(outcome.verdict.kind === 'confirm' ? outcome.verdict.message : null).toBe(
      'Did you want to enter score (on hole 5)?',
    );
  });

  it('clarifies low confidence with keyword candidates', async () => {
    const { capability } = capabilityReturning(ok('SHOT_RECOMMENDATION', 0.3));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('enter score for hole 5') });

    expect(outcome.verdict.kind).toBe('clarify');
    if (outcome.verdict.kind !== 'clarify') return;
    expect(outcome.verdict.clarification.tier).toBe('low');
    expect(outcome.verdict.clarification.suggestions.map((suggestion) => suggestion.intent)).toEqual([
      'SCORE_ENTRY',
      'SHOT_RECOMMENDATION',
    ]);
  });

  it('uses the very low tier below a quarter', async () => {
    const { capability } = capabilityReturning(ok('SHOT_RECOMMENDATION', 0.1));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('hmm') });
    expect(outcome.verdict.kind === 'clarify' ? outcome.verdict.clarification.tier : null).toBe('very_low');
  });

  it('asks for a required entity that is missing', async () => {
    const { capability } = capabilityReturning(ok('CLUB_ADJUSTMENT', 0.9));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('adjust my distance') });

    expect(outcome.verdict.kind).toBe('clarify');
    if (outcome.verdict.kind !== 'clarify') return;
    expect(outcome.verdict.clarification.tier).toBe('missing_entity');
    expect(outcome.verdict.clarification.message).toBe('To adjust club, I need the club. Which did you mean?');
    expect(outcome.verdict.intent?.type).toBe('CLUB_ADJUSTMENT');
  });

  it('falls back to the offline matcher when the classifier is unavailable', async () => {
    const { capability } = capabilityReturning({ status: 'unavailable', reason: 'network' });
    const outcome = await classifierWith(capability).classify({ normalized: normalize("what's in my bag") });

    expect(outcome.source).toBe('offline');
    expect(outcome.fallbackReason).toBe('network');
    expect(outcome.verdict.kind).toBe('route');
    expect(outcome.verdict.intent?.type).toBe('EQUIPMENT_INFO');
    expect(recentReliabilityEvents(60_000, 1_000).map((event) => event.type)).toEqual([
      'classifier:unavailable',
      'classifier:fallback',
    ]);
  });

  it('treats a thrown error as a network failure', async () => {
    const capability: ClassifierCapability = {
      classify: vi.fn(async () => {
        throw new Error('socket hang up');
      }),
    };
    const outcome = await classifierWith(capability).classify({ normalized: normalize("what's in my bag") });
    expect(outcome.fallbackReason).toBe('network');
    expect(outcome.verdict.intent?.type).toBe('EQUIPMENT_INFO');
  });

  it('aborts a slow classifier at the budget and falls back', async () => {
    let seen: AbortSignal | undefined;
    const capability: ClassifierCapability = {
      classify: (_text, _context, options) => {
        seen = options.signal;
        return new Promise<ClassifierResponse>(() => undefined);
      },
    };
    const classifier = new IntentClassifier({ capability, textTimeoutMs: 20, clock: () => 1_000 });

    const outcome = await classifier.classify({ normalized: normalize("what's in my bag") });

    expect(outcome.fallbackReason).toBe('timeout');
    expect(outcome.verdict.intent?.type).toBe('EQUIPMENT_INFO');
    expect(seen?.aborted).toBe(true);
    expect(recentReliabilityEvents(60_000, 1_000)[0]).toEqual({
      type: 'classifier:timeout',
      timestamp: 1_000,
      mode: 'text',
      budgetMs: 20,
    });
  });

  it('gives voice input the longer budget', () => {
    expect(classifierWith(null).timeoutFor('voice')).toBe(VOICE_TIMEOUT_MS);
  });

  it('rejects confidences outside [0, 1]', async () => {
    const { capability } = capabilityReturning(ok('EQUIPMENT_INFO', 1.4));
    const outcome = await classifierWith(capability).classify({ normalized: normalize("what's in my bag") });
    expect(outcome.fallbackReason).toBe('invalid_response');
    expect(outcome.source).toBe('offline');
  });

  it('never calls the classifier for empty input', async () => {
    const { capability, classify } = capabilityReturning(ok('HELP_REQUEST', 0.9));
    const outcome = await classifierWith(capability).classify({ normalized: normalize('   ') });
    expect(classify).not.toHaveBeenCalled();
    expect(outcome.fallbackReason).toBe('invalid_response');
    expect(outcome.verdict).toEqual({ kind: 'inline', intent: null, message: OFFLINE_MODE_MESSAGE, source: 'offline' });
  });

  describe('without a classifier', () => {
    it('routes strong offline matches', async () => {
      const outcome = await classifierWith(null).classify({ normalized: normalize("what's in my bag") });
      expect(outcome.fallbackReason).toBe('unavailable');
      expect(outcome.verdict.kind).toBe('route');
      expect(outcome.verdict.intent?.type).toBe('EQUIPMENT_INFO');
    });

    it('clarifies weak offline matches', async () => {
      const outcome = await classifierWith(null).classify({ normalized: normalize('change units to meters') });
      expect(outcome.verdict.kind).toBe('clarify');
      if (outcome.verdict.kind !== 'clarify') return;
      expect(outcome.verdict.intent).toBeNull();
      expect(outcome.verdict.clarification.message).toBe("I'm offline and need a bit more clarity. Did you mean:");
      expect(outcome.verdict.clarification.suggestions.map((suggestion) => suggestion.intent)).toEqual([
        'SETTINGS_CHANGE',
      ]);
    });

    it('explains online-only requests', async () => {
      const outcome = await classifierWith(null).classify({ normalized: normalize("what's the weather") });
      expect(outcome.verdict.kind).toBe('inline');
      expect(outcome.verdict.intent?.type).toBe('WEATHER_CHECK');
      expect(outcome.verdict.kind === 'inline' ? outcome.verdict.message : null).toBe(
        "Weather data needs an internet connection. I can't check conditions offline.",
      );
    });
  });

  it('emits classification telemetry', async () => {
    const telemetry = vi.fn();
    const { capability } = capabilityReturning(ok('SCORE_ENTRY', 0.9));
    await classifierWith(capability, telemetry).classify({ normalized: normalize('enter score for hole 5') });
    expect(telemetry).toHaveBeenCalledWith('assistant.classify.v1', {
      source: 'online',
      verdict: 'route',
      intent: 'SCORE_ENTRY',
      confidence: 0.9,
      latencyMs: 0,
      fallbackReason: null,
      mode: 'text',
    });
  });

  it('rejects a confirm threshold above the route threshold', () => {
    expect(() => new IntentClassifier({ capability: null, routeThreshold: 0.4, confirmThreshold: 0.6 })).toThrow(
      ContractViolationError,
    );
  });
});
