import { describe, expect, it } from 'vitest';

import { ContractViolationError } from '../../../shared/assistant/errors';
import { OFFLINE_MODE_MESSAGE, OfflineIntentMatcher } from '../../../shared/assistant/offlineMatcher';

describe('OfflineIntentMatcher', () => {
  const matcher = new OfflineIntentMatcher();

  it('matches a score request with the bundled keywords', () => {
    const result = matcher.resolve('enter score for hole 5');
    expect(result.status).toBe('match');
    if (result.status !== 'match') return;
    expect(result.intent).toBe('SCORE_ENTRY');
    expect(result.score).toBeCloseTo(2 / 2.8, 6);
  });

  it('matches a bag question', () => {
    const result = matcher.resolve("what's in my bag");
    expect(result).toEqual({ status: 'match', intent: 'EQUIPMENT_INFO', score: expect.closeTo(2.5 / 3, 6) });
  });

  it('routes on a single strong score', () => {
    const custom = new OfflineIntentMatcher({ keywords: { SCORE_ENTRY: { alpha: 0.75, beta: 0.25 } } });
    expect(custom.resolve('alpha')).toEqual({ status: 'match', intent: 'SCORE_ENTRY', score: 0.75 });
  });

  it('asks for clarification between the weak and strong thresholds', () => {
    const custom = new OfflineIntentMatcher({
      keywords: {
        STATS_LOOKUP: { alpha: 0.45, beta: 0.55 },
        EQUIPMENT_INFO: { alpha: 0.3, gamma: 0.7 },
        SETTINGS_CHANGE: { alpha: 0.2, delta: 0.8 },
        HELP_REQUEST: { alpha: 0.1, epsilon: 0.9 },
      },
    });
    const result = custom.resolve('alpha');
    expect(result.status).toBe('clarify');
    if (result.status !== 'clarify') return;
    expect(result.candidates.map((candidate) => candidate.intent)).toEqual([
      'STATS_LOOKUP',
      'EQUIPMENT_INFO',
      'SETTINGS_CHANGE',
    ]);
    expect(result.candidates[0]?.score).toBeCloseTo(0.45, 6);
  });

  it('asks for clarification when two intents are both strong', () => {
    const custom = new OfflineIntentMatcher({
      keywords: { EQUIPMENT_INFO: { alpha: 1 }, STATS_LOOKUP: { alpha: 1 } },
    });
    expect(custom.resolve('alpha')).toEqual({
      status: 'clarify',
      candidates: [
        { intent: 'STATS_LOOKUP', score: 1 },
        { intent: 'EQUIPMENT_INFO', score: 1 },
      ],
    });
  });

  it('explains when the request needs a connection', () => {
    expect(matcher.resolve("what's the weather")).toEqual({
      status: 'requires_online',
      intent: 'WEATHER_CHECK',
      score: 0.5,
      message: "Weather data needs an internet connection. I can't check conditions offline.",
    });
  });

  it('falls back to the offline message when nothing scores', () => {
    expect(matcher.resolve('xyzzy')).toEqual({ status: 'no_match', message: OFFLINE_MODE_MESSAGE });
    expect(matcher.resolve('')).toEqual({ status: 'no_match', message: OFFLINE_MODE_MESSAGE });
  });

  it('never offers online-only intents as a match', () => {
    const custom = new OfflineIntentMatcher({ keywords: { WEATHER_CHECK: { alpha: 1 } } });
    expect(custom.match('alpha')).toEqual([]);
    expect(custom.score('alpha')).toEqual([{ intent: 'WEATHER_CHECK', score: 1 }]);
  });

  it('matches keywords on word boundaries only', () => {
    expect(matcher.match('garbage day')).toEqual([]);
  });

  it('rejects inverted thresholds', () => {
    expect(() => new OfflineIntentMatcher({ strongThreshold: 0.3, weakThreshold: 0.5 })).toThrow(
      ContractViolationError,
    );
  });
});
