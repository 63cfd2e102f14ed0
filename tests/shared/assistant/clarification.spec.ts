import { describe, expect, it } from 'vitest';

import {
  DEFAULT_SUGGESTIONS,
  generateClarification,
  rankSuggestions,
} from '../../../shared/assistant/clarification';

describe('generateClarification', () => {
  it('keeps the three best distinct intents', () => {
    const clarification = generateClarification(
      [
        { intent: 'SCORE_ENTRY', score: 0.3 },
        { intent: 'SCORE_ENTRY', score: 0.6 },
        { intent: 'STATS_LOOKUP', score: 0.5 },
        { intent: 'HELP_REQUEST', score: 0.2 },
        { intent: 'EQUIPMENT_INFO', score: 0.4 },
      ],
      'low',
    );
    expect(clarification.message).toBe("I'm not quite sure what you meant. Did you mean one of these?");
    expect(clarification.suggestions.map((suggestion) => suggestion.intent)).toEqual([
      'SCORE_ENTRY',
      'STATS_LOOKUP',
      'EQUIPMENT_INFO',
    ]);
    expect(clarification.suggestions.map((suggestion) => suggestion.label)).toEqual([
      'Enter Score',
      'View Stats',
      'My Bag',
    ]);
  });

  it('offers the defaults when nothing scored above zero', () => {
    const clarification = generateClarification([{ intent: 'WEATHER_CHECK', score: 0 }], 'very_low');
    expect(clarification.message).toBe("Sorry, I didn't catch that. Here are some things I can help with:");
    expect(clarification.suggestions.map((suggestion) => suggestion.intent)).toEqual([...DEFAULT_SUGGESTIONS]);
  });

  it('uses the offline wording for the offline tier', () => {
    expect(generateClarification([], 'offline').message).toBe("I'm offline and need a bit more clarity. Did you mean:");
  });

  it('names the missing entity', () => {
    const clarification = generateClarification([{ intent: 'CLUB_ADJUSTMENT', score: 0.9 }], 'missing_entity', {
      intent: 'CLUB_ADJUSTMENT',
      missing: ['club'],
    });
    expect(clarification.message).toBe('To adjust club, I need the club. Which did you mean?');
    expect(clarification.suggestions.map((suggestion) => suggestion.intent)).toEqual(['CLUB_ADJUSTMENT']);
  });

  it('gives the same wording for the same tier', () => {
    const first = generateClarification([{ intent: 'DRILL_REQUEST', score: 0.4 }], 'low');
    const second = generateClarification([{ intent: 'STATS_LOOKUP', score: 0.2 }], 'low');
    expect(first.message).toBe(second.message);
  });
});

describe('rankSuggestions', () => {
  it('breaks ties by registry order', () => {
    expect(
      rankSuggestions([
        { intent: 'HELP_REQUEST', score: 0.5 },
        { intent: 'CLUB_ADJUSTMENT', score: 0.5 },
      ]),
    ).toEqual(['CLUB_ADJUSTMENT', 'HELP_REQUEST']);
  });
});
