import { describe, expect, it } from 'vitest';

import { describePattern, NO_PATTERN_MESSAGE, summarizePatterns } from '../../../shared/memory/insights';
import type { MissPattern } from '../../../shared/memory/types';

const slice: MissPattern = {
  id: 'club=driver|pressure=*:SLICE',
  direction: 'SLICE',
  frequency: 7,
  confidence: 0.7,
  lastOccurrence: 0,
  club: 'driver',
};

describe('describePattern', () => {
  it('names the direction, club and strength', () => {
    expect(describePattern(slice)).toBe('You tend to slice it with your driver (7 recent shots, 70% confidence).');
  });

  it('mentions pressure when the pattern was filtered to it', () => {
    expect(
      describePattern({
        id: 'club=*|pressure=yes:PUSH',
        direction: 'PUSH',
        frequency: 3,
        confidence: 0.456,
        lastOccurrence: 0,
        pressureContext: { isUserTagged: true, isInferred: false },
      }),
    ).toBe('You tend to push it right under pressure (3 recent shots, 46% confidence).');
  });
});

describe('summarizePatterns', () => {
  it('falls back to a no-pattern message', () => {
    expect(summarizePatterns([])).toBe(NO_PATTERN_MESSAGE);
  });

  it('describes at most the limit', () => {
    const fat: MissPattern = { ...slice, id: 'club=driver|pressure=*:FAT', direction: 'FAT', frequency: 3, confidence: 0.3 };
    const thin: MissPattern = { ...slice, id: 'club=driver|pressure=*:THIN', direction: 'THIN', frequency: 3, confidence: 0.3 };
    expect(summarizePatterns([slice, fat, thin])).toBe(
      'You tend to slice it with your driver (7 recent shots, 70% confidence). ' +
        'You tend to hit it fat with your driver (3 recent shots, 30% confidence).',
    );
  });
});
