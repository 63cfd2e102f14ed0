import type { MissDirection, MissPattern } from './types';

const DIRECTION_PHRASES: Readonly<Record<Exclude<MissDirection, 'STRAIGHT'>, string>> = Object.freeze({
  PUSH: 'push it right',
  PULL: 'pull it left',
  SLICE: 'slice it',
  HOOK: 'hook it',
  FAT: 'hit it fat',
  THIN: 'hit it thin',
});

export const NO_PATTERN_MESSAGE =
  "I don't see a clear miss pattern yet. Keep logging shots and I'll spot your tendencies.";

export function describePattern(pattern: MissPattern): string {
  const phrase = pattern.direction === 'STRAIGHT' ? 'hit it straight' : DIRECTION_PHRASES[pattern.direction];
  const club = pattern.club ? ` with your ${pattern.club}` : '';
  const pressure = pattern.pressureContext ? ' under pressure' : '';
  const percent = Math.round(pattern.confidence * 100);
  return `You tend to ${phrase}${club}${pressure} (${pattern.frequency} recent shots, ${percent}% confidence).`;
}

export function summarizePatterns(patterns: readonly MissPattern[], limit = 2): string {
  if (patterns.length === 0) {
    return NO_PATTERN_MESSAGE;
  }
  return patterns.slice(0, Math.max(1, limit)).map(describePattern).join(' ');
}
