import { describe, expect, it } from 'vitest';

import { aggregateMissPatterns } from '../../../shared/memory/aggregator';
import { MS_PER_DAY } from '../../../shared/memory/decay';
import type { MissDirection, MissEvent, PressureContext } from '../../../shared/memory/types';

const NOW = Date.UTC(2026, 3, 10);
const RELAXED: PressureContext = { isUserTagged: false, isInferred: false };
const TAGGED: PressureContext = { isUserTagged: true, isInferred: false };

let counter = 0;

function misses(
  direction: MissDirection,
  count: number,
  options: { ageDays?: number; clubId?: string; pressure?: PressureContext } = {},
): MissEvent[] {
  return Array.from({ length: count }, () => {
    counter += 1;
    return {
      id: `e${String(counter).padStart(4, '0')}`,
      timestamp: NOW - (options.ageDays ?? 0) * MS_PER_DAY,
      clubId: options.clubId ?? 'driver',
      missDirection: direction,
      lie: 'fairway',
      pressureContext: options.pressure ?? RELAXED,
    };
  });
}

describe('aggregateMissPatterns', () => {
  it('ignores a direction seen in two of ten shots', () => {
    expect(aggregateMissPatterns([...misses('SLICE', 2), ...misses('STRAIGHT', 8)], NOW)).toEqual([]);
  });

  it('reports a direction seen in seven of ten shots', () => {
    expect(aggregateMissPatterns([...misses('SLICE', 7), ...misses('STRAIGHT', 3)], NOW)).toEqual([
      { id: 'club=*|pressure=*:SLICE', direction: 'SLICE', frequency: 7, confidence: 0.7, lastOccurrence: NOW },
    ]);
  });

  it('lets misses at the edge of the window decay to nothing', () => {
    const events = [...misses('SLICE', 5, { ageDays: 90 }), ...misses('STRAIGHT', 5)];
    expect(aggregateMissPatterns(events, NOW)).toEqual([]);
  });

  it('needs at least three qualifying events', () => {
    expect(aggregateMissPatterns(misses('SLICE', 2), NOW)).toEqual([]);
  });

  it('drops groups under the share floor', () => {
    expect(aggregateMissPatterns([...misses('HOOK', 3), ...misses('STRAIGHT', 9)], NOW)).toEqual([]);
  });

  it('orders by confidence, then frequency, then direction', () => {
    const byConfidence = aggregateMissPatterns(
      [...misses('HOOK', 4, { ageDays: 14 }), ...misses('SLICE', 4), ...misses('STRAIGHT', 2)],
      NOW,
    );
    expect(byConfidence.map((pattern) => [pattern.direction, pattern.confidence])).toEqual([
      ['SLICE', 0.4],
      ['HOOK', 0.2],
    ]);

    const byFrequency = aggregateMissPatterns(
      [...misses('SLICE', 3), ...misses('HOOK', 6, { ageDays: 14 }), ...misses('STRAIGHT', 1)],
      NOW,
    );
    expect(byFrequency.map((pattern) => pattern.direction)).toEqual(['HOOK', 'SLICE']);

    const byName = aggregateMissPatterns([...misses('SLICE', 4), ...misses('HOOK', 4), ...misses('STRAIGHT', 2)], NOW);
    expect(byName.map((pattern) => pattern.direction)).toEqual(['HOOK', 'SLICE']);
  });

  it('filters by club', () => {
    const events = [
      ...misses('SLICE', 5),
      ...misses('HOOK', 4, { clubId: '7-Iron' }),
      ...misses('STRAIGHT', 1, { clubId: '7-iron' }),
    ];
    expect(aggregateMissPatterns(events, NOW, { club: '7-iron' })).toEqual([
      { id: 'club=7-iron|pressure=*:HOOK', direction: 'HOOK', frequency: 4, confidence: 0.8, lastOccurrence: NOW, club: '7-iron' },
    ]);
  });

  it('filters by pressure', () => {
    const events = [
      ...misses('PUSH', 3, { pressure: TAGGED }),
      ...misses('STRAIGHT', 1, { pressure: TAGGED }),
      ...misses('SLICE', 6),
    ];
    expect(aggregateMissPatterns(events, NOW, { pressure: true })).toEqual([
      {
        id: 'club=*|pressure=yes:PUSH',
        direction: 'PUSH',
        frequency: 3,
        confidence: 0.75,
        lastOccurrence: NOW,
        pressureContext: { isUserTagged: true, isInferred: false },
      },
    ]);
  });

  it('only considers the newest events up to the cap', () => {
    const events = [...misses('STRAIGHT', 10, { ageDays: 1 }), ...misses('SLICE', 10, { ageDays: 2 })];
    expect(aggregateMissPatterns(events, NOW, { maxEvents: 10 })).toEqual([]);
    expect(aggregateMissPatterns(events, NOW, { maxEvents: 20 }).map((pattern) => pattern.frequency)).toEqual([10]);
  });

  it('leaves out events older than the window', () => {
    const events = [...misses('SLICE', 5, { ageDays: 40 }), ...misses('STRAIGHT', 3)];
    expect(aggregateMissPatterns(events, NOW, { windowDays: 30 })).toEqual([]);
  });

  it('gives the same answer for the same input', () => {
    const events = [...misses('PULL', 4), ...misses('FAT', 3, { ageDays: 3 }), ...misses('STRAIGHT', 3)];
    expect(aggregateMissPatterns(events, NOW)).toEqual(aggregateMissPatterns([...events].reverse(), NOW));
  });
});
