import { decay, DEFAULT_HALF_LIFE_DAYS, DEFAULT_RETENTION_DAYS, isWithinRetentionWindow } from './decay';
import {
  filterKey,
  isUnderPressure,
  normalizeClubId,
  type MissDirection,
  type MissEvent,
  type MissPattern,
  type PatternFilter,
  type PressureContext,
} from './types';

export const MIN_SAMPLES = 3;
export const MIN_SHARE = 0.3;
export const MIN_CONFIDENCE = 0.01;
export const MAX_EVENTS = 50;

export interface AggregationOptions extends PatternFilter {
  windowDays?: number;
  maxEvents?: number;
  minSamples?: number;
  minShare?: number;
  minConfidence?: number;
  halfLifeDays?: number;
}

function matchesFilter(event: MissEvent, filter: PatternFilter): boolean {
  if (filter.club && filter.club.trim() && normalizeClubId(event.clubId) !== normalizeClubId(filter.club)) {
    return false;
  }
  if (filter.pressure !== undefined && isUnderPressure(event.pressureContext) !== filter.pressure) {
    return false;
  }
  return true;
}

/** Events inside the window that match the filter, newest first, capped. */
export function qualifyingEvents(events: readonly MissEvent[], now: number, options: AggregationOptions = {}): MissEvent[] {
  const windowDays = options.windowDays ?? DEFAULT_RETENTION_DAYS;
  const maxEvents = Math.max(0, Math.floor(options.maxEvents ?? MAX_EVENTS));
  return events
    .filter((event) => matchesFilter(event, options) && isWithinRetentionWindow(event.timestamp, windowDays, now))
    .sort((a, b) => b.timestamp - a.timestamp || a.id.localeCompare(b.id))
    .slice(0, maxEvents);
}

function summarizePressure(group: readonly MissEvent[]): PressureContext {
  return {
    isUserTagged: group.some((event) => event.pressureContext.isUserTagged),
    isInferred: group.some((event) => event.pressureContext.isInferred),
  };
}

export function comparePatterns(a: MissPattern, b: MissPattern): number {
  return (
    b.confidence - a.confidence ||
    b.frequency - a.frequency ||
    b.lastOccurrence - a.lastOccurrence ||
    a.direction.localeCompare(b.direction)
  );
}

/**
 * Groups qualifying misses by direction and scores each group by the sum of
 * per-event decay weights over the size of the qualifying set. Groups under
 * the sample floor or the share floor never become patterns, and straight
 * shots count toward the total without forming one.
 */
export function aggregateMissPatterns(
  events: readonly MissEvent[],
  now: number,
  options: AggregationOptions = {},
): MissPattern[] {
  const minSamples = options.minSamples ?? MIN_SAMPLES;
  const minShare = options.minShare ?? MIN_SHARE;
  const minConfidence = options.minConfidence ?? MIN_CONFIDENCE;
  const halfLifeDays = options.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;

  const qualifying = qualifyingEvents(events, now, options);
  const total = qualifying.length;
  if (total < minSamples) {
    return [];
  }

  const groups = new Map<MissDirection, MissEvent[]>();
  for (const event of qualifying) {
    if (event.missDirection === 'STRAIGHT') {
      continue;
    }
    const group = groups.get(event.missDirection);
    if (group) {
      group.push(event);
    } else {
      groups.set(event.missDirection, [event]);
    }
  }

  const key = filterKey(options);
  const club = options.club && options.club.trim() ? normalizeClubId(options.club) : undefined;
  const patterns: MissPattern[] = [];
  for (const [direction, group] of groups) {
    const frequency = group.length;
    if (frequency < minSamples || frequency / total < minShare) {
      continue;
    }
    const weight = group.reduce((sum, event) => sum + decay(event.timestamp, now, halfLifeDays), 0);
    const confidence = Math.min(1, Math.max(0, weight / total));
    if (confidence < minConfidence) {
      continue;
    }
    const pattern: MissPattern = {
      id: `${key}:${direction}`,
      direction,
      frequency,
      confidence,
      lastOccurrence: Math.max(...group.map((event) => event.timestamp)),
    };
    if (club) {
      pattern.club = club;
    }
    if (options.pressure === true) {
      pattern.pressureContext = summarizePressure(group);
    }
    patterns.push(pattern);
  }
  return patterns.sort(comparePatterns);
}
