import type { Lie } from '../assistant/types';

export const MISS_DIRECTIONS = ['PUSH', 'PULL', 'SLICE', 'HOOK', 'FAT', 'THIN', 'STRAIGHT'] as const;

export type MissDirection = (typeof MISS_DIRECTIONS)[number];

export function isMissDirection(value: unknown): value is MissDirection {
  return typeof value === 'string' && (MISS_DIRECTIONS as readonly string[]).includes(value);
}

export interface PressureContext {
  isUserTagged: boolean;
  isInferred: boolean;
  scoringContext?: string;
}

export function isUnderPressure(context: PressureContext | null | undefined): boolean {
  return Boolean(context && (context.isUserTagged || context.isInferred));
}

export interface MissEvent {
  id: string;
  /** Epoch milliseconds. */
  timestamp: number;
  clubId: string;
  missDirection: MissDirection;
  lie: Lie;
  pressureContext: PressureContext;
  holeNumber?: number;
  notes?: string;
}

export interface MissPattern {
  id: string;
  direction: MissDirection;
  frequency: number;
  confidence: number;
  lastOccurrence: number;
  club?: string;
  pressureContext?: PressureContext;
}

export interface PatternFilter {
  club?: string;
  /** `true` only pressured shots, `false` only relaxed ones, absent for both. */
  pressure?: boolean;
}

export function normalizeClubId(club: string): string {
  return club.trim().toLowerCase();
}

/** Stable storage key for a filter, e.g. `club=7-iron|pressure=*`. */
export function filterKey(filter: PatternFilter = {}): string {
  const club = filter.club && filter.club.trim() ? normalizeClubId(filter.club) : '*';
  const pressure = filter.pressure === undefined ? '*' : filter.pressure ? 'yes' : 'no';
  return `club=${club}|pressure=${pressure}`;
}
