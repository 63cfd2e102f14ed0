import { LIES, type Lie } from '../assistant/types';
import { AsyncLock } from '../core/lock';
import { resolveStorage, type AsyncStorageLike } from '../core/pstore';
import { isMissDirection, normalizeClubId, type MissEvent, type MissPattern, type PressureContext } from './types';

export interface EventQuery {
  /** Only events at or after this timestamp. */
  since?: number;
  club?: string;
}

export interface StoredPatternSet {
  filterKey: string;
  computedAt: number;
  patterns: MissPattern[];
}

/** Persistence for miss events (append-only) and materialised patterns. */
export interface MissMemoryRepository {
  appendEvent(event: MissEvent): Promise<void>;
  readEvents(query?: EventQuery): Promise<MissEvent[]>;
  replacePatterns(set: StoredPatternSet): Promise<void>;
  readPatterns(filterKey: string): Promise<StoredPatternSet | null>;
  /** Removes events strictly older than `cutoff`; returns how many were removed. */
  deleteEventsBefore(cutoff: number): Promise<number>;
  clear(): Promise<void>;
}

const EVENTS_KEY = 'miss-memory.events.v1';
const PATTERNS_KEY = 'miss-memory.patterns.v1';

const isNum = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asLie(value: unknown): Lie | null {
  return LIES.find((lie) => lie === value) ?? null;
}

function asPressure(value: unknown): PressureContext {
  if (!isRecord(value)) {
    return { isUserTagged: false, isInferred: false };
  }
  const context: PressureContext = {
    isUserTagged: value.isUserTagged === true,
    isInferred: value.isInferred === true,
  };
  if (typeof value.scoringContext === 'string' && value.scoringContext) {
    context.scoringContext = value.scoringContext;
  }
  return context;
}

function parseEvent(raw: unknown): MissEvent | null {
  if (!isRecord(raw)) {
    return null;
  }
  const lie = asLie(raw.lie);
  if (
    typeof raw.id !== 'string' ||
    !raw.id ||
    !isNum(raw.timestamp) ||
    typeof raw.clubId !== 'string' ||
    !raw.clubId ||
    !isMissDirection(raw.missDirection) ||
    !lie
  ) {
    return null;
  }
  const event: MissEvent = {
    id: raw.id,
    timestamp: raw.timestamp,
    clubId: raw.clubId,
    missDirection: raw.missDirection,
    lie,
    pressureContext: asPressure(raw.pressureContext),
  };
  if (isNum(raw.holeNumber)) {
    event.holeNumber = raw.holeNumber;
  }
  if (typeof raw.notes === 'string' && raw.notes) {
    event.notes = raw.notes;
  }
  return event;
}

function parsePattern(raw: unknown): MissPattern | null {
  if (!isRecord(raw)) {
    return null;
  }
  if (
    typeof raw.id !== 'string' ||
    !isMissDirection(raw.direction) ||
    !isNum(raw.frequency) ||
    !isNum(raw.confidence) ||
    raw.confidence < 0 ||
    raw.confidence > 1 ||
    !isNum(raw.lastOccurrence)
  ) {
    return null;
  }
  const pattern: MissPattern = {
    id: raw.id,
    direction: raw.direction,
    frequency: raw.frequency,
    confidence: raw.confidence,
    lastOccurrence: raw.lastOccurrence,
  };
  if (typeof raw.club === 'string' && raw.club) {
    pattern.club = raw.club;
  }
  if (isRecord(raw.pressureContext)) {
    pattern.pressureContext = asPressure(raw.pressureContext);
  }
  return pattern;
}

function parsePatternSet(raw: unknown): StoredPatternSet | null {
  if (!isRecord(raw) || typeof raw.filterKey !== 'string' || !isNum(raw.computedAt) || !Array.isArray(raw.patterns)) {
    return null;
  }
  const patterns = raw.patterns.map(parsePattern).filter((pattern): pattern is MissPattern => pattern !== null);
  return { filterKey: raw.filterKey, computedAt: raw.computedAt, patterns };
}

function safeParse(json: string | null): unknown {
  if (!json) {
    return null;
  }
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}

/**
 * Repository over a key/value store. Events live under one key as a JSON
 * array, pattern sets under another keyed by filter. Corrupt records are
 * skipped one by one.
 */
export class KeyValueMissRepository implements MissMemoryRepository {
  private readonly storage: AsyncStorageLike;
  private readonly lock = new AsyncLock();

  constructor(storage: AsyncStorageLike = resolveStorage()) {
    this.storage = storage;
  }

  appendEvent(event: MissEvent): Promise<void> {
    return this.lock.runExclusive(async () => {
      const events = await this.loadEvents();
      events.push({ ...event });
      await this.storage.setItem(EVENTS_KEY, JSON.stringify(events));
    });
  }

  async readEvents(query: EventQuery = {}): Promise<MissEvent[]> {
    const events = await this.lock.runExclusive(() => this.loadEvents());
    const club = query.club && query.club.trim() ? normalizeClubId(query.club) : null;
    return events.filter((event) => {
      if (query.since !== undefined && event.timestamp < query.since) {
        return false;
      }
      return club === null || normalizeClubId(event.clubId) === club;
    });
  }

  replacePatterns(set: StoredPatternSet): Promise<void> {
    return this.lock.runExclusive(async () => {
      const sets = await this.loadPatternSets();
      sets[set.filterKey] = { filterKey: set.filterKey, computedAt: set.computedAt, patterns: [...set.patterns] };
      await this.storage.setItem(PATTERNS_KEY, JSON.stringify(sets));
    });
  }

  async readPatterns(filterKey: string): Promise<StoredPatternSet | null> {
    const sets = await this.lock.runExclusive(() => this.loadPatternSets());
    return sets[filterKey] ?? null;
  }

  deleteEventsBefore(cutoff: number): Promise<number> {
    return this.lock.runExclusive(async () => {
      const events = await this.loadEvents();
      const kept = events.filter((event) => event.timestamp >= cutoff);
      if (kept.length !== events.length) {
        await this.storage.setItem(EVENTS_KEY, JSON.stringify(kept));
      }
      return events.length - kept.length;
    });
  }

  clear(): Promise<void> {
    return this.lock.runExclusive(async () => {
      if (this.storage.removeItem) {
        await this.storage.removeItem(EVENTS_KEY);
        await this.storage.removeItem(PATTERNS_KEY);
        return;
      }
      await this.storage.setItem(EVENTS_KEY, '[]');
      await this.storage.setItem(PATTERNS_KEY, '{}');
    });
  }

  private async loadEvents(): Promise<MissEvent[]> {
    const parsed = safeParse(await this.storage.getItem(EVENTS_KEY));
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.map(parseEvent).filter((event): event is MissEvent => event !== null);
  }

  private async loadPatternSets(): Promise<Record<string, StoredPatternSet>> {
    const parsed = safeParse(await this.storage.getItem(PATTERNS_KEY));
    const sets: Record<string, StoredPatternSet> = {};
    if (!isRecord(parsed)) {
      return sets;
    }
    for (const [key, value] of Object.entries(parsed)) {
      const set = parsePatternSet(value);
      if (set && set.filterKey === key) {
        sets[key] = set;
      }
    }
    return sets;
  }
}
