import { describeError, requireContract } from '../assistant/errors';
import { ensureId } from '../core/ids';
import { emitReliabilityEvent } from '../reliability/events';
import { silentLogger, type Logger } from '../telemetry/logger';
import { aggregateMissPatterns, comparePatterns, MAX_EVENTS, MIN_CONFIDENCE, MIN_SAMPLES, MIN_SHARE } from './aggregator';
import { decay, DEFAULT_HALF_LIFE_DAYS, DEFAULT_RETENTION_DAYS, MS_PER_DAY } from './decay';
import type { MissMemoryRepository } from './repository';
import {
  filterKey,
  isMissDirection,
  normalizeClubId,
  type MissEvent,
  type MissPattern,
  type PatternFilter,
} from './types';

export interface MissPatternStoreConfig {
  repository: MissMemoryRepository;
  clock?: () => number;
  idFactory?: () => string;
  logger?: Logger;
  halfLifeDays?: number;
  retentionDays?: number;
  maxEvents?: number;
  minSamples?: number;
  minShare?: number;
  minConfidence?: number;
}

export type RecordMissInput = Omit<MissEvent, 'id' | 'timestamp'> & { id?: string; timestamp?: number };

/**
 * Records miss events and serves decayed miss patterns, either computed on
 * demand or from the last materialised refresh.
 */
export class MissPatternStore {
  private readonly repository: MissMemoryRepository;
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  private readonly logger: Logger;
  private readonly halfLifeDays: number;
  private readonly retentionDays: number;
  private readonly maxEvents: number;
  private readonly minSamples: number;
  private readonly minShare: number;
  private readonly minConfidence: number;

  constructor(cfg: MissPatternStoreConfig) {
    this.repository = cfg.repository;
    this.clock = cfg.clock ?? (() => Date.now());
    this.idFactory = cfg.idFactory ?? (() => ensureId('miss'));
    this.logger = cfg.logger ?? silentLogger;
    this.halfLifeDays = cfg.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;
    this.retentionDays = cfg.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.maxEvents = cfg.maxEvents ?? MAX_EVENTS;
    this.minSamples = cfg.minSamples ?? MIN_SAMPLES;
    this.minShare = cfg.minShare ?? MIN_SHARE;
    this.minConfidence = cfg.minConfidence ?? MIN_CONFIDENCE;
  }

  async recordMiss(input: RecordMissInput): Promise<MissEvent> {
    const now = this.clock();
    const timestamp = input.timestamp ?? now;
    requireContract(Number.isFinite(timestamp), 'timestamp', `expected a finite number, got ${timestamp}`);
    requireContract(timestamp <= now, 'timestamp', `event at ${timestamp} is in the future relative to ${now}`);
    requireContract(input.clubId.trim().length > 0, 'clubId', 'must not be blank');
    requireContract(isMissDirection(input.missDirection), 'missDirection', `unknown direction ${input.missDirection}`);

    const event: MissEvent = {
      id: input.id ?? this.idFactory(),
      timestamp,
      clubId: normalizeClubId(input.clubId),
      missDirection: input.missDirection,
      lie: input.lie,
      pressureContext: { ...input.pressureContext },
    };
    if (input.holeNumber !== undefined) {
      event.holeNumber = input.holeNumber;
    }
    if (input.notes) {
      event.notes = input.notes;
    }
    await this.persist('appendEvent', () => this.repository.appendEvent(event));
    this.logger.debug('miss recorded', { club: event.clubId, direction: event.missDirection, notes: event.notes });
    return event;
  }

  /** Patterns aggregated from the events currently in the retention window. */
  async getPatterns(filter: PatternFilter = {}): Promise<MissPattern[]> {
    const now = this.clock();
    const events = await this.repository.readEvents({
      since: now - this.retentionDays * MS_PER_DAY,
      club: filter.club,
    });
    return aggregateMissPatterns(events, now, {
      ...filter,
      windowDays: this.retentionDays,
      maxEvents: this.maxEvents,
      minSamples: this.minSamples,
      minShare: this.minShare,
      minConfidence: this.minConfidence,
      halfLifeDays: this.halfLifeDays,
    });
  }

  /** Recomputes patterns for the filter and replaces whatever was stored for its key. */
  async refreshPatterns(filter: PatternFilter = {}): Promise<MissPattern[]> {
    const patterns = await this.getPatterns(filter);
    await this.persist('replacePatterns', () =>
      this.repository.replacePatterns({ filterKey: filterKey(filter), computedAt: this.clock(), patterns }),
    );
    this.logger.info('miss patterns refreshed', { filter: filterKey(filter), patterns: patterns.length });
    return patterns;
  }

  /**
   * Last refreshed patterns with decay applied for the time since the
   * refresh, so stored confidence only ever goes down between refreshes.
   */
  async getStoredPatterns(filter: PatternFilter = {}): Promise<MissPattern[]> {
    const stored = await this.repository.readPatterns(filterKey(filter));
    if (!stored) {
      return [];
    }
    const now = this.clock();
    const factor = stored.computedAt <= now ? decay(stored.computedAt, now, this.halfLifeDays) : 1;
    return stored.patterns
      .map((pattern) => ({ ...pattern, confidence: pattern.confidence * factor }))
      .filter((pattern) => pattern.confidence >= this.minConfidence)
      .sort(comparePatterns);
  }

  async getDominantPattern(filter: PatternFilter = {}): Promise<MissPattern | null> {
    const [dominant] = await this.getPatterns(filter);
    return dominant ?? null;
  }

  async getRecentEvents(limit = 10): Promise<MissEvent[]> {
    const events = await this.repository.readEvents();
    return events
      .sort((a, b) => b.timestamp - a.timestamp || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, limit));
  }

  /** Deletes events older than the retention window; returns how many were removed. */
  async enforceRetention(): Promise<number> {
    const cutoff = this.clock() - this.retentionDays * MS_PER_DAY;
    const removed = await this.repository.deleteEventsBefore(cutoff);
    if (removed > 0) {
      this.logger.info('miss events expired', { removed });
    }
    return removed;
  }

  private async persist(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      const reason = describeError(error);
      emitReliabilityEvent({ type: 'memory:persist_failed', timestamp: this.clock(), operation, reason });
      this.logger.error('miss memory write failed', { operation, reason });
      throw error;
    }
  }

  async clearHistory(): Promise<void> {
    await this.repository.clear();
    this.logger.info('miss history cleared');
  }
}
