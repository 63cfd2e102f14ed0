import { requireContract } from '../assistant/errors';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const DEFAULT_HALF_LIFE_DAYS = 14;
/** Past this many half-lives the weight is reported as exactly zero. */
export const CUTOFF_HALF_LIVES = 6;
export const DEFAULT_RETENTION_DAYS = 90;

function requireFinite(value: number, field: string): void {
  requireContract(Number.isFinite(value), field, `expected a finite number, got ${value}`);
}

/** Age in fractional days. Rejects timestamps after `now`. */
export function ageDays(timestamp: number, now: number): number {
  requireFinite(timestamp, 'timestamp');
  requireFinite(now, 'now');
  requireContract(timestamp <= now, 'timestamp', `event at ${timestamp} is in the future relative to ${now}`);
  return (now - timestamp) / MS_PER_DAY;
}

/**
 * Exponential time decay, `0.5 ^ (age / halfLife)`. Exactly 1 at age zero
 * and exactly 0 once the age exceeds six half-lives.
 */
export function decay(eventTimestamp: number, now: number, halfLifeDays = DEFAULT_HALF_LIFE_DAYS): number {
  requireContract(
    Number.isFinite(halfLifeDays) && halfLifeDays > 0,
    'halfLifeDays',
    `expected a positive number, got ${halfLifeDays}`,
  );
  const age = ageDays(eventTimestamp, now);
  if (age === 0) {
    return 1;
  }
  if (age > halfLifeDays * CUTOFF_HALF_LIVES) {
    return 0;
  }
  return Math.pow(0.5, age / halfLifeDays);
}

export function decayedConfidence(
  baseConfidence: number,
  lastOccurrence: number,
  now: number,
  halfLifeDays = DEFAULT_HALF_LIFE_DAYS,
): number {
  requireContract(
    Number.isFinite(baseConfidence) && baseConfidence >= 0 && baseConfidence <= 1,
    'baseConfidence',
    `expected a value in [0, 1], got ${baseConfidence}`,
  );
  return baseConfidence * decay(lastOccurrence, now, halfLifeDays);
}

/** Inclusive: an event exactly `retentionDays` old is still retained. */
export function isWithinRetentionWindow(timestamp: number, retentionDays: number, now: number): boolean {
  requireContract(
    Number.isFinite(retentionDays) && retentionDays >= 0,
    'retentionDays',
    `expected a non-negative number, got ${retentionDays}`,
  );
  return ageDays(timestamp, now) <= retentionDays;
}
