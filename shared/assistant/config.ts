import { DEFAULT_HALF_LIFE_DAYS, DEFAULT_RETENTION_DAYS } from '../memory/decay';
import { MAX_EVENTS, MIN_SAMPLES, MIN_SHARE } from '../memory/aggregator';
import type { LogLevel } from '../telemetry/logger';
import { CONFIRM_THRESHOLD, ROUTE_THRESHOLD, TEXT_TIMEOUT_MS, VOICE_TIMEOUT_MS } from './classifier';
import { OFFLINE_STRONG_THRESHOLD, OFFLINE_WEAK_THRESHOLD } from './offlineMatcher';
import { DEFAULT_HISTORY_CAPACITY } from './session';

export type Env = Record<string, string | undefined>;

export interface AssistantConfig {
  classifier: {
    baseUrl: string | null;
    apiKey: string | null;
    routeThreshold: number;
    confirmThreshold: number;
    textTimeoutMs: number;
    voiceTimeoutMs: number;
  };
  offline: {
    strongThreshold: number;
    weakThreshold: number;
  };
  session: {
    historyCapacity: number;
  };
  memory: {
    halfLifeDays: number;
    retentionDays: number;
    maxEvents: number;
    minSamples: number;
    minShare: number;
  };
  log: {
    level: LogLevel;
    buildId: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readString(env: Env, ...names: string[]): string | null {
  for (const name of names) {
    const value = env[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= min && value <= max ? value : fallback;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = readNumber(env, name, fallback, min, max);
  return Number.isInteger(value) ? value : fallback;
}

function thresholdPair(
  env: Env,
  upperName: string,
  lowerName: string,
  defaults: readonly [number, number],
): [number, number] {
  const upper = readNumber(env, upperName, defaults[0], 0, 1);
  const lower = readNumber(env, lowerName, defaults[1], 0, 1);
  // an inverted pair would make the middle tier unreachable
  return lower <= upper ? [upper, lower] : [defaults[0], defaults[1]];
}

export function resolveAssistantConfig(env: Env = process.env): AssistantConfig {
  const [routeThreshold, confirmThreshold] = thresholdPair(
    env,
    'ASSISTANT_ROUTE_THRESHOLD',
    'ASSISTANT_CONFIRM_THRESHOLD',
    [ROUTE_THRESHOLD, CONFIRM_THRESHOLD],
  );
  const [strongThreshold, weakThreshold] = thresholdPair(
    env,
    'ASSISTANT_OFFLINE_STRONG_THRESHOLD',
    'ASSISTANT_OFFLINE_WEAK_THRESHOLD',
    [OFFLINE_STRONG_THRESHOLD, OFFLINE_WEAK_THRESHOLD],
  );
  const baseUrl = readString(env, 'ASSISTANT_CLASSIFIER_URL', 'API_BASE');
  const level = readString(env, 'ASSISTANT_LOG_LEVEL')?.toLowerCase();

  return {
    classifier: {
      baseUrl: baseUrl ? baseUrl.replace(/\/$/, '') : null,
      apiKey: readString(env, 'ASSISTANT_API_KEY', 'API_KEY'),
      routeThreshold,
      confirmThreshold,
      textTimeoutMs: readInteger(env, 'ASSISTANT_TEXT_TIMEOUT_MS', TEXT_TIMEOUT_MS, 1, 60_000),
      voiceTimeoutMs: readInteger(env, 'ASSISTANT_VOICE_TIMEOUT_MS', VOICE_TIMEOUT_MS, 1, 60_000),
    },
    offline: { strongThreshold, weakThreshold },
    session: {
      historyCapacity: readInteger(env, 'ASSISTANT_HISTORY_CAPACITY', DEFAULT_HISTORY_CAPACITY, 1, 1000),
    },
    memory: {
      halfLifeDays: readNumber(env, 'ASSISTANT_MEMORY_HALF_LIFE_DAYS', DEFAULT_HALF_LIFE_DAYS, 0.001, 3650),
      retentionDays: readNumber(env, 'ASSISTANT_MEMORY_RETENTION_DAYS', DEFAULT_RETENTION_DAYS, 0, 3650),
      maxEvents: readInteger(env, 'ASSISTANT_MEMORY_MAX_EVENTS', MAX_EVENTS, 1, 10_000),
      minSamples: readInteger(env, 'ASSISTANT_MEMORY_MIN_SAMPLES', MIN_SAMPLES, 1, 1000),
      minShare: readNumber(env, 'ASSISTANT_MEMORY_MIN_SHARE', MIN_SHARE, 0, 1),
    },
    log: {
      level: LOG_LEVELS.find((candidate) => candidate === level) ?? 'info',
      buildId: readString(env, 'ASSISTANT_BUILD_ID', 'BUILD_ID') ?? 'dev',
    },
  };
}
