import type { UnavailableReason } from '../assistant/errors';
import type { ClassificationSource, IntentType, RoutingResult } from '../assistant/types';

export type TelemetryEmitter = (event: string, data: Record<string, unknown>) => void;

export type ClassificationTelemetryEvent = {
  source: ClassificationSource;
  verdict: 'route' | 'confirm' | 'clarify' | 'inline';
  intent: IntentType | null;
  confidence: number | null;
  latencyMs: number;
  fallbackReason: UnavailableReason | null;
  mode: 'text' | 'voice';
};

export type RoutingTelemetryEvent = {
  kind: RoutingResult['kind'];
  intent: IntentType | null;
  route?: string;
  missing?: string[];
};

export type PatternQueryTelemetryEvent = {
  club: string | null;
  patterns: number;
};

function sanitizeLatency(value: unknown): number {
  const numeric = Number(value);
  return Number.isFinite(numeric) && numeric >= 0 ? Math.round(numeric) : 0;
}

function sanitizeConfidence(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? Math.round(numeric * 1000) / 1000 : null;
}

export function emitClassificationTelemetry(
  emitter: TelemetryEmitter | null | undefined,
  payload: ClassificationTelemetryEvent,
): void {
  if (typeof emitter !== 'function') {
    return;
  }
  try {
    emitter('assistant.classify.v1', {
      source: payload.source,
      verdict: payload.verdict,
      intent: payload.intent,
      confidence: sanitizeConfidence(payload.confidence),
      latencyMs: sanitizeLatency(payload.latencyMs),
      fallbackReason: payload.fallbackReason,
      mode: payload.mode,
    });
  } catch {
    // ignore emitter failures
  }
}

export function emitRoutingTelemetry(
  emitter: TelemetryEmitter | null | undefined,
  payload: RoutingTelemetryEvent,
): void {
  if (typeof emitter !== 'function') {
    return;
  }
  const data: Record<string, unknown> = { kind: payload.kind, intent: payload.intent };
  if (payload.route) {
    data.route = payload.route;
  }
  if (payload.missing && payload.missing.length > 0) {
    data.missing = [...payload.missing];
  }
  try {
    emitter('assistant.route.v1', data);
  } catch {
    // ignore emitter failures
  }
}

export function emitPatternQueryTelemetry(
  emitter: TelemetryEmitter | null | undefined,
  payload: PatternQueryTelemetryEvent,
): void {
  if (typeof emitter !== 'function') {
    return;
  }
  const club = typeof payload.club === 'string' && payload.club.trim() ? payload.club.trim() : null;
  try {
    emitter('assistant.patterns.v1', { club, patterns: Math.max(0, Math.floor(payload.patterns)) });
  } catch {
    // ignore emitter failures
  }
}
