import type { Intent, ParameterValue, RoutingResult, RoutingTarget } from './types';

/** Copy of `parameters` with keys in lexicographic order. */
export function canonicalParameters(parameters: Record<string, ParameterValue>): Record<string, ParameterValue> {
  const sorted: Record<string, ParameterValue> = {};
  for (const key of Object.keys(parameters).sort()) {
    const value = parameters[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return sorted;
}

/**
 * Deep-link string for a routing target, e.g. `caddy/score_entry?hole=5`.
 * Keys are sorted so insertion order never changes the result.
 */
export function buildRoute(target: RoutingTarget): string {
  const base = `${target.module.toLowerCase()}/${target.screen}`;
  const query = Object.entries(canonicalParameters(target.parameters))
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');
  return query ? `${base}?${query}` : base;
}

function stableValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stableValue);
  }
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        out[key] = stableValue(entry);
      }
    }
    return out;
  }
  return value;
}

function serializeIntent(intent: Intent | null): unknown {
  if (!intent) {
    return null;
  }
  return {
    id: intent.id,
    type: intent.type,
    confidence: intent.confidence,
    entities: intent.entities,
    rawInput: intent.rawInput,
  };
}

/** Canonical JSON for a routing result; identical results give identical strings. */
export function serializeRoutingResult(result: RoutingResult): string {
  switch (result.kind) {
    case 'navigate':
      return JSON.stringify(
        stableValue({ kind: result.kind, intent: serializeIntent(result.intent), target: result.target, route: result.route }),
      );
    case 'no_navigation':
      return JSON.stringify(stableValue({ kind: result.kind, intent: serializeIntent(result.intent), response: result.response }));
    case 'confirmation_required':
      return JSON.stringify(
        stableValue({
          kind: result.kind,
          intent: serializeIntent(result.intent),
          message: result.message,
          suggestions: result.suggestions,
        }),
      );
    case 'prerequisite_missing':
      return JSON.stringify(
        stableValue({
          kind: result.kind,
          intent: serializeIntent(result.intent),
          missing: result.missing,
          message: result.message,
        }),
      );
  }
}
