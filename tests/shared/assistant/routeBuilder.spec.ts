import { describe, expect, it } from 'vitest';

import { createIntent } from '../../../shared/assistant/classifier';
import { buildRoute, serializeRoutingResult } from '../../../shared/assistant/routeBuilder';

describe('buildRoute', () => {
  it('builds a module/screen path with query parameters', () => {
    expect(buildRoute({ module: 'CADDY', screen: 'score_entry', parameters: { hole: 5 } })).toBe(
      'caddy/score_entry?hole=5',
    );
  });

  it('ignores parameter insertion order', () => {
    const first = buildRoute({ module: 'CADDY', screen: 'stats', parameters: { b: 2, a: 'x y' } });
    const second = buildRoute({ module: 'CADDY', screen: 'stats', parameters: { a: 'x y', b: 2 } });
    expect(first).toBe('caddy/stats?a=x%20y&b=2');
    expect(second).toBe(first);
  });

  it('omits the query when there are no parameters', () => {
    expect(buildRoute({ module: 'SETTINGS', screen: 'preferences', parameters: {} })).toBe('settings/preferences');
    expect(buildRoute({ module: 'COACH', screen: 'drills', parameters: { indoor: true } })).toBe(
      'coach/drills?indoor=true',
    );
  });
});

describe('serializeRoutingResult', () => {
  it('gives identical strings for equal results built in different orders', () => {
    const intent = createIntent('intent-1', 'STATS_LOOKUP', 0.9, { club: 'driver' }, 'stats with driver');
    const first = serializeRoutingResult({
      kind: 'navigate',
      intent,
      target: { module: 'CADDY', screen: 'stats', parameters: { period: 'recent', club: 'driver' } },
      route: 'caddy/stats?club=driver&period=recent',
    });
    const second = serializeRoutingResult({
      kind: 'navigate',
      intent,
      target: { module: 'CADDY', screen: 'stats', parameters: { club: 'driver', period: 'recent' } },
      route: 'caddy/stats?club=driver&period=recent',
    });
    expect(second).toBe(first);
  });
});
