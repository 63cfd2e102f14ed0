export type ReliabilityEvent =
  | {
      type: 'classifier:timeout';
      timestamp: number;
      mode: 'text' | 'voice';
      budgetMs: number;
    }
  | {
      type: 'classifier:unavailable';
      timestamp: number;
      reason: string;
    }
  | {
      type: 'classifier:fallback';
      timestamp: number;
      reason: string;
      outcome: 'match' | 'clarify' | 'requires_online' | 'no_match';
    }
  | {
      type: 'memory:persist_failed';
      timestamp: number;
      operation: string;
      reason: string;
    };

type ReliabilityListener = (event: ReliabilityEvent) => void;

const HISTORY_WINDOW_MS = 60 * 60 * 1000;

const subscribers = new Set<ReliabilityListener>();
let buffer: ReliabilityEvent[] = [];

function dropExpired(now: number): void {
  const oldest = now - HISTORY_WINDOW_MS;
  buffer = buffer.filter((entry) => entry.timestamp >= oldest);
}

/** Buffers the event for an hour and fans it out; a throwing subscriber does not stop the others. */
export function emitReliabilityEvent(event: ReliabilityEvent): void {
  const stamped: ReliabilityEvent = Number.isFinite(event.timestamp) ? { ...event } : { ...event, timestamp: Date.now() };
  buffer.push(stamped);
  dropExpired(stamped.timestamp);
  for (const subscriber of subscribers) {
    try {
      subscriber(stamped);
    } catch {
      // subscribers are best-effort
    }
  }
}

export function subscribeReliabilityEvents(listener: ReliabilityListener): () => void {
  subscribers.add(listener);
  return () => {
    subscribers.delete(listener);
  };
}

export function recentReliabilityEvents(windowMs: number, now = Date.now()): ReliabilityEvent[] {
  dropExpired(now);
  const since = now - Math.max(0, windowMs);
  const recent: ReliabilityEvent[] = [];
  for (const entry of buffer) {
    if (entry.timestamp >= since) {
      recent.push({ ...entry });
    }
  }
  return recent;
}

export function __resetReliabilityEventsForTests(): void {
  buffer = [];
  subscribers.clear();
}
