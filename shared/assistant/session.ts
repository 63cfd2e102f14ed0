import { AsyncLock } from '../core/lock';
import { ContractViolationError } from './errors';
import type { ConversationRole, ConversationTurn, Lie } from './types';

export const DEFAULT_HISTORY_CAPACITY = 10;
export const CONTEXT_TURNS = 3;

export interface RoundState {
  roundId: string;
  courseName: string;
  currentHole: number;
  par: number;
}

export interface ShotContext {
  club?: string;
  yardage?: number;
  lie?: Lie;
  outcome?: string;
  timestamp: number;
}

export interface SessionSnapshot {
  turns: ConversationTurn[];
  round: RoundState | null;
  lastShot: ShotContext | null;
  lastRecommendation: string | null;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

/** Fixed-capacity FIFO of conversation turns; the oldest turn is evicted first. */
export class ConversationHistory {
  readonly capacity: number;
  private readonly slots: Array<ConversationTurn | undefined>;
  private start = 0;
  private count = 0;

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ContractViolationError('capacity', `expected a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<ConversationTurn | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(turn: ConversationTurn): void {
    const index = (this.start + this.count) % this.capacity;
    this.slots[index] = { ...turn };
    if (this.count < this.capacity) {
      this.count += 1;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  toArray(): ConversationTurn[] {
    const out: ConversationTurn[] = [];
    for (let offset = 0; offset < this.count; offset += 1) {
      const turn = this.slots[(this.start + offset) % this.capacity];
      if (turn) {
        out.push({ ...turn });
      }
    }
    return out;
  }

  recent(limit: number): ConversationTurn[] {
    const all = this.toArray();
    return limit > 0 ? all.slice(-limit) : [];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}

export interface SessionContextConfig {
  capacity?: number;
  clock?: () => number;
}

export interface StartRoundInput {
  roundId: string;
  courseName: string;
  startHole?: number;
  par?: number;
}

function assertHole(hole: number): void {
  if (!Number.isInteger(hole) || hole < 1 || hole > 18) {
    throw new ContractViolationError('hole', `expected 1-18, got ${hole}`);
  }
}

function assertPar(par: number): void {
  if (!Number.isInteger(par) || par < 3 || par > 5) {
    throw new ContractViolationError('par', `expected 3-5, got ${par}`);
  }
}

/**
 * Conversation and round state for one user session. Every mutation goes
 * through one lock so rapid successive inputs cannot interleave.
 */
export class SessionContextManager {
  private readonly history: ConversationHistory;
  private readonly clock: () => number;
  private readonly lock = new AsyncLock();
  private readonly listeners = new Set<SessionListener>();
  private round: RoundState | null = null;
  private lastShot: ShotContext | null = null;
  private lastRecommendation: string | null = null;

  constructor(cfg: SessionContextConfig = {}) {
    this.history = new ConversationHistory(cfg.capacity ?? DEFAULT_HISTORY_CAPACITY);
    this.clock = cfg.clock ?? (() => Date.now());
  }

  get capacity(): number {
    return this.history.capacity;
  }

  addTurn(role: ConversationRole, content: string): Promise<void> {
    return this.mutate(() => {
      this.history.push({ role, content, timestamp: this.clock() });
    });
  }

  startRound(input: StartRoundInput): Promise<RoundState> {
    return this.mutate(() => {
      const currentHole = input.startHole ?? 1;
      const par = input.par ?? 4;
      assertHole(currentHole);
      assertPar(par);
      if (!input.roundId.trim()) {
        throw new ContractViolationError('roundId', 'must not be blank');
      }
      this.round = { roundId: input.roundId, courseName: input.courseName, currentHole, par };
      this.lastShot = null;
      return { ...this.round };
    });
  }

  updateHole(hole: number, par?: number): Promise<RoundState | null> {
    return this.mutate(() => {
      if (!this.round) {
        return null;
      }
      assertHole(hole);
      const nextPar = par ?? this.round.par;
      assertPar(nextPar);
      this.round = { ...this.round, currentHole: hole, par: nextPar };
      return { ...this.round };
    });
  }

  endRound(): Promise<void> {
    return this.mutate(() => {
      this.round = null;
      this.lastShot = null;
    });
  }

  recordShot(shot: Omit<ShotContext, 'timestamp'>): Promise<void> {
    return this.mutate(() => {
      this.lastShot = { ...shot, timestamp: this.clock() };
    });
  }

  recordRecommendation(text: string): Promise<void> {
    return this.mutate(() => {
      this.lastRecommendation = text;
    });
  }

  clear(): Promise<void> {
    return this.mutate(() => {
      this.history.clear();
      this.round = null;
      this.lastShot = null;
      this.lastRecommendation = null;
    });
  }

  snapshot(): SessionSnapshot {
    return {
      turns: this.history.toArray(),
      round: this.round ? { ...this.round } : null,
      lastShot: this.lastShot ? { ...this.lastShot } : null,
      lastRecommendation: this.lastRecommendation,
    };
  }

  recentTurns(limit = CONTEXT_TURNS): ConversationTurn[] {
    return this.history.recent(limit);
  }

  hasActiveRound(): boolean {
    return this.round !== null;
  }

  currentPar(): number | null {
    return this.round?.par ?? null;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private mutate<T>(change: () => T): Promise<T> {
    return this.lock.runExclusive(() => {
      const result = change();
      this.notify();
      return result;
    });
  }

  private notify(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const snapshot = this.snapshot();
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch {
        // listeners are best-effort
      }
    });
  }
}

/** Plain-text context block sent alongside the utterance to the remote classifier. */
export function summarizeSession(snapshot: SessionSnapshot, turns = CONTEXT_TURNS): string {
  const lines: string[] = [];
  if (snapshot.round) {
    const { courseName, currentHole, par } = snapshot.round;
    lines.push(`round: ${courseName}, hole ${currentHole}, par ${par}`);
  }
  if (snapshot.lastShot) {
    const { club, yardage, lie, outcome } = snapshot.lastShot;
    const parts = [club, yardage !== undefined ? `${yardage} yards` : undefined, lie, outcome].filter(
      (part): part is string => typeof part === 'string' && part.length > 0,
    );
    if (parts.length > 0) {
      lines.push(`last shot: ${parts.join(', ')}`);
    }
  }
  if (snapshot.lastRecommendation) {
    lines.push(`last recommendation: ${snapshot.lastRecommendation}`);
  }
  const recent = turns > 0 ? snapshot.turns.slice(-turns) : [];
  for (const turn of recent) {
    lines.push(`${turn.role}: ${turn.content}`);
  }
  return lines.join('\n');
}
