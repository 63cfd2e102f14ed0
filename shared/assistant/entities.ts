import { LIES, type EntityKey, type ExtractedEntities, type Lie } from './types';

export interface ExtractionContext {
  /** Par of the current hole, used to turn "birdie" into a stroke count. */
  par?: number | null;
}

const LIE_WORDS: ReadonlyArray<readonly [RegExp, Lie]> = [
  [/\bfairway\b/, 'fairway'],
  [/\brough\b/, 'rough'],
  [/\b(?:bunker|sand|trap)\b/, 'bunker'],
  [/\bfringe\b/, 'fringe'],
  [/\bgreen\b/, 'green'],
  [/\b(?:trees|woods)\b/, 'trees'],
  [/\b(?:hazard|water)\b/, 'hazard'],
  [/\bon the tee\b/, 'tee'],
];

const CLUB_PATTERN =
  /\b(?:([2-9])-(iron|wood|hybrid)|(driver|putter)|(pitching|gap|approach|sand|lob) wedge)\b/;

const RELATIVE_SCORES: Readonly<Record<string, number>> = Object.freeze({
  albatross: -3,
  eagle: -2,
  birdie: -1,
  par: 0,
  bogey: 1,
  'double bogey': 2,
  'triple bogey': 3,
});

const isNum = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

export function clampValue(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function toInt(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

function inRange(value: number | null, min: number, max: number): number | undefined {
  return value !== null && value >= min && value <= max ? value : undefined;
}

function extractClub(text: string): string | undefined {
  const match = CLUB_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [, number, kind, named, wedge] = match;
  if (number && kind) {
    return `${number}-${kind}`;
  }
  if (named) {
    return named;
  }
  return wedge ? `${wedge} wedge` : undefined;
}

function extractHole(text: string): number | undefined {
  const direct = /\bhole\s+(?:number\s+|#)?(\d{1,2})\b/.exec(text);
  if (direct) {
    return inRange(toInt(direct[1]), 1, 18);
  }
  const ordinal = /\b(\d{1,2})(?:st|nd|rd|th)\s+hole\b/.exec(text);
  return ordinal ? inRange(toInt(ordinal[1]), 1, 18) : undefined;
}

function extractYardage(text: string): number | undefined {
  const explicit = /\b(\d{1,3})\s*(?:yards?|yds?)\b/.exec(text) ?? /\bfrom\s+(\d{2,3})\b/.exec(text);
  if (explicit) {
    return inRange(toInt(explicit[1]), 1, 700);
  }
  return undefined;
}

function extractScore(text: string, context: ExtractionContext): { score?: number; scoreContext?: string } {
  const stated =
    /\b(?:made|got|shot|scored|carded|had)\s+(?:an?\s+)?(\d{1,2})\b/.exec(text) ??
    /\bscore\s+(?:of\s+|was\s+|is\s+)?(\d{1,2})\b/.exec(text);
  const score = stated ? inRange(toInt(stated[1]), 1, 20) : undefined;

  const relative = /\b(albatross|eagle|birdie|double bogey|triple bogey|bogey)\b/.exec(text) ??
    /\b(?:made|got|shot|for)\s+(?:a\s+)?(par)\b/.exec(text);
  if (!relative || !relative[1]) {
    return score !== undefined ? { score } : {};
  }
  const scoreContext = relative[1];
  if (score !== undefined) {
    return { score, scoreContext };
  }
  const par = context.par;
  const delta = RELATIVE_SCORES[scoreContext];
  if (isNum(par) && delta !== undefined) {
    return { score: inRange(par + delta, 1, 20), scoreContext };
  }
  return { scoreContext };
}

function extractWind(text: string): string | undefined {
  const direction =
    /\b(head|tail|cross)\s?wind\b/.exec(text)?.[1] ??
    (/\binto the wind\b/.test(text) ? 'head' : /\bdown\s?wind\b/.test(text) ? 'tail' : undefined);
  const speed = /\b(\d{1,2})\s*(?:mph|kph|km\/h)\b/.exec(text)?.[1];
  if (direction && speed) {
    return `${direction}wind ${speed} mph`;
  }
  if (direction) {
    return `${direction}wind`;
  }
  return speed ? `${speed} mph` : undefined;
}

function extractFatigue(text: string): number | undefined {
  const match = /\b(?:fatigue|tiredness|tired|energy)\s+(?:level\s+)?(?:is\s+|at\s+|of\s+)?(\d{1,2})\b/.exec(text);
  const value = match ? toInt(match[1]) : null;
  return value === null ? undefined : clampValue(value, 1, 10);
}

function extractPain(text: string): string | undefined {
  const parts = 'back|knee|shoulder|wrist|elbow|hip|neck';
  const after = new RegExp(`\\b(${parts})\\s+(?:pain|hurts|is sore|is hurting)\\b`).exec(text);
  if (after) {
    return after[1];
  }
  return new RegExp(`\\b(?:sore|hurting|painful)\\s+(${parts})\\b`).exec(text)?.[1];
}

function extractLie(text: string): Lie | undefined {
  // club names such as "sand wedge" must not read as a lie
  const withoutClubs = text.replace(new RegExp(CLUB_PATTERN.source, 'g'), ' ');
  for (const [pattern, lie] of LIE_WORDS) {
    if (pattern.test(withoutClubs)) {
      return lie;
    }
  }
  return undefined;
}

/** Best-effort extraction from normalised text. Missing values are simply absent. */
export function extractEntities(text: string, context: ExtractionContext = {}): ExtractedEntities {
  const entities: ExtractedEntities = {};
  if (!text) {
    return entities;
  }
  const club = extractClub(text);
  if (club) entities.club = club;
  const yardage = extractYardage(text);
  if (yardage !== undefined) entities.yardage = yardage;
  const lie = extractLie(text);
  if (lie) entities.lie = lie;
  const holeNumber = extractHole(text);
  if (holeNumber !== undefined) entities.holeNumber = holeNumber;
  const { score, scoreContext } = extractScore(text, context);
  if (score !== undefined) entities.score = score;
  if (scoreContext) entities.scoreContext = scoreContext;
  const wind = extractWind(text);
  if (wind) entities.wind = wind;
  const fatigue = extractFatigue(text);
  if (fatigue !== undefined) entities.fatigue = fatigue;
  const pain = extractPain(text);
  if (pain) entities.pain = pain;
  return entities;
}

function asText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined;
}

function asInteger(value: unknown, min: number, max: number): number | undefined {
  const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
  if (!isNum(numeric)) {
    return undefined;
  }
  const rounded = Math.round(numeric);
  return rounded >= min && rounded <= max ? rounded : undefined;
}

function asLie(value: unknown): Lie | undefined {
  const text = asText(value);
  return LIES.find((lie) => lie === text);
}

/**
 * Cleans an entity map from an untrusted source (the remote classifier).
 * Unknown keys are ignored, out-of-range values dropped, fatigue clamped.
 */
export function sanitizeEntities(raw: Record<string, unknown> | null | undefined): ExtractedEntities {
  const entities: ExtractedEntities = {};
  if (!raw) {
    return entities;
  }
  const club = asText(raw.club);
  if (club) entities.club = club;
  const yardage = asInteger(raw.yardage, 1, 700);
  if (yardage !== undefined) entities.yardage = yardage;
  const lie = asLie(raw.lie);
  if (lie) entities.lie = lie;
  const holeNumber = asInteger(raw.holeNumber, 1, 18);
  if (holeNumber !== undefined) entities.holeNumber = holeNumber;
  const score = asInteger(raw.score, 1, 20);
  if (score !== undefined) entities.score = score;
  const wind = asText(raw.wind);
  if (wind) entities.wind = wind;
  const fatigue = asInteger(raw.fatigue, Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY);
  if (fatigue !== undefined) entities.fatigue = clampValue(fatigue, 1, 10);
  const pain = asText(raw.pain);
  if (pain) entities.pain = pain;
  const scoreContext = asText(raw.scoreContext);
  if (scoreContext) entities.scoreContext = scoreContext;
  return entities;
}

/** Fields from `primary` win; `fallback` fills the gaps. */
export function mergeEntities(primary: ExtractedEntities, fallback: ExtractedEntities): ExtractedEntities {
  return { ...fallback, ...primary };
}

export function missingEntities(entities: ExtractedEntities, required: readonly EntityKey[]): EntityKey[] {
  return required.filter((key) => entities[key] === undefined);
}
