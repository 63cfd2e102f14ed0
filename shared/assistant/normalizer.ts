import slang from './data/slang.json';

export type ModificationType = 'slang' | 'number' | 'profanity';

export interface Modification {
  type: ModificationType;
  original: string;
  replacement: string;
}

export interface NormalizedInput {
  normalizedText: string;
  originalText: string;
  /** `"<type>:<original>-><replacement>"`, in the order they were applied. */
  appliedModifications: string[];
  modifications: Modification[];
}

const UNITS: Readonly<Record<string, number>> = Object.freeze({
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
});

const TEENS: Readonly<Record<string, number>> = Object.freeze({
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
});

const TENS: Readonly<Record<string, number>> = Object.freeze({
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90,
});

const SLANG: Readonly<Record<string, string>> = Object.freeze({ ...slang.clubs, ...slang.terms });
const PROFANITY: readonly string[] = Object.freeze([...slang.profanity]);

// "'" and "-" count as word characters so "i'd" and "7-iron" are never split.
const BEFORE = "(?<![\\w'-])";
const AFTER = "(?![\\w'-])";
// "hole five thirty yards" is hole 5 and 30 yards, never 530.
const NOT_AFTER_HOLE = '(?<!\\bhole\\s(?:number\\s)?)';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(words: Iterable<string>): string {
  return Array.from(words)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');
}

const UNIT_ALT = alternation(Object.keys(UNITS));
const TEEN_ALT = alternation(Object.keys(TEENS));
const TENS_ALT = alternation(Object.keys(TENS));

const SLANG_PATTERN = new RegExp(`${BEFORE}(${alternation(Object.keys(SLANG))})${AFTER}`, 'g');
const CLUB_WORD_PATTERN = new RegExp(`${BEFORE}(${UNIT_ALT})[\\s-]+(iron|wood|hybrid)${AFTER}`, 'g');
const HUNDREDS_PATTERN = new RegExp(
  `${NOT_AFTER_HOLE}${BEFORE}(${UNIT_ALT})\\s+hundred(?:\\s+and)?(?:\\s+(?:(${TENS_ALT})(?:[\\s-]+(${UNIT_ALT}))?|(${TEEN_ALT})|(${UNIT_ALT})))?${AFTER}`,
  'g',
);
const SPOKEN_YARDAGE_PATTERN = new RegExp(
  `${NOT_AFTER_HOLE}${BEFORE}(${UNIT_ALT})\\s+(?:(${TENS_ALT})(?:[\\s-]+(${UNIT_ALT}))?|(${TEEN_ALT}))${AFTER}`,
  'g',
);
const TENS_UNITS_PATTERN = new RegExp(`${BEFORE}(${TENS_ALT})[\\s-]+(${UNIT_ALT})${AFTER}`, 'g');
const SINGLE_NUMBER_PATTERN = new RegExp(
  `${BEFORE}(${alternation([...Object.keys(UNITS), ...Object.keys(TEENS), ...Object.keys(TENS), 'hundred'])})${AFTER}`,
  'g',
);
const PROFANITY_PATTERN = new RegExp(`${BEFORE}(${alternation(PROFANITY)})${AFTER}`, 'g');

function lookup(table: Readonly<Record<string, number>>, word: string | undefined): number {
  if (!word) {
    return 0;
  }
  return table[word] ?? 0;
}

function singleNumber(word: string): number {
  if (word === 'hundred') {
    return 100;
  }
  return lookup(UNITS, word) || lookup(TEENS, word) || lookup(TENS, word);
}

class ModificationLog {
  readonly entries: Modification[] = [];

  replace(
    text: string,
    pattern: RegExp,
    type: ModificationType,
    replacer: (match: string, groups: (string | undefined)[]) => string,
  ): string {
    return text.replace(pattern, (match: string, ...rest: unknown[]) => {
      const groups = rest
        .slice(0, -2)
        .map((group) => (typeof group === 'string' ? group : undefined));
      const replacement = replacer(match, groups);
      if (replacement !== match) {
        this.entries.push({ type, original: match, replacement });
      }
      return replacement;
    });
  }
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonicalises user input before classification: lower-case, slang
 * expansion, spoken numbers to digits, profanity masking.
 */
export function normalize(text: string): NormalizedInput {
  const originalText = typeof text === 'string' ? text : '';
  let working = collapseWhitespace(originalText.toLowerCase());
  if (!working) {
    return { normalizedText: '', originalText, appliedModifications: [], modifications: [] };
  }

  const log = new ModificationLog();

  working = log.replace(working, SLANG_PATTERN, 'slang', (match, [word]) => (word ? SLANG[word] ?? match : match));

  working = log.replace(working, CLUB_WORD_PATTERN, 'number', (match, [unit, kind]) => {
    const value = lookup(UNITS, unit);
    return value && kind ? `${value}-${kind}` : match;
  });
  working = log.replace(working, HUNDREDS_PATTERN, 'number', (match, [hundreds, tens, tensUnit, teen, unit]) => {
    const value =
      lookup(UNITS, hundreds) * 100 +
      lookup(TENS, tens) +
      lookup(UNITS, tensUnit) +
      lookup(TEENS, teen) +
      lookup(UNITS, unit);
    return value > 0 ? String(value) : match;
  });
  // "one fifty" is how yardages are spoken: 150, "one sixty five" 165.
  working = log.replace(working, SPOKEN_YARDAGE_PATTERN, 'number', (match, [hundreds, tens, unit, teen]) => {
    const value = lookup(UNITS, hundreds) * 100 + lookup(TENS, tens) + lookup(UNITS, unit) + lookup(TEENS, teen);
    return value > 0 ? String(value) : match;
  });
  working = log.replace(working, TENS_UNITS_PATTERN, 'number', (match, [tens, unit]) => {
    const value = lookup(TENS, tens) + lookup(UNITS, unit);
    return value > 0 ? String(value) : match;
  });
  working = log.replace(working, SINGLE_NUMBER_PATTERN, 'number', (match, [word]) => {
    const value = word ? singleNumber(word) : 0;
    return value > 0 ? String(value) : match;
  });

  working = log.replace(working, PROFANITY_PATTERN, 'profanity', (match) => '*'.repeat(match.length));

  const normalizedText = collapseWhitespace(working);
  return {
    normalizedText,
    originalText,
    appliedModifications: log.entries.map((entry) => `${entry.type}:${entry.original}->${entry.replacement}`),
    modifications: log.entries,
  };
}
