// ============================================================================
// Normalized Range Types
// ============================================================================

/**
 * Numeric envelope extracted from a printed issue identifier.
 *
 * `min`/`max` are always the true numeric extremes of every number run found,
 * whatever order the identifier printed them in. `inverted` only records that
 * the last two numbers were printed in descending order ("13/12").
 */
export interface NormalizedRange {
  min: number | null;
  max: number | null;
  inverted: boolean;
  suffix: string;
}

/**
 * A range is complete when both bounds were parsed. Only complete ranges can
 * cover an expected issue number.
 */
export function hasCompleteRange(
  range: NormalizedRange
): range is NormalizedRange & { min: number; max: number } {
  return range.min != null && range.max != null;
}

export const EMPTY_RANGE: Readonly<NormalizedRange> = Object.freeze({
  min: null,
  max: null,
  inverted: false,
  suffix: '',
});

// ============================================================================
// Scanner
// ============================================================================

type ScanState = 'prefix' | 'number' | 'separator' | 'suffix';

type CharClass = 'digit' | 'separator' | 'other';

type ScanAction =
  | 'skip' // Drop the character
  | 'start' // Begin a new number run
  | 'accumulate' // Append a digit to the current run
  | 'close' // Close the current run
  | 'closeAndStartSuffix' // Close the current run, open the suffix with this character
  | 'append'; // Append to the suffix verbatim

interface Transition {
  next: ScanState;
  action: ScanAction;
}

const SEPARATORS: ReadonlySet<string> = new Set(['/', '-']);

/**
 * Transition table for the issue-number scanner.
 * Once in `suffix`, nothing is interpreted numerically again.
 */
const TRANSITIONS: Record<ScanState, Record<CharClass, Transition>> = {
  prefix: {
    digit: { next: 'number', action: 'start' },
    separator: { next: 'prefix', action: 'skip' },
    other: { next: 'prefix', action: 'skip' },
  },
  number: {
    digit: { next: 'number', action: 'accumulate' },
    separator: { next: 'separator', action: 'close' },
    other: { next: 'suffix', action: 'closeAndStartSuffix' },
  },
  separator: {
    digit: { next: 'number', action: 'start' },
    separator: { next: 'separator', action: 'skip' },
    other: { next: 'separator', action: 'skip' },
  },
  suffix: {
    digit: { next: 'suffix', action: 'append' },
    separator: { next: 'suffix', action: 'append' },
    other: { next: 'suffix', action: 'append' },
  },
};

function classify(char: string): CharClass {
  if (char >= '0' && char <= '9') return 'digit';
  if (SEPARATORS.has(char)) return 'separator';
  return 'other';
}

interface ScanContext {
  current: number;
  previous: number;
  min: number | null;
  max: number | null;
  inverted: boolean;
  suffix: string;
}

function closeNumber(ctx: ScanContext): void {
  const value = ctx.current;
  if (ctx.min == null || value < ctx.min) ctx.min = value;
  if (ctx.max == null || value > ctx.max) ctx.max = value;
  // Only the latest pairwise comparison survives
  ctx.inverted = value < ctx.previous;
  ctx.previous = value;
}

/**
 * Parse a printed issue identifier into its numeric envelope.
 *
 * Examples: "12" → 12..12, "12/13" → 12..13, "13/12" → 12..13 inverted,
 * "7bis" → 7..7 suffix "bis", "5-6 ter" → 5..6 suffix "ter".
 *
 * Never throws: identifiers without digits yield an empty range.
 */
export function parseIssueNumber(raw: string): NormalizedRange {
  if (raw.length === 0) {
    return { ...EMPTY_RANGE };
  }

  const ctx: ScanContext = {
    current: 0,
    previous: 0,
    min: null,
    max: null,
    inverted: false,
    suffix: '',
  };
  let state: ScanState = 'prefix';

  for (const char of raw) {
    const transition: Transition = TRANSITIONS[state][classify(char)];
    const { next, action } = transition;

    switch (action) {
      case 'skip':
        break;
      case 'start':
        ctx.current = Number(char);
        break;
      case 'accumulate':
        ctx.current = ctx.current * 10 + Number(char);
        break;
      case 'close':
        closeNumber(ctx);
        break;
      case 'closeAndStartSuffix':
        closeNumber(ctx);
        ctx.suffix = char;
        break;
      case 'append':
        ctx.suffix += char;
        break;
    }

    state = next;
  }

  if (state === 'number') {
    closeNumber(ctx);
  }

  return {
    min: ctx.min,
    max: ctx.max,
    inverted: ctx.inverted,
    suffix: ctx.suffix.trim(),
  };
}
