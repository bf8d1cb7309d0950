import { hasCompleteRange, type NormalizedRange } from './issue-number.js';

// ============================================================================
// Numbering Rule Types
// ============================================================================

/**
 * A magazine-scoped declaration of where issues are expected to exist.
 *
 * Any bound left `null` is open: it is resolved from the magazine's owned
 * issues every time the rule is evaluated, never frozen when the rule is saved.
 */
export interface NumberingRule {
  id: string;
  fromYear: number | null;
  toYear: number | null;
  /** Numbering restarts every year (monthly issues 1..12 by default) */
  isYearly: boolean;
  fromNumber: number | null;
  toNumber: number | null;
}

/**
 * Minimal view of an owned issue needed to evaluate numbering rules.
 */
export interface IssueNumbers {
  year: number | null;
  range: NormalizedRange;
}

/**
 * An expected issue slot. `year` is null for continuous numbering.
 */
export interface ExpectedNumber {
  year: number | null;
  number: number;
}

export type RuleBound = 'fromYear' | 'toYear' | 'fromNumber' | 'toNumber';

export const DEFAULT_YEARLY_FROM_NUMBER = 1;
export const DEFAULT_YEARLY_TO_NUMBER = 12;

/** Largest number of expected slots a single rule may expand to */
export const MAX_EXPECTED_NUMBERS = 100_000;

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when a rule's open bound has nothing to be resolved from.
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly bound: RuleBound
  ) {
    super(`Numbering rule ${ruleId} has an open ${bound} and no owned issues to resolve it from`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a rule's resolved window holds more than
 * {@link MAX_EXPECTED_NUMBERS} slots, or a bound past the safe integer range.
 * Usually a mistyped issue number (a date such as "20240510") stretching an open bound.
 */
export class ExpansionLimitError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly size: number
  ) {
    super(
      Number.isFinite(size)
        ? `Numbering rule ${ruleId} expands to ${size} issues, more than the ${MAX_EXPECTED_NUMBERS} allowed`
        : `Numbering rule ${ruleId} has a bound outside the safe integer range`
    );
    this.name = 'ExpansionLimitError';
  }
}

// ============================================================================
// Issue Selection
// ============================================================================

/**
 * Check whether a year falls in a rule's year window. Open ends match
 * everything on that side; an unknown year only matches a fully open window.
 */
export function isYearInWindow(
  year: number | null,
  fromYear: number | null,
  toYear: number | null
): boolean {
  if (year == null) {
    return fromYear == null && toYear == null;
  }
  return (fromYear == null || year >= fromYear) && (toYear == null || year <= toYear);
}

/**
 * Issues whose year lies inside the rule's year window, in their original order.
 */
export function getIssuesForNumbering<T extends IssueNumbers>(
  issues: readonly T[],
  rule: NumberingRule
): T[] {
  return issues.filter((issue) => isYearInWindow(issue.year, rule.fromYear, rule.toYear));
}

// ============================================================================
// Extremum Helpers
// ============================================================================

export function minYear(issues: readonly IssueNumbers[]): number | null {
  return extremum(issues.map((issue) => issue.year), Math.min);
}

export function maxYear(issues: readonly IssueNumbers[]): number | null {
  return extremum(issues.map((issue) => issue.year), Math.max);
}

export function minNumber(issues: readonly IssueNumbers[]): number | null {
  return extremum(issues.map((issue) => issue.range.min), Math.min);
}

export function maxNumber(issues: readonly IssueNumbers[]): number | null {
  return extremum(issues.map((issue) => issue.range.max), Math.max);
}

function extremum(
  values: readonly (number | null)[],
  pick: (a: number, b: number) => number
): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (value == null) continue;
    result = result == null ? value : pick(result, value);
  }
  return result;
}

function resolveBound(
  rule: NumberingRule,
  bound: RuleBound,
  fallback: () => number | null
): number {
  const declared = rule[bound];
  if (declared != null) return declared;

  const resolved = fallback();
  if (resolved == null) {
    throw new ConfigurationError(rule.id, bound);
  }
  return resolved;
}

/**
 * Number of values in `[from, to]`; Infinity when a bound is not a safe integer.
 */
function windowSize(from: number, to: number): number {
  if (!Number.isSafeInteger(from) || !Number.isSafeInteger(to)) {
    return Infinity;
  }
  return to < from ? 0 : to - from + 1;
}

function checkExpansionSize(ruleId: string, size: number): void {
  if (size > MAX_EXPECTED_NUMBERS) {
    throw new ExpansionLimitError(ruleId, size);
  }
}

function inclusiveRange(from: number, to: number): number[] {
  const values: number[] = [];
  for (let value = from; value <= to; value++) {
    values.push(value);
  }
  return values;
}

// ============================================================================
// Range Expansion
// ============================================================================

/**
 * Expand a numbering rule into every expected issue slot.
 *
 * Open bounds follow the owned issues: adding an issue past the current
 * extremes widens the window on the next call, removing one narrows it.
 *
 * - Yearly rules produce year-major, number-minor pairs. Numbers default to 1..12.
 * - Continuous rules produce `(null, n)` pairs in ascending order.
 *
 * @param currentIssues - Issues already narrowed to the rule's year window
 *   (see {@link getIssuesForNumbering})
 * @throws ConfigurationError if an open bound cannot be resolved
 * @throws ExpansionLimitError if the window is too large to enumerate
 */
export function expandNumberingRule(
  rule: NumberingRule,
  currentIssues: readonly IssueNumbers[]
): ExpectedNumber[] {
  if (rule.isYearly) {
    const fromYear = resolveBound(rule, 'fromYear', () => minYear(currentIssues));
    const toYear = resolveBound(rule, 'toYear', () => maxYear(currentIssues));
    const fromNumber = rule.fromNumber ?? DEFAULT_YEARLY_FROM_NUMBER;
    const toNumber = rule.toNumber ?? DEFAULT_YEARLY_TO_NUMBER;

    const numberCount = windowSize(fromNumber, toNumber);
    const yearCount = windowSize(fromYear, toYear);
    // An empty side empties the product, whatever the other side holds
    checkExpansionSize(rule.id, numberCount === 0 || yearCount === 0 ? 0 : numberCount * yearCount);

    const numbers = inclusiveRange(fromNumber, toNumber);
    return inclusiveRange(fromYear, toYear).flatMap((year) =>
      numbers.map((number) => ({ year, number }))
    );
  }

  const fromNumber = resolveBound(rule, 'fromNumber', () => minNumber(currentIssues));
  const toNumber = resolveBound(rule, 'toNumber', () => maxNumber(currentIssues));
  checkExpansionSize(rule.id, windowSize(fromNumber, toNumber));

  return inclusiveRange(fromNumber, toNumber).map((number) => ({ year: null, number }));
}

/**
 * Check whether any issue's complete range covers an expected slot.
 * A null `year` matches issues of any year.
 */
export function isNumberCovered(
  issues: readonly IssueNumbers[],
  year: number | null,
  number: number
): boolean {
  return issues.some(
    (issue) =>
      hasCompleteRange(issue.range) &&
      issue.range.min <= number &&
      number <= issue.range.max &&
      (year == null || issue.year === year)
  );
}
