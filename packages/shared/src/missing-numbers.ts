import {
  ConfigurationError,
  ExpansionLimitError,
  expandNumberingRule,
  getIssuesForNumbering,
  isNumberCovered,
  type IssueNumbers,
  type NumberingRule,
  type RuleBound,
} from './numbering.js';

// ============================================================================
// Missing Number Types
// ============================================================================

/**
 * A gap: an expected issue slot no owned issue covers.
 */
export interface MissingNumber {
  /** Null for continuous numbering */
  year: number | null;
  number: number;
  /** Printable issue number */
  label: string;
}

/**
 * A rule that could not be evaluated. The rest of the report is still valid.
 */
export interface RuleFailure {
  ruleId: string;
  /** The open bound that could not be resolved; null when the window was too large */
  bound: RuleBound | null;
  message: string;
}

export interface MissingNumbersReport {
  /** Gaps of every rule, concatenated in rule order */
  missing: MissingNumber[];
  failures: RuleFailure[];
}

/**
 * Everything a magazine owns, in stored order.
 */
export interface MagazineHoldings<TIssue extends IssueNumbers = IssueNumbers> {
  name: string;
  issues: readonly TIssue[];
  numberings: readonly NumberingRule[];
}

// ============================================================================
// Gap Detection
// ============================================================================

/**
 * Gaps for a single rule, in expansion order.
 *
 * @throws ConfigurationError if an open bound cannot be resolved
 * @throws ExpansionLimitError if the window is too large to enumerate
 */
export function findMissingForRule(
  rule: NumberingRule,
  issues: readonly IssueNumbers[]
): MissingNumber[] {
  const currentIssues = getIssuesForNumbering(issues, rule);

  return expandNumberingRule(rule, currentIssues)
    .filter(({ year, number }) => !isNumberCovered(currentIssues, year, number))
    .map(({ year, number }) => ({ year, number, label: String(number) }));
}

/**
 * Compute the missing numbers of a magazine across all of its rules.
 *
 * Rules are evaluated independently. Overlapping rules report a shared gap
 * once per rule; results are neither deduplicated nor re-sorted.
 */
export function computeMissingNumbers(holdings: MagazineHoldings): MissingNumbersReport {
  const report: MissingNumbersReport = { missing: [], failures: [] };

  for (const rule of holdings.numberings) {
    try {
      report.missing.push(...findMissingForRule(rule, holdings.issues));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        report.failures.push({ ruleId: error.ruleId, bound: error.bound, message: error.message });
      } else if (error instanceof ExpansionLimitError) {
        report.failures.push({ ruleId: error.ruleId, bound: null, message: error.message });
      } else {
        throw error;
      }
    }
  }

  return report;
}

/**
 * Year column text for a gap; continuous numbering has no year.
 */
export function formatMissingYear(year: number | null): string {
  return year == null ? '-' : String(year);
}
