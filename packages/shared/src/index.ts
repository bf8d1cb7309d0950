export {
  EMPTY_RANGE,
  hasCompleteRange,
  parseIssueNumber,
  type NormalizedRange,
} from './issue-number.js';

export {
  ConfigurationError,
  DEFAULT_YEARLY_FROM_NUMBER,
  DEFAULT_YEARLY_TO_NUMBER,
  ExpansionLimitError,
  MAX_EXPECTED_NUMBERS,
  expandNumberingRule,
  getIssuesForNumbering,
  isNumberCovered,
  isYearInWindow,
  maxNumber,
  maxYear,
  minNumber,
  minYear,
  type ExpectedNumber,
  type IssueNumbers,
  type NumberingRule,
  type RuleBound,
} from './numbering.js';

export {
  computeMissingNumbers,
  findMissingForRule,
  formatMissingYear,
  type MagazineHoldings,
  type MissingNumber,
  type MissingNumbersReport,
  type RuleFailure,
} from './missing-numbers.js';
