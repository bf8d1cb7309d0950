/**
 * Entity types for the catalog data layer
 *
 * Magazines, issues and numbering rules get generated IDs that persist across
 * edits. A magazine keeps the ordered IDs of what it owns; that order is the
 * order rules are evaluated in.
 */

import type { NormalizedRange, NumberingRule } from '@repo/shared';

/**
 * A magazine title in the collection
 */
export interface Magazine {
  /** Generated ID: "m_abc123" */
  id: string;

  /** Display name, unique across the catalog */
  name: string;

  /** Owned issue IDs, in creation order */
  issueIds: string[];

  /** Owned numbering rule IDs, in creation order */
  numberingIds: string[];

  /** ISO timestamp when entity was created */
  createdAt: string;

  /** ISO timestamp when entity was last updated */
  updatedAt: string;
}

/**
 * A held issue of a magazine.
 * `(magazineId, year, issueNumber)` is unique.
 */
export interface Issue {
  /** Generated ID: "i_abc123" */
  id: string;

  magazineId: string;

  /** Publication year, if known */
  year: number | null;

  /** Issue identifier as printed ("12/13", "7bis") */
  issueNumber: string;

  /** Number of copies held */
  copies: number;

  /** Entered by hand and not yet confirmed by an import */
  isNew: boolean;

  /** Parsed from issueNumber; re-derived whenever issueNumber changes */
  range: NormalizedRange;

  createdAt: string;
  updatedAt: string;
}

/**
 * A persisted numbering rule
 */
export interface Numbering extends NumberingRule {
  /** Generated ID: "n_abc123" */
  id: string;

  magazineId: string;

  createdAt: string;
  updatedAt: string;
}

/**
 * The complete entity store structure
 */
export interface EntityStore {
  /** All magazines, keyed by magazine ID */
  magazines: Record<string, Magazine>;

  /** All issues, keyed by issue ID */
  issues: Record<string, Issue>;

  /** All numbering rules, keyed by numbering ID */
  numberings: Record<string, Numbering>;

  /** Index: magazine name (normalized) -> Magazine ID */
  nameIndex: Record<string, string>;
}

/**
 * Input for creating a new magazine
 */
export interface CreateMagazineInput {
  name: string;
}

/**
 * Input for creating a new issue (range is derived, never supplied)
 */
export interface CreateIssueInput {
  magazineId: string;
  year?: number | null | undefined;
  issueNumber: string;
  /** Defaults to 1 */
  copies?: number | undefined;
  /** Defaults to true: hand-entered issues are new until confirmed */
  isNew?: boolean | undefined;
}

export interface UpdateIssueInput {
  year?: number | null | undefined;
  issueNumber?: string | undefined;
  copies?: number | undefined;
  isNew?: boolean | undefined;
}

/**
 * Filter for listing issues. All criteria combine with AND.
 */
export interface IssueFilter {
  magazineId?: string | undefined;
  year?: number | undefined;
  /** Substring of the printed issue number */
  number?: string | undefined;
  /** Only issues held in more than one copy */
  duplicates?: boolean | undefined;
  isNew?: boolean | undefined;
}

export interface CreateNumberingInput {
  magazineId: string;
  fromYear?: number | null | undefined;
  toYear?: number | null | undefined;
  isYearly: boolean;
  fromNumber?: number | null | undefined;
  toNumber?: number | null | undefined;
}

export interface UpdateNumberingInput {
  fromYear?: number | null | undefined;
  toYear?: number | null | undefined;
  isYearly?: boolean | undefined;
  fromNumber?: number | null | undefined;
  toNumber?: number | null | undefined;
}
