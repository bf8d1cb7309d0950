/**
 * Issue entity operations
 */

import { parseIssueNumber } from '@repo/shared';

import { DuplicateIssueError, EntityNotFoundError } from './errors.js';
import {
  findIssue,
  generateIssueId,
  getAllIssues,
  getIssueById,
  insertIssue,
  loadStore,
  removeIssues,
  saveStore,
} from './store.js';
import type { CreateIssueInput, Issue, IssueFilter, UpdateIssueInput } from './types.js';

/**
 * Create a new issue, deriving its range from the printed number
 *
 * @throws DuplicateIssueError if the magazine already holds this year and number
 */
export async function createIssue(input: CreateIssueInput): Promise<Issue> {
  const store = await loadStore();
  const magazine = store.magazines[input.magazineId];
  if (!magazine) {
    throw new EntityNotFoundError('magazine', input.magazineId);
  }

  const year = input.year ?? null;
  if (findIssue(store, magazine.id, year, input.issueNumber)) {
    throw new DuplicateIssueError(magazine.id, year, input.issueNumber);
  }

  const now = new Date().toISOString();
  const issue: Issue = {
    id: generateIssueId(),
    magazineId: magazine.id,
    year,
    issueNumber: input.issueNumber,
    copies: input.copies ?? 1,
    isNew: input.isNew ?? true,
    range: parseIssueNumber(input.issueNumber),
    createdAt: now,
    updatedAt: now,
  };

  insertIssue(store, magazine, issue);
  await saveStore();
  console.log(`[Issue] Created issue: ${issue.id} - n° ${issue.issueNumber}${issue.year != null ? ` (${issue.year})` : ''}`);

  return issue;
}

/**
 * Update an issue. Editing the printed number re-derives its range.
 */
export async function updateIssue(id: string, input: UpdateIssueInput): Promise<Issue> {
  const store = await loadStore();
  const existing = store.issues[id];
  if (!existing) {
    throw new EntityNotFoundError('issue', id);
  }

  const year = input.year === undefined ? existing.year : input.year;
  const issueNumber = input.issueNumber ?? existing.issueNumber;

  if (year !== existing.year || issueNumber !== existing.issueNumber) {
    const clash = findIssue(store, existing.magazineId, year, issueNumber);
    if (clash && clash.id !== id) {
      throw new DuplicateIssueError(existing.magazineId, year, issueNumber);
    }
  }

  const updated: Issue = {
    ...existing,
    year,
    issueNumber,
    copies: input.copies ?? existing.copies,
    isNew: input.isNew ?? existing.isNew,
    range: issueNumber === existing.issueNumber ? existing.range : parseIssueNumber(issueNumber),
    updatedAt: new Date().toISOString(),
  };

  store.issues[id] = updated;
  await saveStore();
  console.log(`[Issue] Updated issue: ${updated.id}`);

  return updated;
}

export async function deleteIssue(id: string): Promise<void> {
  if (!(await getIssueById(id))) {
    throw new EntityNotFoundError('issue', id);
  }
  await removeIssues([id]);
  console.log(`[Issue] Deleted issue: ${id}`);
}

/**
 * Delete every issue still flagged as new, optionally for one magazine only
 *
 * @returns Number of deleted issues
 */
export async function deleteNewIssues(magazineId?: string): Promise<number> {
  const issues = await listIssues({ magazineId, isNew: true });
  await removeIssues(issues.map((issue) => issue.id));
  console.log(`[Issue] Deleted ${issues.length} new issues`);
  return issues.length;
}

/**
 * List issues matching every given criterion
 */
export async function listIssues(filter: IssueFilter = {}): Promise<Issue[]> {
  const issues = await getAllIssues();

  return issues.filter(
    (issue) =>
      (filter.magazineId == null || issue.magazineId === filter.magazineId) &&
      (filter.year == null || issue.year === filter.year) &&
      (filter.number == null || issue.issueNumber.includes(filter.number)) &&
      (filter.duplicates !== true || issue.copies > 1) &&
      (filter.isNew == null || issue.isNew === filter.isNew)
  );
}
