/**
 * Magazine entity operations
 */

import { computeMissingNumbers, type MagazineHoldings, type MissingNumbersReport } from '@repo/shared';

import { DuplicateMagazineError, EntityNotFoundError } from './errors.js';
import {
  clearStore,
  generateMagazineId,
  getMagazineById,
  getIssuesByMagazineId,
  getNumberingsByMagazineId,
  insertMagazine,
  isMagazineNameTaken,
  loadStore,
  normalizeName,
  saveStore,
  type StoreStats,
} from './store.js';
import type { CreateMagazineInput, EntityStore, Issue, Magazine } from './types.js';

/**
 * Create a new magazine entity
 *
 * @throws DuplicateMagazineError if the name is taken
 */
export async function createMagazine(input: CreateMagazineInput): Promise<Magazine> {
  const name = input.name.trim();
  const store = await loadStore();

  if (isMagazineNameTaken(store, name)) {
    throw new DuplicateMagazineError(name);
  }

  const magazine = addMagazine(store, name);
  await saveStore();
  console.log(`[Magazine] Created magazine: ${magazine.id} - "${magazine.name}"`);

  return magazine;
}

/**
 * Find or create a magazine by name
 */
export async function findOrCreateMagazine(name: string): Promise<Magazine> {
  const store = await loadStore();
  const existingId = store.nameIndex[normalizeName(name)];
  const existing = existingId === undefined ? undefined : store.magazines[existingId];
  if (existing) {
    return existing;
  }

  const magazine = addMagazine(store, name.trim());
  await saveStore();
  console.log(`[Magazine] Created magazine: ${magazine.id} - "${magazine.name}"`);

  return magazine;
}

function addMagazine(store: EntityStore, name: string): Magazine {
  const now = new Date().toISOString();
  const magazine: Magazine = {
    id: generateMagazineId(),
    name,
    issueIds: [],
    numberingIds: [],
    createdAt: now,
    updatedAt: now,
  };
  insertMagazine(store, magazine);
  return magazine;
}

/**
 * Get a magazine or throw
 */
export async function requireMagazine(id: string): Promise<Magazine> {
  const magazine = await getMagazineById(id);
  if (!magazine) {
    throw new EntityNotFoundError('magazine', id);
  }
  return magazine;
}

/**
 * Snapshot of everything a magazine owns, in stored order
 */
export async function getMagazineHoldings(
  id: string
): Promise<MagazineHoldings<Issue> & { magazine: Magazine }> {
  const magazine = await requireMagazine(id);
  const [issues, numberings] = await Promise.all([
    getIssuesByMagazineId(id),
    getNumberingsByMagazineId(id),
  ]);

  return { magazine, name: magazine.name, issues, numberings };
}

/**
 * Compute the missing issues of a magazine from its current holdings.
 * Recomputed on every call; nothing is cached.
 */
export async function getMissingNumbers(id: string): Promise<{
  magazine: Magazine;
  report: MissingNumbersReport;
}> {
  const holdings = await getMagazineHoldings(id);
  const report = computeMissingNumbers(holdings);

  for (const failure of report.failures) {
    console.warn(`[Magazine] Numbering ${failure.ruleId} of "${holdings.name}" skipped: ${failure.message}`);
  }

  return { magazine: holdings.magazine, report };
}

/**
 * Delete every magazine along with its issues and numbering rules
 *
 * @returns Counts of what was deleted
 */
export async function deleteCatalog(): Promise<StoreStats> {
  const stats = await clearStore();
  console.log(
    `[Magazine] Deleted catalog: ${stats.magazineCount} magazines, ${stats.issueCount} issues, ${stats.numberingCount} numberings`
  );
  return stats;
}
