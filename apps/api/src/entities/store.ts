/**
 * Entity store - persists the catalog to a JSON file
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import { env } from '../config/env.js';
import type { EntityStore, Issue, Magazine, Numbering } from './types.js';

const STORE_FILENAME = 'catalog.json';

let dataDir = env.dataDir;

// In-memory cache of the store
let storeCache: EntityStore | null = null;
let pendingLoad: Promise<EntityStore> | null = null;
let pendingWrite: Promise<void> = Promise.resolve();

function storePath(): string {
  return join(dataDir, STORE_FILENAME);
}

/**
 * Create an empty store structure
 */
function createEmptyStore(): EntityStore {
  return {
    magazines: {},
    issues: {},
    numberings: {},
    nameIndex: {},
  };
}

/**
 * Point the store at another directory and drop the cache (for testing)
 */
export function setDataDir(dir: string): void {
  dataDir = dir;
  clearCache();
}

/**
 * Normalize a magazine name for index lookup
 */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function generateMagazineId(): string {
  return `m_${nanoid(10)}`;
}

export function generateIssueId(): string {
  return `i_${nanoid(10)}`;
}

export function generateNumberingId(): string {
  return `n_${nanoid(10)}`;
}

/**
 * Load the entity store from disk. Concurrent first calls share one read, so
 * every caller mutates the same cached object.
 */
export async function loadStore(): Promise<EntityStore> {
  if (storeCache) {
    return storeCache;
  }

  pendingLoad ??= readStore().finally(() => {
    pendingLoad = null;
  });
  return pendingLoad;
}

async function readStore(): Promise<EntityStore> {
  const path = storePath();
  if (!existsSync(path)) {
    storeCache = createEmptyStore();
    return storeCache;
  }

  const data = await readFile(path, 'utf-8');
  const loaded = JSON.parse(data) as Partial<EntityStore>;

  if (!loaded.magazines || !loaded.issues) {
    console.warn('[EntityStore] Invalid store format detected. Starting fresh.');
    storeCache = createEmptyStore();
    return storeCache;
  }

  storeCache = {
    magazines: loaded.magazines,
    issues: loaded.issues,
    numberings: loaded.numberings ?? {},
    nameIndex: loaded.nameIndex ?? {},
  };

  return storeCache;
}

/**
 * Save the entity store to disk. Writes are queued so at most one touches the
 * file at a time; each one writes the cache as it is when its turn comes.
 */
export function saveStore(): Promise<void> {
  const write = pendingWrite.then(writeStore);
  pendingWrite = write.catch((error: unknown) => {
    console.error('[EntityStore] Failed to save store:', error);
  });
  return write;
}

async function writeStore(): Promise<void> {
  if (!storeCache) {
    return;
  }

  if (!existsSync(dataDir)) {
    await mkdir(dataDir, { recursive: true });
  }

  await writeFile(storePath(), JSON.stringify(storeCache, null, 2), 'utf-8');
}

/**
 * Drop every magazine, issue and numbering rule
 *
 * @returns Counts from just before the wipe
 */
export async function clearStore(): Promise<StoreStats> {
  const store = await loadStore();
  const stats = countEntities(store);
  Object.assign(store, createEmptyStore());
  await saveStore();
  return stats;
}

// ============================================================================
// Magazine functions
// ============================================================================

export async function getMagazineById(id: string): Promise<Magazine | null> {
  const store = await loadStore();
  return store.magazines[id] ?? null;
}

/**
 * Get a magazine by name (normalized lookup)
 */
export async function getMagazineByName(name: string): Promise<Magazine | null> {
  const store = await loadStore();
  const magazineId = store.nameIndex[normalizeName(name)];
  if (!magazineId) {
    return null;
  }
  return store.magazines[magazineId] ?? null;
}

/**
 * Check whether a name is taken (normalized lookup, no await)
 */
export function isMagazineNameTaken(store: EntityStore, name: string): boolean {
  return store.nameIndex[normalizeName(name)] !== undefined;
}

/**
 * Add a magazine and index its name
 */
export function insertMagazine(store: EntityStore, magazine: Magazine): void {
  store.magazines[magazine.id] = magazine;
  store.nameIndex[normalizeName(magazine.name)] = magazine.id;
}

export async function getAllMagazines(): Promise<Magazine[]> {
  const store = await loadStore();
  return Object.values(store.magazines);
}

// ============================================================================
// Issue functions
// ============================================================================

export async function getIssueById(id: string): Promise<Issue | null> {
  const store = await loadStore();
  return store.issues[id] ?? null;
}

/**
 * Get all issues of a magazine, in stored order
 */
export async function getIssuesByMagazineId(magazineId: string): Promise<Issue[]> {
  const store = await loadStore();
  const magazine = store.magazines[magazineId];

  if (!magazine) {
    return [];
  }

  return magazine.issueIds
    .map((id) => store.issues[id])
    .filter((issue): issue is Issue => issue !== undefined);
}

/**
 * Find an issue by its natural key
 */
export function findIssue(
  store: EntityStore,
  magazineId: string,
  year: number | null,
  issueNumber: string
): Issue | null {
  const magazine = store.magazines[magazineId];
  if (!magazine) {
    return null;
  }

  for (const id of magazine.issueIds) {
    const issue = store.issues[id];
    if (issue && issue.year === year && issue.issueNumber === issueNumber) {
      return issue;
    }
  }
  return null;
}

export async function getAllIssues(): Promise<Issue[]> {
  const store = await loadStore();
  return Object.values(store.issues);
}

/**
 * Add an issue to the store and to its magazine's issueIds
 */
export function insertIssue(store: EntityStore, magazine: Magazine, issue: Issue): void {
  store.issues[issue.id] = issue;
  magazine.issueIds.push(issue.id);
  magazine.updatedAt = issue.updatedAt;
}

/**
 * Remove issues from the store and from their magazines
 */
export async function removeIssues(ids: string[]): Promise<void> {
  if (ids.length === 0) return;

  const store = await loadStore();
  const now = new Date().toISOString();

  for (const id of ids) {
    const issue = store.issues[id];
    if (!issue) continue;

    const magazine = store.magazines[issue.magazineId];
    if (magazine) {
      magazine.issueIds = magazine.issueIds.filter((issueId) => issueId !== id);
      magazine.updatedAt = now;
    }
    delete store.issues[id];
  }

  await saveStore();
}

// ============================================================================
// Numbering functions
// ============================================================================

export async function getNumberingById(id: string): Promise<Numbering | null> {
  const store = await loadStore();
  return store.numberings[id] ?? null;
}

/**
 * Get all numbering rules of a magazine, in stored order
 */
export async function getNumberingsByMagazineId(magazineId: string): Promise<Numbering[]> {
  const store = await loadStore();
  const magazine = store.magazines[magazineId];

  if (!magazine) {
    return [];
  }

  return magazine.numberingIds
    .map((id) => store.numberings[id])
    .filter((numbering): numbering is Numbering => numbering !== undefined);
}

export async function saveNumbering(numbering: Numbering): Promise<void> {
  const store = await loadStore();
  store.numberings[numbering.id] = numbering;
  await saveStore();
}

/**
 * Add a numbering rule to the store and to its magazine's numberingIds
 */
export function insertNumbering(store: EntityStore, magazine: Magazine, numbering: Numbering): void {
  store.numberings[numbering.id] = numbering;
  magazine.numberingIds.push(numbering.id);
  magazine.updatedAt = numbering.updatedAt;
}

export async function removeNumbering(id: string): Promise<void> {
  const store = await loadStore();
  const numbering = store.numberings[id];
  if (!numbering) return;

  const magazine = store.magazines[numbering.magazineId];
  if (magazine) {
    magazine.numberingIds = magazine.numberingIds.filter((numberingId) => numberingId !== id);
    magazine.updatedAt = new Date().toISOString();
  }
  delete store.numberings[id];

  await saveStore();
}

export interface StoreStats {
  magazineCount: number;
  issueCount: number;
  numberingCount: number;
}

function countEntities(store: EntityStore): StoreStats {
  return {
    magazineCount: Object.keys(store.magazines).length,
    issueCount: Object.keys(store.issues).length,
    numberingCount: Object.keys(store.numberings).length,
  };
}

/**
 * Get store stats (for the health endpoint)
 */
export async function getStoreStats(): Promise<StoreStats> {
  return countEntities(await loadStore());
}

/**
 * Clear the in-memory cache (for testing)
 */
export function clearCache(): void {
  storeCache = null;
  pendingLoad = null;
}
