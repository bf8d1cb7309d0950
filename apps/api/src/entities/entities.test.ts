import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  DuplicateIssueError,
  DuplicateMagazineError,
  EntityNotFoundError,
  clearCache,
  createIssue,
  createMagazine,
  createNumbering,
  deleteCatalog,
  deleteIssue,
  deleteNewIssues,
  deleteNumbering,
  findOrCreateMagazine,
  getIssuesByMagazineId,
  getMagazineById,
  getMagazineByName,
  getMissingNumbers,
  listIssues,
  listNumberings,
  loadStore,
  setDataDir,
  updateIssue,
  updateNumbering,
} from './index.js';

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'catalog-store-'));
  setDataDir(dataDir);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

describe('magazines', () => {
  it('creates a magazine with a trimmed name', async () => {
    const magazine = await createMagazine({ name: '  Topolino ' });

    expect(magazine.id).toMatch(/^m_/);
    expect(magazine.name).toBe('Topolino');
    expect(magazine.issueIds).toEqual([]);
    expect(await getMagazineByName('topolino')).toEqual(magazine);
  });

  it('rejects a duplicate name', async () => {
    await createMagazine({ name: 'Linus' });
    await expect(createMagazine({ name: 'LINUS' })).rejects.toBeInstanceOf(DuplicateMagazineError);
  });

  it('finds an existing magazine instead of creating one', async () => {
    const created = await findOrCreateMagazine('Corto Maltese');
    const found = await findOrCreateMagazine('corto maltese');
    expect(found.id).toBe(created.id);
  });

  it('shares one load between concurrent first calls', async () => {
    await createMagazine({ name: 'Alter' });
    clearCache();

    await Promise.all([createMagazine({ name: 'Linus' }), createMagazine({ name: 'Topolino' })]);
    clearCache();

    const names = Object.values((await loadStore()).magazines).map((m) => m.name);
    expect(names.sort()).toEqual(['Alter', 'Linus', 'Topolino']);
  });

  it('deletes the whole catalog', async () => {
    const magazine = await createMagazine({ name: 'Alter' });
    await createIssue({ magazineId: magazine.id, issueNumber: '1' });

    expect(await deleteCatalog()).toEqual({ magazineCount: 1, issueCount: 1, numberingCount: 0 });
    clearCache();
    expect(await loadStore()).toEqual({ magazines: {}, issues: {}, numberings: {}, nameIndex: {} });
  });

  it('persists to disk', async () => {
    const magazine = await createMagazine({ name: 'Alter' });

    const file = JSON.parse(await readFile(join(dataDir, 'catalog.json'), 'utf-8')) as {
      magazines: Record<string, { name: string }>;
    };
    expect(file.magazines[magazine.id]?.name).toBe('Alter');

    clearCache();
    expect(await getMagazineById(magazine.id)).toEqual(magazine);
  });
});

describe('issues', () => {
  it('derives the range from the printed number', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const issue = await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '5-6 ter' });

    expect(issue.range).toEqual({ min: 5, max: 6, inverted: false, suffix: 'ter' });
    expect(issue.copies).toBe(1);
    expect(issue.isNew).toBe(true);
    expect((await getIssuesByMagazineId(magazine.id)).map((i) => i.id)).toEqual([issue.id]);
  });

  it('stores a missing year as null', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const issue = await createIssue({ magazineId: magazine.id, issueNumber: '7bis' });
    expect(issue.year).toBeNull();
  });

  it('rejects the same year and number twice', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '12' });

    await expect(
      createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '12' })
    ).rejects.toBeInstanceOf(DuplicateIssueError);
    await expect(
      createIssue({ magazineId: magazine.id, year: 1991, issueNumber: '12' })
    ).resolves.toMatchObject({ year: 1991 });
  });

  it('keeps the natural key unique under concurrent creation', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const input = { magazineId: magazine.id, year: 1990, issueNumber: '12' };

    const results = await Promise.allSettled([createIssue(input), createIssue(input), createIssue(input)]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect((await getIssuesByMagazineId(magazine.id)).map((i) => i.issueNumber)).toEqual(['12']);
    clearCache();
    expect(Object.keys((await loadStore()).issues)).toHaveLength(1);
  });

  it('rejects an unknown magazine', async () => {
    await expect(createIssue({ magazineId: 'm_missing', issueNumber: '1' })).rejects.toBeInstanceOf(
      EntityNotFoundError
    );
  });

  it('re-derives the range when the number is edited', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const issue = await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '12' });

    const renumbered = await updateIssue(issue.id, { issueNumber: '13/12' });
    expect(renumbered.range).toEqual({ min: 12, max: 13, inverted: true, suffix: '' });

    const recounted = await updateIssue(issue.id, { copies: 3 });
    expect(recounted.copies).toBe(3);
    expect(recounted.range).toEqual(renumbered.range);
  });

  it('rejects an edit that collides with another issue', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '1' });
    const second = await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '2' });

    await expect(updateIssue(second.id, { issueNumber: '1' })).rejects.toBeInstanceOf(DuplicateIssueError);
  });

  it('filters issues', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const other = await createMagazine({ name: 'Linus' });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '1', copies: 2, isNew: false });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '2' });
    await createIssue({ magazineId: magazine.id, year: 1991, issueNumber: '12', isNew: false });
    await createIssue({ magazineId: other.id, year: 1990, issueNumber: '1' });

    const numbers = async (filter: Parameters<typeof listIssues>[0]) =>
      (await listIssues(filter)).map((i) => `${i.magazineId === magazine.id ? 'T' : 'L'}${i.issueNumber}`);

    expect(await numbers({ magazineId: magazine.id, number: '1' })).toEqual(['T1', 'T12']);
    expect(await numbers({ duplicates: true })).toEqual(['T1']);
    expect(await numbers({ isNew: true })).toEqual(['T2', 'L1']);
    expect(await numbers({ year: 1991 })).toEqual(['T12']);
  });

  it('deletes issues still flagged as new', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const kept = await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '1', isNew: false });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '2' });
    await createIssue({ magazineId: magazine.id, year: 1990, issueNumber: '3' });

    expect(await deleteNewIssues(magazine.id)).toBe(2);
    expect((await getMagazineById(magazine.id))?.issueIds).toEqual([kept.id]);
    expect(Object.keys((await loadStore()).issues)).toEqual([kept.id]);
  });

  it('deletes a single issue', async () => {
    const magazine = await createMagazine({ name: 'Topolino' });
    const issue = await createIssue({ magazineId: magazine.id, issueNumber: '1' });

    await deleteIssue(issue.id);
    expect(await getIssuesByMagazineId(magazine.id)).toEqual([]);
    await expect(deleteIssue(issue.id)).rejects.toBeInstanceOf(EntityNotFoundError);
  });
});

describe('numberings', () => {
  it('keeps open bounds as null', async () => {
    const magazine = await createMagazine({ name: 'Linus' });
    const numbering = await createNumbering({ magazineId: magazine.id, isYearly: false, fromNumber: 1 });

    expect(numbering).toMatchObject({
      fromYear: null,
      toYear: null,
      isYearly: false,
      fromNumber: 1,
      toNumber: null,
    });
  });

  it('updates only the given bounds', async () => {
    const magazine = await createMagazine({ name: 'Linus' });
    const numbering = await createNumbering({ magazineId: magazine.id, isYearly: true, fromYear: 1980 });

    const updated = await updateNumbering(numbering.id, { toYear: 1985, fromYear: null });
    expect(updated).toMatchObject({ fromYear: null, toYear: 1985, isYearly: true });
  });

  it('lists rules in creation order and forgets deleted ones', async () => {
    const magazine = await createMagazine({ name: 'Linus' });
    const first = await createNumbering({ magazineId: magazine.id, isYearly: true });
    const second = await createNumbering({ magazineId: magazine.id, isYearly: false });
    const third = await createNumbering({ magazineId: magazine.id, isYearly: true });

    await deleteNumbering(second.id);
    expect((await listNumberings(magazine.id)).map((n) => n.id)).toEqual([first.id, third.id]);
  });
});

describe('getMissingNumbers', () => {
  it('computes gaps from the stored holdings', async () => {
    const magazine = await createMagazine({ name: 'Linus' });
    await createIssue({ magazineId: magazine.id, year: 1980, issueNumber: '2/3' });
    await createNumbering({
      magazineId: magazine.id,
      isYearly: true,
      fromYear: 1980,
      toYear: 1980,
      fromNumber: 1,
      toNumber: 4,
    });

    const result = await getMissingNumbers(magazine.id);
    expect(result.magazine.id).toBe(magazine.id);
    expect(result.magazine.issueIds).toHaveLength(1);
    expect(result.report).toEqual({
      missing: [
        { year: 1980, number: 1, label: '1' },
        { year: 1980, number: 4, label: '4' },
      ],
      failures: [],
    });
  });

  it('follows issues added after the rule was created', async () => {
    const magazine = await createMagazine({ name: 'Alter' });
    await createNumbering({ magazineId: magazine.id, isYearly: false, fromNumber: 1 });
    await createIssue({ magazineId: magazine.id, issueNumber: '2' });

    expect((await getMissingNumbers(magazine.id)).report.missing.map((m) => m.number)).toEqual([1]);

    await createIssue({ magazineId: magazine.id, issueNumber: '5' });
    expect((await getMissingNumbers(magazine.id)).report.missing.map((m) => m.number)).toEqual([1, 3, 4]);
  });

  it('rejects an unknown magazine', async () => {
    await expect(getMissingNumbers('m_missing')).rejects.toBeInstanceOf(EntityNotFoundError);
  });
});
