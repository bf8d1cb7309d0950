/**
 * Numbering rule entity operations
 */

import { EntityNotFoundError } from './errors.js';
import { requireMagazine } from './magazines.js';
import {
  generateNumberingId,
  getNumberingById,
  getNumberingsByMagazineId,
  insertNumbering,
  loadStore,
  removeNumbering,
  saveNumbering,
  saveStore,
} from './store.js';
import type { CreateNumberingInput, Numbering, UpdateNumberingInput } from './types.js';

/**
 * Create a numbering rule. Bounds left out stay open and are resolved from the
 * magazine's issues whenever missing numbers are computed.
 */
export async function createNumbering(input: CreateNumberingInput): Promise<Numbering> {
  const store = await loadStore();
  const magazine = store.magazines[input.magazineId];
  if (!magazine) {
    throw new EntityNotFoundError('magazine', input.magazineId);
  }

  const now = new Date().toISOString();
  const numbering: Numbering = {
    id: generateNumberingId(),
    magazineId: magazine.id,
    fromYear: input.fromYear ?? null,
    toYear: input.toYear ?? null,
    isYearly: input.isYearly,
    fromNumber: input.fromNumber ?? null,
    toNumber: input.toNumber ?? null,
    createdAt: now,
    updatedAt: now,
  };

  insertNumbering(store, magazine, numbering);
  await saveStore();
  console.log(`[Numbering] Created ${numbering.isYearly ? 'yearly' : 'continuous'} numbering: ${numbering.id}`);

  return numbering;
}

export async function updateNumbering(id: string, input: UpdateNumberingInput): Promise<Numbering> {
  const existing = await getNumberingById(id);
  if (!existing) {
    throw new EntityNotFoundError('numbering', id);
  }

  const updated: Numbering = {
    ...existing,
    fromYear: input.fromYear === undefined ? existing.fromYear : input.fromYear,
    toYear: input.toYear === undefined ? existing.toYear : input.toYear,
    isYearly: input.isYearly ?? existing.isYearly,
    fromNumber: input.fromNumber === undefined ? existing.fromNumber : input.fromNumber,
    toNumber: input.toNumber === undefined ? existing.toNumber : input.toNumber,
    updatedAt: new Date().toISOString(),
  };

  await saveNumbering(updated);
  console.log(`[Numbering] Updated numbering: ${updated.id}`);

  return updated;
}

export async function deleteNumbering(id: string): Promise<void> {
  if (!(await getNumberingById(id))) {
    throw new EntityNotFoundError('numbering', id);
  }
  await removeNumbering(id);
  console.log(`[Numbering] Deleted numbering: ${id}`);
}

export async function listNumberings(magazineId: string): Promise<Numbering[]> {
  await requireMagazine(magazineId);
  return getNumberingsByMagazineId(magazineId);
}
