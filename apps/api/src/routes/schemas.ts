/**
 * Zod schemas shared by the catalog routes
 */

import { z } from 'zod';

export const ErrorSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

export const NormalizedRangeSchema = z.object({
  min: z.number().int().nullable(),
  max: z.number().int().nullable(),
  inverted: z.boolean(),
  suffix: z.string(),
});

export const MagazineSchema = z.object({
  id: z.string(),
  name: z.string(),
  issueIds: z.array(z.string()),
  numberingIds: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const IssueSchema = z.object({
  id: z.string(),
  magazineId: z.string(),
  year: z.number().int().nullable(),
  issueNumber: z.string(),
  copies: z.number().int(),
  isNew: z.boolean(),
  range: NormalizedRangeSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const NumberingSchema = z.object({
  id: z.string(),
  magazineId: z.string(),
  fromYear: z.number().int().nullable(),
  toYear: z.number().int().nullable(),
  isYearly: z.boolean(),
  fromNumber: z.number().int().nullable(),
  toNumber: z.number().int().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const MissingNumberSchema = z.object({
  year: z.number().int().nullable(),
  number: z.number().int(),
  label: z.string(),
});

export const RuleFailureSchema = z.object({
  ruleId: z.string(),
  bound: z.enum(['fromYear', 'toYear', 'fromNumber', 'toNumber']).nullable(),
  message: z.string(),
});

/** Open bound: omitted or null */
const BoundSchema = z.number().int().nonnegative().safe().nullable().optional();

export const CreateNumberingBodySchema = z.object({
  fromYear: BoundSchema,
  toYear: BoundSchema,
  isYearly: z.boolean(),
  fromNumber: BoundSchema,
  toNumber: BoundSchema,
});

export const UpdateNumberingBodySchema = CreateNumberingBodySchema.partial();

/** "true" / "false" query flag */
export const BooleanQuerySchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const IdParamsSchema = z.object({
  id: z.string().min(1),
});
