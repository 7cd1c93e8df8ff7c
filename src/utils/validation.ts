import { z } from 'zod';
import { ilike, or, type SQL } from 'drizzle-orm';
import type { PgColumn } from 'drizzle-orm/pg-core';
import { HttpError } from './httpErrors';

export const listQuerySchema = z.object({
  page: z.string().optional().default('1').transform(val => Math.max(parseInt(val) || 1, 1)),
  limit: z.string().optional().default('20').transform(val => Math.min(Math.max(parseInt(val) || 20, 1), 100)),
  q: z.string().trim().optional(),
});

export const booleanQuery = z.enum(['true', 'false']).transform(val => val === 'true');

export const idQuery = z.string().regex(/^\d+$/, 'Invalid id').transform(Number);

/**
 * Accepts a JSON number or a numeric string, rounds it to the column's
 * `scale` the way Postgres would, then applies `inner`.
 */
export const decimal = (inner: z.ZodNumber = z.number(), scale = 2) =>
  z
    .union([
      z.number(),
      z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Must be a number').transform(Number),
    ])
    .transform(value => Number(value.toFixed(scale)))
    .pipe(inner);

export function toDecimalString(value: number): string;
export function toDecimalString(value: number | null | undefined): string | null | undefined;
export function toDecimalString(value: number | null | undefined) {
  return value === null || value === undefined ? value : value.toString();
}

export const parseId = (value: string, entity: string) => {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id)) {
    throw new HttpError(400, `Invalid ${entity} ID`);
  }
  return id;
};

export const searchCondition = (q: string | undefined, columns: PgColumn[]): SQL | undefined => {
  if (!q) return undefined;
  const searchTerm = `%${q}%`;
  return or(...columns.map(column => ilike(column, searchTerm)));
};

export const pageOffset = (page: number, limit: number) => (page - 1) * limit;
