import { z } from 'zod';
import { formatIssues } from '../lib/validate.js';
import type { AugmentationStatus, PersonRecord } from './types.js';

// ─── Row schema ──────────────────────────────────────────────────────

/** Trimmed text, with blank strings collapsed to null. */
const nullableText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const STATUS_SPELLINGS: Partial<Record<string, AugmentationStatus>> = {
  matched: 'matched',
  notmatched: 'not_matched',
  unmatched: 'not_matched',
  pending: 'pending',
};

const augmentationStatus = z
  .string()
  .transform((value) => STATUS_SPELLINGS[value.toLowerCase().replace(/[^a-z]/g, '')] ?? value)
  .pipe(z.enum(['matched', 'not_matched', 'pending']));

const FirmographicsSchema = z.object({
  industry: nullableText,
  employee_count: z.number().int().nonnegative().nullish().transform((v) => v ?? null),
  revenue_range: nullableText,
  headquarters_location: nullableText,
}).passthrough();

export const PersonRowSchema = z.object({
  person_id: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  full_name: nullableText,
  title_input: nullableText,
  title_new: nullableText,
  company_input: nullableText,
  company_new: nullableText,
  domain_input: nullableText,
  domain_new: nullableText,
  firmographics_input: FirmographicsSchema.optional(),
  firmographics_new: FirmographicsSchema.optional(),
  augmentation_status: augmentationStatus.default('pending'),
  updated_at: nullableText,
});

export const PersonRowsSchema = z.array(PersonRowSchema).superRefine((rows, ctx) => {
  const seen = new Map<string, number>();
  rows.forEach((row, index) => {
    const first = seen.get(row.person_id);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'person_id'],
        message: `Duplicate person_id "${row.person_id}" (first seen at row ${first})`,
      });
    } else {
      seen.set(row.person_id, index);
    }
  });
});

export type PersonRowsParseResult =
  | { ok: true; records: PersonRecord[] }
  | { ok: false; issues: string[] };

/**
 * Validate raw input rows into ordered PersonRecords.
 */
export function parsePersonRows(rows: unknown): PersonRowsParseResult {
  const parsed = PersonRowsSchema.safeParse(rows);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error.issues) };
  }
  return { ok: true, records: parsed.data };
}
