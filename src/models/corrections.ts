/**
 * Correction Rule Model
 *
 * Manually curated overrides for known defects in one game's source
 * records. Stored in data/corrections.json.
 */

import { z } from 'zod';

export const correctionSourceSchema = z.enum([
  'api_events',
  'html_events',
  'api_rosters',
  'html_rosters',
  'html_shifts',
  /** Reconciled roster entries */
  'rosters',
]);
export type CorrectionSource = z.infer<typeof correctionSourceSchema>;

function isPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const correctionMatchSchema = z
  .object({
    eventIdx: z.number().int().optional(),
    descriptionPattern: z.string().min(1).refine(isPattern, { message: 'not a regular expression' }).optional(),
    teamJersey: z.string().min(1).optional(),
    playerName: z.string().min(1).optional(),
  })
  .strict()
  .refine(m => Object.keys(m).length <= 1, { message: 'match takes at most one key' });
export type CorrectionMatch = z.infer<typeof correctionMatchSchema>;

/** Field path: a record field, or one level into a nested object ("player1.apiId") */
const fieldPath = z.string().regex(/^[A-Za-z0-9]+(\.[A-Za-z0-9]+)?$/);

export const correctionActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('set'), field: fieldPath, value: z.unknown() }),
  z.object({ type: z.literal('replace'), field: fieldPath, find: z.string().min(1), replacement: z.string() }),
  z.object({ type: z.literal('swap'), fields: z.tuple([fieldPath, fieldPath]) }),
  z.object({ type: z.literal('copy'), from: fieldPath, to: fieldPath }),
  z.object({ type: z.literal('drop') }),
  z.object({ type: z.literal('add'), record: z.record(z.unknown()) }),
]);
export type CorrectionAction = z.infer<typeof correctionActionSchema>;

export const correctionRuleSchema = z.object({
  gameId: z.string().regex(/^\d{10}$/),
  source: correctionSourceSchema,
  match: correctionMatchSchema,
  action: correctionActionSchema,
  note: z.string().optional(),
});
export type CorrectionRule = z.infer<typeof correctionRuleSchema>;

export const correctionFileSchema = z.object({
  rules: z.array(correctionRuleSchema),
});
