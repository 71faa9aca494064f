/**
 * Reference Data Module
 *
 * Loads the version-controlled JSON tables under data/ and validates
 * them with zod. Tables are read once, when first imported.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Repository data/ directory (same relative location from src/ and dist/) */
export const DATA_DIR = join(__dirname, '..', '..', 'data');

/**
 * Reads and validates a JSON file from data/
 *
 * @param fileName - File name relative to data/
 * @param schema - Schema the parsed content must satisfy
 * @throws ValidationError if the file is not valid JSON or fails the schema
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const path = join(DATA_DIR, fileName);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Could not read ${fileName}: ${message}`, fileName);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(`Invalid ${fileName}: ${result.error.message}`, fileName);
  }
  return result.data;
}

export const teamTablesSchema = z.object({
  codesByName: z.record(z.string()),
  nameAliases: z.record(z.string()),
  codeAliases: z.record(z.string()),
});
export type TeamTables = z.infer<typeof teamTablesSchema>;

export const nameTablesSchema = z.object({
  corrections: z.record(z.string()),
  firstNameAliases: z.record(z.string()),
  apiKeyOverrides: z.record(z.string()),
  duplicates: z.array(
    z.object({
      key: z.string(),
      position: z.string().optional(),
      notPosition: z.string().optional(),
      minSeason: z.number().int().optional(),
    })
  ),
  keyAliases: z.record(z.string()),
});
export type NameTables = z.infer<typeof nameTablesSchema>;

export const penaltyTablesSchema = z.object({
  keywordRules: z.array(z.object({ contains: z.array(z.string()).min(1), penalty: z.string() })),
  renames: z.record(z.string()),
});
export type PenaltyTables = z.infer<typeof penaltyTablesSchema>;

export const TEAMS: TeamTables = loadDataFile('teams.json', teamTablesSchema);
export const NAMES: NameTables = loadDataFile('names.json', nameTablesSchema);
export const PENALTIES: PenaltyTables = loadDataFile('penalties.json', penaltyTablesSchema);
