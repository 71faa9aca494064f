/**
 * Corrections Service
 *
 * Applies the static correction table to one source's records for one game.
 * Records are edited as plain field maps and re-validated with the source's
 * schema; a rule that produces a record of the wrong shape is an error.
 */

import type { z } from 'zod';
import { logger } from '../core/logger.js';
import { ValidationError } from '../errors/index.js';
import { loadDataFile } from '../util/data.js';
import { correctionFileSchema } from '../models/corrections.js';
import type {
  CorrectionAction,
  CorrectionMatch,
  CorrectionRule,
  CorrectionSource,
} from '../models/corrections.js';

export interface CorrectedRecord<T> {
  record: T;
  /** Top-level fields touched by at least one rule ('*' for added records) */
  changed: string[];
}

type Draft = Record<string, unknown>;

function isDraft(value: unknown): value is Draft {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDraft(value: object): Draft {
  return Object.fromEntries(Object.entries(value));
}

function getPath(draft: Draft, path: string): unknown {
  const [head, tail] = path.split('.');
  const value = draft[head];
  if (tail === undefined) return value;
  return isDraft(value) ? value[tail] : undefined;
}

/**
 * Writes a value at a path. Nested writes only go into an existing object.
 *
 * @returns false when the nested parent is missing
 */
function setPath(draft: Draft, path: string, value: unknown): boolean {
  const [head, tail] = path.split('.');
  if (tail === undefined) {
    draft[head] = value;
    return true;
  }
  const parent = draft[head];
  if (!isDraft(parent)) return false;
  draft[head] = { ...parent, [tail]: value };
  return true;
}

function matches(draft: Draft, match: CorrectionMatch): boolean {
  if (match.eventIdx !== undefined) return draft.eventIdx === match.eventIdx;
  if (match.descriptionPattern !== undefined) {
    return typeof draft.description === 'string' && new RegExp(match.descriptionPattern).test(draft.description);
  }
  if (match.teamJersey !== undefined) return draft.teamJersey === match.teamJersey;
  if (match.playerName !== undefined) return draft.playerName === match.playerName;
  return true;
}

/**
 * Applies one edit action to a draft
 *
 * @returns The top-level fields changed, or null when the action does not apply
 */
function applyAction(draft: Draft, action: CorrectionAction): string[] | null {
  switch (action.type) {
    case 'set':
      return setPath(draft, action.field, action.value) ? [action.field.split('.')[0]] : null;
    case 'replace': {
      const current = getPath(draft, action.field);
      if (typeof current !== 'string' || !current.includes(action.find)) return [];
      return setPath(draft, action.field, current.replaceAll(action.find, action.replacement))
        ? [action.field.split('.')[0]]
        : null;
    }
    case 'swap': {
      const [a, b] = action.fields;
      const first = getPath(draft, a);
      const second = getPath(draft, b);
      if (!setPath(draft, a, second) || !setPath(draft, b, first)) return null;
      return [a.split('.')[0], b.split('.')[0]];
    }
    case 'copy': {
      const value = getPath(draft, action.from);
      const copied = isDraft(value) ? { ...value } : value;
      return setPath(draft, action.to, copied) ? [action.to.split('.')[0]] : null;
    }
    case 'drop':
    case 'add':
      return [];
  }
}

/**
 * Read-only table of correction rules, indexed by game and source
 */
export class CorrectionTable {
  private readonly index = new Map<string, CorrectionRule[]>();

  /**
   * @throws ValidationError if any rule fails the rule schema
   */
  constructor(rules: CorrectionRule[]) {
    const checked = correctionFileSchema.safeParse({ rules });
    if (!checked.success) {
      throw new ValidationError(`Invalid correction rules: ${checked.error.message}`, 'corrections');
    }
    for (const rule of checked.data.rules) {
      const key = `${rule.gameId}:${rule.source}`;
      const list = this.index.get(key) ?? [];
      list.push(rule);
      this.index.set(key, list);
    }
  }

  /**
   * Loads data/corrections.json (or another file under data/)
   *
   * @throws ValidationError if the file fails validation
   */
  static load(fileName = 'corrections.json'): CorrectionTable {
    return new CorrectionTable(loadDataFile(fileName, correctionFileSchema).rules);
  }

  /** Empty table, used when a caller opts out of corrections */
  static empty(): CorrectionTable {
    return new CorrectionTable([]);
  }

  rulesFor(gameId: string, source: CorrectionSource): CorrectionRule[] {
    return this.index.get(`${gameId}:${source}`) ?? [];
  }

  /**
   * Applies every rule for (gameId, source) to the records, in table order
   *
   * @param schema - Schema of the record type, used to re-validate each edit
   * @throws ValidationError if a rule leaves a record, or adds one, that fails the schema
   */
  apply<T extends object>(
    gameId: string,
    source: CorrectionSource,
    records: readonly T[],
    schema: z.ZodType<T>
  ): CorrectedRecord<T>[] {
    const rules = this.rulesFor(gameId, source);
    let out: CorrectedRecord<T>[] = records.map(record => ({ record, changed: [] }));
    if (rules.length === 0) return out;

    for (const rule of rules) {
      if (rule.action.type === 'add') {
        const parsed = schema.safeParse(rule.action.record);
        if (!parsed.success) {
          throw new ValidationError(`Correction for ${gameId} ${source} adds an invalid record: ${parsed.error.message}`, 'corrections');
        }
        out.push({ record: parsed.data, changed: ['*'] });
        continue;
      }

      if (rule.action.type === 'drop') {
        out = out.filter(item => !matches(toDraft(item.record), rule.match));
        continue;
      }

      out = out.map(item => {
        const draft = toDraft(item.record);
        if (!matches(draft, rule.match)) return item;
        const changed = applyAction(draft, rule.action);
        if (changed === null) {
          logger.warn({ gameId, source, match: rule.match, action: rule.action.type }, 'correction does not apply');
          return item;
        }
        if (changed.length === 0) return item;
        const parsed = schema.safeParse(draft);
        if (!parsed.success) {
          throw new ValidationError(
            `Correction ${rule.action.type} for ${gameId} ${source} leaves an invalid record: ${parsed.error.message}`,
            'corrections'
          );
        }
        return { record: parsed.data, changed: [...new Set([...item.changed, ...changed])] };
      });
    }

    return out;
  }
}
