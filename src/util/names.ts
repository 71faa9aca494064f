/**
 * Names Module
 *
 * Text cleanup shared by the normalizers and the player identity key
 * used to join players across sources.
 */

import { NAMES, TEAMS } from './data.js';

const SPECIAL_LETTERS: Readonly<Record<string, string>> = {
  'ø': 'o',
  'Ø': 'O',
  'æ': 'ae',
  'Æ': 'AE',
  'ß': 'ss',
  'ł': 'l',
  'Ł': 'L',
  'đ': 'd',
  'Đ': 'D',
  'œ': 'oe',
  'Œ': 'OE',
};

/**
 * Folds accented characters to plain ASCII letters
 *
 * @example
 * foldAccents('Stützle'); // 'Stutzle'
 */
export function foldAccents(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[øØæÆßłŁđĐœŒ]/g, ch => SPECIAL_LETTERS[ch] ?? ch);
}

/**
 * Collapses non-breaking spaces, line breaks and repeated whitespace
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Upper-cased, accent-free, whitespace-collapsed text
 */
export function cleanText(text: string): string {
  return collapseWhitespace(foldAccents(text)).toUpperCase();
}

/**
 * Normalizes a player's full name as printed by either source
 *
 * Strips parenthesised annotations (captaincy marks), shortens the
 * first names both sources spell differently, then applies the
 * known spelling corrections.
 *
 * @example
 * normalizePlayerName('Mitchell Marner'); // 'MITCH MARNER'
 * normalizePlayerName('ALEXANDER OVECHKIN (C)'); // 'ALEX OVECHKIN'
 */
export function normalizePlayerName(raw: string): string {
  let name = cleanText(raw).replace(/\(\s?(.*)\)/, '');
  name = collapseWhitespace(name);
  for (const [from, to] of Object.entries(NAMES.firstNameAliases)) {
    name = name.replace(from, to);
  }
  return NAMES.corrections[name] ?? name;
}

export interface PlayerKeyContext {
  position: string | null;
  season: number;
}

/**
 * Builds the cross-source identity key FIRST.LAST
 *
 * Players sharing a name across eras get a "2" suffix according
 * to the duplicate rules in data/names.json.
 *
 * @param playerName - Already-normalized full name
 */
export function playerKey(playerName: string, context: PlayerKeyContext): string {
  const [first, ...rest] = playerName.split(' ');
  let key = `${first}.${rest.join(' ')}`.replace('..', '.');

  for (const rule of NAMES.duplicates) {
    if (key !== rule.key) continue;
    if (rule.position !== undefined && context.position !== rule.position) continue;
    if (rule.notPosition !== undefined && context.position === rule.notPosition) continue;
    if (rule.minSeason !== undefined && context.season < rule.minSeason) continue;
    key = `${rule.key}2`;
    break;
  }

  return NAMES.keyAliases[key] ?? key;
}

/**
 * Identity key pinned to an API player id, when the id is a known duplicate
 */
export function apiKeyOverride(apiId: number): string | undefined {
  return NAMES.apiKeyOverrides[String(apiId)];
}

/**
 * Three-letter code for a team name printed on the HTML reports
 *
 * @returns The code, or undefined for an unknown name
 */
export function teamCodeFromName(name: string): string | undefined {
  const cleaned = cleanText(name);
  const canonical = TEAMS.nameAliases[cleaned] ?? cleaned;
  if (TEAMS.codesByName[canonical]) return TEAMS.codesByName[canonical];
  if (canonical.includes('CANADIENS')) return TEAMS.codesByName['MONTREAL CANADIENS'];
  return undefined;
}

/**
 * Rewrites a legacy team code (L.A, N.J, S.J, T.B, PHX) to its current form
 */
export function normalizeTeamCode(code: string): string {
  return TEAMS.codeAliases[code] ?? code;
}

/**
 * Replaces legacy team codes appearing as tokens inside free text
 */
export function replaceTeamAliases(text: string): string {
  let out = text;
  for (const [from, to] of Object.entries(TEAMS.codeAliases)) {
    const escaped = from.replace('.', '\\.');
    out = out.replace(new RegExp(`(^|[^A-Z.])${escaped}(?![A-Z])`, 'g'), `$1${to}`);
  }
  return out;
}

/**
 * Levenshtein distance between two strings
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}
