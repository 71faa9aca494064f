/**
 * Diagnostics
 *
 * Non-fatal findings recorded while a game is processed. Each one is logged
 * at warn when raised and returned with the game result.
 */

import { logger } from '../core/logger.js';
import type { Diagnostic, DiagnosticKind, SourceKind } from '../models/records.js';

export type DiagnosticDetail = Diagnostic['detail'];

export function raiseDiagnostic(
  kind: DiagnosticKind,
  gameId: string,
  message: string,
  detail: DiagnosticDetail = {},
  source: SourceKind | null = null
): Diagnostic {
  logger.warn({ gameId, kind, source, ...detail }, message);
  return { kind, gameId, source, message, detail };
}
