/**
 * Game Pipeline Service
 *
 * Runs every stage for one game, reading each artifact from the game's
 * cache before computing it:
 *
 *   fetch → normalize → rosters → changes → events → assemble → score
 *
 * A source that is missing or fails to parse is disabled for this game only
 * and recorded as a diagnostic. A fetch that exhausts its retries fails the
 * game, never the collection.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { AppError, ParseDefectError, toError } from '../errors/index.js';
import { GameCache, SLOTS } from '../cache/gameCache.js';
import type { Slot } from '../cache/gameCache.js';
import type { ArtifactStore } from '../cache/artifactStore.js';
import { SOURCE_KINDS } from '../models/records.js';
import type { Diagnostic, GameInfo, GameResult, RawSource, SourceKind } from '../models/records.js';
import { parseGameId } from '../util/gameId.js';
import type { GameId } from '../util/gameId.js';
import { assemblePlayByPlay } from './assembler.js';
import type { GameContext } from './assembler.js';
import { OnIceTimeline, reconcileChanges } from './changeReconciler.js';
import type { CorrectionTable } from './corrections.js';
import { raiseDiagnostic } from './diagnostics.js';
import { reconcileEvents } from './eventReconciler.js';
import type { MatchOptions } from './eventReconciler.js';
import type { SourceFetcher } from './fetcher.js';
import { normalizeApiEvents } from './normalizers/apiEvents.js';
import { normalizeApiRosters } from './normalizers/apiRosters.js';
import { normalizeGameInfo } from './normalizers/gameInfo.js';
import { normalizeHtmlEvents } from './normalizers/htmlEvents.js';
import { normalizeHtmlRosters } from './normalizers/htmlRosters.js';
import { normalizeHtmlShifts } from './normalizers/htmlShifts.js';
import { RosterIndex, reconcileRosters } from './rosterReconciler.js';
import { scoreEvents } from './scoring.js';
import type { ScoringFunction } from './scoring.js';

export interface PipelineDeps {
  fetcher: SourceFetcher;
  store: ArtifactStore;
  corrections: CorrectionTable;
  /** Predicted-goal model; shots are left unscored without one */
  model?: ScoringFunction;
  match?: MatchOptions;
  signal?: AbortSignal;
}

type RawSources = Record<SourceKind, RawSource | null>;

interface StageOutput<T> {
  value: T;
  diagnostics: Diagnostic[];
}

/**
 * Reads a stage's artifact and its diagnostics from the cache, or computes and stores both
 */
async function stage<T>(cache: GameCache, slot: Slot<T>, compute: () => StageOutput<T>): Promise<StageOutput<T>> {
  const diagnosticsSlot = SLOTS.stageDiagnostics(slot.kind);
  const value = await cache.value(slot);
  const diagnostics = await cache.value(diagnosticsSlot);
  if (value !== undefined && diagnostics !== undefined) {
    logger.debug({ gameId: cache.gameId, stage: slot.kind }, 'stage read from cache');
    return { value, diagnostics };
  }
  const output = compute();
  logger.debug({ gameId: cache.gameId, stage: slot.kind, diagnostics: output.diagnostics.length }, 'stage complete');
  return {
    value: await cache.write(slot, output.value),
    diagnostics: await cache.write(diagnosticsSlot, output.diagnostics),
  };
}

/** A source whose fetch failed, carried to the game result */
class SourceFailure extends Error {
  constructor(
    readonly source: SourceKind,
    readonly error: Error
  ) {
    super(error.message);
  }
}

type RawOutcome = { state: 'present'; value: RawSource } | { state: 'absent'; reason: string };

/**
 * Returns the cached raw source, or fetches and caches it
 */
async function loadRaw(gameId: GameId, kind: SourceKind, cache: GameCache, fetcher: SourceFetcher): Promise<RawOutcome> {
  const slot = SLOTS.raw(kind);
  const cached = await cache.read(slot);
  if (cached !== undefined) return cached;

  const outcome = await fetcher.fetchSource(gameId, kind);
  if (outcome.status === 'ok') {
    return { state: 'present', value: await cache.write(slot, outcome.raw) };
  }
  await cache.writeAbsent(slot, outcome.reason);
  return { state: 'absent', reason: outcome.reason };
}

/**
 * Fetches all six sources concurrently; a fetch failure fails the game
 * once every fetch has settled, so the others stay cached
 */
async function loadSources(gameId: GameId, cache: GameCache, fetcher: SourceFetcher): Promise<StageOutput<RawSources>> {
  const settled = await Promise.allSettled(SOURCE_KINDS.map(kind => loadRaw(gameId, kind, cache, fetcher)));

  const diagnostics: Diagnostic[] = [];
  const sources: RawSources = {
    api_events: null,
    api_rosters: null,
    api_game_info: null,
    html_events: null,
    html_rosters: null,
    html_shifts: null,
  };
  for (const [i, result] of settled.entries()) {
    const kind = SOURCE_KINDS[i];
    if (result.status === 'rejected') throw new SourceFailure(kind, toError(result.reason));
    if (result.value.state === 'present') {
      sources[kind] = result.value.value;
    } else {
      const { reason } = result.value;
      diagnostics.push(raiseDiagnostic('SourceUnavailable', gameId.id, `${kind} unavailable: ${reason}`, { reason }, kind));
    }
  }
  return { value: sources, diagnostics };
}

/**
 * Normalizes one source; a parse defect disables the source and is recorded
 */
async function normalize<T>(
  gameId: GameId,
  raw: RawSource | null,
  cache: GameCache,
  slot: Slot<T>,
  normalizer: (raw: RawSource, gameId: GameId) => T,
  diagnostics: Diagnostic[]
): Promise<T | null> {
  if (raw === null) return null;
  try {
    return await cache.getOrCompute(slot, () => normalizer(raw, gameId));
  } catch (err) {
    if (!(err instanceof ParseDefectError)) throw err;
    diagnostics.push(raiseDiagnostic('ParseDefect', gameId.id, err.message, {}, raw.kind));
    return null;
  }
}

function gameContext(gameId: GameId, info: GameInfo | null, roster: RosterIndex): GameContext {
  const homeTeam = info?.home.abbrev ?? roster.teamOf('HOME');
  const awayTeam = info?.away.abbrev ?? roster.teamOf('AWAY');
  if (homeTeam === undefined || awayTeam === undefined) {
    throw new AppError(`No source identifies the teams of game ${gameId.id}`, 'NO_TEAMS', 422);
  }
  return {
    gameId,
    season: gameId.season,
    session: gameId.session,
    gameDate: info?.gameDate ?? null,
    homeTeam,
    awayTeam,
  };
}

async function execute(gameId: GameId, deps: PipelineDeps, cache: GameCache): Promise<GameResult> {
  const { corrections } = deps;

  const cachedEvents = await cache.value(SLOTS.enrichedEvents);
  const cachedDiagnostics = await cache.value(SLOTS.diagnostics);
  if (cachedEvents !== undefined && cachedDiagnostics !== undefined) {
    logger.debug({ gameId: gameId.id }, 'game read from cache');
    return { status: 'ok', gameId: gameId.id, events: cachedEvents, diagnostics: cachedDiagnostics };
  }

  const sources = await loadSources(gameId, cache, deps.fetcher);
  if (deps.signal?.aborted) return { status: 'cancelled', gameId: gameId.id };

  const raw = sources.value;
  const diagnostics: Diagnostic[] = [...sources.diagnostics];
  const info = await normalize(gameId, raw.api_game_info, cache, SLOTS.gameInfo, normalizeGameInfo, diagnostics);
  const apiEvents = await normalize(gameId, raw.api_events, cache, SLOTS.apiEvents, normalizeApiEvents, diagnostics);
  const apiRosters = await normalize(gameId, raw.api_rosters, cache, SLOTS.apiRosters, normalizeApiRosters, diagnostics);
  const htmlEvents = await normalize(gameId, raw.html_events, cache, SLOTS.htmlEvents, normalizeHtmlEvents, diagnostics);
  const htmlRosters = await normalize(gameId, raw.html_rosters, cache, SLOTS.htmlRosters, normalizeHtmlRosters, diagnostics);
  const shifts = await normalize(gameId, raw.html_shifts, cache, SLOTS.shifts, normalizeHtmlShifts, diagnostics);

  if (apiEvents === null && htmlEvents === null) {
    throw new AppError(`No event source available for game ${gameId.id}`, 'NO_EVENT_SOURCE', 422);
  }

  const rosters = await stage(cache, SLOTS.rosters, () => {
    const { entries, diagnostics: found } = reconcileRosters(gameId, apiRosters, htmlRosters, corrections);
    return { value: entries, diagnostics: found };
  });
  const roster = new RosterIndex(rosters.value);

  const changes = await stage(cache, SLOTS.changes, () => {
    const { changes: value, diagnostics: found } = reconcileChanges(gameId, shifts, roster, corrections);
    return { value, diagnostics: found };
  });

  const canonical = await stage(cache, SLOTS.canonicalEvents, () => {
    const { events, diagnostics: found } = reconcileEvents(
      gameId,
      apiEvents,
      htmlEvents,
      roster,
      corrections,
      deps.match ?? cfg.reconcile
    );
    return { value: events, diagnostics: found };
  });

  const context = gameContext(gameId, info, roster);
  const enriched = await stage(cache, SLOTS.enrichedEvents, () => {
    const events = assemblePlayByPlay(context, canonical.value, OnIceTimeline.fromChanges(changes.value), roster);
    if (!deps.model) return { value: events, diagnostics: [] };
    const { events: value, diagnostics: found } = scoreEvents(gameId.id, events, deps.model);
    return { value, diagnostics: found };
  });

  diagnostics.push(...rosters.diagnostics, ...changes.diagnostics, ...canonical.diagnostics, ...enriched.diagnostics);
  const stored = await cache.write(SLOTS.diagnostics, diagnostics);

  return { status: 'ok', gameId: gameId.id, events: enriched.value, diagnostics: stored };
}

/**
 * Runs the full pipeline for one game
 *
 * Idempotent given the cache: a game whose output is cached returns it
 * without fetching or recomputing anything.
 *
 * @param input - Game id as a string or number
 * @throws ValidationError if the game id is malformed
 */
export async function runGame(input: string | number, deps: PipelineDeps): Promise<GameResult> {
  const gameId = parseGameId(input);
  const cache = new GameCache(deps.store, gameId.id);
  const startedAt = Date.now();

  try {
    const result = await execute(gameId, deps, cache);
    if (result.status === 'ok') {
      logger.info(
        { gameId: gameId.id, events: result.events.length, diagnostics: result.diagnostics.length, ms: Date.now() - startedAt },
        'game complete'
      );
    }
    return result;
  } catch (err) {
    if (err instanceof SourceFailure) {
      const code = err.error instanceof AppError ? err.error.code : 'INTERNAL';
      logger.error({ gameId: gameId.id, source: err.source, err: err.error }, 'game failed');
      return { status: 'failed', gameId: gameId.id, reason: { code, message: err.message, source: err.source } };
    }
    const error = toError(err);
    const code = error instanceof AppError ? error.code : 'INTERNAL';
    logger.error({ gameId: gameId.id, err: error }, 'game failed');
    return { status: 'failed', gameId: gameId.id, reason: { code, message: error.message } };
  }
}

