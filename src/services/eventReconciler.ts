/**
 * Event Reconciler
 *
 * Merges the API and HTML event streams of one game into canonical events:
 * corrections, identity resolution, cross-stream matching, field-level
 * merge, canonical ordering.
 */

import { cfg } from '../core/config.js';
import { DEFAULT_EVENT_SORT, EVENT_SORT_ORDER } from '../core/constants.js';
import { apiEventRecordSchema, htmlEventRecordSchema } from '../models/records.js';
import type {
  ApiEventRecord,
  ApiPlayerSlot,
  CanonicalEvent,
  Diagnostic,
  EventPlayer,
  HtmlEventRecord,
  HtmlPlayerRef,
  ProvenanceFlag,
  RosterEntry,
  SourceKind,
} from '../models/records.js';
import type { GameId } from '../util/gameId.js';
import { isShootout, periodLength } from '../util/time.js';
import type { CorrectionTable } from './corrections.js';
import { raiseDiagnostic } from './diagnostics.js';
import { buildHtmlEventContext, deriveHtmlEvent, rowOf } from './normalizers/htmlEvents.js';
import type { HtmlEventContext } from './normalizers/htmlEvents.js';
import type { RosterIndex } from './rosterReconciler.js';

export interface MatchOptions {
  /** Largest clock difference, in seconds, between two records of one occurrence */
  matchWindowSeconds: number;

  /** Shared identified players required when both records name players */
  minPlayerOverlap: number;
}

/** Events matched without the player-overlap requirement */
const OVERLAP_EXEMPT: ReadonlySet<string> = new Set(['FAC']);

/** HTML fields whose correction requires re-deriving the record */
const HTML_TEXT_FIELDS: ReadonlySet<string> = new Set(['description', 'timeText', 'period', 'event']);

export const MERGED_FIELDS = [
  'period',
  'periodSeconds',
  'gameSeconds',
  'event',
  'eventTeam',
  'description',
  'strength',
  'zone',
  'coordsX',
  'coordsY',
  'shotType',
  'missReason',
  'penalty',
  'penaltyLength',
  'stoppageReason',
  'pbpDistance',
  'situationCode',
  'homeTeamDefendingSide',
  'oppGoalie',
  'emptyNet',
] as const;

export type MergedField = (typeof MERGED_FIELDS)[number];
export type MergeFields = Pick<CanonicalEvent, MergedField>;
type Side = 'api' | 'html';

/**
 * Source preferred for each field of a matched pair. The other side
 * only fills a value the preferred side lacks.
 */
export const MERGE_POLICY: Readonly<Record<MergedField, Side>> = {
  period: 'html',
  periodSeconds: 'html',
  gameSeconds: 'html',
  event: 'api',
  eventTeam: 'api',
  description: 'html',
  strength: 'html',
  zone: 'html',
  coordsX: 'api',
  coordsY: 'api',
  shotType: 'api',
  missReason: 'api',
  penalty: 'html',
  penaltyLength: 'api',
  stoppageReason: 'api',
  pbpDistance: 'html',
  situationCode: 'api',
  homeTeamDefendingSide: 'api',
  oppGoalie: 'api',
  emptyNet: 'api',
};

/**
 * One record of either stream, with identities resolved
 */
export interface StreamEvent {
  source: Side;
  sourceIdx: number;
  fields: MergeFields;
  players: EventPlayer[];
  version: number;
  anomaly: boolean;
  corrected: boolean;
  unresolved: boolean;
}

export interface MatchedPair {
  api: StreamEvent;
  html: StreamEvent;
}

export interface EventReconciliation {
  events: CanonicalEvent[];
  diagnostics: Diagnostic[];
}

function sentinelPlayer(name: string, role: string): EventPlayer {
  return { playerId: name, apiId: null, name, teamJersey: null, position: null, role };
}

function rosterPlayer(entry: RosterEntry, role: string): EventPlayer {
  return {
    playerId: entry.playerId,
    apiId: entry.apiId,
    name: entry.playerName,
    teamJersey: entry.teamJersey,
    position: entry.position,
    role,
  };
}

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/** Identified roster players, sentinels excluded */
function identities(players: readonly EventPlayer[]): Set<string> {
  return new Set(
    players.filter(p => p.playerId !== null && p.teamJersey !== null).map(p => p.playerId ?? '')
  );
}

/**
 * Resolves identities and tracks which references could not be resolved
 */
class Resolver {
  readonly diagnostics: Diagnostic[] = [];

  constructor(
    private readonly gameId: string,
    private readonly roster: RosterIndex
  ) {}

  private unresolved(source: SourceKind, eventIdx: number, detail: Diagnostic['detail']): void {
    this.diagnostics.push(
      raiseDiagnostic('IdentityUnresolved', this.gameId, `unresolved player in event ${eventIdx}`, { eventIdx, ...detail }, source)
    );
  }

  apiSlot(slot: ApiPlayerSlot, eventIdx: number): EventPlayer {
    if (slot.sentinel !== null) return sentinelPlayer(slot.sentinel, slot.role);
    const entry = slot.apiId === null ? undefined : this.roster.byApiId(slot.apiId);
    if (entry) return rosterPlayer(entry, slot.role);
    this.unresolved('api_events', eventIdx, { apiId: slot.apiId });
    return { playerId: null, apiId: slot.apiId, name: null, teamJersey: null, position: null, role: slot.role };
  }

  apiGoalie(apiId: number, eventIdx: number): EventPlayer {
    return this.apiSlot({ apiId, sentinel: null, role: 'GOALIE' }, eventIdx);
  }

  htmlRef(ref: HtmlPlayerRef, eventIdx: number): EventPlayer {
    if (ref.sentinel !== null) return sentinelPlayer(ref.sentinel, ref.role);
    const entry = this.roster.resolveRef(ref);
    if (entry) return rosterPlayer(entry, ref.role);
    const teamJersey = ref.team !== null && ref.jersey !== null ? `${ref.team}${ref.jersey}` : null;
    this.unresolved('html_events', eventIdx, { teamJersey, lastName: ref.lastName });
    return { playerId: null, apiId: null, name: ref.lastName, teamJersey, position: null, role: ref.role };
  }
}

function isAnomalous(periodSeconds: number | null, period: number, gameId: GameId): boolean {
  if (periodSeconds === null) return true;
  if (isShootout(period, gameId.session)) return false;
  return periodSeconds < 0 || periodSeconds > periodLength(period, gameId.session);
}

/**
 * Numbers events sharing (event, period, second, first player) 1, 2, ... in source order
 */
function assignVersions(events: StreamEvent[]): void {
  const seen = new Map<string, number>();
  for (const e of events) {
    const key = `${e.fields.event}:${e.fields.period}:${e.fields.periodSeconds}:${e.players[0]?.playerId ?? ''}`;
    const version = (seen.get(key) ?? 0) + 1;
    seen.set(key, version);
    e.version = version;
  }
}

function apiStream(
  gameId: GameId,
  records: readonly ApiEventRecord[],
  corrections: CorrectionTable,
  resolver: Resolver
): StreamEvent[] {
  return corrections.apply(gameId.id, 'api_events', records, apiEventRecordSchema).map(({ record, changed }): StreamEvent => {
    const slots = [record.player1, record.player2, record.player3].filter((s): s is ApiPlayerSlot => s !== null);
    const players = slots.map(s => resolver.apiSlot(s, record.eventIdx));
    const oppGoalie = record.oppGoalieApiId === null ? null : resolver.apiGoalie(record.oppGoalieApiId, record.eventIdx);
    return {
      source: 'api',
      sourceIdx: record.eventIdx,
      fields: {
        period: record.period,
        periodSeconds: record.periodSeconds,
        gameSeconds: record.gameSeconds,
        event: record.event,
        eventTeam: record.eventTeam,
        description: null,
        strength: null,
        zone: record.zone,
        coordsX: record.coordsX,
        coordsY: record.coordsY,
        shotType: record.shotType,
        missReason: record.missReason,
        penalty: record.penaltyReason,
        penaltyLength: record.penaltyLength,
        stoppageReason: record.stoppageReason,
        pbpDistance: null,
        situationCode: record.situationCode,
        homeTeamDefendingSide: record.homeTeamDefendingSide,
        oppGoalie,
        emptyNet: record.emptyNet,
      },
      players,
      version: 1,
      anomaly: isAnomalous(record.periodSeconds, record.period, gameId),
      corrected: changed.length > 0,
      unresolved: players.some(p => p.playerId === null) || oppGoalie?.playerId === null,
    };
  });
}

/**
 * Re-runs the derivation on a record whose text was corrected
 */
function rederive(record: HtmlEventRecord, context: HtmlEventContext): HtmlEventRecord {
  const derived = deriveHtmlEvent(rowOf(record), context);
  return { ...derived, repairs: [...new Set([...record.repairs, ...derived.repairs])] };
}

function htmlStream(
  gameId: GameId,
  records: readonly HtmlEventRecord[],
  corrections: CorrectionTable,
  resolver: Resolver
): StreamEvent[] {
  const corrected = corrections.apply(gameId.id, 'html_events', records, htmlEventRecordSchema);
  const context = buildHtmlEventContext(gameId, corrected.map(c => rowOf(c.record)));

  return corrected.map(({ record: original, changed }): StreamEvent => {
    const record = changed.some(field => HTML_TEXT_FIELDS.has(field)) ? rederive(original, context) : original;
    const refs = [record.player1, record.player2, record.player3].filter((r): r is HtmlPlayerRef => r !== null);
    const players = refs.map(r => resolver.htmlRef(r, record.eventIdx));
    return {
      source: 'html',
      sourceIdx: record.eventIdx,
      fields: {
        period: record.period,
        periodSeconds: record.periodSeconds,
        gameSeconds: record.gameSeconds,
        event: record.event,
        eventTeam: record.eventTeam,
        description: record.description,
        strength: record.strength,
        zone: record.zone,
        coordsX: null,
        coordsY: null,
        shotType: record.shotType,
        missReason: null,
        penalty: record.penalty,
        penaltyLength: record.penaltyLength,
        stoppageReason: null,
        pbpDistance: record.pbpDistance,
        situationCode: null,
        homeTeamDefendingSide: null,
        oppGoalie: null,
        emptyNet: false,
      },
      players,
      version: 1,
      anomaly: isAnomalous(record.periodSeconds, record.period, gameId),
      corrected: changed.length > 0,
      unresolved: players.some(p => p.playerId === null),
    };
  });
}

/**
 * Pairs API and HTML records of the same occurrence
 *
 * Candidates share event code and period, sit within the match window,
 * have compatible event teams and, when both name identified players
 * (faceoffs aside), share at least minPlayerOverlap of them. Candidates
 * are taken greedily by (clock difference, overlap desc, version
 * mismatch, HTML index, API index); each record is used at most once.
 */
export function matchEvents(
  api: readonly StreamEvent[],
  html: readonly StreamEvent[],
  options: MatchOptions
): MatchedPair[] {
  interface Candidate {
    api: StreamEvent;
    html: StreamEvent;
    dt: number;
    overlap: number;
    versionMismatch: number;
  }
  const candidates: Candidate[] = [];

  for (const h of html) {
    if (h.anomaly || h.fields.periodSeconds === null) continue;
    const hIds = identities(h.players);
    for (const a of api) {
      if (a.anomaly || a.fields.periodSeconds === null) continue;
      if (a.fields.event !== h.fields.event || a.fields.period !== h.fields.period) continue;
      const dt = Math.abs(a.fields.periodSeconds - h.fields.periodSeconds);
      if (dt > options.matchWindowSeconds) continue;
      if (a.fields.eventTeam !== null && h.fields.eventTeam !== null && a.fields.eventTeam !== h.fields.eventTeam) continue;

      const aIds = identities(a.players);
      const overlap = [...aIds].filter(id => hIds.has(id)).length;
      const bothNamed = aIds.size > 0 && hIds.size > 0;
      if (bothNamed && !OVERLAP_EXEMPT.has(h.fields.event) && overlap < options.minPlayerOverlap) continue;

      candidates.push({ api: a, html: h, dt, overlap, versionMismatch: a.version === h.version ? 0 : 1 });
    }
  }

  candidates.sort(
    (x, y) =>
      x.dt - y.dt ||
      y.overlap - x.overlap ||
      x.versionMismatch - y.versionMismatch ||
      x.html.sourceIdx - y.html.sourceIdx ||
      x.api.sourceIdx - y.api.sourceIdx
  );

  const usedApi = new Set<StreamEvent>();
  const usedHtml = new Set<StreamEvent>();
  const pairs: MatchedPair[] = [];
  for (const c of candidates) {
    if (usedApi.has(c.api) || usedHtml.has(c.html)) continue;
    usedApi.add(c.api);
    usedHtml.add(c.html);
    pairs.push({ api: c.api, html: c.html });
  }
  return pairs;
}

function assign<K extends MergedField>(target: MergeFields, field: K, value: MergeFields[K]): void {
  target[field] = value;
}

/**
 * Merges the fields of a matched pair following MERGE_POLICY
 */
export function mergeFields(api: MergeFields, html: MergeFields): MergeFields {
  const out: MergeFields = { ...html };
  for (const field of MERGED_FIELDS) {
    const [preferred, other] = MERGE_POLICY[field] === 'api' ? [api, html] : [html, api];
    assign(out, field, isEmpty(preferred[field]) ? other[field] : preferred[field]);
  }
  return out;
}

/**
 * Merges player slots: API identities win, HTML fills unresolved API slots
 * with the same role and supplies roles the API does not name
 *
 * @returns The merged slots and whether the sources named different players
 */
export function mergePlayers(
  api: readonly EventPlayer[],
  html: readonly EventPlayer[]
): { players: EventPlayer[]; conflict: boolean } {
  if (api.length === 0) return { players: [...html], conflict: false };
  let conflict = false;
  const players = api.map((a, i) => {
    const h = html[i];
    if (!h || h.role !== a.role) return a;
    if (a.playerId === null) return h.playerId !== null ? h : a;
    if (h.playerId !== null && h.playerId !== a.playerId) conflict = true;
    return a;
  });
  const extra = html.slice(api.length).filter(h => !players.some(p => p.role === h.role));
  return { players: [...players, ...extra], conflict };
}

function sortRank(event: string): number {
  return EVENT_SORT_ORDER[event] ?? DEFAULT_EVENT_SORT;
}

interface Draft {
  fields: MergeFields;
  players: EventPlayer[];
  sources: Side[];
  apiEventIdx: number | null;
  htmlEventIdx: number | null;
  flags: Set<ProvenanceFlag>;
  anomaly: boolean;
}

function fromSingle(e: StreamEvent): Draft {
  const flags = new Set<ProvenanceFlag>();
  if (e.corrected) flags.add('corrected');
  if (e.unresolved) flags.add('identity-unresolved');
  if (e.anomaly) flags.add('uncorrected-anomaly');
  return {
    fields: e.fields,
    players: e.players,
    sources: [e.source],
    apiEventIdx: e.source === 'api' ? e.sourceIdx : null,
    htmlEventIdx: e.source === 'html' ? e.sourceIdx : null,
    flags,
    anomaly: e.anomaly,
  };
}

/**
 * Canonical order: period, anomalies last, second, event-type rank, source index.
 * Regular-season shootout attempts keep source order.
 *
 * An uncorrected anomaly keeps its own clock value, so seconds are
 * non-decreasing only across the events without that flag.
 */
function compareDrafts(gameId: GameId) {
  return (a: Draft, b: Draft): number => {
    const byPeriod = a.fields.period - b.fields.period;
    if (byPeriod !== 0) return byPeriod;
    const index = (d: Draft) => d.htmlEventIdx ?? d.apiEventIdx ?? 0;
    if (isShootout(a.fields.period, gameId.session)) return index(a) - index(b);
    return (
      Number(a.anomaly) - Number(b.anomaly) ||
      (a.fields.periodSeconds ?? 0) - (b.fields.periodSeconds ?? 0) ||
      sortRank(a.fields.event) - sortRank(b.fields.event) ||
      index(a) - index(b) ||
      (a.sources[0] === b.sources[0] ? 0 : a.sources[0] === 'html' ? -1 : 1)
    );
  };
}

/**
 * Reconciles both event streams of one game
 *
 * @param api - API event records, or null when the source is unavailable
 * @param html - HTML event records, or null when the source is unavailable
 */
export function reconcileEvents(
  gameId: GameId,
  api: readonly ApiEventRecord[] | null,
  html: readonly HtmlEventRecord[] | null,
  roster: RosterIndex,
  corrections: CorrectionTable,
  options: MatchOptions = cfg.reconcile
): EventReconciliation {
  const resolver = new Resolver(gameId.id, roster);
  const apiEvents = apiStream(gameId, api ?? [], corrections, resolver);
  const htmlEvents = htmlStream(gameId, html ?? [], corrections, resolver);
  assignVersions(apiEvents);
  assignVersions(htmlEvents);

  const diagnostics: Diagnostic[] = [...resolver.diagnostics];
  const pairs = matchEvents(apiEvents, htmlEvents, options);
  const matched = new Set<StreamEvent>(pairs.flatMap(p => [p.api, p.html]));

  const drafts: Draft[] = pairs.map(({ api: a, html: h }): Draft => {
    const { players, conflict } = mergePlayers(a.players, h.players);
    const flags = new Set<ProvenanceFlag>();
    if (a.corrected || h.corrected) flags.add('corrected');
    if (players.some(p => p.playerId === null) || (a.fields.oppGoalie?.playerId === null)) flags.add('identity-unresolved');
    if (conflict) {
      flags.add('player-conflict');
      diagnostics.push(
        raiseDiagnostic('PlayerConflict', gameId.id, `sources name different players for event ${h.sourceIdx}`, {
          apiEventIdx: a.sourceIdx,
          htmlEventIdx: h.sourceIdx,
          event: h.fields.event,
        })
      );
    }
    return {
      fields: mergeFields(a.fields, h.fields),
      players,
      sources: ['api', 'html'],
      apiEventIdx: a.sourceIdx,
      htmlEventIdx: h.sourceIdx,
      flags,
      anomaly: false,
    };
  });

  for (const e of [...htmlEvents, ...apiEvents]) {
    if (matched.has(e)) continue;
    const draft = fromSingle(e);
    if (draft.anomaly) {
      diagnostics.push(
        raiseDiagnostic(
          'UncorrectedAnomaly',
          gameId.id,
          `event ${e.sourceIdx} has no consistent timestamp`,
          { eventIdx: e.sourceIdx, period: e.fields.period, periodSeconds: e.fields.periodSeconds },
          e.source === 'api' ? 'api_events' : 'html_events'
        )
      );
    }
    drafts.push(draft);
  }

  drafts.sort(compareDrafts(gameId));

  const events = drafts.map((d, i): CanonicalEvent => ({
    gameId: gameId.id,
    eventIdx: i + 1,
    ...d.fields,
    players: d.players,
    provenance: {
      sources: d.sources,
      apiEventIdx: d.apiEventIdx,
      htmlEventIdx: d.htmlEventIdx,
      flags: [...d.flags].sort(),
    },
  }));

  return { events, diagnostics };
}
