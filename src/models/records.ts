/**
 * Record Models
 *
 * zod schemas for every artifact the pipeline produces. Types are inferred
 * from the schemas so that artifacts read back from a durable cache are
 * validated with the same definitions the stages write with.
 */

import { z } from 'zod';
import { SENTINEL_PLAYERS } from '../core/constants.js';

export const SOURCE_KINDS = [
  'api_events',
  'api_rosters',
  'api_game_info',
  'html_events',
  'html_rosters',
  'html_shifts',
] as const;

export const sourceKindSchema = z.enum(SOURCE_KINDS);
export type SourceKind = z.infer<typeof sourceKindSchema>;

export const sessionSchema = z.enum(['PR', 'R', 'P', 'AS']);
export const venueSchema = z.enum(['HOME', 'AWAY']);
export type Venue = z.infer<typeof venueSchema>;

export const sentinelSchema = z.enum(SENTINEL_PLAYERS);
export type Sentinel = z.infer<typeof sentinelSchema>;

// Raw sources

export const rawDocumentSchema = z.object({
  url: z.string(),
  /** Set for the two shift reports */
  venue: venueSchema.nullable(),
  text: z.string(),
});
export type RawDocument = z.infer<typeof rawDocumentSchema>;

/**
 * Unparsed payload of one source. JSON bodies are kept as text so that the
 * normalizer owns all structural checks.
 */
export const rawSourceSchema = z.object({
  kind: sourceKindSchema,
  gameId: z.string(),
  fetchedAt: z.string(),
  documents: z.array(rawDocumentSchema).min(1),
});
export type RawSource = z.infer<typeof rawSourceSchema>;

// Source-scoped records

export const teamInfoSchema = z.object({
  id: z.number().int(),
  abbrev: z.string(),
  name: z.string(),
});
export type TeamInfo = z.infer<typeof teamInfoSchema>;

export const gameInfoSchema = z.object({
  gameId: z.string(),
  season: z.number().int(),
  session: sessionSchema,
  gameDate: z.string().nullable(),
  startTimeUtc: z.string().nullable(),
  venue: z.string().nullable(),
  gameState: z.string().nullable(),
  home: teamInfoSchema,
  away: teamInfoSchema,
});
export type GameInfo = z.infer<typeof gameInfoSchema>;

export const apiRosterRecordSchema = z.object({
  gameId: z.string(),
  team: z.string(),
  teamVenue: venueSchema,
  playerName: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  apiId: z.number().int(),
  playerKey: z.string(),
  jersey: z.number().int(),
  teamJersey: z.string(),
  position: z.string(),
  headshotUrl: z.string().nullable(),
});
export type ApiRosterRecord = z.infer<typeof apiRosterRecordSchema>;

export const rosterStatusSchema = z.enum(['ACTIVE', 'SCRATCH']);
export type RosterStatus = z.infer<typeof rosterStatusSchema>;

export const htmlRosterRecordSchema = z.object({
  gameId: z.string(),
  team: z.string(),
  teamName: z.string(),
  teamVenue: venueSchema,
  playerName: z.string(),
  playerKey: z.string(),
  jersey: z.number().int(),
  teamJersey: z.string(),
  position: z.string().nullable(),
  starter: z.boolean(),
  status: rosterStatusSchema,
});
export type HtmlRosterRecord = z.infer<typeof htmlRosterRecordSchema>;

export const apiPlayerSlotSchema = z.object({
  apiId: z.number().int().nullable(),
  sentinel: sentinelSchema.nullable(),
  role: z.string(),
});
export type ApiPlayerSlot = z.infer<typeof apiPlayerSlotSchema>;

export const apiEventRecordSchema = z.object({
  gameId: z.string(),
  eventIdx: z.number().int(),
  period: z.number().int(),
  timeText: z.string(),
  periodSeconds: z.number().int().nullable(),
  gameSeconds: z.number().int().nullable(),
  event: z.string(),
  eventTeam: z.string().nullable(),
  coordsX: z.number().nullable(),
  coordsY: z.number().nullable(),
  zone: z.string().nullable(),
  player1: apiPlayerSlotSchema.nullable(),
  player2: apiPlayerSlotSchema.nullable(),
  player3: apiPlayerSlotSchema.nullable(),
  oppGoalieApiId: z.number().int().nullable(),
  emptyNet: z.boolean(),
  shotType: z.string().nullable(),
  missReason: z.string().nullable(),
  penaltyCode: z.string().nullable(),
  penaltyReason: z.string().nullable(),
  penaltyLength: z.number().int().nullable(),
  stoppageReason: z.string().nullable(),
  stoppageReasonSecondary: z.string().nullable(),
  situationCode: z.string().nullable(),
  homeTeamDefendingSide: z.string().nullable(),
});
export type ApiEventRecord = z.infer<typeof apiEventRecordSchema>;

export const htmlPlayerRefSchema = z.object({
  team: z.string().nullable(),
  jersey: z.number().int().nullable(),
  lastName: z.string().nullable(),
  sentinel: sentinelSchema.nullable(),
  role: z.string(),
});
export type HtmlPlayerRef = z.infer<typeof htmlPlayerRefSchema>;

export const htmlEventRecordSchema = z.object({
  gameId: z.string(),
  eventIdx: z.number().int(),
  period: z.number().int(),
  timeText: z.string(),
  periodSeconds: z.number().int().nullable(),
  gameSeconds: z.number().int().nullable(),
  event: z.string(),
  strength: z.string().nullable(),
  description: z.string(),
  eventTeam: z.string().nullable(),
  player1: htmlPlayerRefSchema.nullable(),
  player2: htmlPlayerRefSchema.nullable(),
  player3: htmlPlayerRefSchema.nullable(),
  zone: z.string().nullable(),
  shotType: z.string().nullable(),
  pbpDistance: z.number().int().nullable(),
  penalty: z.string().nullable(),
  penaltyLength: z.number().int().nullable(),
  repairs: z.array(z.string()),
});
export type HtmlEventRecord = z.infer<typeof htmlEventRecordSchema>;

export const shiftRecordSchema = z.object({
  gameId: z.string(),
  team: z.string(),
  teamName: z.string(),
  teamVenue: venueSchema,
  playerName: z.string(),
  jersey: z.number().int(),
  teamJersey: z.string(),
  period: z.number().int(),
  shiftCount: z.number().int(),
  startSeconds: z.number().int(),
  endSeconds: z.number().int(),
  durationSeconds: z.number().int(),
  repairs: z.array(z.string()),
});
export type ShiftRecord = z.infer<typeof shiftRecordSchema>;

// Reconciled artifacts

export const rosterEntrySchema = z.object({
  gameId: z.string(),
  playerId: z.string(),
  apiId: z.number().int().nullable(),
  playerName: z.string(),
  team: z.string(),
  teamVenue: venueSchema,
  jersey: z.number().int(),
  teamJersey: z.string(),
  position: z.string().nullable(),
  status: rosterStatusSchema,
  starter: z.boolean(),
  headshotUrl: z.string().nullable(),
  sources: z.array(z.enum(['api', 'html'])),
});
export type RosterEntry = z.infer<typeof rosterEntrySchema>;

export const shiftChangeSchema = z.object({
  gameId: z.string(),
  period: z.number().int(),
  periodSeconds: z.number().int(),
  gameSeconds: z.number().int(),
  playerId: z.string(),
  teamJersey: z.string(),
  team: z.string(),
  teamVenue: venueSchema,
  position: z.string().nullable(),
  direction: z.enum(['ON', 'OFF']),
});
export type ShiftChange = z.infer<typeof shiftChangeSchema>;

export const eventPlayerSchema = z.object({
  /** Roster identity, a sentinel, or null when unresolved */
  playerId: z.string().nullable(),
  apiId: z.number().int().nullable(),
  name: z.string().nullable(),
  teamJersey: z.string().nullable(),
  position: z.string().nullable(),
  role: z.string(),
});
export type EventPlayer = z.infer<typeof eventPlayerSchema>;

export const provenanceFlagSchema = z.enum([
  'corrected',
  'uncorrected-anomaly',
  'identity-unresolved',
  'player-conflict',
]);
export type ProvenanceFlag = z.infer<typeof provenanceFlagSchema>;

export const canonicalEventSchema = z.object({
  gameId: z.string(),
  eventIdx: z.number().int(),
  period: z.number().int(),
  periodSeconds: z.number().int().nullable(),
  gameSeconds: z.number().int().nullable(),
  event: z.string(),
  eventTeam: z.string().nullable(),
  description: z.string().nullable(),
  strength: z.string().nullable(),
  zone: z.string().nullable(),
  coordsX: z.number().nullable(),
  coordsY: z.number().nullable(),
  shotType: z.string().nullable(),
  missReason: z.string().nullable(),
  penalty: z.string().nullable(),
  penaltyLength: z.number().int().nullable(),
  stoppageReason: z.string().nullable(),
  pbpDistance: z.number().int().nullable(),
  situationCode: z.string().nullable(),
  homeTeamDefendingSide: z.string().nullable(),
  players: z.array(eventPlayerSchema),
  oppGoalie: eventPlayerSchema.nullable(),
  emptyNet: z.boolean(),
  provenance: z.object({
    sources: z.array(z.enum(['api', 'html'])),
    apiEventIdx: z.number().int().nullable(),
    htmlEventIdx: z.number().int().nullable(),
    flags: z.array(provenanceFlagSchema),
  }),
});
export type CanonicalEvent = z.infer<typeof canonicalEventSchema>;

export const onIcePlayerSchema = z.object({
  playerId: z.string(),
  teamJersey: z.string(),
  position: z.string().nullable(),
});
export type OnIcePlayer = z.infer<typeof onIcePlayerSchema>;

export const teamOnIceSchema = z.object({
  forwards: z.array(onIcePlayerSchema),
  defense: z.array(onIcePlayerSchema),
  goalies: z.array(onIcePlayerSchema),
  skaters: z.number().int(),
  goalie: z.boolean(),
});
export type TeamOnIce = z.infer<typeof teamOnIceSchema>;

export const enrichedEventSchema = canonicalEventSchema.extend({
  season: z.number().int(),
  session: sessionSchema,
  gameDate: z.string().nullable(),
  homeTeam: z.string(),
  awayTeam: z.string(),
  oppTeam: z.string().nullable(),
  eventTeamVenue: venueSchema.nullable(),
  homeOnIce: teamOnIceSchema,
  awayOnIce: teamOnIceSchema,
  strengthState: z.string(),
  oppStrengthState: z.string(),
  homeScore: z.number().int(),
  awayScore: z.number().int(),
  scoreState: z.string(),
  oppScoreState: z.string(),
  scoreDiff: z.number().int(),
  normX: z.number().nullable(),
  normY: z.number().nullable(),
  eventZone: z.string().nullable(),
  eventDistance: z.number().nullable(),
  eventAngle: z.number().nullable(),
  danger: z.boolean(),
  highDanger: z.boolean(),
  eventLength: z.number().int(),
  predGoal: z.number().optional(),
});
export type EnrichedEvent = z.infer<typeof enrichedEventSchema>;

// Diagnostics and results

export const diagnosticKindSchema = z.enum([
  'SourceUnavailable',
  'ParseDefect',
  'IdentityUnresolved',
  'UncorrectedAnomaly',
  'OnIceCardinality',
  'RosterCollision',
  'PlayerConflict',
  'ScoreRejected',
]);
export type DiagnosticKind = z.infer<typeof diagnosticKindSchema>;

export const diagnosticSchema = z.object({
  kind: diagnosticKindSchema,
  gameId: z.string(),
  source: sourceKindSchema.nullable(),
  message: z.string(),
  detail: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});
export type Diagnostic = z.infer<typeof diagnosticSchema>;

export type GameResult =
  | { status: 'ok'; gameId: string; events: EnrichedEvent[]; diagnostics: Diagnostic[] }
  | { status: 'failed'; gameId: string; reason: { code: string; message: string; source?: SourceKind } }
  | { status: 'cancelled'; gameId: string };
