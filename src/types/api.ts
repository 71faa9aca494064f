/**
 * Game-Center API Type Definitions
 *
 * zod schemas for the parts of the structured API the normalizers read.
 * Unknown fields pass through untouched; only what is used is declared.
 */

import { z } from 'zod';

/** Localized string, e.g. { default: 'Oilers', fr: 'Oilers' } */
export const localizedSchema = z.object({ default: z.string() }).passthrough();

export const apiTeamSchema = z
  .object({
    id: z.number().int(),
    abbrev: z.string(),
    name: localizedSchema.optional(),
    commonName: localizedSchema.optional(),
    placeName: localizedSchema.optional(),
  })
  .passthrough();
export type ApiTeam = z.infer<typeof apiTeamSchema>;

const idField = z.number().int().nullable().optional();

export const apiPlayDetailsSchema = z
  .object({
    eventOwnerTeamId: idField,
    xCoord: z.number().nullable().optional(),
    yCoord: z.number().nullable().optional(),
    zoneCode: z.string().nullable().optional(),
    winningPlayerId: idField,
    losingPlayerId: idField,
    hittingPlayerId: idField,
    hitteePlayerId: idField,
    playerId: idField,
    shootingPlayerId: idField,
    blockingPlayerId: idField,
    scoringPlayerId: idField,
    assist1PlayerId: idField,
    assist2PlayerId: idField,
    goalieInNetId: idField,
    committedByPlayerId: idField,
    drawnByPlayerId: idField,
    servedByPlayerId: idField,
    shotType: z.string().nullable().optional(),
    reason: z.string().nullable().optional(),
    secondaryReason: z.string().nullable().optional(),
    typeCode: z.string().nullable().optional(),
    descKey: z.string().nullable().optional(),
    duration: z.number().int().nullable().optional(),
  })
  .passthrough();
export type ApiPlayDetails = z.infer<typeof apiPlayDetailsSchema>;

export const apiPlaySchema = z
  .object({
    sortOrder: z.number().int(),
    periodDescriptor: z.object({ number: z.number().int() }).passthrough().optional(),
    period: z.number().int().optional(),
    timeInPeriod: z.string(),
    typeDescKey: z.string(),
    typeCode: z.number().int().optional(),
    situationCode: z.string().nullable().optional(),
    homeTeamDefendingSide: z.string().nullable().optional(),
    details: apiPlayDetailsSchema.nullable().optional(),
  })
  .passthrough();
export type ApiPlay = z.infer<typeof apiPlaySchema>;

export const apiRosterSpotSchema = z
  .object({
    teamId: z.number().int(),
    playerId: z.number().int(),
    firstName: localizedSchema,
    lastName: localizedSchema,
    sweaterNumber: z.number().int(),
    positionCode: z.string(),
    headshot: z.string().nullable().optional(),
  })
  .passthrough();
export type ApiRosterSpot = z.infer<typeof apiRosterSpotSchema>;

/**
 * /gamecenter/{id}/play-by-play
 */
export const playByPlayResponseSchema = z
  .object({
    id: z.number().int(),
    homeTeam: apiTeamSchema,
    awayTeam: apiTeamSchema,
    plays: z.array(apiPlaySchema),
    rosterSpots: z.array(apiRosterSpotSchema),
  })
  .passthrough();
export type PlayByPlayResponse = z.infer<typeof playByPlayResponseSchema>;

/**
 * /gamecenter/{id}/landing
 */
export const landingResponseSchema = z
  .object({
    id: z.number().int(),
    season: z.number().int().optional(),
    gameType: z.number().int().optional(),
    gameDate: z.string().optional(),
    startTimeUTC: z.string().optional(),
    venue: localizedSchema.optional(),
    gameState: z.string().optional(),
    homeTeam: apiTeamSchema,
    awayTeam: apiTeamSchema,
  })
  .passthrough();
export type LandingResponse = z.infer<typeof landingResponseSchema>;
