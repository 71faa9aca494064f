/**
 * Application Constants
 *
 * Centralized location for all magic numbers and fixed domain tables.
 */

/**
 * Game clock values (in seconds)
 */
export const GAME_CLOCK = {
  /** Length of a regulation period, and of a playoff overtime period */
  PERIOD_SECONDS: 1200,

  /** Length of a regular-season overtime period */
  REGULAR_OT_SECONDS: 300,

  /** Game-seconds value assigned to every regular-season shootout event */
  SHOOTOUT_GAME_SECONDS: 3900,

  /** Period number used for the regular-season shootout */
  SHOOTOUT_PERIOD: 5,
} as const;

/**
 * Tie-break rank for events sharing a period and second
 *
 * Play and stoppages come first, then the penalties they draw, then the
 * faceoff that restarts play and the period and game ends.
 */
export const EVENT_SORT_ORDER: Readonly<Record<string, number>> = {
  PGSTR: 1,
  PGEND: 2,
  ANTHEM: 3,
  EGT: 3,
  CHL: 3,
  DELPEN: 3,
  BLOCK: 3,
  GIVE: 3,
  HIT: 3,
  MISS: 3,
  SHOT: 3,
  TAKE: 3,
  GOAL: 5,
  STOP: 6,
  PENL: 7,
  PBOX: 7,
  PSTR: 7,
  EISTR: 9,
  EIEND: 10,
  FAC: 12,
  PEND: 13,
  SOC: 14,
  GEND: 15,
  GOFF: 16,
};

/** Rank used for event codes missing from EVENT_SORT_ORDER */
export const DEFAULT_EVENT_SORT = 11;

/**
 * Events that see the on-ice state after changes at the same second
 * (line-up for a faceoff, not the players who just came off)
 */
export const AFTER_CHANGE_EVENTS: ReadonlySet<string> = new Set([
  'PGSTR',
  'PGEND',
  'ANTHEM',
  'PSTR',
  'FAC',
  'EISTR',
  'EIEND',
]);

/** Shot attempts that receive a predicted-goal value */
export const SCORED_EVENTS: ReadonlySet<string> = new Set(['GOAL', 'SHOT', 'MISS']);

/** Player slots used by sentinel identities rather than roster players */
export const SENTINEL_PLAYERS = ['BENCH', 'REFEREE', 'TEAMMATE'] as const;

/**
 * Rink geometry (feet, centre ice at the origin)
 */
export const RINK = {
  /** x coordinate of each goal line */
  GOAL_LINE_X: 89,

  /** x coordinate of each blue line */
  BLUE_LINE_X: 25,

  /** Defensive-zone shots closer than this are recoded as offensive */
  DEF_ZONE_SHOT_MAX_FT: 64,

  /** Reported distances beyond this are treated as measured from the far net */
  LONG_SHOT_FT: 89,

  /** Slot rectangle in front of the net */
  HIGH_DANGER: [[69, -9], [89, -9], [89, 9], [69, 9]],

  /** Wider home-plate area around the slot */
  DANGER: [
    [89, 9], [89, -9], [69, -22], [54, -22], [54, -9],
    [44, -9], [44, 9], [54, 9], [54, 22], [69, 22],
  ],
} as const;

/** Shot types whose reported distance is kept even when it exceeds LONG_SHOT_FT */
export const CLOSE_RANGE_SHOT_TYPES: ReadonlySet<string> = new Set([
  'TIP-IN',
  'WRAP-AROUND',
  'WRAP',
  'DEFLECTED',
  'BAT',
  'BETWEEN LEGS',
  'POKE',
]);

/**
 * HTTP statuses below 500 worth retrying (0 = network error / timeout);
 * every 5xx status is retried as well
 */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([0, 408, 429]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || (status >= 500 && status < 600);
}

/** Statuses meaning the source has no document for this game */
export const ABSENT_STATUSES: ReadonlySet<number> = new Set([404, 410]);

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for service health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for health checks (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;
