/**
 * NHL Endpoint Module
 * 
 * Constructs URLs for the two endpoint families each game is read from:
 * the game-center JSON API and the legacy HTML game reports.
 */

import { cfg } from '../core/config.js';
import type { SourceKind } from '../models/records.js';
import type { GameId } from '../util/gameId.js';
import { isValidUrl, ValidationError } from '../util/validation.js';

export interface EndpointBases {
  apiBaseUrl: string;
  htmlBaseUrl: string;
}

/**
 * Validates and strips a trailing slash from a configured base URL
 * 
 * @throws ValidationError if the URL is invalid
 */
function base(url: string, field: string): string {
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid base URL: ${url}`, field);
  }
  return url.replace(/\/+$/, '');
}

/**
 * Constructs URL for the play-by-play document (events and roster spots)
 * 
 * Endpoint: /gamecenter/{gameId}/play-by-play
 * 
 * @example
 * playByPlayUrl(parseGameId('2023020001'))
 * // Returns: https://api-web.nhle.com/v1/gamecenter/2023020001/play-by-play
 */
export function playByPlayUrl(gameId: GameId, bases: EndpointBases = cfg.nhl): string {
  return `${base(bases.apiBaseUrl, 'apiBaseUrl')}/gamecenter/${gameId.id}/play-by-play`;
}

/**
 * Constructs URL for the landing document (teams, venue, start time)
 * 
 * Endpoint: /gamecenter/{gameId}/landing
 */
export function landingUrl(gameId: GameId, bases: EndpointBases = cfg.nhl): string {
  return `${base(bases.apiBaseUrl, 'apiBaseUrl')}/gamecenter/${gameId.id}/landing`;
}

/**
 * Constructs URL for one HTML game report
 * 
 * Endpoint: /{season}/{prefix}{htmlId}.HTM
 * 
 * @param prefix - PL (play-by-play), RO (rosters), TH / TV (home / away time on ice)
 * 
 * @example
 * htmlReportUrl(parseGameId('2023020001'), 'PL')
 * // Returns: https://www.nhl.com/scores/htmlreports/20232024/PL020001.HTM
 */
export function htmlReportUrl(
  gameId: GameId,
  prefix: 'PL' | 'RO' | 'TH' | 'TV',
  bases: EndpointBases = cfg.nhl
): string {
  return `${base(bases.htmlBaseUrl, 'htmlBaseUrl')}/${gameId.season}/${prefix}${gameId.htmlId}.HTM`;
}

/**
 * Document URLs of a source, with the venue of each shift report
 */
export function sourceUrls(
  kind: SourceKind,
  gameId: GameId,
  bases: EndpointBases = cfg.nhl
): { url: string; venue: 'HOME' | 'AWAY' | null }[] {
  switch (kind) {
    case 'api_events':
    case 'api_rosters':
      return [{ url: playByPlayUrl(gameId, bases), venue: null }];
    case 'api_game_info':
      return [{ url: landingUrl(gameId, bases), venue: null }];
    case 'html_events':
      return [{ url: htmlReportUrl(gameId, 'PL', bases), venue: null }];
    case 'html_rosters':
      return [{ url: htmlReportUrl(gameId, 'RO', bases), venue: null }];
    case 'html_shifts':
      return [
        { url: htmlReportUrl(gameId, 'TH', bases), venue: 'HOME' },
        { url: htmlReportUrl(gameId, 'TV', bases), venue: 'AWAY' },
      ];
  }
}
