/**
 * Application-wide constants
 */

import type { GameMode } from './types';

/**
 * Values returned instead of throwing when a server cannot be reached
 */
export const SENTINELS = {
  UNKNOWN_MAP: 'Unknown',
  UNKNOWN_SERVER: 'Unknown Server',
  UNKNOWN_TIME: 'Unknown',
  INVALID_SERVER_INDEX: 'Invalid server index',
} as const;

/**
 * Fallback display names when configuration gives none
 */
export const DEFAULT_SERVER_NAME = 'HLL Server';

/**
 * HTTP status codes
 */
export const HTTP_STATUS = {
  OK: 200,
  UNAUTHORIZED: 401,
} as const;

/**
 * Game modes offered by the map catalog, in menu order
 */
export const GAME_MODES: readonly GameMode[] = ['warfare', 'offensive', 'skirmish'];

/**
 * Number of objective rows in a match layout
 */
export const OBJECTIVE_ROW_COUNT = 5;
