/**
 * Game status - the live overview shown next to the server list
 *
 * Reads the `result` section of CRCON's get_gamestate.
 */

import { SENTINELS } from '../shared/constants';
import { isJsonObject, JsonObject, JsonValue } from '../shared/types';
import type { GameStatus } from '../shared/types';

const WHOLE_SECONDS = /^\s*[+-]?\d+\s*$/;

function toWholeSeconds(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && WHOLE_SECONDS.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

function twoDigits(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * `h:mm:ss` from one hour up, `m:ss` below, `0:00` once time has run out.
 * Without a usable number of seconds the server's own text is shown.
 */
export function formatTimeRemaining(timeRemaining: JsonValue | undefined, rawTime?: JsonValue): string {
  const seconds = toWholeSeconds(timeRemaining);
  if (seconds === null) {
    return typeof rawTime === 'string' && rawTime ? rawTime : SENTINELS.UNKNOWN_TIME;
  }

  if (seconds <= 0) {
    return '0:00';
  }

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  return hours > 0
    ? `${hours}:${twoDigits(minutes)}:${twoDigits(secs)}`
    : `${minutes}:${twoDigits(secs)}`;
}

function nonEmptyString(value: JsonValue | undefined): string | null {
  return typeof value === 'string' && value ? value : null;
}

function playerCount(value: JsonValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

export function summarizeGamestate(result: JsonObject): GameStatus {
  const currentMap: JsonObject = isJsonObject(result.current_map) ? result.current_map : {};

  return {
    map: nonEmptyString(currentMap.pretty_name) ?? nonEmptyString(currentMap.id) ?? SENTINELS.UNKNOWN_MAP,
    allied: playerCount(result.num_allied_players),
    axis: playerCount(result.num_axis_players),
    timeRemaining: formatTimeRemaining(result.time_remaining, result.raw_time_remaining),
  };
}
