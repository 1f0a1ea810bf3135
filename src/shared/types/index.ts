/**
 * Types Index - Barrel Export
 */

// Protocol types (RCON constants and primitives)
export {
  RCON_CONSTANTS,
  RCON_COMMANDS,
  SessionPhase,
  SESSION_TRANSITIONS,
  isJsonObject,
} from './protocol-types';

export type {
  JsonValue,
  JsonObject,
  RconContent,
  RconFrame,
  RconRequestEnvelope,
  RconResponse,
} from './protocol-types';

// Domain types
export type {
  ServerEndpoint,
  ServerSummary,
  ChangeMapResult,
  GameStatus,
  ServerStatus,
  GameMode,
  MapVariant,
  MapCatalogData,
  MapChangeReport,
} from './domain-types';
