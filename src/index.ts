/**
 * Hell Let Loose map control core
 *
 * RCON v2 transport, the CRCON HTTP client, the map catalog and the context
 * that ties them together for a UI layer.
 */

// Application context
export { MapControlContext } from './server/map-control';
export type { MapControlOptions } from './server/map-control';

// Servers
export { ServerRegistry, createSessionRunner, failureMessage } from './server/server-registry';
export type { SessionRunner, ServerRegistryOptions, ServerOutcome } from './server/server-registry';
export { loadServerEndpoints, parsePort } from './shared/server-config';

// RCON transport
export { RconSession, withRconSession, decodeXorKey } from './server/rcon-session';
export type { RconSessionOptions } from './server/rcon-session';
export { RconCommands, readStringField } from './server/rcon-commands';
export type { RconCommandChannel } from './server/rcon-commands';
export {
  RconFramer,
  decodeContentBody,
  decodeFrame,
  decodeResponse,
  encodeEnvelope,
  encodeFrame,
  nextMessageId,
  xorTransform,
} from './server/rcon';

// CRCON HTTP API and map catalog
export { CrconCredentials, CrconHttpClient } from './server/crcon-http';
export type { MapListSource } from './server/crcon-http';
export { MapCatalogService, buildCatalog, variantLabel } from './server/map-catalog';
export type { MapCatalogOptions } from './server/map-catalog';
export { formatTimeRemaining, summarizeGamestate } from './server/game-status';

// Lifecycle
export { ServiceRegistry } from './server/service-registry';
export type { Service, HealthCheckResult } from './server/service-registry';

// Errors
export {
  RconError,
  ConnectionError,
  IOError,
  ConnectionClosedError,
  ProtocolError,
  CommandError,
  ConfigurationError,
  CrconHttpError,
  isRconError,
  describeErrorKind,
} from './shared/rcon-errors';
export type { RconErrorKind } from './shared/rcon-errors';

// Types and shared helpers
export * from './shared/types';
export { config } from './shared/config';
export type { Config } from './shared/config';
export { createLogger, Logger, LogLevel } from './shared/logger';
