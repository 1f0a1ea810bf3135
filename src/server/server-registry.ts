/**
 * ServerRegistry - numbered RCON endpoints and the operations the UI layer calls
 *
 * Every operation opens its own session, runs one or two commands and closes
 * it. Failures never escape: they are logged with the server's identity and
 * turned into the documented degraded values.
 */

import type { ChangeMapResult, ServerEndpoint, ServerSummary } from '../shared/types';
import { SENTINELS } from '../shared/constants';
import { config } from '../shared/config';
import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';
import {
  ConfigurationError,
  RconError,
  describeErrorKind,
  isRconError,
} from '../shared/rcon-errors';
import { RconCommands, readStringField } from './rcon-commands';
import { withRconSession } from './rcon-session';
import type { Service } from './service-registry';

const logger = createLogger('ServerRegistry');

/**
 * Runs `fn` against a freshly connected, authenticated session and tears the
 * session down afterwards. Swappable for tests.
 */
export type SessionRunner = <T>(
  endpoint: ServerEndpoint,
  fn: (commands: RconCommands) => Promise<T>,
) => Promise<T>;

export interface ServerRegistryOptions {
  timeoutMs?: number;
  runner?: SessionRunner;
}

/** Result of one server operation before the degradation policy applies */
export type ServerOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: RconError }
  | { ok: false; error: Error; unexpected: true };

export function createSessionRunner(timeoutMs: number): SessionRunner {
  return (endpoint, fn) =>
    withRconSession(endpoint, { timeoutMs }, session => fn(new RconCommands(session)));
}

/**
 * Message reported for a failed operation.
 */
export function failureMessage(outcome: Extract<ServerOutcome<unknown>, { ok: false }>, action: string, serverName: string): string {
  if ('unexpected' in outcome) {
    return `Unexpected error calling ${action} on ${serverName}: ${outcome.error.message}`;
  }
  return outcome.error.message;
}

export class ServerRegistry implements Service {
  public readonly name = 'servers';

  private readonly endpoints: readonly ServerEndpoint[];
  private readonly displayNames: string[];
  private readonly runner: SessionRunner;
  /** Whether the last operation against each server completed a session */
  private readonly reachable: boolean[];

  constructor(endpoints: readonly ServerEndpoint[], options: ServerRegistryOptions = {}) {
    if (endpoints.length === 0) {
      throw new ConfigurationError(
        'No RCON servers configured. ' +
        'Provide SERVER*_HOST / SERVER*_PORT / SERVER*_PASSWORD or RCON_HOST / RCON_PORT / RCON_PASSWORD.'
      );
    }

    this.endpoints = endpoints;
    this.displayNames = endpoints.map(endpoint => endpoint.name);
    this.runner = options.runner ?? createSessionRunner(options.timeoutMs ?? config.rcon.timeoutMs);
    this.reachable = endpoints.map(() => false);
  }

  /**
   * Fetch every server's display name once. One server failing does not
   * affect the others.
   */
  async initialize(): Promise<void> {
    for (let index = 0; index < this.endpoints.length; index++) {
      const outcome = await this.attempt(index, async commands => {
        const session = await commands.serverInformation('session');
        return readStringField(session, 'ServerName');
      });

      if (outcome.ok) {
        if (outcome.value) {
          this.displayNames[index] = outcome.value;
        }
      } else {
        const { host, port } = this.endpoints[index];
        logger.warn(`Failed to fetch server name for ${host}:${port}`, {
          kind: this.kindOf(outcome),
          error: outcome.error.message,
        });
      }
    }
  }

  listServers(): ServerSummary[] {
    return this.displayNames.map((name, index) => ({ index, name }));
  }

  getServerName(index: number): string {
    return this.isValidIndex(index) ? this.displayNames[index] : SENTINELS.UNKNOWN_SERVER;
  }

  get size(): number {
    return this.endpoints.length;
  }

  /**
   * Current map of server `index`, or "Unknown" when it cannot be read.
   */
  async currentMap(index: number): Promise<string> {
    if (!this.isValidIndex(index)) {
      return SENTINELS.UNKNOWN_MAP;
    }

    const outcome = await this.attempt(index, async commands => {
      const session = await commands.serverInformation('session');
      return readStringField(session, 'MapName');
    });

    if (!outcome.ok) {
      logger.warn(`Failed to get current map for ${this.getServerName(index)}`, {
        kind: this.kindOf(outcome),
        error: outcome.error.message,
      });
      return SENTINELS.UNKNOWN_MAP;
    }

    return outcome.value || SENTINELS.UNKNOWN_MAP;
  }

  /**
   * Issue ChangeMap, then name the new map with a best-effort session query
   * on the same connection.
   */
  async changeMap(index: number, mapId: string): Promise<ChangeMapResult> {
    if (!this.isValidIndex(index)) {
      return { success: false, message: SENTINELS.INVALID_SERVER_INDEX };
    }

    const serverName = this.getServerName(index);
    const outcome = await this.attempt(index, async commands => {
      await commands.changeMap(mapId);

      try {
        const session = await commands.serverInformation('session');
        return readStringField(session, 'MapName');
      } catch (err: unknown) {
        // The map is reloading; the change itself already succeeded
        if (isRconError(err)) {
          logger.debug(`Post-change session query failed on ${serverName}`, err);
          return '';
        }
        throw err;
      }
    });

    if (!outcome.ok) {
      logger.warn(`ChangeMap to ${mapId} failed on ${serverName}`, {
        kind: this.kindOf(outcome),
        error: outcome.error.message,
      });
      return { success: false, message: failureMessage(outcome, 'ChangeMap', serverName) };
    }

    const prettyMap = outcome.value || mapId;
    logger.info(`ChangeMap issued on ${serverName}`, { mapId, newMap: prettyMap });
    return {
      success: true,
      message: `Successfully issued ChangeMap to ${prettyMap} on ${serverName}`,
    };
  }

  /**
   * Healthy while at least one server answered its most recent operation.
   * A rejected command still counts as an answer.
   */
  isHealthy(): boolean {
    return this.reachable.some(Boolean);
  }

  getStats(): { servers: number; reachable: number } {
    return {
      servers: this.endpoints.length,
      reachable: this.reachable.filter(Boolean).length,
    };
  }

  private async attempt<T>(
    index: number,
    fn: (commands: RconCommands) => Promise<T>,
  ): Promise<ServerOutcome<T>> {
    try {
      const value = await this.runner(this.endpoints[index], fn);
      this.reachable[index] = true;
      return { ok: true, value };
    } catch (err: unknown) {
      if (isRconError(err)) {
        this.reachable[index] = err.kind === 'command';
        return { ok: false, error: err };
      }
      this.reachable[index] = false;
      const error = err instanceof Error ? err : new Error(toErrorMessage(err));
      return { ok: false, error, unexpected: true };
    }
  }

  private kindOf(outcome: Extract<ServerOutcome<unknown>, { ok: false }>): string {
    return 'unexpected' in outcome ? 'unexpected' : describeErrorKind(outcome.error.kind);
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.endpoints.length;
  }
}
