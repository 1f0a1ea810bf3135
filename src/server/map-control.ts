/**
 * MapControlContext - the application context behind the map-control UI
 *
 * Owns the server registry, the optional CRCON HTTP client and the map
 * catalog. Construct one per process; nothing here is module-global.
 */

import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';
import { ConfigurationError, CrconHttpError } from '../shared/rcon-errors';
import { loadServerEndpoints } from '../shared/server-config';
import { isJsonObject } from '../shared/types';
import type { JsonObject, MapChangeReport, ServerEndpoint, ServerStatus, ServerSummary } from '../shared/types';
import { CrconHttpClient } from './crcon-http';
import { summarizeGamestate } from './game-status';
import { MapCatalogOptions, MapCatalogService } from './map-catalog';
import { ServerRegistry, ServerRegistryOptions } from './server-registry';
import { HealthCheckResult, ServiceRegistry } from './service-registry';

const logger = createLogger('MapControl');

type Env = Record<string, string | undefined>;

export interface MapControlOptions {
  endpoints: readonly ServerEndpoint[];
  http?: CrconHttpClient | null;
  registry?: ServerRegistryOptions;
  /** The catalog's source defaults to the HTTP client */
  catalog?: MapCatalogOptions;
}

export class MapControlContext {
  readonly servers: ServerRegistry;
  readonly catalog: MapCatalogService;
  readonly http: CrconHttpClient | null;

  private readonly services = new ServiceRegistry();

  constructor(options: MapControlOptions) {
    this.http = options.http ?? null;
    this.servers = new ServerRegistry(options.endpoints, options.registry);
    this.catalog = new MapCatalogService({ source: this.http, ...options.catalog });

    this.services.register(this.servers);
    this.services.register(this.catalog);
  }

  /**
   * Build a context from environment variables. HTTP access is optional.
   */
  static fromEnv(env: Env = process.env): MapControlContext {
    const endpoints = loadServerEndpoints(env);

    let http: CrconHttpClient | null = null;
    try {
      http = CrconHttpClient.fromEnv(env);
    } catch (err: unknown) {
      if (!(err instanceof CrconHttpError)) {
        throw err;
      }
      logger.info(`CRCON HTTP API disabled: ${err.message}`);
    }

    return new MapControlContext({ endpoints, http });
  }

  async initialize(): Promise<void> {
    await this.services.initialize();
  }

  async shutdown(): Promise<void> {
    await this.services.shutdown();
  }

  healthCheck(): HealthCheckResult {
    return this.services.healthCheck();
  }

  listServers(): ServerSummary[] {
    return this.servers.listServers();
  }

  getServerName(index: number): string {
    return this.servers.getServerName(index);
  }

  currentMap(index: number): Promise<string> {
    return this.servers.currentMap(index);
  }

  /**
   * Change map over HTTP when configured, falling back to RCON.
   * Every attempt adds one line to `steps`.
   */
  async changeMap(index: number, mapId: string): Promise<MapChangeReport> {
    const steps: string[] = [];
    let success = false;

    if (this.http) {
      try {
        await this.http.setMap(mapId);
        steps.push('HTTP API change_map succeeded.');
        success = true;
      } catch (err: unknown) {
        if (!(err instanceof CrconHttpError)) {
          throw err;
        }
        steps.push(`HTTP API change_map failed: ${err.message}`);
      }
    } else {
      steps.push('HTTP API not configured; skipping.');
    }

    if (!success) {
      const result = await this.servers.changeMap(index, mapId);
      if (result.success) {
        steps.push('RCON fallback succeeded.');
        success = true;
      } else {
        steps.push(`RCON fallback failed: ${result.message}`);
      }
    } else {
      steps.push('RCON fallback not required.');
    }

    logger.info(`Map change to ${mapId} on ${this.getServerName(index)}`, { success, steps });
    return { success, steps };
  }

  /**
   * Live game state over HTTP. Never throws for an unreachable or
   * unconfigured API; the reason comes back as `error`.
   */
  async serverStatus(): Promise<ServerStatus> {
    if (!this.http) {
      return { available: false, error: 'HTTP API not configured.' };
    }

    let payload: JsonObject;
    try {
      payload = await this.http.getGamestate();
    } catch (err: unknown) {
      if (!(err instanceof CrconHttpError)) {
        throw err;
      }
      logger.warn(`Failed to read game state: ${err.message}`);
      return { available: false, error: err.message };
    }

    const { result } = payload;
    if (!isJsonObject(result)) {
      return { available: false, error: 'get_gamestate returned no game state.' };
    }
    return { available: true, status: summarizeGamestate(result) };
  }

  async getObjectiveRows(): Promise<string[][]> {
    return this.requireHttp('objective controls').getObjectiveRows();
  }

  async setObjectives(objectives: Array<string | number>): Promise<void> {
    const http = this.requireHttp('objective controls');
    try {
      await http.setGameLayout(objectives);
    } catch (err: unknown) {
      logger.warn(`Failed to apply objective layout: ${toErrorMessage(err)}`);
      throw err;
    }
  }

  private requireHttp(feature: string): CrconHttpClient {
    if (!this.http) {
      throw new ConfigurationError(`HTTP API credentials are not configured; ${feature} are unavailable.`);
    }
    return this.http;
  }
}
