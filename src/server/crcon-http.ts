/**
 * CRCON HTTP client
 *
 * Username/password login yields a bearer token; authenticated calls log in
 * lazily and retry once after a 401.
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { config } from '../shared/config';
import { HTTP_STATUS, OBJECTIVE_ROW_COUNT } from '../shared/constants';
import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';
import { CrconHttpError } from '../shared/rcon-errors';
import { isJsonObject, JsonObject, JsonValue } from '../shared/types';

const logger = createLogger('CrconHttp');

type Env = Record<string, string | undefined>;

export class CrconCredentials {
  constructor(
    public readonly baseUrl: string,
    public readonly username: string,
    public readonly password: string,
  ) {}

  static fromEnv(env: Env = process.env): CrconCredentials {
    const baseUrl = (env.CRCON_BASE_URL ?? '').trim();
    const username = (env.CRCON_USERNAME ?? '').trim();
    const password = env.CRCON_PASSWORD;

    if (!baseUrl) {
      throw new CrconHttpError('Environment variable CRCON_BASE_URL is required for HTTP API access.');
    }
    if (!username) {
      throw new CrconHttpError('Environment variable CRCON_USERNAME is required for HTTP API access.');
    }
    if (password === undefined) {
      throw new CrconHttpError('Environment variable CRCON_PASSWORD is required for HTTP API access.');
    }

    return new CrconCredentials(baseUrl.replace(/\/+$/, ''), username, password);
  }
}

/** Anything that can supply the raw get_maps payload */
export interface MapListSource {
  getMaps(): Promise<JsonObject>;
}

export class CrconHttpClient implements MapListSource {
  private token: string | null = null;

  constructor(
    private readonly credentials: CrconCredentials,
    private readonly timeoutMs: number = config.crcon.timeoutMs,
  ) {}

  static fromEnv(env: Env = process.env): CrconHttpClient {
    return new CrconHttpClient(CrconCredentials.fromEnv(env));
  }

  /**
   * Authenticate and store the bearer token.
   */
  async login(): Promise<string> {
    const response = await this.send('/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        username: this.credentials.username,
        password: this.credentials.password,
      }),
    });

    if (response.status !== HTTP_STATUS.OK) {
      throw new CrconHttpError(
        `Login failed with status ${response.status}: ${await response.text()}`,
        response.status,
      );
    }

    const data = await this.parseJson(response);
    const token = [data.result, data.token, data.access_token].find(
      (value): value is string => typeof value === 'string' && value.length > 0,
    );
    if (!token) {
      throw new CrconHttpError('Login response did not include a token.');
    }

    this.token = token;
    logger.debug(`Logged in to ${this.credentials.baseUrl}`);
    return token;
  }

  async getMaps(): Promise<JsonObject> {
    return this.authorized('get_maps', 'GET', '/get_maps');
  }

  /**
   * Live game state (map, scores, player counts)
   */
  async getGamestate(): Promise<JsonObject> {
    const payload = await this.authorized('get_gamestate', 'GET', '/get_gamestate');
    this.assertNotFailed('get_gamestate', payload);
    return payload;
  }

  /**
   * Objective options for the current map: 5 rows of choices.
   */
  async getObjectiveRows(): Promise<string[][]> {
    const payload = await this.authorized('get_objective_rows', 'GET', '/get_objective_rows');
    const rows = payload.result;

    if (!Array.isArray(rows) || rows.length !== OBJECTIVE_ROW_COUNT) {
      throw new CrconHttpError('Unexpected data returned from get_objective_rows.');
    }

    return rows.map(row => (Array.isArray(row) ? row.map(option => String(option)) : []));
  }

  async setMap(mapId: string): Promise<JsonObject> {
    return this.authorized('set_map', 'POST', '/set_map', { map_name: mapId });
  }

  /**
   * Apply a custom objective layout for the current match.
   */
  async setGameLayout(objectives: Array<string | number>, randomConstraints: number = 0): Promise<JsonObject> {
    const payload = await this.authorized('set_game_layout', 'POST', '/set_game_layout', {
      objectives,
      random_constraints: randomConstraints,
    });
    this.assertNotFailed('set_game_layout', payload);
    return payload;
  }

  private async authorized(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    body?: JsonObject,
  ): Promise<JsonObject> {
    if (!this.token) {
      await this.login();
    }

    let response = await this.send(path, this.authorizedInit(method, body));

    if (response.status === HTTP_STATUS.UNAUTHORIZED) {
      // Token expired or revoked; refresh once
      this.token = null;
      await this.login();
      response = await this.send(path, this.authorizedInit(method, body));
    }

    if (response.status !== HTTP_STATUS.OK) {
      throw new CrconHttpError(
        `${operation} failed with status ${response.status}: ${await response.text()}`,
        response.status,
      );
    }

    return this.parseJson(response);
  }

  private authorizedInit(method: 'GET' | 'POST', body?: JsonObject): RequestInit {
    if (!this.token) {
      throw new CrconHttpError('Missing bearer token; call login() first.');
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: 'application/json',
    };

    if (body === undefined) {
      return { method, headers };
    }

    headers['Content-Type'] = 'application/json';
    return { method, headers, body: JSON.stringify(body) };
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    const url = `${this.credentials.baseUrl}${path}`;
    try {
      return await fetch(url, { ...init, timeout: this.timeoutMs });
    } catch (err: unknown) {
      throw new CrconHttpError(`Request to ${url} failed: ${toErrorMessage(err)}`);
    }
  }

  private async parseJson(response: Response): Promise<JsonObject> {
    const text = await response.text();
    let data: JsonValue;
    try {
      data = JSON.parse(text);
    } catch {
      throw new CrconHttpError(`Failed to parse JSON response: ${text}`);
    }

    if (!isJsonObject(data)) {
      throw new CrconHttpError('Unexpected response format; expected JSON object.');
    }
    return data;
  }

  private assertNotFailed(operation: string, payload: JsonObject): void {
    if (payload.failed) {
      throw new CrconHttpError(`${operation} reported failure: ${String(payload.error ?? 'unknown error')}`);
    }
  }
}
