/**
 * CrconHttpMock: in-process stand-in for the CRCON REST API.
 * Answers the endpoints CrconHttpClient calls and records every request.
 */

import type { JsonObject, JsonValue } from '../shared/types';
import { isJsonObject } from '../shared/types';

export interface CapturedHttpRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: JsonValue | null;
}

export interface HttpMockResponse {
  status: number;
  body: string;
}

/** Init as passed by CrconHttpClient to fetch */
export interface MockRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface CrconHttpMockOptions {
  username?: string;
  password?: string;
  /** Tokens handed out by successive logins */
  tokens?: string[];
  maps?: JsonValue[];
  objectiveRows?: string[][];
}

export class CrconHttpMock {
  private readonly username: string;
  private readonly password: string;
  private readonly tokens: string[];
  private validToken: string | null = null;
  private loginCount = 0;
  private requests: CapturedHttpRequest[] = [];
  private overrides: Map<string, HttpMockResponse[]> = new Map();

  maps: JsonValue[];
  objectiveRows: string[][];
  currentMap: string = 'stmereeglise_warfare';
  layout: JsonObject | null = null;
  /** Extra get_gamestate fields beside current_map */
  gamestate: JsonObject = {
    num_allied_players: 0,
    num_axis_players: 0,
    time_remaining: 5400,
    raw_time_remaining: '1:30:00',
  };

  constructor(options: CrconHttpMockOptions = {}) {
    this.username = options.username ?? 'admin';
    this.password = options.password ?? 'test-secret';
    this.tokens = options.tokens ?? ['test-token'];
    this.maps = options.maps ?? [];
    this.objectiveRows = options.objectiveRows ?? [
      ['A1', 'A2', 'A3'],
      ['B1', 'B2', 'B3'],
      ['C1', 'C2', 'C3'],
      ['D1', 'D2', 'D3'],
      ['E1', 'E2', 'E3'],
    ];
  }

  /** Answer the next request to `path` with a fixed response */
  respondOnce(path: string, response: HttpMockResponse): this {
    const queue = this.overrides.get(path) ?? [];
    queue.push(response);
    this.overrides.set(path, queue);
    return this;
  }

  /** Make the current token stale so the next authorized call gets a 401 */
  expireToken(): void {
    this.validToken = null;
  }

  handle(url: string, init: MockRequestInit = {}): HttpMockResponse {
    const path = new URL(url).pathname;
    const method = (init.method ?? 'GET').toUpperCase();
    const headers = init.headers ?? {};
    const body = init.body ? this.parse(init.body) : null;
    this.requests.push({ method, path, headers, body });

    const override = this.overrides.get(path)?.shift();
    if (override) {
      return override;
    }

    if (path === '/login') {
      return this.login(body);
    }

    if (!this.validToken || headers.Authorization !== `Bearer ${this.validToken}`) {
      return { status: 401, body: '{"error":"Unauthorized"}' };
    }

    switch (`${method} ${path}`) {
      case 'GET /get_maps':
        return this.json({ result: this.maps, failed: false });

      case 'GET /get_gamestate':
        return this.json({
          result: { ...this.gamestate, current_map: { id: this.currentMap, pretty_name: this.currentMap } },
          failed: false,
        });

      case 'GET /get_objective_rows':
        return this.json({ result: this.objectiveRows, failed: false });

      case 'POST /set_map': {
        const mapName = isJsonObject(body) ? body.map_name : undefined;
        if (typeof mapName !== 'string') {
          return { status: 400, body: 'map_name is required' };
        }
        this.currentMap = mapName;
        return this.json({ result: mapName, failed: false });
      }

      case 'POST /set_game_layout':
        this.layout = isJsonObject(body) ? body : null;
        return this.json({ result: true, failed: false });

      default:
        return { status: 404, body: 'Not Found' };
    }
  }

  getRequests(): CapturedHttpRequest[] {
    return [...this.requests];
  }

  getPaths(): string[] {
    return this.requests.map(request => `${request.method} ${request.path}`);
  }

  getLoginCount(): number {
    return this.loginCount;
  }

  private login(body: JsonValue | null): HttpMockResponse {
    if (!isJsonObject(body) || body.username !== this.username || body.password !== this.password) {
      return { status: 401, body: 'Invalid credentials' };
    }

    const token = this.tokens[Math.min(this.loginCount, this.tokens.length - 1)];
    this.loginCount++;
    this.validToken = token;
    return this.json({ result: token, failed: false });
  }

  private json(payload: JsonObject): HttpMockResponse {
    return { status: 200, body: JSON.stringify(payload) };
  }

  private parse(text: string): JsonValue | null {
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch {
      return null;
    }
  }
}
