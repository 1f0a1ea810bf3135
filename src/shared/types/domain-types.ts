/**
 * Domain Types
 * Servers, maps and the results handed back to the UI layer
 */

/**
 * One controllable game server, created from configuration at startup
 */
export interface ServerEndpoint {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly password: string;
}

export interface ServerSummary {
  index: number;
  name: string;
}

export interface ChangeMapResult {
  success: boolean;
  message: string;
}

export type GameMode = 'warfare' | 'offensive' | 'skirmish';

export interface MapVariant {
  id: string;
  variant: string;
}

/** mode → map name → variants */
export type MapCatalogData = Partial<Record<GameMode, Record<string, MapVariant[]>>>;

/** Outcome of a map change across the HTTP and RCON paths */
export interface MapChangeReport {
  success: boolean;
  steps: string[];
}

/** Live state of the game, read from CRCON's get_gamestate */
export interface GameStatus {
  map: string;
  /** null when the game state omits the count */
  allied: number | null;
  axis: number | null;
  timeRemaining: string;
}

export type ServerStatus =
  | { available: true; status: GameStatus }
  | { available: false; error: string };
