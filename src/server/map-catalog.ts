/**
 * Map Catalog Service
 * Groups the CRCON map list into mode → map → variants for menu building.
 *
 * Three layers, newest first:
 * - in-memory copy of the last successful get_maps
 * - JSON cache file written after every successful refresh
 * - bundled legacy table (data/legacy-maps.json)
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from '../shared/config';
import { GAME_MODES } from '../shared/constants';
import { createLogger } from '../shared/logger';
import { toErrorMessage, errorCode } from '../shared/error-utils';
import { CrconHttpError } from '../shared/rcon-errors';
import {
  GameMode,
  JsonObject,
  JsonValue,
  MapCatalogData,
  MapVariant,
  isJsonObject,
} from '../shared/types';
import type { MapListSource } from './crcon-http';
import type { Service } from './service-registry';

const logger = createLogger('MapCatalog');

const LEGACY_MAPS_FILE = path.join(__dirname, '../../data/legacy-maps.json');

const ENV_LABELS: Record<string, string> = {
  day: 'Day',
  night: 'Night',
  dusk: 'Dusk',
  dawn: 'Dawn',
  morning: 'Dawn',
  evening: 'Evening',
  overcast: 'Overcast',
  rain: 'Rain',
  storm: 'Storm',
  snow: 'Snow',
  fog: 'Fog',
};

const FACTION_LABELS: Record<string, string> = {
  us: 'US',
  usa: 'US',
  ger: 'GER',
  deu: 'GER',
  gb: 'GB',
  gbr: 'GB',
  rus: 'RUS',
  sov: 'RUS',
  cwu: 'CW',
  cw: 'CW',
  axis: 'Axis',
  allies: 'Allies',
};

export interface MapCatalogOptions {
  source?: MapListSource | null;
  /** JSON cache file; null disables it */
  cacheFile?: string | null;
  legacyFile?: string;
  ttlMs?: number;
  fileTtlMs?: number;
  now?: () => number;
}

// --- label helpers --------------------------------------------------------

function asString(value: JsonValue | undefined): string {
  return typeof value === 'string' ? value : '';
}

/** Word-wise capitalisation: "foy warfare" → "Foy Warfare" */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function environmentLabel(environment: string): string {
  if (!environment) {
    return 'Standard';
  }
  const normalized = environment.toLowerCase();
  return ENV_LABELS[normalized] ?? titleCase(normalized.replace(/_/g, ' '));
}

export function attackerLabel(attacker: string): string {
  if (!attacker) {
    return 'Attack';
  }
  const normalized = attacker.toLowerCase();
  return FACTION_LABELS[normalized] ?? normalized.toUpperCase();
}

/**
 * Menu label for one get_maps entry, e.g. "GER Attack (Night)" or "Dusk".
 */
export function variantLabel(entry: JsonObject): string {
  const rawMode = asString(entry.game_mode);
  const environment = environmentLabel(asString(entry.environment));

  if (rawMode.toLowerCase() === 'offensive') {
    const attacker = attackerLabel(asString(entry.attackers));
    if (environment !== 'Standard' && environment !== 'Day') {
      return `${attacker} Attack (${environment})`;
    }
    return `${attacker} Attack`;
  }

  if (environment === 'Standard') {
    // No environment field: parse the suffix of e.g. "Foy Warfare (Night)"
    const prettyName = asString(entry.pretty_name);
    const mapMeta = isJsonObject(entry.map) ? entry.map : {};
    const baseName = asString(mapMeta.pretty_name);

    if (baseName && prettyName.startsWith(baseName)) {
      let suffix = stripChars(prettyName.slice(baseName.length), ' -');
      if (suffix) {
        suffix = stripChars(suffix.split(titleCase(rawMode)).join(''), ' -()');
        if (suffix) {
          return titleCase(suffix);
        }
      }
    }
    return 'Standard';
  }

  return environment;
}

function toGameMode(value: string): GameMode | undefined {
  return GAME_MODES.find(mode => mode === value);
}

/**
 * Group raw get_maps entries. Unsupported modes and entries without a map
 * name or id are skipped; duplicate labels within a map keep the first id.
 */
export function buildCatalog(entries: JsonValue[]): MapCatalogData {
  const structured: MapCatalogData = {};

  for (const entry of entries) {
    if (!isJsonObject(entry)) continue;

    const mode = toGameMode(asString(entry.game_mode).toLowerCase());
    if (!mode) continue;

    const mapMeta = isJsonObject(entry.map) ? entry.map : {};
    const mapName = asString(mapMeta.pretty_name) || asString(mapMeta.name);
    const mapId = asString(entry.id);
    if (!mapName || !mapId) continue;

    const label = variantLabel(entry);
    const modeMaps = structured[mode] ?? {};
    structured[mode] = modeMaps;
    const variants = modeMaps[mapName] ?? [];
    modeMaps[mapName] = variants;

    if (!variants.some(v => v.variant === label)) {
      variants.push({ id: mapId, variant: label });
    }
  }

  const ordered: MapCatalogData = {};
  for (const mode of GAME_MODES) {
    const maps = structured[mode];
    if (!maps) continue;

    const sortedMaps: Record<string, MapVariant[]> = {};
    for (const mapName of Object.keys(maps).sort(compareStrings)) {
      sortedMaps[mapName] = [...maps[mapName]].sort(
        (a, b) => compareStrings(a.variant, b.variant) || compareStrings(a.id, b.id)
      );
    }
    ordered[mode] = sortedMaps;
  }

  return ordered;
}

/**
 * Validate catalog-shaped JSON (cache file, legacy table).
 */
export function parseCatalogData(value: unknown): MapCatalogData | null {
  if (!isJsonObject(value)) return null;

  const catalog: MapCatalogData = {};
  for (const [modeName, modeMaps] of Object.entries(value)) {
    const mode = toGameMode(modeName);
    if (!isJsonObject(modeMaps)) return null;
    if (!mode) continue;

    const maps: Record<string, MapVariant[]> = {};
    for (const [mapName, variants] of Object.entries(modeMaps)) {
      if (!Array.isArray(variants)) return null;

      const parsed: MapVariant[] = [];
      for (const variant of variants) {
        if (!isJsonObject(variant) || typeof variant.id !== 'string' || typeof variant.variant !== 'string') {
          return null;
        }
        parsed.push({ id: variant.id, variant: variant.variant });
      }
      maps[mapName] = parsed;
    }
    catalog[mode] = maps;
  }
  return catalog;
}

function layerKeys(catalog: MapCatalogData): Set<string> {
  const keys = new Set<string>();
  for (const mode of GAME_MODES) {
    for (const [mapName, variants] of Object.entries(catalog[mode] ?? {})) {
      for (const variant of variants) {
        keys.add(`${mode}/${mapName}/${variant.id}`);
      }
    }
  }
  return keys;
}

function isEmptyCatalog(catalog: MapCatalogData): boolean {
  return GAME_MODES.every(mode => catalog[mode] === undefined);
}

// --- service ---------------------------------------------------------------

export class MapCatalogService implements Service {
  public readonly name = 'mapCatalog';

  private readonly source: MapListSource | null;
  private readonly cacheFile: string | null;
  private readonly legacyFile: string;
  private readonly ttlMs: number;
  private readonly fileTtlMs: number;
  private readonly now: () => number;

  private cache: MapCatalogData | null = null;
  private cacheTimestamp: number = 0;
  private lastError: string | null = null;
  private legacy: MapCatalogData | null = null;
  private refreshing: Promise<void> | null = null;

  constructor(options: MapCatalogOptions = {}) {
    this.source = options.source ?? null;
    this.cacheFile = options.cacheFile === undefined
      ? path.resolve(config.mapCache.file)
      : options.cacheFile;
    this.legacyFile = options.legacyFile ?? LEGACY_MAPS_FILE;
    this.ttlMs = options.ttlMs ?? config.mapCache.ttlMs;
    this.fileTtlMs = options.fileTtlMs ?? config.mapCache.fileTtlMs;
    this.now = options.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    await this.refresh();
  }

  /** Waits for an in-flight refresh so the cache file is not left half written */
  async shutdown(): Promise<void> {
    if (this.refreshing) {
      await this.refreshing;
    }
  }

  /** Unhealthy while the last refresh from the source failed; the legacy table alone is fine */
  isHealthy(): boolean {
    return this.source === null || this.lastError === null;
  }

  /**
   * Refresh from the map list source when the cache is missing or stale.
   * Concurrent callers share one in-flight refresh.
   */
  refresh(force: boolean = false): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.buildCache(force).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  async getMapsForMode(mode: GameMode, forceRefresh: boolean = false): Promise<string[]> {
    const data = await this.activeMaps(forceRefresh);
    return Object.keys(data[mode] ?? {});
  }

  async getVariantsForMap(mode: GameMode, mapName: string, forceRefresh: boolean = false): Promise<MapVariant[]> {
    const data = await this.activeMaps(forceRefresh);
    return [...(data[mode]?.[mapName] ?? [])];
  }

  async getMapId(mode: GameMode, mapName: string, variant: string): Promise<string | null> {
    const variants = await this.getVariantsForMap(mode, mapName);
    return variants.find(entry => entry.variant === variant)?.id ?? null;
  }

  getStats(): { cached: boolean; updatedAt: number; lastError: string | null } {
    return { cached: this.cache !== null, updatedAt: this.cacheTimestamp, lastError: this.lastError };
  }

  private async activeMaps(forceRefresh: boolean): Promise<MapCatalogData> {
    await this.refresh(forceRefresh);
    return this.cache ?? this.loadLegacy();
  }

  private async buildCache(force: boolean): Promise<void> {
    const now = this.now();
    if (!force && this.cache && now - this.cacheTimestamp < this.ttlMs) {
      return;
    }

    if (!this.cache) {
      this.cache = await this.loadCacheFile();
    }
    const previous = this.cache;

    const age = this.cacheTimestamp ? now - this.cacheTimestamp : this.fileTtlMs + 1;
    if (!force && previous && age <= this.fileTtlMs) {
      return;
    }

    if (!this.source) {
      this.lastError = 'No map list source configured';
      logger.debug(this.lastError);
      return;
    }

    try {
      const response = await this.source.getMaps();
      const entries = Array.isArray(response.result) ? response.result : [];
      if (entries.length === 0) {
        throw new CrconHttpError('CRCON get_maps returned no map entries.');
      }

      const catalog = buildCatalog(entries);
      if (isEmptyCatalog(catalog)) {
        throw new CrconHttpError('CRCON get_maps did not return any supported game modes.');
      }

      if (previous) {
        this.logChanges(previous, catalog);
      }

      this.cache = catalog;
      this.cacheTimestamp = now;
      this.lastError = null;
      await this.writeCacheFile(catalog, now);
    } catch (err: unknown) {
      this.lastError = toErrorMessage(err);
      if (err instanceof CrconHttpError) {
        logger.warn(`Failed to refresh map cache via CRCON API: ${this.lastError}`);
      } else {
        logger.error('Unexpected error while refreshing map cache via CRCON API', err);
      }
    }
  }

  private logChanges(previous: MapCatalogData, next: MapCatalogData): void {
    const oldLayers = layerKeys(previous);
    const newLayers = layerKeys(next);
    const added = [...newLayers].filter(key => !oldLayers.has(key)).sort(compareStrings);
    const removed = [...oldLayers].filter(key => !newLayers.has(key)).sort(compareStrings);

    if (added.length > 0 || removed.length > 0) {
      logger.info('CRCON map list updated', { added, removed });
    }
  }

  private async loadCacheFile(): Promise<MapCatalogData | null> {
    if (!this.cacheFile) {
      return null;
    }

    let raw: string;
    try {
      raw = await fs.promises.readFile(this.cacheFile, 'utf-8');
    } catch (err: unknown) {
      if (errorCode(err) !== 'ENOENT') {
        logger.warn(`Failed to read cached map file ${this.cacheFile}: ${toErrorMessage(err)}`);
      }
      return null;
    }

    try {
      const data: unknown = JSON.parse(raw);
      if (!isJsonObject(data)) return null;

      const maps = parseCatalogData(data.maps);
      if (!maps) return null;

      const updatedAt = typeof data.updated_at === 'number' ? data.updated_at : 0;
      this.cacheTimestamp = updatedAt * 1000;
      return maps;
    } catch (err: unknown) {
      logger.warn(`Failed to read cached map file ${this.cacheFile}: ${toErrorMessage(err)}`);
      return null;
    }
  }

  private async writeCacheFile(catalog: MapCatalogData, now: number): Promise<void> {
    if (!this.cacheFile) {
      return;
    }

    try {
      await fs.promises.mkdir(path.dirname(this.cacheFile), { recursive: true });
      const payload = { updated_at: now / 1000, maps: catalog };
      await fs.promises.writeFile(this.cacheFile, JSON.stringify(payload, null, 2), 'utf-8');
    } catch (err: unknown) {
      logger.warn(`Failed to write map cache file ${this.cacheFile}: ${toErrorMessage(err)}`);
    }
  }

  private loadLegacy(): MapCatalogData {
    if (!this.legacy) {
      try {
        this.legacy = parseCatalogData(JSON.parse(fs.readFileSync(this.legacyFile, 'utf-8'))) ?? {};
      } catch (err: unknown) {
        logger.error(`Failed to load legacy map table ${this.legacyFile}`, err);
        this.legacy = {};
      }
    }
    return this.legacy;
  }
}
