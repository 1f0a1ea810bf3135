/**
 * Unit Tests for the map catalog: grouping, labels, refresh and cache layers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  MapCatalogService,
  attackerLabel,
  buildCatalog,
  environmentLabel,
  parseCatalogData,
  titleCase,
  variantLabel,
} from './map-catalog';
import type { MapListSource } from './crcon-http';
import { CrconHttpError } from '../shared/rcon-errors';
import type { JsonObject, JsonValue } from '../shared/types';

const MAP_ENTRIES: JsonValue[] = [
  {
    id: 'stmereeglise_warfare',
    game_mode: 'warfare',
    environment: 'day',
    pretty_name: 'St. Mere Eglise Warfare',
    map: { pretty_name: 'St. Mere Eglise', name: 'SME' },
  },
  {
    id: 'stmereeglise_warfare_night',
    game_mode: 'warfare',
    environment: 'night',
    map: { pretty_name: 'St. Mere Eglise' },
  },
  {
    id: 'stmereeglise_offensive_us',
    game_mode: 'offensive',
    attackers: 'us',
    environment: 'day',
    map: { pretty_name: 'St. Mere Eglise' },
  },
  {
    id: 'stmereeglise_offensive_ger',
    game_mode: 'offensive',
    attackers: 'ger',
    environment: 'dusk',
    map: { pretty_name: 'St. Mere Eglise' },
  },
  {
    id: 'foy_warfare',
    game_mode: 'Warfare',
    pretty_name: 'Foy Warfare (Night)',
    map: { pretty_name: 'Foy' },
  },
  {
    id: 'foy_warfare_std',
    game_mode: 'warfare',
    pretty_name: 'Foy',
    map: { pretty_name: 'Foy' },
  },
  {
    id: 'foy_warfare_dup',
    game_mode: 'warfare',
    pretty_name: 'Foy Warfare (Night)',
    map: { pretty_name: 'Foy' },
  },
  {
    id: 'carentan_skirmish',
    game_mode: 'skirmish',
    environment: 'rain',
    map: { name: 'Carentan' },
  },
  { id: 'x_control', game_mode: 'control', map: { pretty_name: 'X' } },
  { game_mode: 'warfare', map: { pretty_name: 'No Id' } },
  'not an object',
];

const EXPECTED_CATALOG = {
  warfare: {
    'Foy': [
      { id: 'foy_warfare', variant: 'Night' },
      { id: 'foy_warfare_std', variant: 'Standard' },
    ],
    'St. Mere Eglise': [
      { id: 'stmereeglise_warfare', variant: 'Day' },
      { id: 'stmereeglise_warfare_night', variant: 'Night' },
    ],
  },
  offensive: {
    'St. Mere Eglise': [
      { id: 'stmereeglise_offensive_ger', variant: 'GER Attack (Dusk)' },
      { id: 'stmereeglise_offensive_us', variant: 'US Attack' },
    ],
  },
  skirmish: {
    'Carentan': [{ id: 'carentan_skirmish', variant: 'Rain' }],
  },
};

/** Map list source that replays canned results; the last one repeats */
class FakeMapSource implements MapListSource {
  calls = 0;

  constructor(private readonly results: Array<JsonObject | Error>) {}

  async getMaps(): Promise<JsonObject> {
    const result = this.results[Math.min(this.calls, this.results.length - 1)];
    this.calls++;
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

describe('labels', () => {
  it('title-cases words', () => {
    expect(titleCase('heavy snow')).toBe('Heavy Snow');
    expect(titleCase('NIGHT')).toBe('Night');
  });

  it('maps environments through the label table', () => {
    expect(environmentLabel('')).toBe('Standard');
    expect(environmentLabel('DAY')).toBe('Day');
    expect(environmentLabel('morning')).toBe('Dawn');
    expect(environmentLabel('heavy_snow')).toBe('Heavy Snow');
  });

  it('maps attacking factions through the label table', () => {
    expect(attackerLabel('')).toBe('Attack');
    expect(attackerLabel('sov')).toBe('RUS');
    expect(attackerLabel('Allies')).toBe('Allies');
    expect(attackerLabel('pl')).toBe('PL');
  });

  it('labels offensive layers by attacker and non-day environment', () => {
    expect(variantLabel({ game_mode: 'offensive', attackers: 'gb' })).toBe('GB Attack');
    expect(variantLabel({ game_mode: 'offensive', attackers: 'cw', environment: 'day' })).toBe('CW Attack');
    expect(variantLabel({ game_mode: 'offensive', attackers: 'rus', environment: 'snow' })).toBe('RUS Attack (Snow)');
  });

  it('parses a suffix from pretty_name when the environment is missing', () => {
    expect(variantLabel({
      game_mode: 'skirmish',
      pretty_name: 'Driel - Skirmish - dawn',
      map: { pretty_name: 'Driel' },
    })).toBe('Dawn');
  });

  it('falls back to Standard', () => {
    expect(variantLabel({ game_mode: 'warfare', pretty_name: 'Other Name', map: { pretty_name: 'Foy' } }))
      .toBe('Standard');
  });
});

describe('buildCatalog', () => {
  it('groups, labels, de-duplicates and sorts entries', () => {
    expect(buildCatalog(MAP_ENTRIES)).toEqual(EXPECTED_CATALOG);
  });

  it('returns an empty catalog when nothing is supported', () => {
    expect(buildCatalog([{ id: 'a', game_mode: 'control', map: { name: 'A' } }])).toEqual({});
  });
});

describe('parseCatalogData', () => {
  it('accepts catalog-shaped data and drops unknown modes', () => {
    expect(parseCatalogData({
      warfare: { Foy: [{ id: 'foy_warfare', variant: 'Day' }] },
      control: {},
    })).toEqual({ warfare: { Foy: [{ id: 'foy_warfare', variant: 'Day' }] } });
  });

  it('rejects malformed data', () => {
    expect(parseCatalogData([])).toBeNull();
    expect(parseCatalogData({ warfare: { Foy: 'x' } })).toBeNull();
    expect(parseCatalogData({ warfare: { Foy: [{ id: 1, variant: 'Day' }] } })).toBeNull();
  });
});

describe('MapCatalogService', () => {
  let now: number;
  let warnSpy: jest.SpyInstance;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('without a source', () => {
    it('serves the bundled legacy table', async () => {
      const catalog = new MapCatalogService({ cacheFile: null, now: clock });

      const maps = await catalog.getMapsForMode('warfare');

      expect(maps).toHaveLength(18);
      expect(maps.slice(0, 2)).toEqual(['Carentan', 'Driel']);
      await expect(catalog.getVariantsForMap('warfare', 'Carentan')).resolves.toEqual([
        { id: 'carentan_warfare', variant: 'Day' },
        { id: 'carentan_warfare_night', variant: 'Night' },
      ]);
      expect(catalog.getLastError()).toBe('No map list source configured');
      expect(catalog.isHealthy()).toBe(true);
    });
  });

  describe('with a source', () => {
    it('builds the catalog from get_maps', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await expect(catalog.getMapsForMode('warfare')).resolves.toEqual(['Foy', 'St. Mere Eglise']);
      await expect(catalog.getMapId('warfare', 'Foy', 'Night')).resolves.toBe('foy_warfare');
      await expect(catalog.getMapId('warfare', 'Foy', 'Dusk')).resolves.toBeNull();
      await expect(catalog.getVariantsForMap('skirmish', 'Nowhere')).resolves.toEqual([]);
      expect(catalog.getLastError()).toBeNull();
    });

    it('does not refetch while the cache is fresh', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock, ttlMs: 1000, fileTtlMs: 10_000 });

      await catalog.getMapsForMode('warfare');
      now += 500;
      await catalog.getMapsForMode('warfare');
      now += 5_000;
      await catalog.getMapsForMode('warfare');
      expect(source.calls).toBe(1);

      now += 10_000;
      await catalog.getMapsForMode('warfare');
      expect(source.calls).toBe(2);
    });

    it('refetches when forced', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.getMapsForMode('warfare');
      await catalog.getMapsForMode('warfare', true);

      expect(source.calls).toBe(2);
    });

    it('shares one in-flight refresh between concurrent callers', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      const [warfare, offensive] = await Promise.all([
        catalog.getMapsForMode('warfare'),
        catalog.getMapsForMode('offensive'),
      ]);

      expect(source.calls).toBe(1);
      expect(warfare).toEqual(['Foy', 'St. Mere Eglise']);
      expect(offensive).toEqual(['St. Mere Eglise']);
    });

    it('falls back to the legacy table and records the error when the first fetch fails', async () => {
      const source = new FakeMapSource([new CrconHttpError('get_maps failed with status 500: boom', 500)]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await expect(catalog.getMapsForMode('skirmish')).resolves.toHaveLength(10);
      expect(catalog.getLastError()).toBe('get_maps failed with status 500: boom');
      expect(warnSpy).toHaveBeenCalledWith(
        expect.stringContaining('Failed to refresh map cache via CRCON API: get_maps failed with status 500: boom'),
      );
    });

    it('keeps the previous catalog when a refresh fails', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }, new CrconHttpError('offline')]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.getMapsForMode('warfare');
      await expect(catalog.getMapsForMode('warfare', true)).resolves.toEqual(['Foy', 'St. Mere Eglise']);
      expect(catalog.getLastError()).toBe('offline');
    });

    it('treats an empty map list as a failure', async () => {
      const source = new FakeMapSource([{ result: [] }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.refresh();

      expect(catalog.getLastError()).toBe('CRCON get_maps returned no map entries.');
      expect(catalog.getStats().cached).toBe(false);
    });

    it('treats a list without supported modes as a failure', async () => {
      const source = new FakeMapSource([{ result: [{ id: 'a', game_mode: 'control', map: { name: 'A' } }] }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.refresh();

      expect(catalog.getLastError()).toBe('CRCON get_maps did not return any supported game modes.');
    });

    it('returns variant lists the caller can modify freely', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      const variants = await catalog.getVariantsForMap('warfare', 'Foy');
      variants.splice(0, variants.length);

      await expect(catalog.getMapId('warfare', 'Foy', 'Night')).resolves.toBe('foy_warfare');
      await expect(catalog.getVariantsForMap('warfare', 'Foy')).resolves.toHaveLength(2);
    });

    it('reports health from the last refresh attempt', async () => {
      const source = new FakeMapSource([new CrconHttpError('offline'), { result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.refresh();
      expect(catalog.isHealthy()).toBe(false);

      await catalog.refresh(true);
      expect(catalog.isHealthy()).toBe(true);
    });

    it('waits for an in-flight refresh on shutdown', async () => {
      let release: (value: JsonObject) => void = () => undefined;
      const response = new Promise<JsonObject>(resolve => { release = resolve; });
      const source: MapListSource = { getMaps: () => response };
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      const pending = catalog.refresh();
      const stopped = catalog.shutdown();
      release({ result: MAP_ENTRIES });
      await stopped;

      expect(catalog.getStats().cached).toBe(true);
      await pending;
    });

    it('clears the last error after a successful refresh', async () => {
      const source = new FakeMapSource([new CrconHttpError('offline'), { result: MAP_ENTRIES }]);
      const catalog = new MapCatalogService({ source, cacheFile: null, now: clock });

      await catalog.refresh();
      expect(catalog.getLastError()).toBe('offline');

      await catalog.refresh(true);
      expect(catalog.getLastError()).toBeNull();
    });
  });

  describe('cache file', () => {
    let dir: string;
    let cacheFile: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'map-catalog-'));
      cacheFile = path.join(dir, 'nested', 'map_cache.json');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes the catalog with its timestamp in seconds', async () => {
      const source = new FakeMapSource([{ result: MAP_ENTRIES }]);
      await new MapCatalogService({ source, cacheFile, now: clock }).refresh();

      const written: unknown = JSON.parse(fs.readFileSync(cacheFile, 'utf-8'));
      expect(written).toEqual({ updated_at: 1_700_000_000, maps: EXPECTED_CATALOG });
    });

    it('loads a fresh cache file without contacting the source', async () => {
      const writer = new MapCatalogService({ source: new FakeMapSource([{ result: MAP_ENTRIES }]), cacheFile, now: clock });
      await writer.refresh();

      now += 60 * 60 * 1000;
      const source = new FakeMapSource([new CrconHttpError('should not be called')]);
      const reader = new MapCatalogService({ source, cacheFile, now: clock });

      await expect(reader.getMapsForMode('offensive')).resolves.toEqual(['St. Mere Eglise']);
      expect(source.calls).toBe(0);
      expect(reader.getLastError()).toBeNull();
    });

    it('refreshes a stale cache file and keeps it when the source fails', async () => {
      fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
      fs.writeFileSync(cacheFile, JSON.stringify({
        updated_at: now / 1000 - 8 * 24 * 60 * 60,
        maps: { warfare: { Foy: [{ id: 'foy_warfare', variant: 'Day' }] } },
      }));

      const source = new FakeMapSource([new CrconHttpError('offline')]);
      const catalog = new MapCatalogService({ source, cacheFile, now: clock });

      await expect(catalog.getMapsForMode('warfare')).resolves.toEqual(['Foy']);
      expect(source.calls).toBe(1);
      expect(catalog.getLastError()).toBe('offline');
    });

    it('ignores a malformed cache file', async () => {
      fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
      fs.writeFileSync(cacheFile, '{"updated_at": 1, "maps": {"warfare": []}}');

      const catalog = new MapCatalogService({ cacheFile, now: clock });

      await expect(catalog.getMapsForMode('warfare')).resolves.toHaveLength(18);
    });
  });
});
