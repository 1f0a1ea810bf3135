/**
 * Centralized configuration for the map control core
 *
 * Reads environment variables with defaults. Server endpoints are loaded
 * separately (see server-config.ts) because their variable names are indexed.
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

function parseLevelName(value: string | undefined): LogLevelName {
  switch ((value ?? '').toLowerCase()) {
    case 'debug': return 'debug';
    case 'warn': return 'warn';
    case 'error': return 'error';
    default: return 'info';
  }
}

export const config = {
  /**
   * RCON transport
   */
  rcon: {
    // Connect timeout, also the idle deadline for every read/write
    timeoutMs: Number(process.env.RCON_TIMEOUT) || 5000,
  },

  /**
   * CRCON HTTP API
   */
  crcon: {
    timeoutMs: Number(process.env.CRCON_TIMEOUT) || 10000,
  },

  /**
   * Map list cache
   */
  mapCache: {
    ttlMs: 5 * 60 * 1000,
    fileTtlMs: 7 * 24 * 60 * 60 * 1000, // one week
    file: process.env.MAP_CACHE_FILE || 'data/map_cache.json',
  },

  /**
   * Logging
   */
  logging: {
    // Levels: 'debug' | 'info' | 'warn' | 'error'
    level: parseLevelName(process.env.LOG_LEVEL),
    colorize: process.env.NODE_ENV !== 'production',
  },
};

/**
 * Type-safe access to config
 */
export type Config = typeof config;
