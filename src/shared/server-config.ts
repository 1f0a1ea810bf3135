/**
 * Server endpoint configuration
 *
 * Two layouts are accepted:
 * - Indexed: SERVER1_HOST, SERVER1_PORT, SERVER1_PASSWORD, SERVER1_NAME, SERVER2_HOST, ...
 *   with RCON_PORT / RCON_PASSWORD as shared fallbacks
 * - Legacy single server: RCON_HOST, RCON_PORT, RCON_PASSWORD, SERVER_NAME
 */

import { DEFAULT_SERVER_NAME } from './constants';
import { ConfigurationError } from './rcon-errors';
import type { ServerEndpoint } from './types';

type Env = Record<string, string | undefined>;

/**
 * Parse a port number; undefined when absent or not an integer.
 */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const port = Number(value.trim());
  return Number.isInteger(port) ? port : undefined;
}

function validatePort(port: number, variable: string): number {
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid RCON port in ${variable}: ${port}`);
  }
  return port;
}

export function loadServerEndpoints(env: Env = process.env): ServerEndpoint[] {
  const servers: ServerEndpoint[] = [];

  const sharedPassword = env.RCON_PASSWORD ?? '';
  const sharedPort = parsePort(env.RCON_PORT);

  for (let index = 1; ; index++) {
    const host = env[`SERVER${index}_HOST`];
    if (!host) {
      break;
    }

    const ownPort = parsePort(env[`SERVER${index}_PORT`]);
    const port = ownPort ?? sharedPort;
    const password = env[`SERVER${index}_PASSWORD`] || sharedPassword;

    if (!port || !password) {
      throw new ConfigurationError(
        `SERVER${index}_HOST is defined but port or password is missing. ` +
        `Set SERVER${index}_PORT / SERVER${index}_PASSWORD or the shared RCON_PORT / RCON_PASSWORD.`
      );
    }

    servers.push({
      name: env[`SERVER${index}_NAME`] || `${DEFAULT_SERVER_NAME} ${index}`,
      host,
      port: validatePort(port, ownPort !== undefined ? `SERVER${index}_PORT` : 'RCON_PORT'),
      password,
    });
  }

  if (servers.length === 0) {
    const host = env.RCON_HOST;
    if (host && sharedPort && sharedPassword) {
      servers.push({
        name: env.SERVER_NAME || DEFAULT_SERVER_NAME,
        host,
        port: validatePort(sharedPort, 'RCON_PORT'),
        password: sharedPassword,
      });
    }
  }

  return servers;
}
