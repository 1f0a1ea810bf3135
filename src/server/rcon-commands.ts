/**
 * Typed RCON commands over a session's generic request primitive.
 * Errors from the session propagate unchanged.
 */

import {
  RCON_COMMANDS,
  RconContent,
  JsonObject,
  JsonValue,
  isJsonObject,
} from '../shared/types';

/** The slice of RconSession the commands need */
export interface RconCommandChannel {
  sendCommand(name: string, content?: RconContent): Promise<JsonValue>;
}

export class RconCommands {
  constructor(private readonly channel: RconCommandChannel) {}

  /**
   * Switch the server to `mapId`. Status 200 is success.
   */
  async changeMap(mapId: string): Promise<void> {
    await this.channel.sendCommand(RCON_COMMANDS.CHANGE_MAP, mapId);
  }

  /**
   * Query a ServerInformation section (e.g. "session", "players").
   * Returns {} when the server answers with anything but a mapping.
   */
  async serverInformation(name: string, value: string = ''): Promise<JsonObject> {
    const content = await this.channel.sendCommand(RCON_COMMANDS.SERVER_INFORMATION, {
      Name: name,
      Value: value,
    });
    return isJsonObject(content) ? content : {};
  }
}

/**
 * Read a trimmed string field from a ServerInformation result.
 */
export function readStringField(info: JsonObject, field: string): string {
  const value = info[field];
  return typeof value === 'string' ? value.trim() : '';
}
