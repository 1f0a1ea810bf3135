/**
 * Mock Server: barrel export.
 * In-process peers for testing: an RCON v2 game server and the CRCON REST API.
 */

export { RconMock, DEFAULT_MOCK_OPTIONS } from './rcon-mock';
export { CrconHttpMock } from './crcon-http-mock';
export type {
  CapturedHttpRequest,
  CrconHttpMockOptions,
  HttpMockResponse,
  MockRequestInit,
} from './crcon-http-mock';

export type {
  CapturedRconRequest,
  RconAction,
  RconMockOptions,
  RconReply,
} from './types/rcon-exchange-types';
