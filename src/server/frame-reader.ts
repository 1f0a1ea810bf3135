/**
 * FrameReader - awaitable frame queue over a connected socket
 *
 * Frames are parsed as data arrives and handed out one at a time. The first
 * socket fault (error, idle timeout, close) is latched: the pending read and
 * every later read reject with it.
 */

import type { Socket } from 'net';
import { RconFramer } from './rcon';
import type { RconFrame } from '../shared/types';
import { ConnectionClosedError, IOError, RconError } from '../shared/rcon-errors';

interface PendingRead {
  resolve: (frame: RconFrame) => void;
  reject: (err: RconError) => void;
}

export class FrameReader {
  private framer = new RconFramer();
  private frames: RconFrame[] = [];
  private pending: PendingRead | null = null;
  private failure: RconError | null = null;

  private readonly onData = (chunk: Buffer) => {
    for (const frame of this.framer.ingest(chunk)) {
      if (this.pending) {
        const { resolve } = this.pending;
        this.pending = null;
        resolve(frame);
      } else {
        this.frames.push(frame);
      }
    }
  };

  private readonly onError = (err: Error) => {
    this.fail(new IOError(`Failed to read response from server: ${err.message}`));
  };

  private readonly onTimeout = () => {
    this.fail(new IOError(`Timed out after ${this.timeoutMs}ms waiting for server`));
    this.socket.destroy();
  };

  private readonly onClose = () => {
    const partial = this.framer.pendingBytes > 0 ? ` (${this.framer.pendingBytes} bytes of an incomplete frame)` : '';
    this.fail(new ConnectionClosedError(`Connection closed by remote host${partial}`));
  };

  constructor(
    private readonly socket: Socket,
    private readonly timeoutMs: number,
  ) {
    socket.on('data', this.onData);
    socket.on('error', this.onError);
    socket.on('timeout', this.onTimeout);
    socket.on('end', this.onClose);
    socket.on('close', this.onClose);
  }

  /**
   * Resolve with the next complete frame. Only one read may be outstanding.
   */
  readFrame(): Promise<RconFrame> {
    const queued = this.frames.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new IOError('A read is already in progress on this connection'));
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /** Stop listening; a pending read is rejected. */
  dispose(): void {
    this.socket.removeListener('data', this.onData);
    this.socket.removeListener('error', this.onError);
    this.socket.removeListener('timeout', this.onTimeout);
    this.socket.removeListener('end', this.onClose);
    this.socket.removeListener('close', this.onClose);
    this.fail(new ConnectionClosedError('Connection has been closed'));
  }

  private fail(err: RconError): void {
    if (this.failure) {
      return;
    }
    this.failure = err;

    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(err);
    }
  }
}
