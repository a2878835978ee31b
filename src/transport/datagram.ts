/**
 * Datagram Transport
 *
 * One DNS exchange over UDP: the request is sent, and re-sent up to
 * `server.retries` times, each attempt waiting `server.timeout` for a reply
 * with the same message ID from the server's port.
 */

import dgram from 'node:dgram';
import { isIP } from 'node:net';
import type { Server } from '../core/server.js';
import { NetworkError, TimeoutError, formatAddress } from '../core/errors.js';
import type { Logger } from '../types/logger.js';
import { silentLogger } from '../types/logger.js';
import type { DatagramExchange } from './connector.js';

export class DatagramTransport implements DatagramExchange {
  constructor(
    private readonly server: Server,
    private readonly logger: Logger = silentLogger
  ) {}

  async exchange(request: Buffer): Promise<Buffer> {
    const socket = this.createSocket();
    try {
      return await this.sendWithRetry(socket, request);
    } finally {
      socket.close();
    }
  }

  protected createSocket(): dgram.Socket {
    return dgram.createSocket({
      type: isIP(this.server.address) === 6 ? 'udp6' : 'udp4',
    });
  }

  /**
   * Send with retransmission on timeout. Other errors end the exchange.
   */
  protected async sendWithRetry(socket: dgram.Socket, data: Buffer): Promise<Buffer> {
    const maxAttempts = this.server.retries + 1;
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        return await this.sendOnce(socket, data);
      } catch (error) {
        if (!(error instanceof TimeoutError) || attempt >= maxAttempts) {
          throw error;
        }
        this.logger.debug(
          `UDP ${formatAddress(this.server)}: no response, retransmitting (${attempt}/${this.server.retries})`
        );
      }
    }
  }

  /**
   * Send data once and wait for the matching response
   */
  protected sendOnce(socket: dgram.Socket, data: Buffer): Promise<Buffer> {
    const { address, port, timeout } = this.server;
    const id = data.readUInt16BE(0);

    return new Promise((resolve, reject) => {
      let settled = false;

      const cleanup = () => {
        clearTimeout(timeoutId);
        socket.removeListener('message', onMessage);
        socket.removeListener('error', onError);
      };

      const onMessage = (msg: Buffer, rinfo: dgram.RemoteInfo) => {
        if (settled) return;
        if (rinfo.port !== port || msg.length < 2 || msg.readUInt16BE(0) !== id) {
          this.logger.debug(`UDP ${formatAddress(this.server)}: ignoring unrelated datagram`);
          return;
        }
        settled = true;
        cleanup();
        resolve(msg);
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new NetworkError(`UDP ${formatAddress(this.server)}: ${err.message}`, errorCode(err)));
      };

      const onTimeout = () => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new TimeoutError({ phase: 'response', timeout, server: this.server }));
      };

      socket.on('message', onMessage);
      socket.on('error', onError);
      const timeoutId = setTimeout(onTimeout, timeout);

      socket.send(data, port, address, (err) => {
        if (err) onError(err);
      });
    });
  }
}

function errorCode(err: Error): string {
  return 'code' in err && typeof err.code === 'string' ? err.code : 'UNKNOWN';
}
