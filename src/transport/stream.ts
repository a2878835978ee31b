/**
 * Stream Transport
 *
 * DNS over TCP (RFC 7766) and over TLS (RFC 7858). Messages carry a two-byte
 * length prefix. A connection multiplexes requests by message ID: the pump
 * writes queued requests and routes every incoming message to the receiver
 * registered for its ID.
 */

import net from 'node:net';
import tls from 'node:tls';
import type { Server } from '../core/server.js';
import {
  ConfigurationError,
  ConnectionError,
  DnsqError,
  ProtocolError,
  TimeoutError,
  formatAddress,
  toDnsqError,
} from '../core/errors.js';
import type { Logger } from '../types/logger.js';
import { silentLogger } from '../types/logger.js';
import { Channel } from '../utils/channel.js';
import type { ResponseReceiver, StreamConnection, StreamProtocol } from './connector.js';

const LENGTH_PREFIX = 2;

/**
 * Prefix a message with its length
 */
export function frameMessage(message: Buffer): Buffer {
  const length = Buffer.alloc(LENGTH_PREFIX);
  length.writeUInt16BE(message.length, 0);
  return Buffer.concat([length, message]);
}

/**
 * Connect to a server, completing the TLS handshake where asked for.
 *
 * TLS validates the certificate against Node's bundled Mozilla root set,
 * with SNI and the expected identity set to `server.tlsHostname`.
 */
export function openStream(
  server: Server,
  protocol: StreamProtocol,
  logger: Logger = silentLogger
): Promise<NetStreamConnection> {
  if (protocol === 'TLS' && !server.tlsHostname) {
    return Promise.reject(
      new ConfigurationError(`No TLS hostname for ${formatAddress(server)}`, {
        configKey: 'tlsHostname',
        suggestions: ['Pass the server name with --tls-hostname.'],
      })
    );
  }

  return new Promise((resolve, reject) => {
    const socket =
      protocol === 'TLS'
        ? tls.connect({
            host: server.address,
            port: server.port,
            servername: server.tlsHostname,
            ca: [...tls.rootCertificates],
          })
        : net.connect({ host: server.address, port: server.port });

    const readyEvent = protocol === 'TLS' ? 'secureConnect' : 'connect';

    const timeoutId = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.destroy();
      reject(
        new TimeoutError({
          phase: protocol === 'TLS' ? 'secureConnect' : 'connect',
          timeout: server.timeout,
          server,
        })
      );
    }, server.timeout);

    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      socket.destroy();
      const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
      reject(
        new ConnectionError(`${protocol} connection to ${formatAddress(server)} failed: ${err.message}`, {
          host: server.address,
          port: server.port,
          code,
        })
      );
    };

    socket.once('error', onError);
    socket.once(readyEvent, () => {
      clearTimeout(timeoutId);
      socket.removeListener('error', onError);
      logger.debug(`${protocol} connected to ${formatAddress(server)}`);
      resolve(new NetStreamConnection(socket, server, protocol, logger));
    });
  });
}

export class NetStreamConnection implements StreamConnection {
  private readonly receivers = new Map<number, Channel<Buffer>>();
  private readonly outbound = new Channel<Buffer>();
  private readonly closed: Promise<void>;
  private pending: Buffer = Buffer.alloc(0);
  private failure?: DnsqError;

  constructor(
    private readonly socket: net.Socket,
    private readonly server: Server,
    private readonly protocol: StreamProtocol,
    private readonly logger: Logger = silentLogger
  ) {
    this.closed = new Promise((resolve) => {
      socket.once('close', () => {
        this.fail(
          new ConnectionError(`${protocol} connection to ${formatAddress(server)} closed`, {
            host: server.address,
            port: server.port,
          })
        );
        resolve();
      });
    });
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (err) => this.fail(toDnsqError(err, `${protocol} ${formatAddress(server)}`)));
  }

  /**
   * The pump: writes queued requests until the connection ends
   */
  async run(): Promise<void> {
    for await (const frame of this.outbound) {
      try {
        await this.write(frame);
      } catch (err) {
        this.fail(toDnsqError(err, `${this.protocol} write to ${formatAddress(this.server)}`));
      }
    }
    await this.closed;
  }

  send(request: Buffer): ResponseReceiver {
    if (this.failure) throw this.failure;

    const id = request.readUInt16BE(0);
    const channel = new Channel<Buffer>();
    this.receivers.set(id, channel);
    this.outbound.push(frameMessage(request));

    return { next: () => this.receive(channel) };
  }

  close(): void {
    this.fail(
      new ConnectionError(`${this.protocol} connection to ${formatAddress(this.server)} closed`, {
        host: this.server.address,
        port: this.server.port,
      })
    );
  }

  private async receive(channel: Channel<Buffer>): Promise<Buffer> {
    const { timeout } = this.server;
    let timeoutId: NodeJS.Timeout | undefined;
    const timer = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(
        () => reject(new TimeoutError({ phase: 'response', timeout, server: this.server })),
        timeout
      );
    });

    try {
      const message = await Promise.race([channel.next(), timer]);
      if (message === null) {
        throw new ProtocolError('Connection closed before the response arrived', { protocol: 'dns' });
      }
      return message;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private write(frame: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  private onData(chunk: Buffer): void {
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    while (this.pending.length >= LENGTH_PREFIX) {
      const length = this.pending.readUInt16BE(0);
      if (this.pending.length < LENGTH_PREFIX + length) break;

      const message = Buffer.from(this.pending.subarray(LENGTH_PREFIX, LENGTH_PREFIX + length));
      this.pending = this.pending.subarray(LENGTH_PREFIX + length);
      this.route(message);
    }
  }

  private route(message: Buffer): void {
    if (message.length < 2) {
      this.fail(new ProtocolError('Short message on stream', { protocol: 'dns' }));
      return;
    }

    const id = message.readUInt16BE(0);
    const receiver = this.receivers.get(id);
    if (!receiver) {
      this.fail(new ProtocolError(`Unexpected message ID ${id} on stream`, { protocol: 'dns', code: id }));
      return;
    }
    receiver.push(message);
  }

  private fail(error: DnsqError): void {
    const failure = this.failure ?? error;
    if (!this.failure) {
      this.failure = failure;
      this.logger.debug(failure.message);
    }
    this.outbound.close();
    for (const receiver of this.receivers.values()) {
      receiver.close(failure);
    }
    this.receivers.clear();
    this.socket.destroy();
  }
}
