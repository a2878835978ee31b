import type { Server } from '../core/server.js';
import type { Logger } from '../types/logger.js';
import { silentLogger } from '../types/logger.js';
import { DatagramTransport } from './datagram.js';
import { openStream } from './stream.js';

export type StreamProtocol = 'TCP' | 'TLS';

/**
 * One datagram request/response exchange, retransmissions included
 */
export interface DatagramExchange {
  exchange(request: Buffer): Promise<Buffer>;
}

/**
 * Responses to a single request sent over a stream connection
 */
export interface ResponseReceiver {
  /**
   * Next message carrying the request's ID. Rejects on timeout or when the
   * connection fails.
   */
  next(): Promise<Buffer>;
}

/**
 * An established TCP or TLS connection.
 *
 * Socket reads and writes belong to the pump, `run()`, which the caller
 * spawns once; requesters only talk to it through `send()` and the
 * receivers it hands out.
 */
export interface StreamConnection {
  run(): Promise<void>;
  send(request: Buffer): ResponseReceiver;
  close(): void;
}

/**
 * Factory for transport primitives, the seam tests replace
 */
export interface Connector {
  datagram(server: Server): DatagramExchange;
  connect(server: Server, protocol: StreamProtocol): Promise<StreamConnection>;
}

/**
 * Connector over Node's dgram, net and tls modules
 */
export class NetConnector implements Connector {
  constructor(private readonly logger: Logger = silentLogger) {}

  datagram(server: Server): DatagramExchange {
    return new DatagramTransport(server, this.logger);
  }

  connect(server: Server, protocol: StreamProtocol): Promise<StreamConnection> {
    return openStream(server, protocol, this.logger);
  }
}
