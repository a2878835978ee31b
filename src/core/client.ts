import { ConfigurationError, formatAddress } from './errors.js';
import { RequestMessage } from './request.js';
import { Answer, DnsMessage } from './response.js';
import { ResponseStream } from './response-stream.js';
import { createRegistry, isStreamTransport } from './server.js';
import type { Server, ServerRegistry } from './server.js';
import { Stats } from './stats.js';
import type { QueryType } from '../dns/types.js';
import type { SystemConfig } from '../config/resolv-conf.js';
import { NetConnector } from '../transport/connector.js';
import type { Connector, StreamProtocol } from '../transport/connector.js';
import type { Logger } from '../types/logger.js';
import { getLogger } from '../utils/logger.js';

/**
 * A TLS server without a hostname can't be validated; that is a
 * configuration error, not a reason to fail over.
 */
function requireTlsHostname(server: Server): void {
  if (server.transport === 'tls' && !server.tlsHostname) {
    throw new ConfigurationError(`No TLS hostname for ${formatAddress(server)}`, {
      configKey: 'tlsHostname',
      suggestions: ['Pass the server name with --tls-hostname.'],
    });
  }
}

export interface ClientOptions {
  /** Transport primitives, Node's sockets by default */
  connector?: Connector;
  logger?: Logger;
}

/**
 * Transport dispatcher.
 *
 * Sends a request to the registry's servers in order and returns the first
 * answer. Each server gets its own transport fallback (UDP to TCP on
 * truncation) before the next server is tried; when the last server fails
 * too, its error is rethrown.
 *
 * @example
 * ```typescript
 * const client = new Client([createServer({ address: '192.0.2.53' })]);
 * const answer = await client.query({ name: 'example.com', type: 'AAAA' });
 * console.log(answer.message.records().answers);
 * ```
 */
export class Client {
  readonly servers: ServerRegistry;
  private readonly connector: Connector;
  private readonly logger: Logger;

  constructor(servers: Iterable<Server>, options: ClientOptions = {}) {
    this.servers = createRegistry(servers);
    this.logger = options.logger ?? getLogger();
    this.connector = options.connector ?? new NetConnector(this.logger);
  }

  /**
   * Client over the servers of the system resolver configuration
   */
  static system(conf: SystemConfig, options: ClientOptions = {}): Client {
    return new Client(conf.servers, options);
  }

  /**
   * Recursive query for a name and type with the default flags
   */
  query(question: { name: string; type: QueryType }): Promise<Answer> {
    return this.request(new RequestMessage(question));
  }

  async request(request: RequestMessage): Promise<Answer> {
    this.servers.forEach(requireTlsHostname);
    let lastError: unknown;

    for (const [index, server] of this.servers.entries()) {
      try {
        return await this.requestServer(request, server);
      } catch (err) {
        lastError = err;
        const next = index + 1 < this.servers.length ? 'trying next server' : 'no servers left';
        this.logger.debug(`${formatAddress(server)} failed: ${describe(err)}; ${next}`);
      }
    }

    throw lastError;
  }

  /**
   * Send a request to one server over its configured transport
   */
  requestServer(request: RequestMessage, server: Server): Promise<Answer> {
    switch (server.transport) {
      case 'udp':
        return this.requestUdp(request, server);
      case 'udp-tcp':
        return this.requestUdpTcp(request, server);
      case 'tcp':
        return this.requestStream(request, server, 'TCP');
      case 'tls':
        return this.requestStream(request, server, 'TLS');
    }
  }

  /**
   * Open a multi-message response (zone transfers).
   *
   * Only stream transports can carry one, so a registry holding any datagram
   * server is rejected before anything is sent.
   */
  async requestMulti(request: RequestMessage): Promise<ResponseStream> {
    const datagramServer = this.servers.find((server) => !isStreamTransport(server.transport));
    if (datagramServer) {
      throw new ConfigurationError(
        `Multi-message responses need TCP or TLS, but ${formatAddress(datagramServer)} uses ${datagramServer.transport}`,
        {
          configKey: 'transport',
          suggestions: ['Use --tcp or --tls for zone transfers.'],
        }
      );
    }

    this.servers.forEach(requireTlsHostname);
    let lastError: unknown;
    for (const [index, server] of this.servers.entries()) {
      try {
        return await this.openResponseStream(request, server, server.transport === 'tls' ? 'TLS' : 'TCP');
      } catch (err) {
        lastError = err;
        const next = index + 1 < this.servers.length ? 'trying next server' : 'no servers left';
        this.logger.debug(`${formatAddress(server)} failed: ${describe(err)}; ${next}`);
      }
    }

    throw lastError;
  }

  private async requestUdp(request: RequestMessage, server: Server): Promise<Answer> {
    const { message, stats } = await this.exchangeDatagram(request, server);
    stats.finalize();
    return new Answer([message], stats);
  }

  private async requestUdpTcp(request: RequestMessage, server: Server): Promise<Answer> {
    const { message, stats } = await this.exchangeDatagram(request, server);
    if (!message.isTruncated) {
      stats.finalize();
      return new Answer([message], stats);
    }

    this.logger.debug(`${formatAddress(server)}: truncated UDP response, retrying over TCP`);
    return this.requestStream(request, server, 'TCP');
  }

  private async exchangeDatagram(
    request: RequestMessage,
    server: Server
  ): Promise<{ message: DnsMessage; stats: Stats }> {
    this.logger.debug(`UDP ${formatAddress(server)}: ${request.name} ${request.type}`);

    const stats = new Stats(server, 'UDP');
    const bytes = await this.connector
      .datagram(server)
      .exchange(request.encode({ udpPayloadSize: server.udpPayloadSize }));
    const message = new DnsMessage(bytes);
    message.validate();
    return { message, stats };
  }

  /**
   * One request over a fresh stream connection; a streaming request collects
   * every message of the response.
   */
  private async requestStream(
    request: RequestMessage,
    server: Server,
    protocol: StreamProtocol
  ): Promise<Answer> {
    const response = await this.openResponseStream(request, server, protocol);
    const messages = await response.collect();
    return new Answer(messages, response.stats);
  }

  private async openResponseStream(
    request: RequestMessage,
    server: Server,
    protocol: StreamProtocol
  ): Promise<ResponseStream> {
    requireTlsHostname(server);
    this.logger.debug(`${protocol} ${formatAddress(server)}: ${request.name} ${request.type}`);

    const stats = new Stats(server, protocol);
    const connection = await this.connector.connect(server, protocol);
    connection.run().catch((err: unknown) => {
      this.logger.debug(`${protocol} ${formatAddress(server)}: pump stopped: ${describe(err)}`);
    });

    try {
      const receiver = connection.send(request.encode());
      return new ResponseStream(request, connection, receiver, stats);
    } catch (err) {
      connection.close();
      throw err;
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
