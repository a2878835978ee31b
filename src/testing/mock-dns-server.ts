/**
 * Mock DNS Server
 *
 * A small DNS server for testing the client. Answers over UDP and TCP on
 * the same port, can truncate its UDP responses, serve an authority
 * section and stream zone transfers.
 *
 * @example
 * ```typescript
 * import { MockDnsServer } from 'dnsq/testing';
 *
 * const server = await MockDnsServer.create();
 *
 * server.addRecord({ type: 'A', name: 'www.example.test', data: '192.0.2.1' });
 * server.addAuthority({ type: 'SOA', name: 'example.test', data: soa });
 *
 * // dig @127.0.0.1 -p ${server.port} www.example.test A
 *
 * await server.stop();
 * ```
 */

import { EventEmitter } from 'node:events';
import * as dgram from 'node:dgram';
import * as net from 'node:net';
import dnsPacket from 'dns-packet';
import type { Answer, DecodedPacket, Question } from 'dns-packet';
import { frameMessage } from '../transport/stream.js';
import { canonicalName, toAbsolute } from '../dns/names.js';

// ============================================
// Types
// ============================================

export interface MockDnsServerOptions {
  /**
   * Port to listen on, for UDP and TCP
   * @default 0 (any free port)
   */
  port?: number;

  /**
   * Host to bind to
   * @default '127.0.0.1'
   */
  host?: string;

  /**
   * Response delay in ms
   * @default 0
   */
  delay?: number;

  /**
   * Answer UDP queries with TC set and no records
   * @default false
   */
  truncate?: boolean;

  /**
   * Never answer; for timeout tests
   * @default false
   */
  silent?: boolean;

  /**
   * Set AA on responses
   * @default true
   */
  authoritative?: boolean;
}

export type MockProtocol = 'udp' | 'tcp';

export interface MockQuery {
  id: number;
  name: string;
  type: string;
  protocol: MockProtocol;
  /** RD, AD and CD as sent */
  flags: number;
  /** Authority section, carries the serial of an IXFR request */
  authorities: Answer[];
  /** Additional section, carries the OPT record */
  additionals: Answer[];
}

export interface MockDnsStats {
  queriesReceived: number;
  responsesSent: number;
  queryLog: Array<{ name: string; type: string; protocol: MockProtocol; timestamp: number }>;
}

const RESPONSE_FLAGS = dnsPacket.RECURSION_AVAILABLE;
const CLIENT_FLAGS = dnsPacket.RECURSION_DESIRED | dnsPacket.AUTHENTIC_DATA | dnsPacket.CHECKING_DISABLED;
const RCODE_NXDOMAIN = 3;
const MAX_ALIAS_HOPS = 8;

function nameKey(name: string): string {
  return canonicalName(toAbsolute(name));
}

function isAtOrBelow(name: string, zone: string): boolean {
  const key = nameKey(name);
  const apex = nameKey(zone);
  return apex === '.' || key === apex || key.endsWith(`.${apex}`);
}

// ============================================
// MockDnsServer
// ============================================

export class MockDnsServer extends EventEmitter {
  private options: Required<MockDnsServerOptions>;
  private udp: dgram.Socket | null = null;
  private tcp: net.Server | null = null;
  private connections = new Set<net.Socket>();
  private records = new Map<string, Answer[]>();
  private authorities: Answer[] = [];
  private transfers = new Map<string, Answer[][]>();
  private started = false;
  private boundPort = 0;
  private stats: MockDnsStats = {
    queriesReceived: 0,
    responsesSent: 0,
    queryLog: [],
  };

  constructor(options: MockDnsServerOptions = {}) {
    super();

    this.options = {
      port: 0,
      host: '127.0.0.1',
      delay: 0,
      truncate: false,
      silent: false,
      authoritative: true,
      ...options,
    };
  }

  // ============================================
  // Properties
  // ============================================

  get isRunning(): boolean {
    return this.started;
  }

  get port(): number {
    return this.boundPort;
  }

  get host(): string {
    return this.options.host;
  }

  get statistics(): MockDnsStats {
    return { ...this.stats, queryLog: [...this.stats.queryLog] };
  }

  /**
   * Change behaviour between tests without restarting
   */
  configure(options: Pick<MockDnsServerOptions, 'delay' | 'truncate' | 'silent' | 'authoritative'>): void {
    this.options = { ...this.options, ...options };
  }

  // ============================================
  // Record Management
  // ============================================

  /**
   * Add a record to the answers for its owner name
   */
  addRecord(record: Answer): void {
    const key = nameKey(record.name);
    const records = this.records.get(key) ?? [];
    records.push(record);
    this.records.set(key, records);
  }

  /**
   * Add a record served in the authority section of empty answers for
   * names at or below its owner
   */
  addAuthority(record: Answer): void {
    this.authorities.push(record);
  }

  /**
   * Serve AXFR and IXFR queries for `zone` with these messages, one
   * response per entry. UDP gets the first one only.
   */
  setTransfer(zone: string, messages: Answer[][]): void {
    this.transfers.set(nameKey(zone), messages);
  }

  getRecords(name: string): Answer[] {
    return this.records.get(nameKey(name)) ?? [];
  }

  clearRecords(): void {
    this.records.clear();
    this.authorities = [];
    this.transfers.clear();
  }

  // ============================================
  // Lifecycle
  // ============================================

  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Server already started');
    }

    const tcp = net.createServer((socket) => this.handleConnection(socket));
    this.tcp = tcp;
    await new Promise<void>((resolve, reject) => {
      tcp.once('error', reject);
      tcp.listen(this.options.port, this.options.host, () => {
        tcp.off('error', reject);
        resolve();
      });
    });

    const address = tcp.address();
    this.boundPort = typeof address === 'object' && address !== null ? address.port : this.options.port;

    await new Promise<void>((resolve, reject) => {
      const socket = dgram.createSocket(net.isIPv6(this.options.host) ? 'udp6' : 'udp4');
      this.udp = socket;

      socket.once('error', reject);
      socket.on('message', (msg, rinfo) => {
        void this.handleDatagram(msg, rinfo);
      });
      socket.bind(this.boundPort, this.options.host, () => {
        socket.off('error', reject);
        socket.on('error', (err) => this.reportError(err));
        resolve();
      });
    });

    this.started = true;
    this.emit('start');
  }

  async stop(): Promise<void> {
    if (!this.started) return;

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    const udp = this.udp;
    const tcp = this.tcp;
    this.udp = null;
    this.tcp = null;

    await Promise.all([
      new Promise<void>((resolve) => (udp ? udp.close(() => resolve()) : resolve())),
      new Promise<void>((resolve) => (tcp ? tcp.close(() => resolve()) : resolve())),
    ]);

    this.started = false;
    this.emit('stop');
  }

  reset(): void {
    this.stats = {
      queriesReceived: 0,
      responsesSent: 0,
      queryLog: [],
    };
    this.clearRecords();
    this.emit('reset');
  }

  // ============================================
  // Query Handling
  // ============================================

  private async handleDatagram(msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    const responses = await this.answer(msg, 'udp');
    const [response] = responses;
    if (!response) return;

    this.udp?.send(response, rinfo.port, rinfo.address, (err) => {
      if (err) {
        this.reportError(err);
      } else {
        this.stats.responsesSent++;
      }
    });
  }

  private handleConnection(socket: net.Socket): void {
    this.connections.add(socket);
    let buffer = Buffer.alloc(0);

    socket.on('data', (chunk) => {
      buffer = Buffer.concat([buffer, chunk]);
      while (buffer.length >= 2) {
        const length = buffer.readUInt16BE(0);
        if (buffer.length < 2 + length) break;
        const message = buffer.subarray(2, 2 + length);
        buffer = buffer.subarray(2 + length);
        void this.answer(message, 'tcp').then((responses) => {
          for (const response of responses) {
            if (socket.destroyed) return;
            socket.write(frameMessage(response));
            this.stats.responsesSent++;
          }
        }, (err: unknown) => this.reportError(err));
      }
    });
    socket.on('error', (err) => this.reportError(err));
    socket.on('close', () => this.connections.delete(socket));
  }

  /**
   * Wire responses for one query; none when the query is unreadable or the
   * server is silent
   */
  private async answer(msg: Buffer, protocol: MockProtocol): Promise<Buffer[]> {
    this.stats.queriesReceived++;

    let packet: DecodedPacket;
    try {
      packet = dnsPacket.decode(msg);
    } catch (err) {
      this.reportError(err);
      return [];
    }

    const question = packet.questions?.[0];
    if (!question) return [];

    const query: MockQuery = {
      id: packet.id ?? 0,
      name: toAbsolute(question.name),
      type: question.type,
      protocol,
      flags: (packet.flags ?? 0) & CLIENT_FLAGS,
      authorities: packet.authorities ?? [],
      additionals: packet.additionals ?? [],
    };
    this.stats.queryLog.push({ name: query.name, type: query.type, protocol, timestamp: Date.now() });
    this.emit('query', query);

    if (this.options.delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delay));
    }
    if (this.options.silent) return [];

    const flags = RESPONSE_FLAGS | query.flags | (this.options.authoritative ? dnsPacket.AUTHORITATIVE_ANSWER : 0);

    if (protocol === 'udp' && this.options.truncate) {
      return [this.encode(query, question, flags | dnsPacket.TRUNCATED_RESPONSE, [], [])];
    }

    if (question.type === 'AXFR' || question.type === 'IXFR') {
      const transfer = this.transfers.get(nameKey(question.name));
      if (transfer) {
        const messages = protocol === 'udp' ? transfer.slice(0, 1) : transfer;
        return messages.map((answers) => this.encode(query, question, flags, answers, []));
      }
    }

    const answers = this.lookup(question);
    const authorities =
      answers.length === 0 ? this.authorities.filter((record) => isAtOrBelow(question.name, record.name)) : [];
    const known = answers.length > 0 || this.records.has(nameKey(question.name));
    const rcode = known || authorities.length > 0 ? 0 : RCODE_NXDOMAIN;

    return [this.encode(query, question, flags | rcode, answers, authorities)];
  }

  private lookup(question: Question): Answer[] {
    const answers: Answer[] = [];
    let name = question.name;

    for (let hop = 0; hop < MAX_ALIAS_HOPS; hop++) {
      const records = this.records.get(nameKey(name)) ?? [];
      const matching = records.filter((record) => record.type === question.type);
      if (matching.length > 0) {
        answers.push(...matching);
        break;
      }

      const alias = records.find((record) => record.type === 'CNAME');
      if (!alias || !('data' in alias) || typeof alias.data !== 'string') break;
      answers.push(alias);
      name = alias.data;
    }

    return answers;
  }

  private encode(query: MockQuery, question: Question, flags: number, answers: Answer[], authorities: Answer[]): Buffer {
    this.emit('response', query);
    return dnsPacket.encode({
      type: 'response',
      id: query.id,
      flags,
      questions: [question],
      answers,
      authorities,
    });
  }

  private reportError(err: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }

  // ============================================
  // Static factory
  // ============================================

  static async create(options: MockDnsServerOptions = {}): Promise<MockDnsServer> {
    const server = new MockDnsServer(options);
    await server.start();
    return server;
  }
}
