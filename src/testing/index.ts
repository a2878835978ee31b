/**
 * Testing utilities
 *
 * In-process DNS server to point the client at.
 *
 * @example
 * ```typescript
 * import { MockDnsServer } from 'dnsq/testing';
 * import { Client, createServer } from 'dnsq';
 *
 * const server = await MockDnsServer.create();
 * server.addRecord({ type: 'A', name: 'www.example.test', data: '192.0.2.1' });
 *
 * const client = new Client([createServer({ address: '127.0.0.1', port: server.port, transport: 'udp' })]);
 * const answer = await client.query({ name: 'www.example.test', type: 'A' });
 * ```
 */

export { MockDnsServer } from './mock-dns-server.js';

export type {
  MockDnsServerOptions,
  MockDnsStats,
  MockProtocol,
  MockQuery,
} from './mock-dns-server.js';
