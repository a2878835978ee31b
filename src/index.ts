/**
 * dnsq
 *
 * DNS query client: UDP, TCP and DNS over TLS with ordered failover,
 * zone transfers, and verification of answers against the zone's
 * authoritative servers.
 *
 * @example
 * ```typescript
 * import { Client, createServer } from 'dnsq';
 *
 * const client = new Client([
 *   createServer({ address: '192.0.2.53' }),
 *   createServer({ address: '198.51.100.53', transport: 'tcp' }),
 * ]);
 *
 * const answer = await client.query({ name: 'example.com', type: 'MX' });
 * console.log(answer.message.rcodeName, answer.stats.duration);
 * ```
 *
 * @packageDocumentation
 */

// Core
export { Client, type ClientOptions } from './core/client.js';
export { RequestMessage, type RequestFlags, type EncodeOptions } from './core/request.js';
export { Answer, DnsMessage } from './core/response.js';
export { ResponseStream } from './core/response-stream.js';
export {
  DNS_PORT,
  DNS_TLS_PORT,
  ServerSchema,
  createServer,
  createRegistry,
  isStreamTransport,
  type Server,
  type ServerInit,
  type ServerRegistry,
  type Transport,
} from './core/server.js';
export { Stats, type Protocol, type ServerAddress } from './core/stats.js';
export {
  DnsqError,
  TimeoutError,
  NetworkError,
  ConnectionError,
  ProtocolError,
  StateError,
  ConfigurationError,
  ParseError,
  VerificationError,
  formatAddress,
  toDnsqError,
  type TimeoutPhase,
  type VerificationHop,
} from './core/errors.js';

// Configuration
export { DEFAULT_QUERY_DEFAULTS, loadConfig, type QueryDefaults } from './config/defaults.js';
export {
  parseResolvConf,
  parseServerAddress,
  systemConfig,
  loadSystemConfig,
  type ResolvConf,
  type SystemConfig,
} from './config/resolv-conf.js';

// Transport
export {
  NetConnector,
  type Connector,
  type DatagramExchange,
  type ResponseReceiver,
  type StreamConnection,
  type StreamProtocol,
} from './transport/connector.js';

// DNS
export * from './dns/index.js';

// Commands
export { createContext, type CommandContext } from './commands/context.js';
export { runQuery, type QueryOptions, type QueryResult, type Verification } from './commands/query.js';
export { runXfr, type XfrOptions, type XfrResult } from './commands/xfr.js';
export { runLookup, type LookupResult, type LookupReport } from './commands/lookup.js';
export type { ServerSelection } from './commands/servers.js';

// Output
export { formatMessage, formatRecord, formatFlags, formatStats, formatDiff } from './output/dig.js';

// Logging
export { DnsqLogger, getLogger, setLogger, type LoggerOptions } from './utils/logger.js';
export { consoleLogger, silentLogger, createLevelLogger, type Logger, type LogLevel } from './types/logger.js';
