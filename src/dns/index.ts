/**
 * DNS Module
 *
 * Names, record types, record-level parsing and the resolvers built on
 * the client.
 *
 * @example
 * ```typescript
 * import { AuthoritativeResolver, StubResolver, diffAnswers } from 'dnsq/dns';
 *
 * const stub = StubResolver.system(await loadSystemConfig(loadConfig()));
 * const servers = await new AuthoritativeResolver(stub, defaults).resolve('www.example.com');
 * ```
 *
 * @packageDocumentation
 */

export { toAbsolute, canonicalName, namesEqual, compareNames, reverseName } from './names.js';
export { QUERY_TYPES, isQueryType, parseQueryType, type QueryType } from './types.js';
export {
  skipName,
  readSections,
  readAnswerRecords,
  canonicalForm,
  presentData,
  parseSoaData,
  type ParsedRecord,
  type ParsedSections,
  type CanonicalForm,
  type SoaData,
} from './records.js';
export { diffAnswers, type DiffAction, type DiffItem, type DiffRecord } from './diff.js';
export { TransferTracker } from './xfr.js';
export { StubResolver, type HostInfo } from './stub.js';
export { AuthoritativeResolver, type ServerDefaults } from './authoritative.js';
