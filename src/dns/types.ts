import type { RecordType } from 'dns-packet';
import { ConfigurationError } from '../core/errors.js';

/**
 * Record types that may be asked for in a query
 */
export const QUERY_TYPES = [
  'A',
  'AAAA',
  'AXFR',
  'CAA',
  'CNAME',
  'DNAME',
  'DNSKEY',
  'DS',
  'HINFO',
  'IXFR',
  'MX',
  'NAPTR',
  'NS',
  'NSEC',
  'NSEC3',
  'NSEC3PARAM',
  'PTR',
  'RRSIG',
  'SOA',
  'SRV',
  'SSHFP',
  'TLSA',
  'TXT',
] as const satisfies readonly RecordType[];

export type QueryType = (typeof QUERY_TYPES)[number];

export function isQueryType(value: string): value is QueryType {
  return QUERY_TYPES.some((type) => type === value);
}

export function parseQueryType(value: string): QueryType {
  const upper = value.toUpperCase();
  if (!isQueryType(upper)) {
    throw new ConfigurationError(`Unknown record type: ${value}`, {
      configKey: 'qtype',
      suggestions: [`Use one of: ${QUERY_TYPES.join(', ')}`],
    });
  }
  return upper;
}
