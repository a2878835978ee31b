import { isIP } from 'node:net';
import { StubResolver } from '../dns/stub.js';
import { clientOptions } from './context.js';
import type { CommandContext } from './context.js';

export type LookupResult =
  | { kind: 'forward'; query: string; canonicalName: string; addresses: string[] }
  | { kind: 'reverse'; query: string; names: string[] }
  | { kind: 'failed'; query: string; error: Error };

export interface LookupReport {
  results: LookupResult[];
  /** Whether every lookup succeeded */
  ok: boolean;
}

/**
 * Addresses of host names and host names of addresses, through the
 * system servers. A failed lookup doesn't stop the others.
 */
export async function runLookup(queries: string[], context: CommandContext): Promise<LookupReport> {
  const resolver = StubResolver.system(await context.system(), clientOptions(context));
  const results: LookupResult[] = [];

  for (const query of queries) {
    try {
      if (isIP(query) !== 0) {
        results.push({ kind: 'reverse', query, names: await resolver.lookupAddr(query) });
      } else {
        const host = await resolver.resolveHost(query);
        results.push({ kind: 'forward', query, canonicalName: host.canonicalName, addresses: host.addresses });
      }
    } catch (err) {
      context.logger.debug(`Lookup of ${query} failed`);
      results.push({ kind: 'failed', query, error: err instanceof Error ? err : new Error(String(err)) });
    }
  }

  return { results, ok: results.every((result) => result.kind !== 'failed') };
}
