import { isIP } from 'node:net';
import { Client } from '../core/client.js';
import { ConfigurationError, VerificationError } from '../core/errors.js';
import { RequestMessage } from '../core/request.js';
import type { RequestFlags } from '../core/request.js';
import type { Answer } from '../core/response.js';
import type { ServerAddress } from '../core/stats.js';
import { AuthoritativeResolver } from '../dns/authoritative.js';
import { diffAnswers } from '../dns/diff.js';
import type { DiffItem } from '../dns/diff.js';
import { reverseName } from '../dns/names.js';
import { StubResolver } from '../dns/stub.js';
import type { QueryType } from '../dns/types.js';
import { clientOptions } from './context.js';
import type { CommandContext } from './context.js';
import { selectClient } from './servers.js';
import type { ServerSelection } from './servers.js';

export interface QueryOptions extends ServerSelection {
  /** Name to query, or an address for a reverse lookup */
  qname: string;
  /** AAAA for names and PTR for addresses when absent */
  qtype?: QueryType;
  flags?: Partial<RequestFlags>;
  /** Allow AXFR and IXFR */
  force?: boolean;
  /** Compare the answer with the one from the authoritative servers */
  verify?: boolean;
}

export type Verification =
  | { status: 'match'; server: ServerAddress }
  | { status: 'mismatch'; server: ServerAddress; diff: DiffItem[] }
  | { status: 'failed'; error: Error };

export interface QueryResult {
  answer: Answer;
  verification?: Verification;
}

export function queryName(qname: string): string {
  return isIP(qname) !== 0 ? reverseName(qname) : qname;
}

export function queryType(options: Pick<QueryOptions, 'qname' | 'qtype'>): QueryType {
  if (options.qtype) return options.qtype;
  return isIP(options.qname) !== 0 ? 'PTR' : 'AAAA';
}

/**
 * Query, then optionally verify the answer against the zone's
 * authoritative servers.
 *
 * A failing dispatch rejects. A failing verification does not: the primary
 * answer comes back with `verification.status === 'failed'`.
 */
export async function runQuery(options: QueryOptions, context: CommandContext): Promise<QueryResult> {
  const qtype = queryType(options);
  if ((qtype === 'AXFR' || qtype === 'IXFR') && !options.force) {
    throw new ConfigurationError(
      `${qtype} queries start a zone transfer`,
      {
        configKey: 'qtype',
        suggestions: ['Use the xfr command for zone transfers.', 'Pass --force to query anyway.'],
      }
    );
  }

  const name = queryName(options.qname);
  const client = await selectClient(options, context);
  const request = new RequestMessage({ name, type: qtype }, options.flags);
  const answer = await client.request(request);

  if (!options.verify) {
    return { answer };
  }
  return { answer, verification: await verify(name, qtype, answer, options, context) };
}

async function verify(
  name: string,
  type: QueryType,
  answer: Answer,
  options: QueryOptions,
  context: CommandContext
): Promise<Verification> {
  try {
    const resolver = new AuthoritativeResolver(
      StubResolver.system(await context.system(), clientOptions(context)),
      {
        timeout: options.timeout ?? context.defaults.timeout,
        retries: options.retries ?? context.defaults.retries,
        udpPayloadSize: options.udpPayloadSize ?? context.defaults.udpPayloadSize,
      },
      context.logger
    );
    const servers = await resolver.resolve(name);

    let authoritative: Answer;
    try {
      authoritative = await new Client(servers, clientOptions(context)).query({ name, type });
    } catch (err) {
      throw new VerificationError(
        `Authoritative query failed: ${err instanceof Error ? err.message : String(err)}`,
        { hop: 'dispatch', cause: err }
      );
    }

    const server = authoritative.stats.server;
    const diff = diffAnswers(authoritative.message, answer.message);
    return diff ? { status: 'mismatch', server, diff } : { status: 'match', server };
  } catch (err) {
    context.logger.debug(`Verification failed: ${err instanceof Error ? err.message : String(err)}`);
    return { status: 'failed', error: err instanceof Error ? err : new Error(String(err)) };
  }
}
