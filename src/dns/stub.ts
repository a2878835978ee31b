import { Client } from '../core/client.js';
import type { ClientOptions } from '../core/client.js';
import type { Answer } from '../core/response.js';
import type { SystemConfig } from '../config/resolv-conf.js';
import { namesEqual, reverseName, toAbsolute } from './names.js';
import type { ParsedRecord } from './records.js';
import type { QueryType } from './types.js';

export interface HostInfo {
  name: string;
  /** Target of the CNAME chain starting at `name`, or `name` itself */
  canonicalName: string;
  addresses: string[];
}

function followAliases(name: string, records: ParsedRecord[]): string {
  let current = name;
  // At most one hop per record
  for (let i = 0; i < records.length; i++) {
    const alias = records.find(
      (record) => record.type === 'CNAME' && typeof record.data === 'string' && namesEqual(record.name, current)
    );
    if (!alias || typeof alias.data !== 'string') break;
    current = toAbsolute(alias.data);
  }
  return current;
}

/**
 * Stub resolver: recursive queries against the system's servers.
 *
 * Used for the verification hops, for turning a server name into
 * addresses and by the lookup command.
 */
export class StubResolver {
  constructor(private readonly client: Client) {}

  static system(conf: SystemConfig, options: ClientOptions = {}): StubResolver {
    return new StubResolver(Client.system(conf, options));
  }

  query(name: string, type: QueryType): Promise<Answer> {
    return this.client.query({ name, type });
  }

  /**
   * IPv4 and IPv6 addresses of a host. A and AAAA are asked for at the
   * same time; only when both queries fail does the lookup fail.
   */
  async resolveHost(name: string): Promise<HostInfo> {
    const results = await Promise.allSettled([this.query(name, 'A'), this.query(name, 'AAAA')]);

    const info: HostInfo = { name: toAbsolute(name), canonicalName: toAbsolute(name), addresses: [] };
    let failure: unknown;
    for (const result of results) {
      if (result.status === 'rejected') {
        failure ??= result.reason;
        continue;
      }

      const { answers } = result.value.message.records();
      info.canonicalName = followAliases(info.name, answers);
      for (const record of answers) {
        if (
          (record.type === 'A' || record.type === 'AAAA') &&
          typeof record.data === 'string' &&
          namesEqual(record.name, info.canonicalName)
        ) {
          info.addresses.push(record.data);
        }
      }
    }

    if (failure !== undefined && results.every((result) => result.status === 'rejected')) {
      throw failure;
    }
    return info;
  }

  async lookupHost(name: string): Promise<string[]> {
    return (await this.resolveHost(name)).addresses;
  }

  /**
   * Host names of an address, from its PTR records
   */
  async lookupAddr(address: string): Promise<string[]> {
    const answer = await this.query(reverseName(address), 'PTR');
    return answer.message
      .records()
      .answers.filter((record) => record.type === 'PTR' && typeof record.data === 'string')
      .map((record) => toAbsolute(String(record.data)));
  }
}
