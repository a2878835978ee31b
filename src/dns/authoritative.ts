import { VerificationError } from '../core/errors.js';
import type { VerificationHop } from '../core/errors.js';
import { DNS_PORT, createRegistry, createServer } from '../core/server.js';
import type { ServerRegistry } from '../core/server.js';
import type { QueryDefaults } from '../config/defaults.js';
import type { Logger } from '../types/logger.js';
import { silentLogger } from '../types/logger.js';
import { namesEqual, toAbsolute } from './names.js';
import type { StubResolver } from './stub.js';

export type ServerDefaults = Pick<QueryDefaults, 'timeout' | 'retries' | 'udpPayloadSize'>;

/**
 * Finds the servers that are authoritative for a name, starting from
 * nothing but a stub resolver:
 *
 * 1. the zone apex, from a SOA query for the name
 * 2. the apex's NS set
 * 3. the addresses of every nameserver, looked up concurrently
 * 4. one `udp-tcp` server on port 53 per distinct address
 *
 * Any failing hop ends the chain with a VerificationError.
 */
export class AuthoritativeResolver {
  constructor(
    private readonly resolver: StubResolver,
    private readonly defaults: ServerDefaults,
    private readonly logger: Logger = silentLogger
  ) {}

  async resolve(name: string): Promise<ServerRegistry> {
    const apex = await this.findApex(name);
    this.logger.debug(`Apex of ${toAbsolute(name)} is ${apex}`);

    const nameservers = await this.findNameservers(apex);
    this.logger.debug(`NS set of ${apex}: ${nameservers.join(', ')}`);

    const addresses = await this.findAddresses(nameservers);
    this.logger.debug(`Authoritative addresses: ${[...addresses].join(', ')}`);

    return createRegistry(
      [...addresses].map((address) =>
        createServer({
          address,
          port: DNS_PORT,
          transport: 'udp-tcp',
          timeout: this.defaults.timeout,
          retries: this.defaults.retries,
          udpPayloadSize: this.defaults.udpPayloadSize,
        })
      )
    );
  }

  /**
   * The name itself when the answer section opens with its SOA, otherwise
   * the owner of the SOA in the authority section.
   */
  async findApex(name: string): Promise<string> {
    const sections = await this.hop('apex', `SOA lookup for ${toAbsolute(name)}`, async () => {
      const answer = await this.resolver.query(name, 'SOA');
      return answer.message.records();
    });

    // Only the first answer record counts; anything else there falls through
    // to the authority section.
    const [first] = sections.answers;
    if (first && first.type === 'SOA' && namesEqual(first.name, name)) {
      return toAbsolute(name);
    }

    const soa = sections.authorities.find((record) => record.type === 'SOA');
    if (soa) {
      return toAbsolute(soa.name);
    }

    throw new VerificationError('no SOA record', { hop: 'apex' });
  }

  /**
   * NS records owned by the apex itself
   */
  async findNameservers(apex: string): Promise<string[]> {
    const { answers } = await this.hop('ns', `NS lookup for ${apex}`, async () => {
      const answer = await this.resolver.query(apex, 'NS');
      return answer.message.records();
    });

    const nameservers = answers
      .filter((record) => record.type === 'NS' && namesEqual(record.name, apex))
      .flatMap((record) => (typeof record.data === 'string' ? [toAbsolute(record.data)] : []));

    if (nameservers.length === 0) {
      throw new VerificationError('no NS record', { hop: 'ns' });
    }
    return nameservers;
  }

  /**
   * Union of the nameservers' addresses
   */
  async findAddresses(nameservers: string[]): Promise<Set<string>> {
    const lookups = await this.hop('addresses', 'Nameserver address lookup', () =>
      Promise.all(nameservers.map((nameserver) => this.resolver.lookupHost(nameserver)))
    );

    const addresses = new Set(lookups.flat());
    if (addresses.size === 0) {
      throw new VerificationError('no addresses', { hop: 'addresses' });
    }
    return addresses;
  }

  private async hop<T>(hop: VerificationHop, what: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof VerificationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new VerificationError(`${what} failed: ${reason}`, { hop, cause: err });
    }
  }
}
