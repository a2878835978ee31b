import { isIP } from 'node:net';
import { Client } from '../core/client.js';
import { ConfigurationError } from '../core/errors.js';
import { DNS_PORT, DNS_TLS_PORT, createServer } from '../core/server.js';
import type { Server, Transport } from '../core/server.js';
import { StubResolver } from '../dns/stub.js';
import { clientOptions } from './context.js';
import type { CommandContext } from './context.js';

/**
 * Where and how to send a command's request
 */
export interface ServerSelection {
  /** Address or host name; the system servers when absent */
  server?: string;
  port?: number;
  transport: Transport;
  tlsHostname?: string;
  /** Only use IPv4 addresses of a server given by name */
  ipv4?: boolean;
  /** Only use IPv6 addresses of a server given by name */
  ipv6?: boolean;
  timeout?: number;
  retries?: number;
  udpPayloadSize?: number;
}

/**
 * Build the client for a command:
 *
 * - an address is used as it is, TLS needs an explicit hostname;
 * - a host name is resolved through the system servers and doubles as the
 *   TLS hostname;
 * - without a server the system servers are used, with the selected
 *   transport; TLS can't be used there.
 */
export async function selectClient(selection: ServerSelection, context: CommandContext): Promise<Client> {
  const { defaults } = context;
  const tls = selection.transport === 'tls';
  const settings = {
    port: selection.port ?? (tls ? DNS_TLS_PORT : DNS_PORT),
    transport: selection.transport,
    timeout: selection.timeout ?? defaults.timeout,
    retries: selection.retries ?? defaults.retries,
    udpPayloadSize: selection.udpPayloadSize ?? defaults.udpPayloadSize,
  };

  if (selection.server === undefined) {
    if (tls) {
      throw new ConfigurationError('--server is required for TLS transport', { configKey: 'server' });
    }
    const system = await context.system();
    const servers: Server[] = system.servers.map((server) =>
      createServer({
        address: server.address,
        port: server.port,
        transport: selection.transport,
        timeout: selection.timeout ?? server.timeout,
        retries: selection.retries ?? server.retries,
        udpPayloadSize: selection.udpPayloadSize ?? server.udpPayloadSize,
      })
    );
    return new Client(servers, clientOptions(context));
  }

  if (isIP(selection.server) !== 0) {
    if (tls && !selection.tlsHostname) {
      throw new ConfigurationError('--tls-hostname is required for TLS transport', {
        configKey: 'tlsHostname',
      });
    }
    return new Client(
      [createServer({ ...settings, address: selection.server, tlsHostname: selection.tlsHostname })],
      clientOptions(context)
    );
  }

  const host = selection.server;
  const resolver = StubResolver.system(await context.system(), clientOptions(context));
  const addresses = (await resolver.lookupHost(host)).filter((address) => {
    const family = isIP(address);
    return !(family === 4 && selection.ipv6) && !(family === 6 && selection.ipv4);
  });
  context.logger.debug(`Server ${host} resolved to ${addresses.join(', ') || 'nothing'}`);

  return new Client(
    addresses.map((address) =>
      createServer({ ...settings, address, tlsHostname: selection.tlsHostname ?? host })
    ),
    clientOptions(context)
  );
}
