import { isIP } from 'node:net';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Transport used to reach a server.
 *
 * - `udp`: datagrams only
 * - `udp-tcp`: datagrams, redone over TCP when the response is truncated
 * - `tcp`: a single stream connection
 * - `tls`: DNS over TLS (RFC 7858)
 */
export type Transport = 'udp' | 'udp-tcp' | 'tcp' | 'tls';

export const DNS_PORT = 53;
export const DNS_TLS_PORT = 853;

export interface Server {
  readonly address: string;
  readonly port: number;
  readonly transport: Transport;
  /** Per-attempt timeout in milliseconds */
  readonly timeout: number;
  /** Datagram retransmissions after the first attempt */
  readonly retries: number;
  /** Advertised EDNS UDP payload size */
  readonly udpPayloadSize: number;
  /** Name used for SNI and certificate validation, required for `tls` */
  readonly tlsHostname?: string;
}

export type ServerRegistry = readonly Server[];

export const ServerSchema = z.object({
  address: z.string().refine((value) => isIP(value) !== 0, {
    message: 'must be an IPv4 or IPv6 address',
  }),
  port: z.number().int().min(1).max(65535).default(DNS_PORT),
  transport: z.enum(['udp', 'udp-tcp', 'tcp', 'tls']).default('udp-tcp'),
  timeout: z.number().positive().default(5000),
  retries: z.number().int().min(0).max(255).default(2),
  udpPayloadSize: z.number().int().min(512).max(65535).default(1232),
  tlsHostname: z.string().min(1).optional(),
});

export type ServerInit = z.input<typeof ServerSchema>;

/**
 * Create an immutable Server value
 *
 * @example
 * ```typescript
 * const server = createServer({ address: '9.9.9.9', transport: 'tls', port: 853, tlsHostname: 'dns.quad9.net' });
 * ```
 */
export function createServer(init: ServerInit): Server {
  const parsed = ServerSchema.safeParse(init);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || 'server';
    throw new ConfigurationError(`Invalid server ${key}: ${issue?.message ?? 'invalid value'}`, {
      configKey: key,
    });
  }

  const { tlsHostname, ...rest } = parsed.data;
  const server: Server = tlsHostname === undefined ? rest : { ...rest, tlsHostname };
  return Object.freeze(server);
}

/**
 * Build the ordered candidate list. An empty list is a configuration error.
 */
export function createRegistry(servers: Iterable<Server>): ServerRegistry {
  const list = Array.from(servers);
  if (list.length === 0) {
    throw new ConfigurationError('No servers to send the request to', {
      configKey: 'servers',
      suggestions: [
        'Pass a server with --server.',
        'Check that the system resolver configuration lists a nameserver.'
      ],
    });
  }
  return Object.freeze(list);
}

export function isStreamTransport(transport: Transport): boolean {
  switch (transport) {
    case 'tcp':
    case 'tls':
      return true;
    case 'udp':
    case 'udp-tcp':
      return false;
  }
}
