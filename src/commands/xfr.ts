import { ConfigurationError } from '../core/errors.js';
import { RequestMessage } from '../core/request.js';
import type { DnsMessage } from '../core/response.js';
import type { Stats } from '../core/stats.js';
import type { Transport } from '../core/server.js';
import type { CommandContext } from './context.js';
import { queryName } from './query.js';
import { selectClient } from './servers.js';
import type { ServerSelection } from './servers.js';

export interface XfrOptions extends Omit<ServerSelection, 'transport'> {
  /** Zone name, or an address for a reverse zone */
  zone: string;
  /** Ask for an IXFR from this serial instead of an AXFR */
  ixfr?: number;
  /** Try UDP first, only allowed with IXFR */
  udp?: boolean;
  tls?: boolean;
}

export interface XfrResult {
  messages: number;
  stats: Stats;
}

/**
 * Transfer a zone, handing every message to `onMessage` as it arrives.
 *
 * TCP by default. With `udp` the request goes out as an ordinary query
 * (UDP, then TCP on truncation); RFC 5936 leaves AXFR over UDP undefined, so
 * that is only accepted for IXFR.
 */
export async function runXfr(
  options: XfrOptions,
  context: CommandContext,
  onMessage: (message: DnsMessage, stats: Stats) => void
): Promise<XfrResult> {
  if (options.udp && options.ixfr === undefined) {
    throw new ConfigurationError('UDP is only permitted with IXFR', { configKey: 'udp' });
  }

  const transport: Transport = options.tls ? 'tls' : options.udp ? 'udp-tcp' : 'tcp';
  const client = await selectClient({ ...options, transport }, context);
  const request = new RequestMessage(
    { name: queryName(options.zone), type: options.ixfr === undefined ? 'AXFR' : 'IXFR' },
    { recursionDesired: false },
    { ixfrSerial: options.ixfr }
  );

  if (transport === 'udp-tcp') {
    const answer = await client.request(request);
    for (const message of answer.messages) {
      onMessage(message, answer.stats);
    }
    return { messages: answer.messages.length, stats: answer.stats };
  }

  const response = await client.requestMulti(request);
  let messages = 0;
  for await (const message of response) {
    messages++;
    onMessage(message, response.stats);
  }
  return { messages, stats: response.stats };
}
