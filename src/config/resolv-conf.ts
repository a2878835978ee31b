import { readFile } from 'node:fs/promises';
import { getServers } from 'node:dns';
import { isIP } from 'node:net';
import { DNS_PORT, createServer } from '../core/server.js';
import type { Server, Transport } from '../core/server.js';
import type { QueryDefaults } from './defaults.js';

/**
 * The parts of resolv.conf(5) a query client cares about
 */
export interface ResolvConf {
  nameservers: string[];
  /** `options timeout:n`, seconds */
  timeout?: number;
  /** `options attempts:n` */
  attempts?: number;
  /** `options use-vc`: TCP only */
  useVc: boolean;
}

/**
 * The system's default servers, loaded once and passed around by value
 */
export interface SystemConfig {
  readonly servers: readonly Server[];
}

function parseOption(conf: ResolvConf, option: string): void {
  const [key, value] = option.split(':', 2);
  const number = value === undefined ? NaN : Number.parseInt(value, 10);

  switch (key) {
    case 'timeout':
      if (Number.isFinite(number) && number > 0) conf.timeout = number;
      break;
    case 'attempts':
      if (Number.isFinite(number) && number >= 0) conf.attempts = number;
      break;
    case 'use-vc':
    case 'usevc':
    case 'tcp':
      conf.useVc = true;
      break;
  }
}

export function parseResolvConf(text: string): ResolvConf {
  const conf: ResolvConf = { nameservers: [], useVc: false };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/[#;].*$/, '').trim();
    if (!line) continue;

    const [keyword, ...args] = line.split(/\s+/);
    switch (keyword) {
      case 'nameserver': {
        const address = args[0]?.split('%')[0];
        if (address && isIP(address) !== 0) conf.nameservers.push(address);
        break;
      }
      case 'options':
        for (const option of args) parseOption(conf, option);
        break;
    }
  }

  return conf;
}

/**
 * Split what `dns.getServers()` reports (`1.2.3.4`, `1.2.3.4:5353`,
 * `[::1]:5353`, `::1`) into address and port
 */
export function parseServerAddress(value: string): { address: string; port: number } | undefined {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(value);
  if (bracketed) {
    const [, address, port] = bracketed;
    return isIP(address) === 6 ? { address, port: port ? Number(port) : DNS_PORT } : undefined;
  }
  if (isIP(value) !== 0) return { address: value, port: DNS_PORT };

  const withPort = /^([\d.]+):(\d+)$/.exec(value);
  if (withPort && isIP(withPort[1]) === 4) {
    return { address: withPort[1], port: Number(withPort[2]) };
  }
  return undefined;
}

export function systemConfig(
  conf: ResolvConf,
  defaults: QueryDefaults,
  fallback: readonly string[] = []
): SystemConfig {
  const transport: Transport = conf.useVc ? 'tcp' : 'udp-tcp';
  const timeout = conf.timeout !== undefined ? conf.timeout * 1000 : defaults.timeout;
  const retries = Math.min(conf.attempts ?? defaults.retries, 255);

  const addresses =
    conf.nameservers.length > 0
      ? conf.nameservers.map((address) => ({ address, port: DNS_PORT }))
      : fallback.flatMap((value) => parseServerAddress(value) ?? []);

  return {
    servers: Object.freeze(
      addresses.map(({ address, port }) =>
        createServer({
          address,
          port,
          transport,
          timeout,
          retries,
          udpPayloadSize: defaults.udpPayloadSize,
        })
      )
    ),
  };
}

/**
 * Load the system resolver configuration from `defaults.resolvConf`.
 *
 * Falls back to the servers Node's resolver uses when the file is missing
 * or names no nameserver.
 */
export async function loadSystemConfig(defaults: QueryDefaults): Promise<SystemConfig> {
  let conf: ResolvConf = { nameservers: [], useVc: false };
  try {
    conf = parseResolvConf(await readFile(defaults.resolvConf, 'utf8'));
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ENOENT' && code !== 'EACCES') throw err;
  }
  return systemConfig(conf, defaults, getServers());
}
