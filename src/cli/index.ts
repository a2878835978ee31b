#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { InvalidArgumentError, program } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../config/defaults.js';
import { DnsqError, formatAddress } from '../core/errors.js';
import { parseQueryType } from '../dns/types.js';
import { createContext } from '../commands/context.js';
import type { CommandContext } from '../commands/context.js';
import { runQuery } from '../commands/query.js';
import { runXfr } from '../commands/xfr.js';
import { runLookup } from '../commands/lookup.js';
import { formatDiff, formatMessage, formatStats } from '../output/dig.js';
import colors from '../utils/colors.js';
import { getLogger } from '../utils/logger.js';

function integer(name: string, min: number, max: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`${name} must be an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

function seconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  }
  return Math.round(parsed * 1000);
}

function queryType(value: string) {
  try {
    return parseQueryType(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

async function readVersion(): Promise<string> {
  const pkg = z
    .object({ version: z.string() })
    .safeParse(JSON.parse(await readFile(new URL('../../package.json', import.meta.url), 'utf8')));
  return pkg.success ? pkg.data.version : '0.0.0';
}

function reportError(error: unknown): void {
  if (error instanceof DnsqError) {
    console.error(colors.red(`Error: ${error.message}`));
    for (const suggestion of error.suggestions) {
      console.error(colors.gray(`  • ${suggestion}`));
    }
  } else {
    console.error(colors.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
}

interface ServerFlags {
  server?: string;
  port?: number;
  ipv4?: boolean;
  ipv6?: boolean;
  udp?: boolean;
  tls?: boolean;
  tlsHostname?: string;
  timeout?: number;
}

interface QueryFlags extends ServerFlags {
  tcp?: boolean;
  retries?: number;
  udpPayloadSize?: number;
  rd: boolean;
  do?: boolean;
  ad?: boolean;
  cd?: boolean;
  force?: boolean;
  verify?: boolean;
}

interface XfrFlags extends ServerFlags {
  ixfr?: number;
}

/**
 * CLI Entry Point
 */
async function main() {
  const version = await readVersion();
  let context: CommandContext | undefined;
  const getContext = () => (context ??= createContext(loadConfig(), { logger: getLogger() }));

  program
    .name('dnsq')
    .description('Send DNS queries, transfer zones and verify answers against the authoritative servers')
    .version(version);

  program
    .command('query')
    .description('Send a query and print the response')
    .argument('<qname>', 'Name to query, or an address for a reverse lookup')
    .argument('[qtype]', 'Record type (AAAA for names, PTR for addresses)', queryType)
    .option('-s, --server <addr-or-host>', 'Server to send the query to')
    .option('-p, --port <port>', 'Server port (53, or 853 with --tls)', integer('Port', 1, 65535))
    .option('-4, --ipv4', 'Only use IPv4 addresses of a named server')
    .option('-6, --ipv6', 'Only use IPv6 addresses of a named server')
    .option('-u, --udp', 'Use UDP only')
    .option('-t, --tcp', 'Use TCP only')
    .option('--tls', 'Use DNS over TLS')
    .option('--tls-hostname <name>', 'Server name for TLS certificate validation')
    .option('--timeout <seconds>', 'Timeout per attempt', seconds)
    .option('--retries <count>', 'UDP retransmissions', integer('Retries', 0, 255))
    .option('--udp-payload-size <bytes>', 'Advertised UDP payload size', integer('UDP payload size', 512, 65535))
    .option('--no-rd', 'Clear the recursion desired flag')
    .option('--do', 'Set the DNSSEC OK flag')
    .option('--ad', 'Set the authentic data flag')
    .option('--cd', 'Set the checking disabled flag')
    .option('-f, --force', 'Allow AXFR and IXFR queries')
    .option('--verify', 'Compare the answer with the authoritative servers')
    .action(async (qname: string, qtype: ReturnType<typeof queryType> | undefined, flags: QueryFlags) => {
      try {
        if (flags.ipv4 && flags.ipv6) {
          throw new InvalidArgumentError('-4 and -6 exclude each other.');
        }
        const result = await runQuery(
          {
            qname,
            qtype,
            server: flags.server,
            port: flags.port,
            transport: flags.udp ? 'udp' : flags.tls ? 'tls' : flags.tcp ? 'tcp' : 'udp-tcp',
            tlsHostname: flags.tlsHostname,
            ipv4: flags.ipv4,
            ipv6: flags.ipv6,
            timeout: flags.timeout,
            retries: flags.retries,
            udpPayloadSize: flags.udpPayloadSize,
            flags: {
              recursionDesired: flags.rd,
              dnssecOk: Boolean(flags.do),
              authenticData: Boolean(flags.ad),
              checkingDisabled: Boolean(flags.cd),
            },
            force: flags.force,
            verify: flags.verify,
          },
          getContext()
        );

        const { answer, verification } = result;
        answer.messages.forEach((message, index) => {
          const last = index === answer.messages.length - 1;
          console.log(formatMessage(message, last ? answer.stats : undefined).join('\n'));
        });

        if (!verification) return;
        switch (verification.status) {
          case 'match':
            console.log('\n;; Authoritative ANSWER matches.');
            break;
          case 'mismatch':
            console.log('\n;; Authoritative ANSWER does not match.');
            console.log(`;; Difference of ANSWER with authoritative server ${formatAddress(verification.server)}:`);
            console.log(formatDiff(verification.diff).join('\n'));
            break;
          case 'failed':
            console.error(colors.yellow(`\n;; Verification failed: ${verification.error.message}`));
            process.exitCode = 1;
            break;
        }
      } catch (error) {
        reportError(error);
      }
    });

  program
    .command('xfr')
    .description('Transfer a zone (AXFR, or IXFR with --ixfr)')
    .argument('<zone>', 'Zone name, or an address for a reverse zone')
    .option('--ixfr <serial>', 'Incremental transfer from this serial', integer('Serial', 0, 0xffffffff))
    .option('-s, --server <addr-or-host>', 'Server to transfer from')
    .option('-p, --port <port>', 'Server port (53, or 853 with --tls)', integer('Port', 1, 65535))
    .option('-4, --ipv4', 'Only use IPv4 addresses of a named server')
    .option('-6, --ipv6', 'Only use IPv6 addresses of a named server')
    .option('-u, --udp', 'Try UDP first (IXFR only)')
    .option('--tls', 'Use DNS over TLS')
    .option('--tls-hostname <name>', 'Server name for TLS certificate validation')
    .option('--timeout <seconds>', 'Timeout per attempt', seconds)
    .action(async (zone: string, flags: XfrFlags) => {
      try {
        let size = 0;
        const result = await runXfr({ zone, ...flags }, getContext(), (message) => {
          size += message.bytes.length;
          console.log(formatMessage(message).join('\n'));
        });
        console.log(['', ...formatStats(result.stats, size)].join('\n'));
        console.log(`;; XFR messages: ${result.messages}`);
      } catch (error) {
        reportError(error);
      }
    });

  program
    .command('lookup')
    .description('Look up the addresses of host names and the names of addresses')
    .argument('<names...>', 'Host names or addresses')
    .action(async (names: string[]) => {
      try {
        const report = await runLookup(names, getContext());
        report.results.forEach((result, index) => {
          if (index > 0) console.log('');
          switch (result.kind) {
            case 'forward': {
              const alias = result.canonicalName !== result.query.replace(/\.?$/, '.')
                ? ` (alias for ${result.canonicalName})`
                : '';
              console.log(`${result.query}${alias}`);
              const lines = result.addresses.length > 0 ? result.addresses : ['<no addresses found>'];
              lines.forEach((line) => console.log(`  ${line}`));
              break;
            }
            case 'reverse': {
              console.log(result.query);
              const lines = result.names.length > 0 ? result.names : ['<no hosts found>'];
              lines.forEach((line) => console.log(`  ${line}`));
              break;
            }
            case 'failed':
              console.error(colors.red(`${result.query}: ${result.error.message}`));
              break;
          }
        });
        if (!report.ok) {
          throw new DnsqError('not all lookups have succeeded');
        }
      } catch (error) {
        reportError(error);
      }
    });

  await program.parseAsync();
}

// Run the CLI
main().catch((error: unknown) => {
  reportError(error);
});
