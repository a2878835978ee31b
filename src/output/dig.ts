/**
 * Minimal dig-like rendering for the CLI.
 */

import dnsPacket from 'dns-packet';
import type { DnsMessage } from '../core/response.js';
import type { Stats } from '../core/stats.js';
import type { DiffItem } from '../dns/diff.js';
import { presentData } from '../dns/records.js';
import type { ParsedRecord } from '../dns/records.js';

const QUERY_RESPONSE = 0x8000;

const HEADER_FLAGS: Array<[string, number]> = [
  ['qr', QUERY_RESPONSE],
  ['aa', dnsPacket.AUTHORITATIVE_ANSWER],
  ['tc', dnsPacket.TRUNCATED_RESPONSE],
  ['rd', dnsPacket.RECURSION_DESIRED],
  ['ra', dnsPacket.RECURSION_AVAILABLE],
  ['ad', dnsPacket.AUTHENTIC_DATA],
  ['cd', dnsPacket.CHECKING_DISABLED],
];

const OPCODES = ['QUERY', 'IQUERY', 'STATUS', 'OPCODE3', 'NOTIFY', 'UPDATE'];

export function formatRecord(record: ParsedRecord): string {
  return `${record.name}  ${record.ttl}  ${record.class}  ${record.type}  ${presentData(record)}`;
}

export function formatFlags(flags: number): string {
  return HEADER_FLAGS.filter(([, bit]) => (flags & bit) !== 0)
    .map(([name]) => name)
    .join(' ');
}

/**
 * Header, sections and, when given, the stats of a response
 */
export function formatMessage(message: DnsMessage, stats?: Stats): string[] {
  const questions = message.questions();
  const { answers, authorities, additionals, opt } = message.records();
  const opcode = OPCODES[(message.flags >> 11) & 0x0f] ?? 'OPCODE';
  const lines: string[] = [];

  lines.push(`;; ->>HEADER<<- opcode: ${opcode}, rcode: ${message.rcodeName}, id: ${message.id}`);
  lines.push(
    `;; flags: ${formatFlags(message.flags)}; QUERY: ${questions.length}, ` +
      `ANSWER: ${answers.length}, AUTHORITY: ${authorities.length}, ADDITIONAL: ${additionals.length}`
  );

  if (opt) {
    lines.push('', ';; OPT PSEUDOSECTION:');
    lines.push(`; EDNS: version ${opt.ednsVersion}; flags: ${opt.dnssecOk ? 'do' : ''}; udp: ${opt.udpPayloadSize}`);
  }

  if (questions.length > 0) {
    lines.push('', ';; QUESTION SECTION:');
    for (const question of questions) {
      lines.push(`;${question.name}  ${question.class}  ${question.type}`);
    }
  }

  const sections: Array<[string, ParsedRecord[]]> = [
    ['ANSWER', answers],
    ['AUTHORITY', authorities],
    ['ADDITIONAL', additionals],
  ];
  for (const [title, records] of sections) {
    if (records.length === 0) continue;
    lines.push('', `;; ${title} SECTION:`);
    lines.push(...records.map(formatRecord));
  }

  if (stats) {
    lines.push('', ...formatStats(stats, message.bytes.length));
  }
  return lines;
}

export function formatStats(stats: Stats, size: number): string[] {
  return [
    `;; Query time: ${Math.round(stats.duration)} msec`,
    `;; SERVER: ${stats.server.address}#${stats.server.port} (${stats.protocol})`,
    `;; WHEN: ${stats.start.toString()}`,
    `;; MSG SIZE  rcvd: ${size}`,
  ];
}

const DIFF_MARKS: Record<DiffItem['action'], string> = {
  added: '+ ',
  removed: '- ',
  unchanged: '  ',
};

export function formatDiff(diff: DiffItem[]): string[] {
  return diff.map(
    ({ action, record }) =>
      `${DIFF_MARKS[action]}${record.owner} ${record.class} ${record.type} ${record.data}`
  );
}
