import { describe, it, expect } from 'vitest';
import dnsPacket from 'dns-packet';
import { formatDiff, formatFlags, formatMessage, formatStats } from '../../src/output/dig.js';
import { Stats } from '../../src/core/stats.js';
import { a, message, ns, soa } from '../helpers/dns.js';

const QUESTION = { name: 'www.example.com', type: 'A' } as const;

describe('formatFlags', () => {
  it('should list the set header flags in order', () => {
    expect(formatFlags(0x8000 | dnsPacket.RECURSION_DESIRED | dnsPacket.RECURSION_AVAILABLE)).toBe('qr rd ra');
    expect(formatFlags(dnsPacket.AUTHORITATIVE_ANSWER | dnsPacket.TRUNCATED_RESPONSE)).toBe('aa tc');
    expect(formatFlags(0)).toBe('');
  });
});

describe('formatMessage', () => {
  it('should render the header, question and answer', () => {
    const response = message(QUESTION, {
      id: 7,
      flags: dnsPacket.RECURSION_DESIRED | dnsPacket.RECURSION_AVAILABLE,
      answers: [a('www.example.com', '192.0.2.80')],
    });

    expect(formatMessage(response)).toEqual([
      ';; ->>HEADER<<- opcode: QUERY, rcode: NOERROR, id: 7',
      ';; flags: qr rd ra; QUERY: 1, ANSWER: 1, AUTHORITY: 0, ADDITIONAL: 0',
      '',
      ';; QUESTION SECTION:',
      ';www.example.com.  IN  A',
      '',
      ';; ANSWER SECTION:',
      'www.example.com.  300  IN  A  192.0.2.80',
    ]);
  });

  it('should render the authority section and the rcode', () => {
    const response = message(QUESTION, {
      id: 8,
      flags: dnsPacket.AUTHORITATIVE_ANSWER,
      rcode: 3,
      authorities: [soa('example.com', 2024010101)],
    });

    const lines = formatMessage(response);
    expect(lines[0]).toBe(';; ->>HEADER<<- opcode: QUERY, rcode: NXDOMAIN, id: 8');
    expect(lines[1]).toBe(';; flags: qr aa; QUERY: 1, ANSWER: 0, AUTHORITY: 1, ADDITIONAL: 0');
    expect(lines.slice(-2)).toEqual([
      ';; AUTHORITY SECTION:',
      'example.com.  3600  IN  SOA  ns1.example.com. hostmaster.example.com. 2024010101 7200 900 1209600 300',
    ]);
  });

  it('should render the EDNS pseudo-section', () => {
    const response = message(QUESTION, {
      additionals: [
        {
          type: 'OPT',
          name: '.',
          udpPayloadSize: 1232,
          extendedRcode: 0,
          ednsVersion: 0,
          flags: dnsPacket.DNSSEC_OK,
          flag_do: true,
          options: [],
        },
      ],
    });

    const lines = formatMessage(response);
    expect(lines.slice(2, 5)).toEqual(['', ';; OPT PSEUDOSECTION:', '; EDNS: version 0; flags: do; udp: 1232']);
  });

  it('should append the stats when given', () => {
    const response = message(QUESTION, { answers: [ns('www.example.com', 'ns1.example.com')] });
    const stats = new Stats({ address: '192.0.2.1', port: 53 }, 'UDP');

    expect(formatMessage(response, stats).slice(-4)).toEqual(formatStats(stats, response.bytes.length));
  });
});

describe('formatStats', () => {
  it('should report the server, protocol and size', () => {
    const stats = new Stats({ address: '2001:db8::1', port: 853 }, 'TLS');

    expect(formatStats(stats, 120)).toEqual([
      `;; Query time: ${Math.round(stats.duration)} msec`,
      ';; SERVER: 2001:db8::1#853 (TLS)',
      `;; WHEN: ${stats.start.toString()}`,
      ';; MSG SIZE  rcvd: 120',
    ]);
  });
});

describe('formatDiff', () => {
  it('should mark added and removed rows', () => {
    expect(
      formatDiff([
        { action: 'added', record: { owner: 'www.example.com.', class: 'IN', type: 'A', data: '192.0.2.34' } },
        { action: 'removed', record: { owner: 'www.example.com.', class: 'IN', type: 'A', data: '192.0.2.35' } },
        { action: 'unchanged', record: { owner: 'www.example.com.', class: 'IN', type: 'A', data: '192.0.2.36' } },
      ])
    ).toEqual([
      '+ www.example.com. IN A 192.0.2.34',
      '- www.example.com. IN A 192.0.2.35',
      '  www.example.com. IN A 192.0.2.36',
    ]);
  });
});
