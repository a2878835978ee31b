import { describe, it, expect } from 'vitest';
import dnsPacket from 'dns-packet';
import { Answer, DnsMessage } from '../../src/core/response.js';
import { ParseError, StateError } from '../../src/core/errors.js';
import { Stats } from '../../src/core/stats.js';
import { a, message, replyWithBrokenAlias, soa } from '../helpers/dns.js';

const question = { name: 'example.com', type: 'A' as const, class: 'IN' as const };

describe('DnsMessage', () => {
  it('should read the header', () => {
    const msg = message(question, {
      id: 777,
      flags: dnsPacket.AUTHORITATIVE_ANSWER,
      answers: [a('example.com', '192.0.2.1'), a('example.com', '192.0.2.2')],
    });

    expect(msg.id).toBe(777);
    expect(msg.isAuthoritative).toBe(true);
    expect(msg.isTruncated).toBe(false);
    expect(msg.rcode).toBe(0);
    expect(msg.rcodeName).toBe('NOERROR');
    expect(msg.answerCount).toBe(2);
  });

  it('should read TC and the rcode', () => {
    const msg = message(question, { flags: dnsPacket.TRUNCATED_RESPONSE, rcode: 3 });
    expect(msg.isTruncated).toBe(true);
    expect(msg.rcodeName).toBe('NXDOMAIN');
  });

  it('should name unknown rcodes by number', () => {
    expect(message(question, { rcode: 15 }).rcodeName).toBe('RCODE15');
  });

  it('should reject messages shorter than a header', () => {
    expect(() => new DnsMessage(Buffer.alloc(5))).toThrow(ParseError);
  });

  it('should decode through dns-packet', () => {
    const msg = message(question, { answers: [a('example.com', '192.0.2.1')] });
    expect(msg.decode().answers?.[0]).toMatchObject({ type: 'A', data: '192.0.2.1' });
    expect(msg.decode()).toBe(msg.decode());
  });

  it('should report malformed messages as ParseError', () => {
    const header = Buffer.alloc(12);
    header.writeUInt16BE(1, 4); // one question, missing
    expect(() => new DnsMessage(header).decode()).toThrow(/^Malformed DNS message/);
  });

  it('should validate the header and question only', () => {
    const msg = new DnsMessage(replyWithBrokenAlias({ id: 3, questions: [question] }, [a('example.com', '192.0.2.1')]));

    expect(() => msg.validate()).not.toThrow();
    expect(msg.questions()).toEqual([{ name: 'example.com.', type: 'A', class: 'IN' }]);
    expect(() => msg.decode()).toThrow(/^Malformed DNS message/);
  });

  it('should fail validation without a readable question', () => {
    const header = Buffer.alloc(12);
    header.writeUInt16BE(1, 4);
    expect(() => new DnsMessage(header).validate()).toThrow(ParseError);
  });

  it('should give the record sections', () => {
    const msg = message(
      { name: 'www.example.com', type: 'SOA', class: 'IN' },
      { authorities: [soa('example.com', 5)] }
    );
    const sections = msg.records();

    expect(sections.answers).toEqual([]);
    expect(sections.authorities).toHaveLength(1);
    expect(sections.authorities[0].name).toBe('example.com.');
  });
});

describe('Answer', () => {
  const stats = new Stats({ address: '192.0.2.1', port: 53 }, 'UDP');

  it('should expose the first message', () => {
    const first = message(question, { id: 1 });
    const second = message(question, { id: 2 });
    const answer = new Answer([first, second], stats);

    expect(answer.message).toBe(first);
    expect(answer.messages).toHaveLength(2);
    expect(Object.isFrozen(answer.messages)).toBe(true);
    expect(answer.stats).toBe(stats);
  });

  it('should need at least one message', () => {
    expect(() => new Answer([], stats)).toThrow(StateError);
  });
});
