import dnsPacket from 'dns-packet';
import type { DecodedPacket } from 'dns-packet';
import { ParseError, StateError } from './errors.js';
import type { Stats } from './stats.js';
import { readQuestions, readSections } from '../dns/records.js';
import type { ParsedQuestion, ParsedSections } from '../dns/records.js';

const HEADER_SIZE = 12;

const RCODE_NAMES = ['NOERROR', 'FORMERR', 'SERVFAIL', 'NXDOMAIN', 'NOTIMP', 'REFUSED', 'YXDOMAIN', 'YXRRSET', 'NXRRSET', 'NOTAUTH', 'NOTZONE'];

/**
 * A response message as received: owned bytes with header accessors and a
 * lazy full decode.
 */
export class DnsMessage {
  readonly bytes: Buffer;
  private decoded?: DecodedPacket;
  private sections?: ParsedSections;
  private questionSection?: ParsedQuestion[];

  constructor(bytes: Buffer) {
    if (bytes.length < HEADER_SIZE) {
      throw new ParseError(`Short DNS message: ${bytes.length} bytes`, { format: 'dns', position: 0 });
    }
    this.bytes = bytes;
  }

  get id(): number {
    return this.bytes.readUInt16BE(0);
  }

  get flags(): number {
    return this.bytes.readUInt16BE(2);
  }

  /** TC: the response did not fit the datagram */
  get isTruncated(): boolean {
    return (this.flags & dnsPacket.TRUNCATED_RESPONSE) !== 0;
  }

  get isAuthoritative(): boolean {
    return (this.flags & dnsPacket.AUTHORITATIVE_ANSWER) !== 0;
  }

  /** Header response code (the EDNS extension is not folded in) */
  get rcode(): number {
    return this.flags & 0x0f;
  }

  get rcodeName(): string {
    return RCODE_NAMES[this.rcode] ?? `RCODE${this.rcode}`;
  }

  get answerCount(): number {
    return this.bytes.readUInt16BE(6);
  }

  /**
   * Full decode through dns-packet
   *
   * @throws ParseError if any part of the message is malformed
   */
  decode(): DecodedPacket {
    if (!this.decoded) {
      try {
        this.decoded = dnsPacket.decode(this.bytes);
      } catch (err) {
        throw new ParseError(
          `Malformed DNS message: ${err instanceof Error ? err.message : String(err)}`,
          { format: 'dns' }
        );
      }
    }
    return this.decoded;
  }

  /**
   * Check that the header and question section can be read. Malformed
   * records further on don't fail the message; `records()` leaves them out.
   *
   * @throws ParseError
   */
  validate(): void {
    this.questions();
    this.records();
  }

  questions(): ParsedQuestion[] {
    if (!this.questionSection) {
      this.questionSection = readQuestions(this.bytes);
    }
    return this.questionSection;
  }

  /**
   * Record sections, skipping records that don't parse
   */
  records(): ParsedSections {
    if (!this.sections) {
      this.sections = readSections(this.bytes);
    }
    return this.sections;
  }
}

/**
 * The result of a successful dispatch: the response message(s) and the
 * statistics of the attempt that produced them.
 */
export class Answer {
  readonly messages: readonly DnsMessage[];
  readonly stats: Stats;

  constructor(messages: DnsMessage[], stats: Stats) {
    const [first] = messages;
    if (!first) {
      throw new StateError('An answer needs at least one message', {
        expectedState: 'message received',
        actualState: 'empty',
      });
    }
    this.messages = Object.freeze([...messages]);
    this.stats = stats;
  }

  /** The (first) response message */
  get message(): DnsMessage {
    return this.messages[0];
  }
}
