import { randomInt } from 'node:crypto';
import dnsPacket from 'dns-packet';
import type { Packet, Question } from 'dns-packet';
import { ConfigurationError } from './errors.js';
import { toAbsolute } from '../dns/names.js';
import type { QueryType } from '../dns/types.js';

export interface RequestFlags {
  /** RD, set by default */
  recursionDesired: boolean;
  /** CD */
  checkingDisabled: boolean;
  /** AD */
  authenticData: boolean;
  /** DO bit in the EDNS OPT record */
  dnssecOk: boolean;
}

export interface EncodeOptions {
  /** Message ID, random when omitted */
  id?: number;
  /** Advertise this UDP payload size in an EDNS OPT record */
  udpPayloadSize?: number;
}

const DEFAULT_FLAGS: RequestFlags = {
  recursionDesired: true,
  checkingDisabled: false,
  authenticData: false,
  dnssecOk: false,
};

// RFC 6891: the payload size advertised when only DO forces an OPT record
const DEFAULT_EDNS_PAYLOAD_SIZE = 1232;

/**
 * A query ready to be put on the wire.
 *
 * The value is immutable; every attempt calls `encode()` and gets its own
 * bytes with a fresh message ID, so a failed attempt never consumes the
 * request.
 */
export class RequestMessage {
  public readonly name: string;
  public readonly type: QueryType;
  public readonly flags: Readonly<RequestFlags>;
  /** Serial sent in the authority section of an IXFR request */
  public readonly ixfrSerial?: number;

  constructor(
    question: { name: string; type: QueryType },
    flags: Partial<RequestFlags> = {},
    options: { ixfrSerial?: number } = {}
  ) {
    if (options.ixfrSerial !== undefined && question.type !== 'IXFR') {
      throw new ConfigurationError('An IXFR serial can only be sent with an IXFR query', {
        configKey: 'ixfr',
      });
    }
    this.name = toAbsolute(question.name);
    this.type = question.type;
    this.flags = Object.freeze({ ...DEFAULT_FLAGS, ...flags });
    this.ixfrSerial = options.ixfrSerial;
  }

  /**
   * Zone transfers may be answered by a sequence of messages
   */
  get isStreaming(): boolean {
    return this.type === 'AXFR' || this.type === 'IXFR';
  }

  get question(): Question {
    return { name: this.name, type: this.type, class: 'IN' };
  }

  /**
   * Produce the wire form of this request for one attempt
   */
  encode(options: EncodeOptions = {}): Buffer {
    const packet: Packet = {
      type: 'query',
      id: options.id ?? randomInt(0, 0x10000),
      flags: this.headerFlags(),
      questions: [this.question],
    };

    if (this.ixfrSerial !== undefined) {
      const soa = {
        type: 'SOA' as const,
        name: this.name,
        class: 'IN' as const,
        ttl: 0,
        data: {
          mname: '.',
          rname: '.',
          serial: this.ixfrSerial,
          refresh: 0,
          retry: 0,
          expire: 0,
          minimum: 0,
        },
      };
      packet.authorities = [soa];
    }

    if (this.flags.dnssecOk || options.udpPayloadSize !== undefined) {
      const opt = {
        type: 'OPT' as const,
        name: '.',
        udpPayloadSize: options.udpPayloadSize ?? DEFAULT_EDNS_PAYLOAD_SIZE,
        extendedRcode: 0,
        ednsVersion: 0,
        flags: this.flags.dnssecOk ? dnsPacket.DNSSEC_OK : 0,
        flag_do: this.flags.dnssecOk,
        options: [],
      };
      packet.additionals = [opt];
    }

    return dnsPacket.encode(packet);
  }

  private headerFlags(): number {
    let flags = 0;
    if (this.flags.recursionDesired) flags |= dnsPacket.RECURSION_DESIRED;
    if (this.flags.checkingDisabled) flags |= dnsPacket.CHECKING_DISABLED;
    if (this.flags.authenticData) flags |= dnsPacket.AUTHENTIC_DATA;
    return flags;
  }
}
