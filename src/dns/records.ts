/**
 * Record-level access to DNS messages.
 *
 * dns-packet decodes a message all-or-nothing. Comparing answer sections
 * needs to keep the records that parse and drop the ones that don't, so the
 * sections are walked here and every record is handed to the library's
 * record codec on its own.
 */

import dnsPacket from 'dns-packet';
import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import { canonicalName, toAbsolute } from './names.js';

export interface ParsedRecord {
  /** Owner name, absolute */
  name: string;
  type: string;
  class: string;
  ttl: number;
  data: unknown;
  /** Everything the codec produced, kept for re-encoding */
  fields: Record<string, unknown>;
}

export interface ParsedQuestion {
  name: string;
  type: string;
  class: string;
}

/** EDNS parameters from the OPT pseudo-record */
export interface OptRecord {
  udpPayloadSize: number;
  ednsVersion: number;
  dnssecOk: boolean;
}

export interface ParsedSections {
  answers: ParsedRecord[];
  authorities: ParsedRecord[];
  additionals: ParsedRecord[];
  /** The OPT pseudo-record of the additional section, if any */
  opt?: OptRecord;
  /** Records that failed to parse and were left out */
  dropped: number;
}

interface RecordCodec {
  decode(buf: Buffer, offset?: number): unknown;
  encode(record: unknown, buf?: Buffer, offset?: number): Buffer;
}

const HEADER_SIZE = 12;

const DecodedRecordSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    class: z.string().default('IN'),
    ttl: z.number().default(0),
    data: z.unknown(),
  })
  .passthrough();

const DecodedQuestionSchema = z.object({
  name: z.string(),
  type: z.string(),
  class: z.string().default('IN'),
});

const DecodedOptSchema = z.object({
  type: z.literal('OPT'),
  udpPayloadSize: z.number(),
  ednsVersion: z.number().default(0),
  flag_do: z.boolean().default(false),
});

const MxDataSchema = z.object({ preference: z.number(), exchange: z.string() }).passthrough();
const SoaDataSchema = z
  .object({
    mname: z.string(),
    rname: z.string(),
    serial: z.number(),
    refresh: z.number(),
    retry: z.number(),
    expire: z.number(),
    minimum: z.number(),
  })
  .passthrough();
const SrvDataSchema = z
  .object({ priority: z.number(), weight: z.number(), port: z.number(), target: z.string() })
  .passthrough();
const CaaDataSchema = z.object({ flags: z.number(), tag: z.string(), value: z.string() }).passthrough();

export type SoaData = z.infer<typeof SoaDataSchema>;

const NAME_DATA_TYPES = new Set(['NS', 'CNAME', 'PTR', 'DNAME']);

function isRecordCodec(value: unknown): value is RecordCodec {
  return (
    typeof value === 'object' &&
    value !== null &&
    'decode' in value &&
    typeof value.decode === 'function' &&
    'encode' in value &&
    typeof value.encode === 'function'
  );
}

const codecs = new Map<'answer' | 'question', RecordCodec>();

function getCodec(kind: 'answer' | 'question'): RecordCodec {
  let codec = codecs.get(kind);
  if (!codec) {
    const candidate: unknown = Reflect.get(dnsPacket, kind);
    if (!isRecordCodec(candidate)) {
      throw new ParseError(`dns-packet does not expose its ${kind} codec`, { format: 'dns' });
    }
    codec = candidate;
    codecs.set(kind, codec);
  }
  return codec;
}

/**
 * Offset right behind the (possibly compressed) name starting at `offset`
 */
export function skipName(buf: Buffer, offset: number): number {
  let pos = offset;
  for (;;) {
    if (pos >= buf.length) {
      throw new ParseError('Name runs past the end of the message', { format: 'dns', position: pos });
    }
    const len = buf[pos];
    if (len === 0) return pos + 1;
    if ((len & 0xc0) === 0xc0) {
      if (pos + 2 > buf.length) {
        throw new ParseError('Truncated compression pointer', { format: 'dns', position: pos });
      }
      return pos + 2;
    }
    if ((len & 0xc0) !== 0) {
      throw new ParseError(`Unknown label type 0x${len.toString(16)}`, { format: 'dns', position: pos });
    }
    pos += len + 1;
  }
}

type DecodedEntry = { record: ParsedRecord } | { opt: OptRecord };

function readRecords(
  buf: Buffer,
  start: number,
  count: number
): { records: ParsedRecord[]; opt?: OptRecord; next?: number; dropped: number } {
  const codec = getCodec('answer');
  const records: ParsedRecord[] = [];
  let opt: OptRecord | undefined;
  let dropped = 0;
  let offset = start;

  for (let i = 0; i < count; i++) {
    let end: number;
    try {
      const nameEnd = skipName(buf, offset);
      if (nameEnd + 10 > buf.length) throw new ParseError('Truncated record header', { position: nameEnd });
      end = nameEnd + 10 + buf.readUInt16BE(nameEnd + 8);
      if (end > buf.length) throw new ParseError('Truncated record data', { position: nameEnd + 10 });
    } catch {
      // Record boundaries are lost: everything from here on is unusable.
      return { records, opt, dropped: dropped + count - i };
    }

    const entry = decodeRecord(codec, buf, offset);
    if (!entry) {
      dropped++;
    } else if ('opt' in entry) {
      opt ??= entry.opt;
    } else {
      records.push(entry.record);
    }
    offset = end;
  }

  return { records, opt, next: offset, dropped };
}

function decodeRecord(codec: RecordCodec, buf: Buffer, offset: number): DecodedEntry | undefined {
  let decoded: unknown;
  try {
    decoded = codec.decode(buf, offset);
  } catch {
    return undefined;
  }

  const opt = DecodedOptSchema.safeParse(decoded);
  if (opt.success) {
    return {
      opt: { udpPayloadSize: opt.data.udpPayloadSize, ednsVersion: opt.data.ednsVersion, dnssecOk: opt.data.flag_do },
    };
  }

  const parsed = DecodedRecordSchema.safeParse(decoded);
  if (!parsed.success || parsed.data.type === 'OPT') return undefined;

  return {
    record: {
      name: toAbsolute(parsed.data.name),
      type: parsed.data.type,
      class: parsed.data.class,
      ttl: parsed.data.ttl,
      data: parsed.data.data,
      fields: parsed.data,
    },
  };
}

/**
 * Question section of a message
 *
 * @throws ParseError if a question can't be read
 */
export function readQuestions(buf: Buffer): ParsedQuestion[] {
  if (buf.length < HEADER_SIZE) {
    throw new ParseError(`Message too short: ${buf.length} bytes`, { format: 'dns', position: 0 });
  }

  const codec = getCodec('question');
  const questions: ParsedQuestion[] = [];
  let offset = HEADER_SIZE;

  for (let i = 0; i < buf.readUInt16BE(4); i++) {
    let decoded: unknown;
    try {
      decoded = codec.decode(buf, offset);
    } catch (err) {
      throw new ParseError(`Malformed question: ${err instanceof Error ? err.message : String(err)}`, {
        format: 'dns',
        position: offset,
      });
    }
    const parsed = DecodedQuestionSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new ParseError('Malformed question', { format: 'dns', position: offset });
    }
    questions.push({ name: toAbsolute(parsed.data.name), type: parsed.data.type, class: parsed.data.class });
    offset = skipName(buf, offset) + 4;
  }

  return questions;
}

/**
 * Walk the answer, authority and additional sections of a message.
 *
 * Malformed records are dropped. The OPT pseudo-record is returned apart.
 *
 * @throws ParseError if the header or question section is unusable
 */
export function readSections(buf: Buffer): ParsedSections {
  if (buf.length < HEADER_SIZE) {
    throw new ParseError(`Message too short: ${buf.length} bytes`, { format: 'dns', position: 0 });
  }

  const qdcount = buf.readUInt16BE(4);
  const ancount = buf.readUInt16BE(6);
  const nscount = buf.readUInt16BE(8);
  const arcount = buf.readUInt16BE(10);

  let offset = HEADER_SIZE;
  for (let i = 0; i < qdcount; i++) {
    offset = skipName(buf, offset) + 4;
    if (offset > buf.length) {
      throw new ParseError('Truncated question section', { format: 'dns', position: offset });
    }
  }

  const result: ParsedSections = { answers: [], authorities: [], additionals: [], dropped: 0 };
  const sections: Array<['answers' | 'authorities' | 'additionals', number]> = [
    ['answers', ancount],
    ['authorities', nscount],
    ['additionals', arcount],
  ];

  let next: number | undefined = offset;
  for (const [section, count] of sections) {
    if (next === undefined) {
      result.dropped += count;
      continue;
    }
    const read = readRecords(buf, next, count);
    result[section] = read.records;
    if (read.opt && section === 'additionals') result.opt = read.opt;
    result.dropped += read.dropped;
    next = read.next;
  }

  return result;
}

/**
 * Answer section of a message, or an empty list if the message can't be
 * walked at all.
 */
export function readAnswerRecords(buf: Buffer): ParsedRecord[] {
  try {
    return readSections(buf).answers;
  } catch (err) {
    if (err instanceof ParseError) return [];
    throw err;
  }
}

function canonicalData(type: string, data: unknown): unknown {
  if (NAME_DATA_TYPES.has(type)) {
    return typeof data === 'string' ? data.toLowerCase() : data;
  }

  switch (type) {
    case 'MX': {
      const mx = MxDataSchema.safeParse(data);
      return mx.success ? { ...mx.data, exchange: mx.data.exchange.toLowerCase() } : data;
    }
    case 'SOA': {
      const soa = SoaDataSchema.safeParse(data);
      return soa.success
        ? { ...soa.data, mname: soa.data.mname.toLowerCase(), rname: soa.data.rname.toLowerCase() }
        : data;
    }
    case 'SRV': {
      const srv = SrvDataSchema.safeParse(data);
      return srv.success ? { ...srv.data, target: srv.data.target.toLowerCase() } : data;
    }
    default:
      return data;
  }
}

export interface CanonicalForm {
  typeCode: number;
  classCode: number;
  /** Record data with names uncompressed and lower-cased */
  rdata: Buffer;
}

/**
 * Canonical wire form of a record's type and data (RFC 4034, section 6.2),
 * independent of TTL, owner case and message compression.
 */
export function canonicalForm(record: ParsedRecord): CanonicalForm {
  const wire = getCodec('answer').encode({
    ...record.fields,
    name: canonicalName(record.name),
    ttl: 0,
    data: canonicalData(record.type, record.data),
  });
  const nameEnd = skipName(wire, 0);
  return {
    typeCode: wire.readUInt16BE(nameEnd),
    classCode: wire.readUInt16BE(nameEnd + 2),
    rdata: wire.subarray(nameEnd + 10),
  };
}

function quoteText(value: unknown): string {
  if (Buffer.isBuffer(value)) return JSON.stringify(value.toString('utf8'));
  return JSON.stringify(String(value));
}

/**
 * Presentation form of record data, dig style
 */
export function presentData(record: ParsedRecord): string {
  const { type, data } = record;

  if (typeof data === 'string') {
    return NAME_DATA_TYPES.has(type) ? toAbsolute(data) : data;
  }

  switch (type) {
    case 'TXT':
      return Array.isArray(data) ? data.map(quoteText).join(' ') : quoteText(data);
    case 'MX': {
      const mx = MxDataSchema.safeParse(data);
      if (mx.success) return `${mx.data.preference} ${toAbsolute(mx.data.exchange)}`;
      break;
    }
    case 'SOA': {
      const soa = SoaDataSchema.safeParse(data);
      if (soa.success) {
        const { mname, rname, serial, refresh, retry, expire, minimum } = soa.data;
        return `${toAbsolute(mname)} ${toAbsolute(rname)} ${serial} ${refresh} ${retry} ${expire} ${minimum}`;
      }
      break;
    }
    case 'SRV': {
      const srv = SrvDataSchema.safeParse(data);
      if (srv.success) {
        const { priority, weight, port, target } = srv.data;
        return `${priority} ${weight} ${port} ${toAbsolute(target)}`;
      }
      break;
    }
    case 'CAA': {
      const caa = CaaDataSchema.safeParse(data);
      if (caa.success) return `${caa.data.flags} ${caa.data.tag} ${JSON.stringify(caa.data.value)}`;
      break;
    }
  }

  if (Buffer.isBuffer(data)) {
    return `\\# ${data.length} ${data.toString('hex')}`;
  }
  return JSON.stringify(data, (_key, value: unknown) =>
    Buffer.isBuffer(value) ? value.toString('hex') : value
  );
}

export function parseSoaData(data: unknown): SoaData | undefined {
  const soa = SoaDataSchema.safeParse(data);
  return soa.success ? soa.data : undefined;
}
