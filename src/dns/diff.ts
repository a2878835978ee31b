import type { DnsMessage } from '../core/response.js';
import { compareNames, canonicalName } from './names.js';
import { canonicalForm, presentData, readAnswerRecords } from './records.js';
import type { ParsedRecord } from './records.js';

export type DiffAction = 'added' | 'removed' | 'unchanged';

export interface DiffRecord {
  owner: string;
  class: string;
  type: string;
  /** Presentation form of the record data */
  data: string;
}

export interface DiffItem {
  action: DiffAction;
  record: DiffRecord;
}

interface KeyedRecord {
  typeCode: number;
  classCode: number;
  rdata: Buffer;
  record: DiffRecord;
}

/**
 * Answer records keyed by owner, class, type and data. TTLs take no part,
 * and records that can't be put in canonical form are left out.
 */
function recordSet(records: ParsedRecord[]): Map<string, KeyedRecord> {
  const set = new Map<string, KeyedRecord>();

  for (const record of records) {
    let form: ReturnType<typeof canonicalForm>;
    try {
      form = canonicalForm(record);
    } catch {
      continue;
    }

    const owner = canonicalName(record.name);
    const key = `${owner} ${form.classCode} ${form.typeCode} ${form.rdata.toString('hex')}`;
    set.set(key, {
      typeCode: form.typeCode,
      classCode: form.classCode,
      rdata: form.rdata,
      record: {
        owner: record.name,
        class: record.class,
        type: record.type,
        data: presentData(record),
      },
    });
  }

  return set;
}

function compareRows(left: KeyedRecord, right: KeyedRecord): number {
  return (
    compareNames(left.record.owner, right.record.owner) ||
    left.classCode - right.classCode ||
    left.typeCode - right.typeCode ||
    Buffer.compare(left.rdata, right.rdata)
  );
}

/**
 * Compare the answer sections of two messages as record sets.
 *
 * Records only in `left` are `removed`, only in `right` `added`, in both
 * `unchanged`. Rows are sorted by owner (canonical DNS order), class, type
 * and data, with actions interleaved.
 *
 * @returns null when both sets are equal
 *
 * @example
 * ```typescript
 * const diff = diffAnswers(authoritative.message, answer.message);
 * if (diff) diff.filter((item) => item.action !== 'unchanged');
 * ```
 */
export function diffAnswers(left: DnsMessage, right: DnsMessage): DiffItem[] | null {
  const leftSet = recordSet(readAnswerRecords(left.bytes));
  const rightSet = recordSet(readAnswerRecords(right.bytes));

  const rows: Array<KeyedRecord & { action: DiffAction }> = [];
  let unchanged = 0;

  for (const [key, entry] of leftSet) {
    if (rightSet.has(key)) {
      rows.push({ ...entry, action: 'unchanged' });
      unchanged++;
    } else {
      rows.push({ ...entry, action: 'removed' });
    }
  }
  for (const [key, entry] of rightSet) {
    if (!leftSet.has(key)) {
      rows.push({ ...entry, action: 'added' });
    }
  }

  if (unchanged === rows.length) return null;

  return rows.sort(compareRows).map(({ action, record }) => ({ action, record }));
}
