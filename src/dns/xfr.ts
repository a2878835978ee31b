import { ProtocolError } from '../core/errors.js';
import type { DnsMessage } from '../core/response.js';
import type { RequestMessage } from '../core/request.js';
import { parseSoaData } from './records.js';

type Mode = 'start' | 'pending' | 'axfr' | 'incremental' | 'done';

/**
 * Decides when a multi-message response is complete.
 *
 * - Ordinary queries: after the first message.
 * - AXFR: at the SOA closing the zone.
 * - IXFR: at once when the first message is a lone SOA,
 *   at the second SOA when the server falls back to a full transfer, and at
 *   the third appearance of the new serial for an incremental transfer.
 * - A message with an error rcode ends any transfer.
 */
export class TransferTracker {
  private mode: Mode = 'start';
  private newSerial?: number;
  private soaSeen = 0;

  constructor(private readonly request: RequestMessage) {}

  get isComplete(): boolean {
    return this.mode === 'done';
  }

  /**
   * Account for the next message; returns whether the response is complete
   *
   * @throws ProtocolError if a transfer does not open with a SOA record
   */
  push(message: DnsMessage): boolean {
    if (this.mode === 'done') return true;

    if (!this.request.isStreaming || message.rcode !== 0) {
      this.mode = 'done';
      return true;
    }

    const { answers } = message.records();
    const firstMessage = this.mode === 'start';

    for (const record of answers) {
      const soa = record.type === 'SOA' ? parseSoaData(record.data) : undefined;

      switch (this.mode) {
        case 'start':
          if (!soa) {
            throw new ProtocolError(`${this.request.type} response does not start with a SOA record`, {
              protocol: 'dns',
            });
          }
          this.newSerial = soa.serial;
          this.soaSeen = 1;
          this.mode = this.request.type === 'IXFR' ? 'pending' : 'axfr';
          break;

        case 'pending':
          // The record after the opening SOA tells the IXFR flavor apart
          if (soa && soa.serial !== this.newSerial) {
            this.mode = 'incremental';
          } else {
            // Full transfer; a second SOA straight away closes an empty zone
            this.mode = soa ? 'done' : 'axfr';
          }
          break;

        case 'axfr':
          if (soa) this.mode = 'done';
          break;

        case 'incremental':
          if (soa && soa.serial === this.newSerial) {
            this.soaSeen++;
            if (this.soaSeen === 3) this.mode = 'done';
          }
          break;

        case 'done':
          break;
      }
    }

    // A first message holding nothing but the SOA is the whole answer: the
    // zone is up to date, or the server won't transfer it
    if (firstMessage && this.mode === 'pending' && answers.length === 1) {
      this.mode = 'done';
    }

    return this.isComplete;
  }
}
