import { DnsMessage } from './response.js';
import type { RequestMessage } from './request.js';
import type { Stats } from './stats.js';
import { TransferTracker } from '../dns/xfr.js';
import type { ResponseReceiver, StreamConnection } from '../transport/connector.js';

/**
 * Lazily produced response messages of one request over a stream
 * connection.
 *
 * Messages are pulled with `next()` (or `for await`) until the response is
 * complete, at which point the stats are finalized and the connection is
 * closed. A failure also closes the connection and is rethrown.
 */
export class ResponseStream implements AsyncIterable<DnsMessage> {
  private readonly tracker: TransferTracker;
  private done = false;

  constructor(
    request: RequestMessage,
    private readonly connection: StreamConnection,
    private readonly receiver: ResponseReceiver,
    readonly stats: Stats
  ) {
    this.tracker = new TransferTracker(request);
  }

  get isComplete(): boolean {
    return this.done;
  }

  /**
   * Next message, or `null` once the response is complete
   */
  async next(): Promise<DnsMessage | null> {
    if (this.done) return null;

    try {
      const message = new DnsMessage(await this.receiver.next());
      message.validate();
      if (this.tracker.push(message)) {
        this.done = true;
        this.stats.finalize();
        this.connection.close();
      }
      return message;
    } catch (err) {
      this.abort();
      throw err;
    }
  }

  /**
   * Read the remaining messages
   */
  async collect(): Promise<DnsMessage[]> {
    const messages: DnsMessage[] = [];
    for await (const message of this) {
      messages.push(message);
    }
    return messages;
  }

  /**
   * Stop reading; the stats stay unfinalized
   */
  abort(): void {
    if (this.done) return;
    this.done = true;
    this.connection.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<DnsMessage> {
    while (true) {
      const message = await this.next();
      if (message === null) return;
      yield message;
    }
  }
}
