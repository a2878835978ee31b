import { StateError } from './errors.js';

export type Protocol = 'UDP' | 'TCP' | 'TLS';

export interface ServerAddress {
  address: string;
  port: number;
}

/**
 * Timing and metadata of a single request attempt.
 *
 * Mutable only while the attempt runs: `finalize()` records the elapsed
 * time once, after which the value is frozen.
 */
export class Stats {
  readonly start: Date;
  readonly server: ServerAddress;
  readonly protocol: Protocol;
  private _duration = 0;
  private finalized = false;
  private readonly startedAt: number;

  constructor(server: ServerAddress, protocol: Protocol) {
    this.start = new Date();
    this.startedAt = performance.now();
    this.server = { address: server.address, port: server.port };
    this.protocol = protocol;
  }

  /** Elapsed time in milliseconds, 0 until finalized. */
  get duration(): number {
    return this._duration;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  finalize(): void {
    if (this.finalized) {
      throw new StateError('Stats already finalized', {
        expectedState: 'running',
        actualState: 'finalized',
      });
    }
    this._duration = Math.round((performance.now() - this.startedAt) * 100) / 100;
    this.finalized = true;
    Object.freeze(this);
  }
}
