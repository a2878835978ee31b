import type { ServerAddress } from './stats.js';

export class DnsqError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, suggestions: string[] = [], retriable = false) {
    super(message);
    this.name = 'DnsqError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Timeout phases for granular error reporting
 */
export type TimeoutPhase =
  | 'connect'       // TCP connection
  | 'secureConnect' // TLS handshake
  | 'response';     // Waiting for a DNS response

/**
 * Timeout error with phase information
 */
export class TimeoutError extends DnsqError {
  phase: TimeoutPhase;
  timeout: number;
  server?: ServerAddress;

  constructor(options: { phase: TimeoutPhase; timeout: number; server?: ServerAddress }) {
    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'TCP connection timed out',
      secureConnect: 'TLS handshake timed out',
      response: 'Waiting for response timed out',
    };

    let message = `${phaseMessages[options.phase]} after ${options.timeout}ms`;
    if (options.server) {
      message += ` (${formatAddress(options.server)})`;
    }

    super(
      message,
      [
        'Verify the server address and that it answers DNS on this port.',
        'Increase the timeout with --timeout if the server is slow.',
        'Try another transport (--tcp or --udp).'
      ],
      true
    );
    this.name = 'TimeoutError';
    this.phase = options.phase;
    this.timeout = options.timeout;
    this.server = options.server;
  }
}

export class NetworkError extends DnsqError {
  code?: string;

  constructor(message: string, code?: string) {
    super(
      message,
      [
        'Confirm the server is reachable from this environment.',
        'Check firewall rules for DNS traffic (port 53, or 853 for TLS).'
      ],
      true
    );
    this.name = 'NetworkError';
    this.code = code;
  }
}

/**
 * Error thrown when connection to a server fails
 */
export class ConnectionError extends DnsqError {
  host?: string;
  port?: number;
  code?: string;

  constructor(
    message: string,
    options?: {
      host?: string;
      port?: number;
      code?: string;
    }
  ) {
    super(
      message,
      [
        'Verify the host and port are correct and the server is running.',
        'Check network connectivity and firewall rules.'
      ],
      true
    );
    this.name = 'ConnectionError';
    this.host = options?.host;
    this.port = options?.port;
    this.code = options?.code;
  }
}

/**
 * Error thrown when a response violates the DNS protocol
 */
export class ProtocolError extends DnsqError {
  protocol: string;
  code?: string | number;

  constructor(message: string, options: { protocol: string; code?: string | number }) {
    const protocolSuggestions: Record<string, string[]> = {
      dns: [
        'Verify the server is a DNS server.',
        'Check if the domain exists and has the requested record type.',
        'Try an alternative resolver.'
      ],
      tls: [
        'Verify the certificate is valid and not expired.',
        'Check that --tls-hostname matches the certificate.'
      ]
    };

    super(message, protocolSuggestions[options.protocol.toLowerCase()] ?? [], false);
    this.name = 'ProtocolError';
    this.protocol = options.protocol;
    this.code = options.code;
  }
}

/**
 * Error thrown when a state precondition is not met
 */
export class StateError extends DnsqError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(message, ['Check that operations are called in the correct order.'], false);
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * Always raised before any network I/O.
 */
export class ConfigurationError extends DnsqError {
  configKey?: string;

  constructor(message: string, options?: { configKey?: string; suggestions?: string[] }) {
    super(
      message,
      options?.suggestions ?? [
        'Check the command line options and environment variables.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Error thrown when a message cannot be parsed
 */
export class ParseError extends DnsqError {
  format?: string;
  position?: number;

  constructor(
    message: string,
    options?: {
      format?: string;
      position?: number;
    }
  ) {
    super(
      message,
      ['Check for malformed or truncated responses from the server.'],
      false
    );
    this.name = 'ParseError';
    this.format = options?.format;
    this.position = options?.position;
  }
}

export type VerificationHop = 'apex' | 'ns' | 'addresses' | 'dispatch';

/**
 * Error raised on the verification path. Never discards the primary answer.
 */
export class VerificationError extends DnsqError {
  hop: VerificationHop;
  cause?: unknown;

  constructor(message: string, options: { hop: VerificationHop; cause?: unknown }) {
    super(
      message,
      [
        'The zone may not be delegated correctly.',
        'Retry without --verify to see the plain answer.'
      ],
      false
    );
    this.name = 'VerificationError';
    this.hop = options.hop;
    this.cause = options.cause;
  }
}

export function formatAddress(server: ServerAddress): string {
  return server.address.includes(':')
    ? `[${server.address}]:${server.port}`
    : `${server.address}:${server.port}`;
}

/**
 * Wrap anything thrown by a socket or codec into a DnsqError
 */
export function toDnsqError(err: unknown, context: string): DnsqError {
  if (err instanceof DnsqError) return err;
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return new NetworkError(`${context}: ${err.message}`, code);
  }
  return new DnsqError(`${context}: ${String(err)}`);
}
