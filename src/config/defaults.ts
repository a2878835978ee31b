import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

/**
 * Per-server settings applied wherever a server is built without explicit
 * values: from the command line, the system configuration and the
 * authoritative resolver.
 */
export interface QueryDefaults {
  /** Milliseconds */
  timeout: number;
  retries: number;
  udpPayloadSize: number;
  /** Path of the system resolver configuration */
  resolvConf: string;
}

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  DNSQ_TIMEOUT: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(5)),
  DNSQ_RETRIES: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(255).default(2)),
  DNSQ_UDP_PAYLOAD_SIZE: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(512).max(65535).default(1232)
  ),
  DNSQ_RESOLV_CONF: z.preprocess(emptyToUndefined, z.string().default('/etc/resolv.conf')),
});

export const DEFAULT_QUERY_DEFAULTS: Readonly<QueryDefaults> = Object.freeze({
  timeout: 5000,
  retries: 2,
  udpPayloadSize: 1232,
  resolvConf: '/etc/resolv.conf',
});

/**
 * Read the defaults from the environment
 *
 * - `DNSQ_TIMEOUT`: seconds, fractions allowed
 * - `DNSQ_RETRIES`
 * - `DNSQ_UDP_PAYLOAD_SIZE`
 * - `DNSQ_RESOLV_CONF`
 *
 * @throws ConfigurationError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): QueryDefaults {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || 'environment';
    throw new ConfigurationError(`Invalid ${key}: ${issue?.message ?? 'invalid value'}`, {
      configKey: key,
      suggestions: [`Fix or unset ${key}.`],
    });
  }

  return {
    timeout: Math.round(parsed.data.DNSQ_TIMEOUT * 1000),
    retries: parsed.data.DNSQ_RETRIES,
    udpPayloadSize: parsed.data.DNSQ_UDP_PAYLOAD_SIZE,
    resolvConf: parsed.data.DNSQ_RESOLV_CONF,
  };
}
