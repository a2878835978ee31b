import type { QueryDefaults } from '../config/defaults.js';
import { loadSystemConfig } from '../config/resolv-conf.js';
import type { SystemConfig } from '../config/resolv-conf.js';
import type { ClientOptions } from '../core/client.js';
import type { Connector } from '../transport/connector.js';
import type { Logger } from '../types/logger.js';
import { getLogger } from '../utils/logger.js';

/**
 * What a command needs from its surroundings. Built once per invocation.
 */
export interface CommandContext {
  defaults: QueryDefaults;
  /** The system configuration, loaded on first use */
  system(): Promise<SystemConfig>;
  connector?: Connector;
  logger: Logger;
}

export function createContext(
  defaults: QueryDefaults,
  options: { connector?: Connector; logger?: Logger; system?: SystemConfig } = {}
): CommandContext {
  let system: Promise<SystemConfig> | undefined = options.system
    ? Promise.resolve(options.system)
    : undefined;

  return {
    defaults,
    system: () => (system ??= loadSystemConfig(defaults)),
    connector: options.connector,
    logger: options.logger ?? getLogger(),
  };
}

export function clientOptions(context: CommandContext): ClientOptions {
  return { connector: context.connector, logger: context.logger };
}
