import { createBranding, setBranding } from "../branding/branding.js";
import { loadConfig } from "../config/loader.js";
import { Fetcher } from "../fetch/fetcher.js";
import { closeSharedTransport, type HttpTransport } from "../fetch/transport.js";
import type { Hasher } from "../integrity/checksum.js";
import { closeSharedDigestPool, sharedDigestPool } from "../integrity/digest-pool.js";
import { createStreamLogger, diag, type Logger, type OutputFormat } from "../log/logger.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { MetactlConfig } from "../types/config.js";

export type ContextOptions = {
  configDir?: string;
  env?: string;
  format: OutputFormat;
  /** Test seams; the shared transport and digest pool are used otherwise. */
  transport?: HttpTransport;
  hasher?: Hasher;
  logger?: Logger;
  registry?: SchemaRegistry;
};

export type CommandContext = {
  config: MetactlConfig;
  fetcher: Fetcher;
  logger: Logger;
  registry?: SchemaRegistry;
  /** Release the shared pool and connections this context started. */
  close(): Promise<void>;
};

/**
 * Load config, apply its branding and build the fetcher a command runs with.
 *
 * @throws {ConfigurationError} the config cannot be loaded
 */
export function createContext(opts: ContextOptions): CommandContext {
  const config = loadConfig(opts.env, opts.configDir);
  const logger = opts.logger ?? createStreamLogger({ format: opts.format });

  if (config.branding) {
    const res = setBranding(createBranding(config.branding.name, config.branding.email));
    if (!res.ok) {
      logger.log(diag("debug", res.error, "Branding was already set; keeping the first value"));
    }
  }

  const ownsPool = opts.hasher === undefined;
  const ownsTransport = opts.transport === undefined;

  const fetcher = new Fetcher({
    transport: opts.transport,
    hasher: opts.hasher ?? sharedDigestPool(config.hash_workers),
    logger,
  });

  return {
    config,
    fetcher,
    logger,
    registry: opts.registry,
    async close() {
      if (ownsPool) await closeSharedDigestPool();
      if (ownsTransport) await closeSharedTransport();
    },
  };
}
