import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { describeError } from "../core/errors.js";
import { diag, type Diagnostic } from "../log/logger.js";
import { createRegistry } from "../schema/registry.js";
import type { MetactlConfig } from "../types/config.js";

export type ValidateResult = { ok: true; config: MetactlConfig; schemas: string[] } | { ok: false; errors: Diagnostic[] };

/** Check that the config layers load and every payload schema compiles. */
export function validateAll(opts: { configDir: string; env?: string; schemaDir?: string }): ValidateResult {
  const configDir = path.resolve(opts.configDir);
  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  const errors: Diagnostic[] = [];

  let config: MetactlConfig | undefined;
  try {
    config = loadConfig(opts.env, configDir);
  } catch (e) {
    errors.push(diag("error", "CONFIG_INVALID", describeError(e), { path: configDir }));
  }

  const schemas: string[] = [];
  try {
    const registry = createRegistry(opts.schemaDir);
    for (const name of registry.names()) {
      registry.validator<unknown>(name);
      schemas.push(name);
    }
  } catch (e) {
    errors.push(diag("error", "SCHEMA_INVALID", describeError(e)));
  }

  if (errors.length > 0 || !config) return { ok: false, errors };
  return { ok: true, config, schemas };
}
