import { createAjv } from "../schema/ajv.js";
import type { MetactlConfig } from "../types/config.js";

/** Config schema — ensures required fields exist and typed fields are well-formed. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "version_manifest_url"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    branding: {
      type: "object",
      required: ["name", "email"],
      properties: {
        name: { type: "string", minLength: 1 },
        email: { type: "string", minLength: 1 },
      },
    },
    version_manifest_url: { type: "string", minLength: 1 },
    mirrors: { type: "array", items: { type: "string", minLength: 1 } },
    hash_workers: { type: "integer", minimum: 1 },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: MetactlConfig; errors: null }
  | { valid: false; errors: string };

const ajv = createAjv();
const isMetactlConfig = ajv.compile<MetactlConfig>(CONFIG_SCHEMA);

/** Validate a loaded config object against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (isMetactlConfig(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(isMetactlConfig.errors) };
}
