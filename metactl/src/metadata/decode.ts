import { DeserializationError } from "../core/errors.js";
import { sharedRegistry, type SchemaRegistry } from "../schema/registry.js";

/**
 * Parse a UTF-8 JSON payload and check it against a registered schema.
 * Schema defaults are written into the returned value.
 *
 * @throws {DeserializationError} the bytes are not JSON or do not match the schema
 */
export function decodeJson<T>(
  bytes: Uint8Array,
  schemaName: string,
  source: string,
  registry: SchemaRegistry = sharedRegistry(),
): T {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch (e) {
    throw new DeserializationError(`Invalid JSON from ${source}`, e);
  }

  const validate = registry.validator<T>(schemaName);
  if (!validate(data)) {
    throw new DeserializationError(`Payload from ${source} does not match ${schemaName}: ${registry.errorsText(validate)}`);
  }
  return data;
}
