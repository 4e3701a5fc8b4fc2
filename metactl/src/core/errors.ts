export type MetadataErrorKind =
  | "checksum_failure"
  | "network_fetch_failure"
  | "configuration_error"
  | "deserialization_error"
  | "task_execution_error";

/**
 * Base of every error the fetch and metadata layers reject with.
 * Switch on `kind` to tell content failures from infrastructure failures.
 */
export abstract class MetadataError extends Error {
  abstract readonly kind: MetadataErrorKind;
}

/** Downloaded bytes did not match the expected SHA-1 on any attempt. */
export class ChecksumError extends MetadataError {
  readonly kind = "checksum_failure";

  constructor(
    readonly hash: string,
    readonly url: string,
    readonly tries: number,
  ) {
    super(`Failed to validate file checksum at url ${url} with hash ${hash} after ${tries} tries`);
    this.name = "ChecksumError";
  }
}

export class NetworkFetchError extends MetadataError {
  readonly kind = "network_fetch_failure";

  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Unable to fetch ${url}`, { cause });
    this.name = "NetworkFetchError";
  }
}

export class ConfigurationError extends MetadataError {
  readonly kind = "configuration_error";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class DeserializationError extends MetadataError {
  readonly kind = "deserialization_error";

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "DeserializationError";
  }
}

/** Background work (digest computation) could not be run to completion. */
export class TaskExecutionError extends MetadataError {
  readonly kind = "task_execution_error";

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TaskExecutionError";
  }
}

export function isMetadataError(err: unknown): err is MetadataError {
  return err instanceof MetadataError;
}

/** Render any thrown value, including its cause chain, as one line. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause === undefined) return err.message;
  return `${err.message}: ${describeError(err.cause)}`;
}
