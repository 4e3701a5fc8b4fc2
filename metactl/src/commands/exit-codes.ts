import { describeError, isMetadataError, type MetadataErrorKind } from "../core/errors.js";

/** Process exit codes, one per failure class. */
export const EXIT = {
  SUCCESS: 0,
  FETCH_FAILED: 1,
  INTEGRITY_FAILED: 2,
  INVALID_ARGS: 3,
  MALFORMED_PAYLOAD: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_KIND: Record<MetadataErrorKind, ExitCode> = {
  checksum_failure: EXIT.INTEGRITY_FAILED,
  network_fetch_failure: EXIT.FETCH_FAILED,
  configuration_error: EXIT.INVALID_ARGS,
  deserialization_error: EXIT.MALFORMED_PAYLOAD,
  task_execution_error: EXIT.FETCH_FAILED,
};

export type CommandFailure = { ok: false; code: string; error: string; exitCode: ExitCode };

export function invalidArgs(message: string): CommandFailure {
  return { ok: false, code: "INVALID_ARGS", error: message, exitCode: EXIT.INVALID_ARGS };
}

/** Map a thrown value onto the failure a command handler returns. */
export function toFailure(err: unknown): CommandFailure {
  if (isMetadataError(err)) {
    return { ok: false, code: err.kind.toUpperCase(), error: describeError(err), exitCode: EXIT_BY_KIND[err.kind] };
  }
  return { ok: false, code: "UNEXPECTED_ERROR", error: describeError(err), exitCode: EXIT.FETCH_FAILED };
}
