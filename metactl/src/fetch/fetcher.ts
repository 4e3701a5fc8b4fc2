import { currentBranding } from "../branding/branding.js";
import {
  ChecksumError,
  ConfigurationError,
  MetadataError,
  NetworkFetchError,
  TaskExecutionError,
  describeError,
} from "../core/errors.js";
import type { Hasher } from "../integrity/checksum.js";
import { sharedDigestPool } from "../integrity/digest-pool.js";
import { diag, silentLogger, type Logger } from "../log/logger.js";
import { sharedTransport, type HttpTransport } from "./transport.js";

/** Attempts per URL before a transient failure becomes terminal. */
export const MAX_ATTEMPTS = 4;

/** Per-attempt budget covering the request and the body read. */
export const REQUEST_TIMEOUT_MS = 15_000;

export type DownloadOptions = {
  /** Expected lowercase hex SHA-1 of the body. */
  sha1?: string;
  /** Aborts the current attempt and ends the whole download. */
  signal?: AbortSignal;
};

export type FetcherOptions = {
  transport?: HttpTransport;
  hasher?: Hasher;
  /** Overrides the process-wide branding for this fetcher. */
  userAgent?: string;
  logger?: Logger;
  timeoutMs?: number;
};

export type AttemptOutcome =
  | { kind: "success"; bytes: Uint8Array }
  | { kind: "transient_failure"; cause: unknown }
  | { kind: "digest_mismatch"; expected: string; actual: string };

type FailedAttempt = Exclude<AttemptOutcome, { kind: "success" }>;

/**
 * Downloads metadata files with a fixed retry budget and optional SHA-1
 * verification. Attempts run back to back without delay; each one is a fresh
 * request. Bytes of a failed attempt are never returned.
 */
export class Fetcher {
  private readonly transport: HttpTransport;
  private readonly hasher: Hasher;
  private readonly userAgent: string | undefined;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(opts: FetcherOptions = {}) {
    this.transport = opts.transport ?? sharedTransport();
    this.hasher = opts.hasher ?? sharedDigestPool();
    this.userAgent = opts.userAgent;
    this.logger = opts.logger ?? silentLogger;
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  /**
   * GET `url`, retrying transport failures, body-read failures
   * and digest mismatches up to {@link MAX_ATTEMPTS} times in total.
   *
   * @throws {ChecksumError} every attempt returned a body with the wrong digest
   * @throws {NetworkFetchError} the last attempt failed in transport, or `signal` fired
   * @throws {TaskExecutionError} the digest could not be computed
   */
  async download(url: string, opts: DownloadOptions = {}): Promise<Uint8Array> {
    const headers = { "User-Agent": this.userAgent ?? currentBranding().headerValue };

    for (let attempt = 1; ; attempt++) {
      if (opts.signal?.aborted) {
        throw new NetworkFetchError(url, opts.signal.reason);
      }

      const outcome = await this.attempt(url, headers, opts);
      if (outcome.kind === "success") return outcome.bytes;

      if (attempt >= MAX_ATTEMPTS) {
        const err = terminalError(url, outcome, attempt);
        this.logger.log(diag("error", "FETCH_FAILED", err.message, { url, attempts: attempt, error: describeError(err) }));
        throw err;
      }

      this.logger.log(
        diag("warn", "FETCH_RETRY", `Attempt ${attempt}/${MAX_ATTEMPTS} for ${url} failed`, {
          url,
          attempt,
          reason: outcome.kind === "digest_mismatch" ? `sha1 ${outcome.actual} != ${outcome.expected}` : describeError(outcome.cause),
        }),
      );
    }
  }

  /**
   * Try `mirror + relativePath` for each mirror in order, one at a time, each
   * with the full retry budget of {@link download}. The first success wins;
   * if every mirror fails the last mirror's error is thrown.
   *
   * @throws {ConfigurationError} `mirrors` is empty; nothing is requested
   */
  async downloadFromMirrors(
    relativePath: string,
    mirrors: readonly string[],
    opts: DownloadOptions = {},
  ): Promise<Uint8Array> {
    const last = mirrors.at(-1);
    if (last === undefined) {
      throw new ConfigurationError("No mirrors provided");
    }

    for (const mirror of mirrors.slice(0, -1)) {
      try {
        return await this.download(mirror + relativePath, opts);
      } catch (err) {
        if (opts.signal?.aborted) throw err;
        this.logger.log(
          diag("warn", "MIRROR_FAILED", `Mirror ${mirror} failed, trying the next one`, {
            url: mirror + relativePath,
            error: describeError(err),
          }),
        );
      }
    }

    return this.download(last + relativePath, opts);
  }

  private async attempt(url: string, headers: Record<string, string>, opts: DownloadOptions): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${this.timeoutMs} ms`)),
      this.timeoutMs,
    );
    const onAbort = (): void => controller.abort(opts.signal?.reason);
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    let body: Uint8Array;
    try {
      const res = await this.transport.get(url, { headers, signal: controller.signal });
      body = await res.bytes();
    } catch (err) {
      return { kind: "transient_failure", cause: err };
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
    }

    const expected = opts.sha1;
    if (expected === undefined) return { kind: "success", bytes: body };

    const actual = await this.digest(body);
    if (actual !== expected) {
      return { kind: "digest_mismatch", expected, actual };
    }
    return { kind: "success", bytes: body };
  }

  private async digest(bytes: Uint8Array): Promise<string> {
    try {
      return await this.hasher.digest(bytes);
    } catch (err) {
      if (err instanceof TaskExecutionError) throw err;
      throw new TaskExecutionError("Failed to compute digest", err);
    }
  }
}

function terminalError(url: string, outcome: FailedAttempt, attempts: number): MetadataError {
  switch (outcome.kind) {
    case "digest_mismatch":
      return new ChecksumError(outcome.expected, url, attempts);
    case "transient_failure":
      return new NetworkFetchError(url, outcome.cause);
  }
}

let shared: Fetcher | undefined;

/** Fetcher with the shared transport, the shared digest pool and the process-wide branding. */
export function defaultFetcher(): Fetcher {
  if (!shared) shared = new Fetcher();
  return shared;
}
