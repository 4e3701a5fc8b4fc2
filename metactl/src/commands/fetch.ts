import fs from "node:fs";
import { computeSha1, isSha1Hex } from "../integrity/checksum.js";
import type { CommandContext } from "./context.js";
import { invalidArgs, toFailure, type CommandFailure } from "./exit-codes.js";

export type DownloadResult =
  | { ok: true; url: string; bytes: Uint8Array; sha1: string; out?: string }
  | CommandFailure;

export type FetchOptions = {
  url: string;
  sha1?: string;
  out?: string;
};

/** Write the body to `out` when given; the caller prints it otherwise. */
export function writeOutput(out: string | undefined, bytes: Uint8Array): void {
  if (out) fs.writeFileSync(out, bytes);
}

export async function fetchFile(opts: FetchOptions, ctx: CommandContext): Promise<DownloadResult> {
  if (opts.sha1 !== undefined && !isSha1Hex(opts.sha1)) {
    return invalidArgs(`--sha1 must be 40 lowercase hex characters, got "${opts.sha1}"`);
  }

  try {
    const bytes = await ctx.fetcher.download(opts.url, { sha1: opts.sha1 });
    writeOutput(opts.out, bytes);
    return { ok: true, url: opts.url, bytes, sha1: computeSha1(bytes), out: opts.out };
  } catch (e) {
    return toFailure(e);
  }
}
