import { computeSha1, isSha1Hex } from "../integrity/checksum.js";
import type { CommandContext } from "./context.js";
import { invalidArgs, toFailure } from "./exit-codes.js";
import { writeOutput, type DownloadResult } from "./fetch.js";

export type MirrorOptions = {
  path: string;
  /** Falls back to `mirrors` from config when empty. */
  mirrors?: string[];
  sha1?: string;
  out?: string;
};

export async function mirrorFile(opts: MirrorOptions, ctx: CommandContext): Promise<DownloadResult> {
  if (opts.sha1 !== undefined && !isSha1Hex(opts.sha1)) {
    return invalidArgs(`--sha1 must be 40 lowercase hex characters, got "${opts.sha1}"`);
  }

  const mirrors = opts.mirrors && opts.mirrors.length > 0 ? opts.mirrors : (ctx.config.mirrors ?? []);

  try {
    const bytes = await ctx.fetcher.downloadFromMirrors(opts.path, mirrors, { sha1: opts.sha1 });
    writeOutput(opts.out, bytes);
    // Reported URL is the relative path: which mirror served it is only in the diagnostics.
    return { ok: true, url: opts.path, bytes, sha1: computeSha1(bytes), out: opts.out };
  } catch (e) {
    return toFailure(e);
  }
}
