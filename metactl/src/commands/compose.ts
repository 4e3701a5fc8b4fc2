import fs from "node:fs";
import { fetchVersionManifest } from "../metadata/minecraft.js";
import { fetchMergedVersion } from "../metadata/modded.js";
import type { VersionInfo } from "../types/minecraft.js";
import type { CommandContext } from "./context.js";
import { toFailure, type CommandFailure } from "./exit-codes.js";

export type ComposeOptions = {
  partialUrl: string;
  manifestUrl?: string;
  out?: string;
};

export type ComposeResult = { ok: true; version: VersionInfo; out?: string } | CommandFailure;

/** Merge a loader overlay over the game version it inherits from. */
export async function composeVersion(opts: ComposeOptions, ctx: CommandContext): Promise<ComposeResult> {
  const source = { fetcher: ctx.fetcher, registry: ctx.registry };
  try {
    const manifest = await fetchVersionManifest(opts.manifestUrl ?? ctx.config.version_manifest_url, source);
    const version = await fetchMergedVersion(opts.partialUrl, manifest, source);
    if (opts.out) {
      fs.writeFileSync(opts.out, JSON.stringify(version, null, 2) + "\n");
    }
    return { ok: true, version, out: opts.out };
  } catch (e) {
    return toFailure(e);
  }
}
