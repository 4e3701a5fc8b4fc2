import { DeserializationError } from "../core/errors.js";
import { fetchVersionManifest, parseVersionType } from "../metadata/minecraft.js";
import type { LatestVersion, Version, VersionType } from "../types/minecraft.js";
import type { CommandContext } from "./context.js";
import { invalidArgs, toFailure, type CommandFailure } from "./exit-codes.js";

export type VersionsOptions = {
  url?: string;
  type?: string;
};

export type VersionsResult = { ok: true; latest: LatestVersion; versions: Version[] } | CommandFailure;

/** List manifest entries, newest first as served, optionally narrowed to one version type. */
export async function listVersions(opts: VersionsOptions, ctx: CommandContext): Promise<VersionsResult> {
  let type: VersionType | undefined;
  if (opts.type !== undefined) {
    try {
      type = parseVersionType(opts.type);
    } catch (e) {
      if (e instanceof DeserializationError) return invalidArgs(e.message);
      throw e;
    }
  }

  try {
    const manifest = await fetchVersionManifest(opts.url ?? ctx.config.version_manifest_url, {
      fetcher: ctx.fetcher,
      registry: ctx.registry,
    });
    const versions = type === undefined ? manifest.versions : manifest.versions.filter((v) => v.type === type);
    return { ok: true, latest: manifest.latest, versions };
  } catch (e) {
    return toFailure(e);
  }
}
