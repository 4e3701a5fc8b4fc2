import { ConfigurationError } from "../core/errors.js";
import { defaultFetcher } from "../fetch/fetcher.js";
import { mergePartialVersion } from "../merge/version.js";
import type { VersionInfo, VersionManifest } from "../types/minecraft.js";
import type { LoaderManifest, PartialVersionInfo } from "../types/modded.js";
import { decodeJson } from "./decode.js";
import { fetchVersionInfo, findVersion, type MetadataSource } from "./minecraft.js";

export async function fetchPartialVersion(url: string, source: MetadataSource = {}): Promise<PartialVersionInfo> {
  const fetcher = source.fetcher ?? defaultFetcher();
  const bytes = await fetcher.download(url, { signal: source.signal });
  return decodeJson<PartialVersionInfo>(bytes, "partial-version-info", url, source.registry);
}

export async function fetchLoaderManifest(url: string, source: MetadataSource = {}): Promise<LoaderManifest> {
  const fetcher = source.fetcher ?? defaultFetcher();
  const bytes = await fetcher.download(url, { signal: source.signal });
  return decodeJson<LoaderManifest>(bytes, "loader-manifest", url, source.registry);
}

/**
 * Fetch a loader overlay and the game version it inherits from, and merge
 * the two. The overlay is fetched first; the base version is looked up in
 * `manifest` by the overlay's `inheritsFrom`.
 *
 * @throws {ConfigurationError} `inheritsFrom` names a version missing from `manifest`
 */
export async function fetchMergedVersion(
  partialUrl: string,
  manifest: VersionManifest,
  source: MetadataSource = {},
): Promise<VersionInfo> {
  const partial = await fetchPartialVersion(partialUrl, source);
  const base = findVersion(manifest, partial.inheritsFrom);
  if (!base) {
    throw new ConfigurationError(`Version ${partial.inheritsFrom} (inherited by ${partial.id}) is not in the manifest`);
  }
  const info = await fetchVersionInfo(base, source);
  return mergePartialVersion(partial, info);
}
