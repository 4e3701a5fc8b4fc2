import { DeserializationError } from "../core/errors.js";
import { defaultFetcher, type Fetcher } from "../fetch/fetcher.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { AssetsIndex, JavaProfile, Version, VersionInfo, VersionManifest, VersionType } from "../types/minecraft.js";
import { decodeJson } from "./decode.js";

export const VERSION_MANIFEST_URL = "https://piston-meta.mojang.com/mc/game/version_manifest_v2.json";

/** Where metadata helpers download through and validate against. Both default to the shared instances. */
export type MetadataSource = {
  fetcher?: Fetcher;
  registry?: SchemaRegistry;
  signal?: AbortSignal;
};

export async function fetchVersionManifest(
  url: string = VERSION_MANIFEST_URL,
  source: MetadataSource = {},
): Promise<VersionManifest> {
  const fetcher = source.fetcher ?? defaultFetcher();
  const bytes = await fetcher.download(url, { signal: source.signal });
  return decodeJson<VersionManifest>(bytes, "version-manifest", url, source.registry);
}

/** Download a manifest entry's version document, verified against the entry's SHA-1. */
export async function fetchVersionInfo(version: Version, source: MetadataSource = {}): Promise<VersionInfo> {
  const fetcher = source.fetcher ?? defaultFetcher();
  const bytes = await fetcher.download(version.url, { sha1: version.sha1, signal: source.signal });
  return decodeJson<VersionInfo>(bytes, "version-info", version.url, source.registry);
}

export async function fetchAssetsIndex(versionInfo: VersionInfo, source: MetadataSource = {}): Promise<AssetsIndex> {
  const { url, sha1 } = versionInfo.assetIndex;
  const fetcher = source.fetcher ?? defaultFetcher();
  const bytes = await fetcher.download(url, { sha1, signal: source.signal });
  return decodeJson<AssetsIndex>(bytes, "assets-index", url, source.registry);
}

export function findVersion(manifest: VersionManifest, id: string): Version | undefined {
  return manifest.versions.find((v) => v.id === id);
}

const JAVA_PROFILES: readonly JavaProfile[] = [
  "jre-legacy",
  "java-runtime-alpha",
  "java-runtime-beta",
  "java-runtime-gamma",
  "minecraft-java-exe",
];

const VERSION_TYPES: readonly VersionType[] = ["release", "snapshot", "old_alpha", "old_beta"];

/** @throws {DeserializationError} `name` is not a known Java runtime profile */
export function parseJavaProfile(name: string): JavaProfile {
  const profile = JAVA_PROFILES.find((p) => p === name);
  if (profile === undefined) {
    throw new DeserializationError(`Invalid java profile: ${name}`);
  }
  return profile;
}

/** @throws {DeserializationError} `name` is not a known version type */
export function parseVersionType(name: string): VersionType {
  const type = VERSION_TYPES.find((t) => t === name);
  if (type === undefined) {
    throw new DeserializationError(`Invalid version type: ${name}`);
  }
  return type;
}
