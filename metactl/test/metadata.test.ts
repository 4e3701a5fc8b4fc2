import { describe, expect, it } from "vitest";
import { ChecksumError, ConfigurationError, DeserializationError } from "../src/core/errors.js";
import { Fetcher } from "../src/fetch/fetcher.js";
import { inlineHasher } from "../src/integrity/checksum.js";
import {
  fetchAssetsIndex,
  fetchVersionInfo,
  fetchVersionManifest,
  findVersion,
  parseJavaProfile,
  parseVersionType,
} from "../src/metadata/minecraft.js";
import { fetchLoaderManifest, fetchMergedVersion, fetchPartialVersion } from "../src/metadata/modded.js";
import {
  ASSETS_URL,
  MANIFEST_URL,
  PARTIAL_URL,
  ScriptedTransport,
  VERSION_URL,
  jsonBody,
  manifest,
  manifestEntry,
  partialVersion,
  versionInfo,
  type Step,
} from "./helpers.js";

function source(script: Record<string, Step[]>) {
  const transport = new ScriptedTransport(script);
  return { transport, fetcher: new Fetcher({ transport, hasher: inlineHasher }) };
}

describe("game metadata", () => {
  it("fetches and validates the version manifest", async () => {
    const doc = manifest([manifestEntry("a".repeat(40))]);
    const { fetcher } = source({ [MANIFEST_URL]: [{ body: JSON.stringify(doc) }] });
    expect(await fetchVersionManifest(MANIFEST_URL, { fetcher })).toEqual(doc);
  });

  it("fetches a version document verified against the manifest sha1", async () => {
    const { body, sha1 } = jsonBody(versionInfo());
    const { fetcher, transport } = source({ [VERSION_URL]: [{ body }] });
    const info = await fetchVersionInfo(manifestEntry(sha1), { fetcher });
    expect(info.id).toBe("1.20.1");
    expect(transport.urls()).toEqual([VERSION_URL]);
  });

  it("fails a version document whose sha1 never matches", async () => {
    const { body } = jsonBody(versionInfo());
    const { fetcher, transport } = source({ [VERSION_URL]: [{ body }] });
    await expect(fetchVersionInfo(manifestEntry("b".repeat(40)), { fetcher })).rejects.toBeInstanceOf(ChecksumError);
    expect(transport.requests).toHaveLength(4);
  });

  it("defaults include_in_classpath to true", async () => {
    const doc = { ...versionInfo(), libraries: [{ name: "org.example:lib:1.0" }] };
    const { body, sha1 } = jsonBody(doc);
    const { fetcher } = source({ [VERSION_URL]: [{ body }] });
    const info = await fetchVersionInfo(manifestEntry(sha1), { fetcher });
    expect(info.libraries).toEqual([{ name: "org.example:lib:1.0", include_in_classpath: true }]);
  });

  it("does not retry a payload that is not JSON", async () => {
    const { fetcher, transport } = source({ [MANIFEST_URL]: [{ body: "<html>" }] });
    const err = await fetchVersionManifest(MANIFEST_URL, { fetcher }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeserializationError);
    expect(err instanceof Error && err.message).toBe(`Invalid JSON from ${MANIFEST_URL}`);
    expect(transport.requests).toHaveLength(1);
  });

  it("rejects JSON of the wrong shape", async () => {
    const { fetcher } = source({ [MANIFEST_URL]: [{ body: JSON.stringify({ versions: "none" }) }] });
    await expect(fetchVersionManifest(MANIFEST_URL, { fetcher })).rejects.toThrow(
      `Payload from ${MANIFEST_URL} does not match version-manifest`,
    );
  });

  it("fetches the asset index named by a version document", async () => {
    const assets = { objects: { "icons/icon_16x16.png": { hash: "c".repeat(40), size: 3665 } } };
    const { body, sha1 } = jsonBody(assets);
    const info = versionInfo();
    info.assetIndex = { ...info.assetIndex, sha1 };
    const { fetcher } = source({ [ASSETS_URL]: [{ body }] });
    expect(await fetchAssetsIndex(info, { fetcher })).toEqual(assets);
  });

  it("finds versions by id", () => {
    const doc = manifest([manifestEntry("a".repeat(40)), manifestEntry("d".repeat(40), { id: "23w31a", type: "snapshot" })]);
    expect(findVersion(doc, "23w31a")?.type).toBe("snapshot");
    expect(findVersion(doc, "0.0.1")).toBeUndefined();
  });

  it("parses java profiles and version types", () => {
    expect(parseJavaProfile("java-runtime-gamma")).toBe("java-runtime-gamma");
    expect(() => parseJavaProfile("java-runtime-omega")).toThrow("Invalid java profile: java-runtime-omega");
    expect(parseVersionType("old_beta")).toBe("old_beta");
    expect(() => parseVersionType("beta")).toThrow(DeserializationError);
  });
});

describe("loader metadata", () => {
  it("fetches a loader overlay", async () => {
    const { fetcher } = source({ [PARTIAL_URL]: [{ body: JSON.stringify(partialVersion()) }] });
    const partial = await fetchPartialVersion(PARTIAL_URL, { fetcher });
    expect(partial.inheritsFrom).toBe("1.20.1");
    expect(partial.libraries[0].include_in_classpath).toBe(true);
  });

  it("fetches a loader manifest", async () => {
    const url = "https://loader.test/manifest.json";
    const doc = { gameVersions: [{ id: "1.20.1", loaders: { stable: { id: "0.15.0", url: PARTIAL_URL } } }] };
    const { fetcher } = source({ [url]: [{ body: JSON.stringify(doc) }] });
    expect(await fetchLoaderManifest(url, { fetcher })).toEqual(doc);
  });

  it("merges an overlay over the version it inherits from", async () => {
    const { body, sha1 } = jsonBody(versionInfo());
    const { fetcher, transport } = source({
      [PARTIAL_URL]: [{ body: JSON.stringify(partialVersion()) }],
      [VERSION_URL]: [{ body }],
    });
    const merged = await fetchMergedVersion(PARTIAL_URL, manifest([manifestEntry(sha1)]), { fetcher });

    expect(transport.urls()).toEqual([PARTIAL_URL, VERSION_URL]);
    expect(merged.id).toBe("1.20.1-loader-0.15");
    expect(merged.mainClass).toBe("net.loader.launch.Knot");
    expect(merged.libraries.map((l) => l.name)).toEqual([
      "net.loader:loader:0.15.0",
      "org.lwjgl:lwjgl:3.3.1",
      "com.mojang:brigadier:1.1.8",
    ]);
  });

  it("rejects an overlay whose base version is not in the manifest", async () => {
    const { fetcher, transport } = source({
      [PARTIAL_URL]: [{ body: JSON.stringify(partialVersion({ inheritsFrom: "1.99" })) }],
    });
    const err = await fetchMergedVersion(PARTIAL_URL, manifest([manifestEntry("a".repeat(40))]), { fetcher }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(transport.urls()).toEqual([PARTIAL_URL]);
  });
});
