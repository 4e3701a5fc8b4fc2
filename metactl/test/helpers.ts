import type { HttpRequest, HttpResponse, HttpTransport } from "../src/fetch/transport.js";
import { computeSha1 } from "../src/integrity/checksum.js";
import type { Library, Version, VersionInfo, VersionManifest } from "../src/types/minecraft.js";
import type { PartialVersionInfo } from "../src/types/modded.js";

export type Step =
  | { body: string | Uint8Array; status?: number }
  | { status: number }
  | { error: Error }
  | { bodyError: Error }
  | { hang: true };

export type RecordedRequest = { url: string; headers: Record<string, string> };

function toBytes(body: string | Uint8Array): Uint8Array {
  return typeof body === "string" ? new TextEncoder().encode(body) : body;
}

/**
 * In-process transport that plays back a script of responses per URL. The
 * last step of a URL repeats once its script runs out; an unscripted URL
 * fails like a refused connection.
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly scripts = new Map<string, Step[]>();

  constructor(script: Record<string, Step[]> = {}) {
    for (const [url, steps] of Object.entries(script)) this.scripts.set(url, [...steps]);
  }

  urls(): string[] {
    return this.requests.map((r) => r.url);
  }

  async get(url: string, req: HttpRequest): Promise<HttpResponse> {
    this.requests.push({ url, headers: req.headers });
    const steps = this.scripts.get(url);
    const step = steps && steps.length > 1 ? steps.shift() : steps?.[0];
    if (!step) throw new Error(`connect ECONNREFUSED ${url}`);

    if ("hang" in step) {
      return new Promise((_resolve, reject) => {
        req.signal.addEventListener("abort", () => reject(req.signal.reason), { once: true });
      });
    }
    if ("error" in step) throw step.error;
    if ("bodyError" in step) {
      const err = step.bodyError;
      return { status: 200, bytes: async () => Promise.reject(err) };
    }

    const status = step.status ?? 200;
    const bytes = "body" in step ? toBytes(step.body) : new Uint8Array();
    return { status, bytes: async () => bytes };
  }
}

export function jsonBody(value: unknown): { body: string; sha1: string } {
  const body = JSON.stringify(value);
  return { body, sha1: computeSha1(new TextEncoder().encode(body)) };
}

export const MANIFEST_URL = "https://meta.test/mc/version_manifest_v2.json";
export const VERSION_URL = "https://meta.test/v1/packages/1.20.1.json";
export const ASSETS_URL = "https://meta.test/v1/packages/assets-5.json";
export const PARTIAL_URL = "https://loader.test/versions/1.20.1-loader-0.15.json";

export function library(name: string, extra: Partial<Library> = {}): Library {
  return { name, include_in_classpath: true, ...extra };
}

export function versionInfo(extra: Partial<VersionInfo> = {}): VersionInfo {
  return {
    arguments: {
      game: ["--username", "${auth_player_name}"],
      jvm: ["-Djava.library.path=${natives_directory}"],
    },
    assetIndex: {
      id: "5",
      sha1: "b1f5a1ad9b5d7f6b4b36e3e1e2c6d0a4c8e5f301",
      size: 410,
      totalSize: 620_000,
      url: ASSETS_URL,
    },
    assets: "5",
    downloads: {
      client: { sha1: "0c3ec587af28e5a785c0b4a7b8a30f9a8f78f838", size: 23_000_000, url: "https://meta.test/client.jar" },
    },
    id: "1.20.1",
    javaVersion: { component: "java-runtime-gamma", majorVersion: 17 },
    libraries: [library("org.lwjgl:lwjgl:3.3.1"), library("com.mojang:brigadier:1.1.8")],
    mainClass: "net.minecraft.client.main.Main",
    minimumLauncherVersion: 21,
    complianceLevel: 1,
    releaseTime: "2023-06-12T13:25:51+00:00",
    time: "2023-06-12T13:25:51+00:00",
    type: "release",
    ...extra,
  };
}

export function manifestEntry(sha1: string, extra: Partial<Version> = {}): Version {
  return {
    id: "1.20.1",
    type: "release",
    url: VERSION_URL,
    time: "2023-06-12T13:25:51+00:00",
    releaseTime: "2023-06-12T13:25:51+00:00",
    sha1,
    complianceLevel: 1,
    ...extra,
  };
}

export function manifest(versions: Version[]): VersionManifest {
  return { latest: { release: "1.20.1", snapshot: "23w31a" }, versions };
}

export function partialVersion(extra: Partial<PartialVersionInfo> = {}): PartialVersionInfo {
  return {
    id: "1.20.1-loader-0.15",
    inheritsFrom: "1.20.1",
    releaseTime: "2023-12-01T10:00:00+00:00",
    time: "2023-12-01T10:00:00+00:00",
    mainClass: "net.loader.launch.Knot",
    arguments: { jvm: ["-DloaderFlag=true"] },
    libraries: [library("net.loader:loader:0.15.0", { url: "https://maven.loader.test/" })],
    type: "release",
    ...extra,
  };
}
