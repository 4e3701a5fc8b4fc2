import type { VersionInfo } from "../types/minecraft.js";
import type { PartialVersionInfo } from "../types/modded.js";
import { concatOverlayFirst, pick, unionKeys } from "./rules.js";

/**
 * Apply a loader's version overlay to the game version it inherits from.
 *
 * Identity fields (`id`, `time`, `releaseTime`, `type`) always come from the
 * overlay. Libraries and processors concatenate overlay first.
 *
 * `arguments` is key-unioned, but an overlay's list replaces the base list for
 * the same argument type instead of being appended to it. Library merges
 * concatenate their lists; version arguments deliberately do not.
 */
export function mergePartialVersion(partial: PartialVersionInfo, base: VersionInfo): VersionInfo {
  return {
    arguments: unionKeys(partial.arguments, base.arguments),
    assetIndex: base.assetIndex,
    assets: base.assets,
    downloads: base.downloads,
    id: partial.id,
    javaVersion: base.javaVersion,
    libraries: [...partial.libraries, ...base.libraries],
    mainClass: pick(partial.mainClass, base.mainClass),
    minecraftArguments: base.minecraftArguments,
    minimumLauncherVersion: base.minimumLauncherVersion,
    complianceLevel: base.complianceLevel,
    releaseTime: partial.releaseTime,
    time: partial.time,
    type: partial.type,
    data: unionKeys(partial.data, base.data),
    processors: concatOverlayFirst(partial.processors, base.processors),
  };
}
