import type { Library, LibraryDownloads, PartialLibrary } from "../types/minecraft.js";
import { concatOverlayFirst, mergeNested, pick, unionKeys } from "./rules.js";

function mergeDownloads(overlay: LibraryDownloads, base: LibraryDownloads): LibraryDownloads {
  return {
    // The artifact is one file: replaced, never merged.
    artifact: pick(overlay.artifact, base.artifact),
    classifiers: unionKeys(overlay.classifiers, base.classifiers),
  };
}

/**
 * Apply a library overlay to a complete library.
 *
 * `rules` concatenate with the overlay's rules first; `natives` and
 * `downloads.classifiers` are key-unioned; `checksums`, `extract` and
 * `downloads.artifact` are replaced wholesale.
 */
export function mergePartialLibrary(partial: PartialLibrary, base: Library): Library {
  return {
    downloads: mergeNested(partial.downloads, base.downloads, mergeDownloads),
    extract: pick(partial.extract, base.extract),
    name: pick(partial.name, base.name),
    url: pick(partial.url, base.url),
    natives: unionKeys(partial.natives, base.natives),
    rules: concatOverlayFirst(partial.rules, base.rules),
    checksums: pick(partial.checksums, base.checksums),
    include_in_classpath: pick(partial.include_in_classpath, base.include_in_classpath),
  };
}
