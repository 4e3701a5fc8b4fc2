/** Loader (mod platform) metadata: overlay versions and loader manifests. */
import type { Argument, ArgumentType, Library, Processor, SidedDataEntry, VersionType } from "./minecraft.js";

/** A loader's version document. It overlays the game version named by `inheritsFrom`. */
export type PartialVersionInfo = {
  id: string;
  inheritsFrom: string;
  releaseTime: string;
  time: string;
  mainClass?: string;
  arguments?: Partial<Record<ArgumentType, Argument[]>>;
  libraries: Library[];
  type: VersionType;
  data?: Record<string, SidedDataEntry>;
  processors?: Processor[];
};

export type LoaderType = "latest" | "stable";

export type LoaderVersion = {
  id: string;
  /** Location of the loader's PartialVersionInfo. */
  url: string;
};

export type LoaderGameVersion = {
  /** Game version id. */
  id: string;
  loaders: Partial<Record<LoaderType, LoaderVersion>>;
};

export type LoaderManifest = {
  gameVersions: LoaderGameVersion[];
};
