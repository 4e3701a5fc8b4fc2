/** Game-version metadata as served by the version manifest and its per-version documents. */

export type VersionType = "release" | "snapshot" | "old_alpha" | "old_beta";

export type JavaProfile =
  | "jre-legacy"
  | "java-runtime-alpha"
  | "java-runtime-beta"
  | "java-runtime-gamma"
  | "minecraft-java-exe";

/** One entry of the version manifest. */
export type Version = {
  id: string;
  type: VersionType;
  /** Location of the full version document. */
  url: string;
  time: string;
  releaseTime: string;
  /** SHA-1 of the version document at `url`. */
  sha1: string;
  complianceLevel: number;
  /** Mirror-provided only. */
  assetsIndexUrl?: string;
  /** Mirror-provided only. */
  assetsIndexSha1?: string;
  javaProfile?: JavaProfile;
};

export type LatestVersion = {
  release: string;
  snapshot: string;
};

export type VersionManifest = {
  latest: LatestVersion;
  versions: Version[];
};

export type AssetIndex = {
  id: string;
  sha1: string;
  size: number;
  totalSize: number;
  url: string;
};

export type DownloadType = "client" | "client_mappings" | "server" | "server_mappings" | "windows_server";

export type Download = {
  sha1: string;
  size: number;
  url: string;
};

export type LibraryDownload = {
  path: string;
  sha1: string;
  size: number;
  url: string;
};

export type LibraryDownloads = {
  artifact?: LibraryDownload;
  /** Classifier name → file, e.g. `natives-linux`. */
  classifiers?: Record<string, LibraryDownload>;
};

export type RuleAction = "allow" | "disallow";

export type Os =
  | "osx"
  | "osx-arm64"
  | "windows"
  | "windows-arm64"
  | "linux"
  | "linux-arm64"
  | "linux-arm32"
  | "unknown";

export type OsRule = {
  name?: Os;
  /** Usually a regular expression. */
  version?: string;
  arch?: string;
};

export type FeatureRule = {
  is_demo_user?: boolean;
  has_demo_resolution?: boolean;
};

export type Rule = {
  action: RuleAction;
  os?: OsRule;
  features?: FeatureRule;
};

export type LibraryExtract = {
  exclude?: string[];
};

export type JavaVersion = {
  component: string;
  majorVersion: number;
};

export type Library = {
  downloads?: LibraryDownloads;
  extract?: LibraryExtract;
  /** Maven coordinate, `groupId:artifactId:version`. */
  name: string;
  url?: string;
  natives?: Partial<Record<Os, string>>;
  rules?: Rule[];
  /** Loader libraries only. */
  checksums?: string[];
  include_in_classpath: boolean;
};

/** Library overlay: every field optional, present fields override the base library. */
export type PartialLibrary = {
  downloads?: LibraryDownloads;
  extract?: LibraryExtract;
  name?: string;
  url?: string;
  natives?: Partial<Record<Os, string>>;
  rules?: Rule[];
  checksums?: string[];
  include_in_classpath?: boolean;
};

export type ArgumentValue = string | string[];

export type Argument = string | { rules: Rule[]; value: ArgumentValue };

export type ArgumentType = "game" | "jvm";

export type SidedDataEntry = {
  client: string;
  server: string;
};

export type Processor = {
  /** Maven coordinate of the processor jar. */
  jar: string;
  classpath: string[];
  args: string[];
  outputs?: Record<string, string>;
  /** Any of `client`, `server`, `extract`. */
  sides?: string[];
};

export type VersionInfo = {
  arguments?: Partial<Record<ArgumentType, Argument[]>>;
  assetIndex: AssetIndex;
  assets: string;
  downloads: Partial<Record<DownloadType, Download>>;
  id: string;
  javaVersion?: JavaVersion;
  libraries: Library[];
  mainClass: string;
  /** Pre-1.13 argument string. */
  minecraftArguments?: string;
  minimumLauncherVersion: number;
  complianceLevel?: number;
  releaseTime: string;
  time: string;
  type: VersionType;
  data?: Record<string, SidedDataEntry>;
  processors?: Processor[];
};

export type Asset = {
  hash: string;
  size: number;
};

export type AssetsIndex = {
  objects: Record<string, Asset>;
};
