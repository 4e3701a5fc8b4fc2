/** Configuration types — layered config system. */

export type BrandingConfig = {
  name: string;
  email: string;
};

export type MetactlConfig = {
  schema_version: string;
  branding?: BrandingConfig;
  version_manifest_url: string;
  /** Mirror prefixes for `metactl mirror` when none are given on the command line. */
  mirrors?: string[];
  /** Digest worker pool size. */
  hash_workers?: number;
};
