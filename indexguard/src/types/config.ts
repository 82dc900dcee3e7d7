/** Configuration types for the layered config (see config/loader.ts). */
export type GlyphSet = "emoji" | "ascii";

export type ManifestConfig = {
  /** Manifest file name inside the package directory. */
  file_name: string;
  /** Export command; the manifest path is appended as the last argument. */
  command: string[];
  timeout_ms: number;
};

export type IndexGuardConfig = {
  schema_version: string;
  /** First component of new-file paths in the diff ("b" for git). */
  new_file_prefix: string;
  /** Top-level directory of the index holding package descriptors. */
  index_root: string;
  /** Patterns (minimatch) of paths outside the index that only warn. */
  allowed_paths: string[];
  index_repository: string;
  index_branch: string;
  index_cache_dir: string;
  forge_url_template: string;
  glyphs: GlyphSet;
  manifest: ManifestConfig;
};
