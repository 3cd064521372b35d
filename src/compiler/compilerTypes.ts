export type ToolchainInfo = {
  /**
   * rustc version, e.g. `1.75.0`.
   * null when rustc is missing, not executable or `rustc -V` failed.
   */
  version: string | null;
  /** rustc executable used for version detection (`RUSTC` or `rustc`). */
  rustc: string;
  /** cargo executable used for builds (`CARGO` or `cargo`). */
  cargo: string;
  /** Untouched `rustc -V` output, when detection ran. */
  raw?: string;
};

export type RuntimeFeature = {
  /** semver range over `process.versions.node`. */
  range: string;
  /** cargo feature that selects the matching binding generation. */
  feature: string;
  /** Extra environment for cargo when building for this generation. */
  env?: Readonly<Record<string, string>>;
};
