export type CargoProfile = 'debug' | 'release';

export type RustExtensionOptions = {
  /**
   * Full dotted name of the extension, including any packages, e.g. `mypkg._native`.
   * Not a filename. When omitted the name is derived from the artifact cargo produces.
   */
  name?: string;
  /** Path to the crate's Cargo.toml. */
  manifestPath: string;
  /** Extra arguments appended verbatim to `cargo build`. */
  args?: readonly string[];
  /** Extra cargo features enabled alongside the runtime feature. */
  features?: readonly string[];
  /** semver range the installed rustc must satisfy, e.g. `>=1.70.0`. */
  version?: string;
  /** Don't echo the cargo command line or its output. */
  quiet?: boolean;
  /** Build the debug profile instead of passing `--release`. */
  debug?: boolean;
};
