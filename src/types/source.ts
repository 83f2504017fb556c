/** Source model for PKGBUILD `source=` / `vcspins=` entries. */

export type GitSource = {
  url: string;
  commit?: string;
  tag?: string;
  signed: boolean;
};

export type Source =
  | { kind: "file"; path: string }
  | { kind: "url"; url: string }
  | { kind: "git"; git: GitSource };

/**
 * One array element. `filename` is set when the entry used the
 * `filename::url` form; otherwise it is derived from the source.
 */
export type Input = {
  source: Source;
  filename?: string;
};

export type ResolvedPin = {
  tagHash: string;
  commitHash: string;
  source: Source;
};

/** Resolved pins keyed by filename, in pin declaration order. */
export type ResolvedPins = ReadonlyMap<string, ResolvedPin>;

export type PinMode = "tag" | "commit";
