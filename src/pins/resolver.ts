import fs from "node:fs";
import path from "node:path";
import type { GitSource, Input, ResolvedPin, ResolvedPins } from "../types/source.js";
import { openGitRepository, type OpenRepository } from "../git/operations.js";
import { inputFilename } from "../makepkg/input.js";
import { silent, diag, type DiagnosticSink } from "../log/diagnostics.js";

export type ResolveOpts = {
  /** `source=` entries, used to look up pins declared by name only. */
  sources?: readonly Input[];
  openRepository?: OpenRepository;
  log?: DiagnosticSink;
};

/**
 * Resolve a tagged git source against an existing local clone.
 * Cloning is not supported; the repository must already be at repoPath.
 */
export async function resolvePin(
  source: GitSource,
  repoPath: string,
  openRepository: OpenRepository = openGitRepository,
  log: DiagnosticSink = silent
): Promise<ResolvedPin> {
  if (!fs.existsSync(repoPath)) {
    throw new Error(`Repo does not exist yet, cloning is currently not supported: ${repoPath}`);
  }

  const tagName = source.tag;
  if (tagName === undefined) {
    throw new Error(`No tag configured: ${source.url}`);
  }

  const repo = await openRepository(repoPath);
  const ref = `refs/tags/${tagName}`;

  const tagHash = await repo.resolveRef(ref);
  log(diag("info", "TAG_RESOLVED", `Resolved tag "${tagName}" to tag hash: ${tagHash}`, { tag: tagName, tagHash }));

  const commitHash = await repo.peelToCommit(ref);
  log(diag("info", "TAG_PEELED", `Resolved tag "${tagName}" to commit hash: ${commitHash}`, { tag: tagName, commitHash }));

  return { tagHash, commitHash, source: { kind: "git", git: source } };
}

/**
 * The git source a pin stands for. A bare name (`vcspins=(foo)`) parses as a
 * file source and is looked up among the `source=` entries by filename.
 */
function pinGitSource(pin: Input, filename: string, sources: readonly Input[]): GitSource {
  switch (pin.source.kind) {
    case "git":
      return pin.source.git;
    case "url":
      throw new Error(`Url sources are not allowed in vcspins: ${filename}`);
    case "file": {
      const named = sources.find((s) => s.source.kind === "git" && inputFilename(s) === filename)?.source;
      if (named?.kind === "git") return named.git;
      throw new Error(`File sources are not allowed in vcspins: ${filename}`);
    }
  }
}

/**
 * Resolve every declared pin, in declaration order. Each pin's clone is
 * expected at `<folder>/<filename>`. Stops at the first failure.
 */
export async function resolvePins(
  pins: readonly Input[],
  folder: string,
  opts: ResolveOpts = {}
): Promise<ResolvedPins> {
  const log = opts.log ?? silent;
  const resolved = new Map<string, ResolvedPin>();

  for (const pin of pins) {
    const filename = inputFilename(pin);
    log(diag("debug", "PIN_PROCESSING", `Processing pin: ${filename}`, { filename }));

    const git = pinGitSource(pin, filename, opts.sources ?? []);
    const repoPath = path.join(folder, filename);
    try {
      resolved.set(filename, await resolvePin(git, repoPath, opts.openRepository, log));
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to resolve pin "${filename}": ${message}`, { cause: e });
    }
  }

  return resolved;
}
