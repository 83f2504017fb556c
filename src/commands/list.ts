import path from "node:path";
import { BashEvaluator, listSources } from "../makepkg/extract.js";
import { resolvePins } from "../pins/resolver.js";
import { openGitRepository } from "../git/operations.js";
import { silent } from "../log/diagnostics.js";
import { extractPins, step, type Collaborators, type Failure } from "./update.js";

export type PinReport = {
  filename: string;
  tag: string | null;
  tagHash: string;
  commitHash: string;
};

export type ListOpts = Collaborators & {
  manifest: string;
  shell?: string;
  pinVariable?: string;
  sourceVariable?: string;
};

export type ListResult = { ok: true; pins: PinReport[] } | Failure;

/** Resolve the declared pins without touching the manifest. */
export async function list(opts: ListOpts): Promise<ListResult> {
  const log = opts.log ?? silent;
  const evaluator = opts.evaluator ?? new BashEvaluator(opts.shell);

  const pins = await extractPins(opts.manifest, evaluator, log, opts.pinVariable);
  if (!pins.ok) return pins;

  const sources = await step("EXTRACT_FAILED", "Failed to get sources from PKGBUILD", () =>
    listSources(evaluator, opts.manifest, log, opts.sourceVariable)
  );
  if (!sources.ok) return sources;

  const folder = path.dirname(path.resolve(opts.manifest));
  const resolved = await step("RESOLVE_FAILED", "Failed to resolve vcs pins", () =>
    resolvePins(pins.value, folder, { sources: sources.value, openRepository: opts.openRepository ?? openGitRepository, log })
  );
  if (!resolved.ok) return resolved;

  const reports: PinReport[] = [];
  for (const [filename, pin] of resolved.value) {
    reports.push({
      filename,
      tag: pin.source.kind === "git" ? pin.source.git.tag ?? null : null,
      tagHash: pin.tagHash,
      commitHash: pin.commitHash,
    });
  }
  return { ok: true, pins: reports };
}
