import fs from "node:fs/promises";
import path from "node:path";
import type { Input, PinMode, ResolvedPins } from "../types/source.js";
import { BashEvaluator, listPins, listSources, type ShellEvaluator } from "../makepkg/extract.js";
import { formatInput } from "../makepkg/input.js";
import { resolvePins } from "../pins/resolver.js";
import { rewriteManifest, splitLines } from "../manifest/rewrite.js";
import { openGitRepository, type OpenRepository } from "../git/operations.js";
import { silent, diag, type DiagnosticSink } from "../log/diagnostics.js";
import type { ErrorCode } from "./exit-codes.js";

export type Failure = { ok: false; error: { code: ErrorCode; message: string } };

type StepResult<T> = { ok: true; value: T } | Failure;

export type Collaborators = {
  evaluator?: ShellEvaluator;
  openRepository?: OpenRepository;
  log?: DiagnosticSink;
};

export type UpdateOpts = Collaborators & {
  manifest: string;
  output?: string;
  dryRun?: boolean;
  pinMode?: PinMode;
  shell?: string;
  pinVariable?: string;
  sourceVariable?: string;
};

export type UpdateResult =
  | {
      ok: true;
      manifest: string;
      /** null on a dry run. */
      writtenTo: string | null;
      pins: ResolvedPins;
      pinned: string[];
      content: string;
    }
  | Failure;

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Run one stage, turning a thrown error into a coded failure. */
export async function step<T>(code: ErrorCode, context: string, fn: () => Promise<T> | T): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e: unknown) {
    return { ok: false, error: { code, message: `${context}: ${errorMessage(e)}` } };
  }
}

/**
 * Extract the declared pins, checking the manifest is reachable first.
 * Shared by update and list.
 */
export async function extractPins(
  manifest: string,
  evaluator: ShellEvaluator,
  log: DiagnosticSink,
  pinVariable = "vcspins"
): Promise<StepResult<Input[]>> {
  const access = await step("MANIFEST_MISSING", `Failed to access PKGBUILD at ${manifest}`, () => fs.access(manifest));
  if (!access.ok) return access;

  const pins = await step("EXTRACT_FAILED", "Failed to get pins from PKGBUILD", () =>
    listPins(evaluator, manifest, log, pinVariable)
  );
  if (!pins.ok) return pins;
  log(diag("debug", "PINS_FOUND", `Found vcs pins: ${pins.value.map(formatInput).join(", ")}`, { count: pins.value.length }));

  if (pins.value.length === 0) {
    return { ok: false, error: { code: "NO_PINS", message: `No vcs pins are configured (${pinVariable}= is empty)` } };
  }
  return pins;
}

/**
 * Resolve every pin and rewrite the manifest. All or nothing: the file is
 * written only after every pin resolved and the rewrite succeeded.
 */
export async function update(opts: UpdateOpts): Promise<UpdateResult> {
  const manifest = opts.manifest;
  const log = opts.log ?? silent;
  const evaluator = opts.evaluator ?? new BashEvaluator(opts.shell);
  const openRepository = opts.openRepository ?? openGitRepository;
  const mode = opts.pinMode ?? "tag";

  const pins = await extractPins(manifest, evaluator, log, opts.pinVariable);
  if (!pins.ok) return pins;

  const sources = await step("EXTRACT_FAILED", "Failed to get sources from PKGBUILD", () =>
    listSources(evaluator, manifest, log, opts.sourceVariable)
  );
  if (!sources.ok) return sources;

  const folder = path.dirname(path.resolve(manifest));
  const resolved = await step("RESOLVE_FAILED", "Failed to resolve vcs pins", () =>
    resolvePins(pins.value, folder, { sources: sources.value, openRepository, log })
  );
  if (!resolved.ok) return resolved;

  const raw = await step("MANIFEST_MISSING", `Failed to read PKGBUILD at ${manifest}`, () => fs.readFile(manifest));
  if (!raw.ok) return raw;

  const text = await step("INVALID_UTF8", `Failed to decode ${manifest}`, () =>
    new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(raw.value)
  );
  if (!text.ok) return text;

  const rewritten = await step("REWRITE_FAILED", `Failed to rewrite ${manifest}`, () =>
    rewriteManifest(splitLines(text.value), resolved.value, sources.value, mode, log)
  );
  if (!rewritten.ok) return rewritten;
  for (const filename of rewritten.value.pinned) {
    log(diag("info", "SOURCE_PINNED", `Pinned source ${filename}`, { filename, mode }));
  }

  if (opts.dryRun) {
    log(diag("debug", "DRY_RUN", "Skipping write back because of dry run"));
    return {
      ok: true,
      manifest,
      writtenTo: null,
      pins: resolved.value,
      pinned: rewritten.value.pinned,
      content: rewritten.value.content,
    };
  }

  const dest = opts.output ?? manifest;
  log(diag("debug", "WRITING", `Updating PKGBUILD at ${dest}`));
  const written = await step("WRITE_FAILED", `Failed to write to ${dest}`, () =>
    fs.writeFile(dest, rewritten.value.content, "utf8")
  );
  if (!written.ok) return written;

  return {
    ok: true,
    manifest,
    writtenTo: dest,
    pins: resolved.value,
    pinned: rewritten.value.pinned,
    content: rewritten.value.content,
  };
}
