import type { Input, PinMode, ResolvedPin, ResolvedPins, Source } from "../types/source.js";
import { formatInput, inputFilename, withSource } from "../makepkg/input.js";
import { silent, diag, type DiagnosticSink } from "../log/diagnostics.js";

export type RewriteResult = {
  content: string;
  /** Filenames of source entries that were replaced by a pin. */
  pinned: string[];
};

/** Split on LF, dropping a CR before it and the empty tail after a final newline. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function pinnedSource(pin: ResolvedPin, mode: PinMode): Source {
  if (pin.source.kind !== "git") return pin.source;
  const git = { ...pin.source.git };
  if (mode === "commit") {
    delete git.tag;
    git.commit = pin.commitHash;
  } else {
    git.tag = pin.tagHash;
  }
  return { kind: "git", git };
}

/** Pins win over the original entry whenever the derived filenames match. */
export function pinSources(
  sources: readonly Input[],
  pins: ResolvedPins,
  mode: PinMode
): { inputs: Input[]; pinned: string[] } {
  const pinned: string[] = [];
  const inputs = sources.map((input) => {
    const filename = inputFilename(input);
    const pin = pins.get(filename);
    if (!pin) return input;
    pinned.push(filename);
    return withSource(input, pinnedSource(pin, mode));
  });
  return { inputs, pinned };
}

/**
 * Rewrite a PKGBUILD: `_commit`/`_tag` lines take the first declared pin,
 * the `source=(...)` block is regenerated from `sources`, everything else
 * is copied through untouched.
 */
export function rewriteManifest(
  lines: readonly string[],
  pins: ResolvedPins,
  sources: readonly Input[],
  mode: PinMode = "tag",
  log: DiagnosticSink = silent
): RewriteResult {
  const out: string[] = [];
  let pinned: string[] = [];

  const firstPin = (variable: string): ResolvedPin => {
    const first = pins.entries().next();
    if (first.done) {
      throw new Error(`Can't use ${variable}= if no vcspins= is set`);
    }
    const [filename, pin] = first.value;
    if (pins.size > 1) {
      log(diag("warn", "FIRST_PIN_USED", `${pins.size} pins declared, using "${filename}" for ${variable}=`, { filename, variable }));
    } else {
      log(diag("debug", "FIRST_PIN_USED", `Using repo for ${variable}=: ${filename}`, { filename, variable }));
    }
    return pin;
  };

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i] ?? "";
    log(diag("trace", "LINE_READ", `Read line from PKGBUILD: ${JSON.stringify(line)}`));

    if (line.startsWith("_commit")) {
      out.push(`_commit=${firstPin("_commit").commitHash}`);
    } else if (line.startsWith("_tag")) {
      out.push(`_tag=${firstPin("_tag").tagHash}`);
    } else if (line.startsWith("source=")) {
      // Skip the original array up to and including the closing line.
      while (i + 1 < lines.length) {
        i += 1;
        if ((lines[i] ?? "").endsWith(")")) break;
      }
      const res = pinSources(sources, pins, mode);
      pinned = pinned.concat(res.pinned);
      out.push("source=(");
      for (const input of res.inputs) out.push(`    "${formatInput(input)}"`);
      out.push(")");
    } else {
      out.push(line);
    }
  }

  return { content: out.map((l) => `${l}\n`).join(""), pinned };
}
