import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import type { Input } from "../types/source.js";
import { silent, diag, type DiagnosticSink } from "../log/diagnostics.js";
import { parseInput } from "./input.js";

const pExecFile = promisify(execFile);

const VARIABLE_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Evaluates a PKGBUILD array variable and returns its elements, one per entry. */
export interface ShellEvaluator {
  evaluate(manifestPath: string, variable: string): Promise<string[]>;
}

function exitStatus(e: unknown): string {
  if (typeof e === "object" && e !== null) {
    if ("code" in e && e.code !== undefined && e.code !== null) return `exit code ${String(e.code)}`;
    if ("signal" in e && e.signal) return `signal ${String(e.signal)}`;
  }
  return e instanceof Error ? e.message : String(e);
}

/**
 * Sources the manifest in bash and echoes each array element on its own line.
 * The manifest path is passed as `$1` rather than spliced into the script.
 */
export class BashEvaluator implements ShellEvaluator {
  constructor(private readonly shell = "bash") {}

  async evaluate(manifestPath: string, variable: string): Promise<string[]> {
    if (!VARIABLE_RE.test(variable)) {
      throw new Error(`Invalid variable name: ${variable}`);
    }
    const resolved = await fs.realpath(manifestPath);
    const script = `source "$1"; for x in \${${variable}[@]}; do echo "$x"; done`;

    let stdout: string;
    try {
      const res = await pExecFile(this.shell, ["-c", script, "vcspin", resolved], {
        cwd: path.dirname(resolved),
        encoding: "utf8",
        maxBuffer: 16 * 1024 * 1024,
      });
      stdout = res.stdout;
    } catch (e: unknown) {
      throw new Error(`Process (${this.shell}, ${variable}) exited with error: ${exitStatus(e)}`);
    }

    const lines = stdout.split("\n");
    if (lines[lines.length - 1] === "") lines.pop();
    return lines;
  }
}

export async function listInputs(
  evaluator: ShellEvaluator,
  manifestPath: string,
  variable: string,
  log: DiagnosticSink = silent
): Promise<Input[]> {
  const lines = await evaluator.evaluate(manifestPath, variable);
  log(diag("trace", "VARIABLE_EVALUATED", `${variable}: ${lines.length} entries`, { variable, lines }));

  return lines.map((line) => {
    try {
      return parseInput(line);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to parse ${variable} entry "${line}": ${message}`);
    }
  });
}

export function listPins(
  evaluator: ShellEvaluator,
  manifestPath: string,
  log?: DiagnosticSink,
  variable = "vcspins"
): Promise<Input[]> {
  return listInputs(evaluator, manifestPath, variable, log);
}

export function listSources(
  evaluator: ShellEvaluator,
  manifestPath: string,
  log?: DiagnosticSink,
  variable = "source"
): Promise<Input[]> {
  return listInputs(evaluator, manifestPath, variable, log);
}
