import { Command, CommanderError, Option } from "commander";
import { loadConfig } from "./config/loader.js";
import { validateConfig } from "./config/validator.js";
import { update } from "./commands/update.js";
import { list } from "./commands/list.js";
import { EXIT, exitCodeFor, type ErrorCode } from "./commands/exit-codes.js";
import {
  createSink,
  diag,
  levelForVerbosity,
  type DiagnosticSink,
  type OutputFormat,
  type TextStream,
} from "./log/diagnostics.js";
import type { VcspinConfig } from "./types/config.js";
import type { PinMode } from "./types/source.js";

export type CliIO = {
  stdout: TextStream;
  stderr: TextStream;
  env: NodeJS.ProcessEnv;
};

type CommonOpts = {
  pkgbuild?: string;
  config?: string;
  env?: string;
  verbose: number;
  format: OutputFormat;
};

type UpdateCliOpts = CommonOpts & {
  dryRun?: boolean;
  output?: string;
  pinCommit?: boolean;
};

/** Thrown by fail() to unwind out of an action with a chosen exit code. */
class CliExit extends Error {
  constructor(readonly exitCode: number) {
    super(`exit ${exitCode}`);
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("-p, --pkgbuild <path>", "Path to PKGBUILD (default: from config, PKGBUILD)")
    .option("--config <dir>", "Directory with base.yaml / <env>.yaml overrides")
    .option("--env <name>", "Config environment layer to load (e.g. ci)")
    .option("-v, --verbose", "Turn debugging information on (repeatable)", increaseVerbosity, 0)
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

export function buildProgram(io: CliIO): Command {
  const println = (stream: TextStream, line: string) => stream.write(line + "\n");

  function fail(format: OutputFormat, code: ErrorCode, message: string): never {
    if (format === "jsonl") {
      println(io.stdout, JSON.stringify(diag("error", code, message)));
    } else {
      println(io.stderr, message);
    }
    throw new CliExit(exitCodeFor(code));
  }

  function setup(opts: CommonOpts): { config: VcspinConfig; log: DiagnosticSink } {
    let merged: Record<string, unknown>;
    try {
      merged = loadConfig(opts.env, opts.config, io.env);
    } catch (e: unknown) {
      fail(opts.format, "CONFIG_INVALID", `Failed to load config: ${errorMessage(e)}`);
    }
    const res = validateConfig(merged);
    if (!res.valid) {
      fail(opts.format, "CONFIG_INVALID", `Invalid config: ${res.errors}`);
    }
    const log = createSink({
      format: opts.format,
      threshold: levelForVerbosity(res.config.log_level, opts.verbose),
      stdout: io.stdout,
      stderr: io.stderr,
    });
    return { config: res.config, log };
  }

  const program = new Command();

  // Inherited by the subcommands below.
  program
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  program
    .name("vcspin")
    .description("Pin git tags in a PKGBUILD to tag object and commit hashes")
    .version("0.1.0");

  withCommonOptions(program.command("update", { isDefault: true }))
    .description("Resolve vcspins= and rewrite _commit=, _tag= and source=")
    .option("-n, --dry-run", "Attempt update but do not write to PKGBUILD")
    .option("-o, --output <path>", "Write updated PKGBUILD to this path")
    .option("--pin-commit", "Pin commits instead of tag object hashes")
    .action(async (opts: UpdateCliOpts) => {
      const { config, log } = setup(opts);
      const pinMode: PinMode = opts.pinCommit ? "commit" : config.pin_mode;

      const res = await update({
        manifest: opts.pkgbuild ?? config.manifest,
        output: opts.output,
        dryRun: opts.dryRun,
        pinMode,
        shell: config.shell,
        pinVariable: config.pin_variable,
        sourceVariable: config.source_variable,
        log,
      });

      if (!res.ok) fail(opts.format, res.error.code, res.error.message);

      const pins = [...res.pins].map(([filename, pin]) => ({ filename, tagHash: pin.tagHash, commitHash: pin.commitHash }));
      if (opts.format === "jsonl") {
        println(io.stdout, JSON.stringify({ level: "info", code: "OK", writtenTo: res.writtenTo, pinned: res.pinned, pins }));
      } else {
        for (const p of pins) println(io.stdout, `${p.filename}  tag ${p.tagHash}  commit ${p.commitHash}`);
        println(io.stdout, res.writtenTo === null ? "Dry run, nothing written." : `Updated ${res.writtenTo}`);
      }
    });

  withCommonOptions(program.command("list"))
    .description("Show the hashes each vcspins= entry currently resolves to")
    .action(async (opts: CommonOpts) => {
      const { config, log } = setup(opts);

      const res = await list({
        manifest: opts.pkgbuild ?? config.manifest,
        shell: config.shell,
        pinVariable: config.pin_variable,
        sourceVariable: config.source_variable,
        log,
      });

      if (!res.ok) fail(opts.format, res.error.code, res.error.message);

      if (opts.format === "jsonl") {
        for (const p of res.pins) println(io.stdout, JSON.stringify(p));
      } else {
        for (const p of res.pins) println(io.stdout, `${p.filename}  ${p.tag ?? "-"}  tag ${p.tagHash}  commit ${p.commitHash}`);
      }
    });

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and run the
 * chosen command. Resolves to the process exit code.
 */
export async function main(args: string[], io: CliIO): Promise<number> {
  try {
    await buildProgram(io).parseAsync(args, { from: "user" });
    return EXIT.SUCCESS;
  } catch (err: unknown) {
    if (err instanceof CliExit) return err.exitCode;
    // Commander has already printed its message; --help and --version carry exit code 0.
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS;
    io.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
    return EXIT.PIN_FAILED;
  }
}
