#!/usr/bin/env node

import { main } from "./program.js";

main(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(JSON.stringify({ ok: false, error: err instanceof Error ? err.message : String(err) }) + "\n");
    process.exitCode = 1;
  }
);
