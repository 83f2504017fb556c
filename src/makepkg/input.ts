import type { Input, Source } from "../types/source.js";
import { formatSource, parseSource, sourceFilename } from "./source.js";

/** Parse one array element, honouring the `filename::url` form (split on the first `::`). */
export function parseInput(line: string): Input {
  const idx = line.indexOf("::");
  if (idx === -1) return { source: parseSource(line) };
  return {
    filename: line.slice(0, idx),
    source: parseSource(line.slice(idx + 2)),
  };
}

export function formatInput(input: Input): string {
  const source = formatSource(input.source);
  return input.filename === undefined ? source : `${input.filename}::${source}`;
}

export function inputFilename(input: Input): string {
  return input.filename ?? sourceFilename(input.source);
}

export function withSource(input: Input, source: Source): Input {
  return { ...input, source };
}
