import path from "node:path";
import type { Source } from "../types/source.js";
import { decodeGitSource, encodeGitSource } from "./git-source.js";

const URL_SCHEMES = new Set(["https", "http", "ftp"]);

/** Classify a raw entry by the scheme in front of `://`. */
export function parseSource(raw: string): Source {
  const idx = raw.indexOf("://");
  if (idx === -1) return { kind: "file", path: raw };

  const scheme = raw.slice(0, idx);
  if (URL_SCHEMES.has(scheme)) return { kind: "url", url: raw };
  if (scheme.startsWith("git")) return { kind: "git", git: decodeGitSource(raw) };

  throw new Error(`Unknown scheme: "${scheme}"`);
}

export function formatSource(source: Source): string {
  switch (source.kind) {
    case "file":
      return source.path;
    case "url":
      return source.url;
    case "git":
      return encodeGitSource(source.git);
  }
}

function lastUrlSegment(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid url: ${raw}`);
  }
  // Opaque urls (mailto:, data:) have no hierarchical path.
  if (!url.pathname.startsWith("/")) {
    throw new Error(`Url contains no path: ${raw}`);
  }
  const segments = url.pathname.split("/");
  return segments[segments.length - 1] ?? "";
}

/** Filename makepkg would store this source under. */
export function sourceFilename(source: Source): string {
  let filename: string;
  switch (source.kind) {
    case "file":
      filename = path.posix.basename(source.path);
      break;
    case "url":
      filename = lastUrlSegment(source.url);
      break;
    case "git":
      filename = lastUrlSegment(source.git.url);
      break;
  }
  if (filename.length === 0 || filename === "." || filename === "..") {
    throw new Error(`Filename can't be empty: ${formatSource(source)}`);
  }
  return filename;
}
