import type { GitSource } from "../types/source.js";

const SIGNED = "?signed";
const COMMIT = "#commit=";
const TAG = "#tag=";

function stripSuffix(s: string, suffix: string): string | null {
  return s.endsWith(suffix) ? s.slice(0, s.length - suffix.length) : null;
}

function rsplitOnce(s: string, sep: string): [string, string] | null {
  const idx = s.lastIndexOf(sep);
  if (idx === -1) return null;
  return [s.slice(0, idx), s.slice(idx + sep.length)];
}

/**
 * Decode `url[?signed][#commit=<hash>][#tag=<name>]`.
 *
 * The signed marker is checked both before and after the commit/tag
 * fragments are taken off, so `url?signed#tag=v1` and `url#tag=v1?signed`
 * decode the same way.
 */
export function decodeGitSource(raw: string): GitSource {
  let s = raw;
  let signed = false;
  let commit: string | undefined;
  let tag: string | undefined;

  const unsigned = stripSuffix(s, SIGNED);
  if (unsigned !== null) {
    signed = true;
    s = unsigned;
  }

  const commitSplit = rsplitOnce(s, COMMIT);
  if (commitSplit) {
    [s, commit] = commitSplit;
  }

  const tagSplit = rsplitOnce(s, TAG);
  if (tagSplit) {
    [s, tag] = tagSplit;
  }

  const unsignedAgain = stripSuffix(s, SIGNED);
  if (unsignedAgain !== null) {
    signed = true;
    s = unsignedAgain;
  }

  const source: GitSource = { url: s, signed };
  if (commit !== undefined) source.commit = commit;
  if (tag !== undefined) source.tag = tag;
  return source;
}

export function encodeGitSource(git: GitSource): string {
  let out = git.url;
  if (git.signed) out += SIGNED;
  if (git.commit !== undefined) out += `${COMMIT}${git.commit}`;
  if (git.tag !== undefined) out += `${TAG}${git.tag}`;
  return out;
}
