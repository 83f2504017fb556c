import { describe, expect, it } from "vitest";
import { decodeGitSource, encodeGitSource } from "../src/makepkg/git-source.js";
import type { GitSource } from "../src/types/source.js";

const URL = "git+https://example.com/foo.git";

describe("decodeGitSource", () => {
  it("decodes a bare url", () => {
    expect(decodeGitSource(URL)).toEqual({ url: URL, signed: false });
  });

  it("decodes a tag", () => {
    expect(decodeGitSource(`${URL}#tag=v1.2.0`)).toEqual({ url: URL, tag: "v1.2.0", signed: false });
  });

  it("decodes a commit", () => {
    expect(decodeGitSource(`${URL}#commit=0123abcd`)).toEqual({ url: URL, commit: "0123abcd", signed: false });
  });

  it("decodes ?signed before the tag", () => {
    expect(decodeGitSource(`${URL}?signed#tag=v1`)).toEqual({ url: URL, tag: "v1", signed: true });
  });

  it("decodes ?signed after the tag", () => {
    expect(decodeGitSource(`${URL}#tag=v1?signed`)).toEqual({ url: URL, tag: "v1", signed: true });
  });

  it("decodes a trailing ?signed with no fragments", () => {
    expect(decodeGitSource(`${URL}?signed`)).toEqual({ url: URL, signed: true });
  });

  it("splits on the last #tag= occurrence", () => {
    expect(decodeGitSource("git://example.com/a#tag=b#tag=c")).toEqual({
      url: "git://example.com/a#tag=b",
      tag: "c",
      signed: false,
    });
  });

  it("takes #commit= before #tag=, so a commit followed by a tag swallows the tag", () => {
    expect(decodeGitSource(`${URL}#commit=abc#tag=v1`)).toEqual({ url: URL, commit: "abc#tag=v1", signed: false });
  });

  it("decodes a tag followed by a commit", () => {
    expect(decodeGitSource(`${URL}#tag=v1#commit=abc`)).toEqual({ url: URL, tag: "v1", commit: "abc", signed: false });
  });
});

describe("encodeGitSource", () => {
  it("emits fields in url, ?signed, #commit=, #tag= order", () => {
    expect(encodeGitSource({ url: URL, signed: true, commit: "abc", tag: "v1" })).toBe(
      `${URL}?signed#commit=abc#tag=v1`
    );
  });

  it("omits unset fields", () => {
    expect(encodeGitSource({ url: URL, signed: false })).toBe(URL);
    expect(encodeGitSource({ url: URL, signed: false, tag: "v2" })).toBe(`${URL}#tag=v2`);
  });

  it("round-trips sources that carry at most one of commit and tag", () => {
    const cases: GitSource[] = [
      { url: URL, signed: false },
      { url: URL, signed: true },
      { url: URL, signed: false, tag: "v1.0.0" },
      { url: URL, signed: true, tag: "3f2a9c" },
      { url: "git://example.com/bar", signed: false, commit: "deadbeef" },
      { url: "git+ssh://git@example.com/baz.git", signed: true, commit: "deadbeef" },
    ];
    for (const c of cases) {
      expect(decodeGitSource(encodeGitSource(c))).toEqual(c);
    }
  });
});
