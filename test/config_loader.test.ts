import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const NO_ENV: NodeJS.ProcessEnv = {};

describe("config loader", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "vcspin-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads the bundled base config", () => {
    const config = loadConfig(undefined, undefined, NO_ENV);
    expect(config).toEqual({
      schema_version: "1.0.0",
      manifest: "PKGBUILD",
      pin_variable: "vcspins",
      source_variable: "source",
      shell: "bash",
      pin_mode: "tag",
      log_level: "warn",
    });
  });

  it("merges the bundled ci layer over base", () => {
    const config = loadConfig("ci", undefined, NO_ENV);
    expect(config.pin_mode).toBe("commit");
    expect(config.log_level).toBe("info");
    expect(config.manifest).toBe("PKGBUILD");
  });

  it("layers a custom directory's base.yaml and env file over the bundled defaults", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "shell: /usr/bin/bash\n", "utf8");
    fs.writeFileSync(path.join(tmpDir, "release.yaml"), "pin_mode: commit\n", "utf8");
    const config = loadConfig("release", tmpDir, NO_ENV);
    expect(config.shell).toBe("/usr/bin/bash");
    expect(config.pin_mode).toBe("commit");
    expect(config.pin_variable).toBe("vcspins");
  });

  it("applies VCSPIN_ environment overrides last", () => {
    const config = loadConfig("ci", undefined, { VCSPIN_PIN_MODE: "tag", VCSPIN_MANIFEST: "pkg/PKGBUILD", OTHER: "x" });
    expect(config.pin_mode).toBe("tag");
    expect(config.manifest).toBe("pkg/PKGBUILD");
    expect(config).not.toHaveProperty("other");
  });

  it("ignores VCSPIN_ variables that name no config key", () => {
    const config = loadConfig(undefined, undefined, { VCSPIN_HOME: "/x", VCSPIN_SHELL: "zsh" });
    expect(config).not.toHaveProperty("home");
    expect(config.shell).toBe("zsh");
    expect(validateConfig(config).valid).toBe(true);
  });

  it("returns base config when env yaml does not exist", () => {
    expect(loadConfig("nonexistent-env", undefined, NO_ENV).pin_mode).toBe("tag");
  });

  it("treats an empty yaml file as no overrides", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "", "utf8");
    expect(loadConfig(undefined, tmpDir, NO_ENV).shell).toBe("bash");
  });

  it("rejects a yaml file that is not a mapping", () => {
    const file = path.join(tmpDir, "base.yaml");
    fs.writeFileSync(file, "- a\n- b\n", "utf8");
    expect(() => loadConfig(undefined, tmpDir, NO_ENV)).toThrow(`Config file must contain a mapping: ${file}`);
  });
});

describe("config validator", () => {
  it("accepts the bundled config", () => {
    const res = validateConfig(loadConfig(undefined, undefined, NO_ENV));
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects an unknown pin mode", () => {
    const res = validateConfig({ ...loadConfig(undefined, undefined, NO_ENV), pin_mode: "branch" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("pin_mode");
  });

  it("rejects a variable name the shell could not expand", () => {
    const res = validateConfig({ ...loadConfig(undefined, undefined, NO_ENV), pin_variable: "vcs pins" });
    expect(res.valid).toBe(false);
  });

  it("rejects unknown keys", () => {
    const res = validateConfig({ ...loadConfig(undefined, undefined, NO_ENV), typo: "1" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("additional properties");
  });

  it("rejects config missing required fields", () => {
    const res = validateConfig({ manifest: "PKGBUILD" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("required");
  });
});
