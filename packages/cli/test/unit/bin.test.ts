import fs from "node:fs";
import path from "node:path";
import {fileURLToPath} from "node:url";
import {describe, it, expect} from "vitest";

describe("bin", () => {
  const pkgDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(pkgDir, "package.json"), "utf8"));

  function getBinPath(): string {
    if (typeof pkg !== "object" || pkg === null || !("bin" in pkg)) throw Error("package.json has no bin");
    const {bin} = pkg;
    if (typeof bin !== "object" || bin === null || !("randao-election" in bin)) throw Error("no randao-election bin");
    const binPath = bin["randao-election"];
    if (typeof binPath !== "string") throw Error("bin path is not a string");
    return path.join(pkgDir, binPath);
  }

  it("should point the binary at an executable script", () => {
    const binPath = getBinPath();
    expect(fs.existsSync(binPath)).toBe(true);
    expect(fs.readFileSync(binPath, "utf8").startsWith("#!/usr/bin/env node\n")).toBe(true);
  });

  it("should start the cli from its sources", () => {
    const script = fs.readFileSync(getBinPath(), "utf8");
    const entry = /await import\("(.+)"\);/.exec(script);
    expect(entry).not.toBeNull();
    expect(path.resolve(path.dirname(getBinPath()), entry?.[1] ?? "")).toBe(path.join(pkgDir, "src/index.ts"));
  });
});
