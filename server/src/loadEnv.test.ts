import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { loadEnvFiles } from "./loadEnv";

describe("loadEnvFiles", () => {
  const dirs: string[] = [];

  afterEach(() => {
    delete process.env.SCORING_ENV_PROBE;
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
  });

  it("lets server/.env override the root file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "env-"));
    dirs.push(dir);
    fs.mkdirSync(path.join(dir, "server"));
    fs.writeFileSync(path.join(dir, ".env"), "SCORING_ENV_PROBE=root\n");
    fs.writeFileSync(path.join(dir, "server", ".env"), "SCORING_ENV_PROBE=server\n");

    const loaded = loadEnvFiles(dir);

    expect(loaded).toEqual([path.resolve(dir, ".env"), path.resolve(dir, "server", ".env")]);
    expect(process.env.SCORING_ENV_PROBE).toBe("server");
  });

  it("skips files that don't exist", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "env-"));
    dirs.push(dir);
    expect(loadEnvFiles(dir)).toEqual([]);
  });
});
