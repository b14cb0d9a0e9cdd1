import dotenv from "dotenv";
import path from "node:path";
import fs from "node:fs";

/**
 * Loads `.env` then `server/.env` (later files override earlier ones), both
 * relative to `cwd`. Returns the files that existed.
 */
export function loadEnvFiles(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];
  const candidates = [path.resolve(cwd, ".env"), path.resolve(cwd, "server", ".env")];
  candidates.forEach((file, i) => {
    if (!fs.existsSync(file)) return;
    dotenv.config({ path: file, override: i > 0 });
    loaded.push(file);
  });
  return loaded;
}

export const loadedEnvFiles = loadEnvFiles();
