import fs from "node:fs";
import path from "node:path";

type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

function minLevelRank(): number {
  // LOG_LEVEL=debug|info|warn|error|silent. Default: info.
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (raw === "silent") return Number.POSITIVE_INFINITY;
  if (raw === "debug") return LEVEL_RANK.DEBUG;
  if (raw === "warn") return LEVEL_RANK.WARN;
  if (raw === "error") return LEVEL_RANK.ERROR;
  return LEVEL_RANK.INFO;
}

function getLogFilePath(): string | null {
  // Set LOG_FILE to override, or to "off" to keep console-only logging.
  // Default: ./logs/server.log.txt relative to the process cwd.
  const envPath = (process.env.LOG_FILE || "").trim();
  if (envPath.toLowerCase() === "off") return null;
  if (envPath) return envPath;
  return path.resolve(process.cwd(), "logs", "server.log.txt");
}

function ensureLogDir(filePath: string) {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch {
    // appendToFile reports the failure on its own
  }
}

function safeMeta(meta?: Record<string, unknown>) {
  if (!meta) return undefined;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    // never log secrets if they get passed accidentally
    const lk = k.toLowerCase();
    if (lk.includes("key") || lk.includes("secret") || lk.includes("token")) {
      out[k] = "[REDACTED]";
    } else {
      out[k] = v;
    }
  }
  return out;
}

let fileLoggingBroken = false;

function appendToFile(lines: string[]) {
  const filePath = getLogFilePath();
  if (!filePath || fileLoggingBroken) return;
  ensureLogDir(filePath);
  try {
    fs.appendFileSync(filePath, lines.join("\n") + "\n", "utf-8");
  } catch (e) {
    // Keep console logging; say so once.
    fileLoggingBroken = true;
    console.warn(`[WARN] ${new Date().toISOString()} file logging disabled: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < minLevelRank()) return;

  const ts = new Date().toISOString();
  const line = `[${level}] ${ts} ${message}`;
  const m = safeMeta(meta);
  const metaLine = m && Object.keys(m).length ? JSON.stringify(m) : null;

  // Console
  if (level === "ERROR") console.error(line);
  else if (level === "WARN") console.warn(line);
  else console.log(line);
  if (metaLine) console.log(metaLine);

  // File
  appendToFile([line, ...(metaLine ? [metaLine] : [])]);
}

export const log = {
  debug: (message: string, meta?: Record<string, unknown>) => write("DEBUG", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => write("INFO", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => write("WARN", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => write("ERROR", message, meta),
  // helpful for debugging
  filePath: () => getLogFilePath(),
};
