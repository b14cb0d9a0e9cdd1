import { loadedEnvFiles } from "./loadEnv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createEngine } from "./engine";
import { errorMessage } from "./errors";
import { log } from "./logger";
import { loadScoringTables } from "./scoringTables";

function main() {
  // ConfigError is fatal at startup
  const config = loadConfig();
  const tables = loadScoringTables(config.scoringTablesPath);
  const engine = createEngine(config, tables);

  createApp(engine).listen(config.port, () => {
    log.info(`Server running on http://localhost:${config.port}`);
    log.info("Logging to file", { filePath: log.filePath() });
    log.info("Env files loaded", { files: loadedEnvFiles });
  });
}

try {
  main();
} catch (e) {
  log.error("Startup failed", { message: errorMessage(e) });
  process.exitCode = 1;
}
