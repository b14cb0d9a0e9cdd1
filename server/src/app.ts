import express from "express";
import cors from "cors";
import type { Engine } from "./engine";
import { errorMessage } from "./errors";
import { log } from "./logger";
import { requestLoggingMiddleware } from "./requestLogging";
import { runScoring, scoreQualityRequest } from "./scoringService";

export function createApp(engine: Engine) {
  const app = express();

  app.use(cors({ origin: true }));
  app.use(express.json({ limit: "5mb" }));
  app.use(requestLoggingMiddleware);

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.post("/api/score", async (req, res) => {
    // a client that hangs up cancels the batch
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await runScoring(engine, req.body, controller.signal);
      if (!result.ok) return res.status(400).json(result);
      return res.json({ ok: true, run: result.run });
    } catch (e) {
      log.error("score failed", { message: errorMessage(e) });
      return res.status(500).json({ ok: false, error: errorMessage(e) });
    }
  });

  app.post("/api/score/quality", (req, res) => {
    try {
      const result = scoreQualityRequest(engine, req.body);
      if (!result.ok) return res.status(400).json(result);
      return res.json(result);
    } catch (e) {
      log.error("score-quality failed", { message: errorMessage(e) });
      return res.status(500).json({ ok: false, error: errorMessage(e) });
    }
  });

  app.get("/api/runs", (_req, res) => res.json({ ok: true, runs: engine.runs.list() }));

  app.get("/api/runs/:id", (req, res) => {
    const run = engine.runs.get(String(req.params.id || ""));
    if (!run) return res.status(404).json({ ok: false, error: "Run not found" });
    return res.json({ ok: true, run });
  });

  app.get("/api/cache/stats", (_req, res) => res.json({ ok: true, stats: engine.cache.stats() }));

  app.delete("/api/cache", (_req, res) => {
    engine.cache.clear();
    log.info("Similarity cache cleared");
    return res.json({ ok: true, stats: engine.cache.stats() });
  });

  return app;
}
