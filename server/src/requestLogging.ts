import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { log } from "./logger";

export type RequestShape = {
  organization?: string;
  candidates?: number;
  company?: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function nameOf(v: unknown): string | undefined {
  if (!isRecord(v) || typeof v.name !== "string") return undefined;
  return v.name.trim().slice(0, 120) || undefined;
}

/**
 * What a scoring request is about, without any profile text: founder bios and
 * descriptions never reach the log.
 */
export function requestShape(body: unknown): RequestShape | undefined {
  if (!isRecord(body)) return undefined;
  const shape: RequestShape = {};
  const organization = nameOf(body.organization);
  if (organization) shape.organization = organization;
  if (Array.isArray(body.candidates)) shape.candidates = body.candidates.length;
  const company = nameOf(body.company);
  if (company) shape.company = company;
  return Object.keys(shape).length ? shape : undefined;
}

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = randomUUID();
  res.locals.requestId = requestId;
  res.setHeader("x-request-id", requestId);
  const startedAt = Date.now();

  log.info("HTTP request", {
    requestId,
    method: req.method,
    path: req.originalUrl,
    shape: requestShape(req.body),
  });

  res.on("finish", () => {
    log.info("HTTP response", {
      requestId,
      status: res.statusCode,
      ms: Date.now() - startedAt,
    });
  });

  res.on("close", () => {
    if (!res.writableEnded) log.warn("HTTP client disconnected", { requestId, ms: Date.now() - startedAt });
  });

  next();
}
