/**
 * HTTP health endpoints for the hosting platform
 */

import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { createLogger } from "../lib/logger";

const log = createLogger("http");

export const SERVICE_NAME = "agriculture-digest-bot";
export const APP_VERSION = "1.0.0";

export interface HealthInfo {
  version: string;
  botTokenConfigured: boolean;
  channelConfigured: boolean;
}

export interface HealthStatus extends HealthInfo {
  status: "healthy";
  service: string;
  timestamp: string;
}

export function healthStatus(info: HealthInfo, now: Date = new Date()): HealthStatus {
  return {
    status: "healthy",
    service: SERVICE_NAME,
    version: info.version,
    botTokenConfigured: info.botTokenConfigured,
    channelConfigured: info.channelConfigured,
    timestamp: now.toISOString(),
  };
}

export function rootStatus() {
  return {
    message: "Agriculture Digest Bot is running",
    health_check: "/health",
    status: "operational",
  };
}

function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.on("finish", () => {
    log.debug(`${req.method} ${req.url} ${res.statusCode} (${Date.now() - startTime}ms)`);
  });
  next();
}

export function createHealthApp(info: HealthInfo, now: () => Date = () => new Date()): Express {
  const app = express();

  app.use(requestLogging);

  app.get("/health", (_req, res) => {
    res.json(healthStatus(info, now()));
  });

  app.get("/", (_req, res) => {
    res.json(rootStatus());
  });

  return app;
}
