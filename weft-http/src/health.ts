import type { Express } from "express";
import type { HealthCheckResult } from "./types.js";

export const HEALTH_PATH = "/health";

export function registerHealth(app: Express, isReady: () => boolean): void {
  app.get(HEALTH_PATH, (_req, res) => {
    const ready = isReady();
    const result: HealthCheckResult = {
      status: ready ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
    };
    res.status(ready ? 200 : 503).json(result);
  });
}
