import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";

export function buildMetaRouter(args: { config: AppConfig }): Router {
  const { config } = args;
  const router = express.Router();

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION ?? "dev",
      scanner_strategy: config.SCANNER_STRATEGY,
      cache_window_hours: config.SCAN_CACHE_HOURS,
      alert_threshold: config.NOTIFY_SEVERITY_THRESHOLD
    });
  });

  return router;
}
