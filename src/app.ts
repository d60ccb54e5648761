import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import type { AppConfig } from "./config.js";
import { buildEventsRouter } from "./api/events.js";
import { buildMetaRouter } from "./api/meta.js";
import { buildScansRouter } from "./api/scans.js";
import type { EventHandlerDeps } from "./worker/event-handler.js";

export function buildApp(args: { config: AppConfig; deps: EventHandlerDeps }) {
  const { config, deps } = args;
  const app = express();
  const bodyLimitBytes = config.HTTP_JSON_BODY_LIMIT_BYTES ?? 1024 * 1024;

  if (config.TRUST_PROXY ?? false) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors());
  app.use(
    rateLimit({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      max: config.RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) =>
        res.status(429).json({
          error: {
            error_code: "RATE_LIMITED",
            message: "too many requests"
          }
        })
    })
  );
  // Event Grid posts with application/cloudevents+json or plain JSON.
  app.use(express.json({ limit: bodyLimitBytes, type: ["application/json", "application/*+json"] }));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const openapiYaml = fs.readFileSync(path.join(moduleDir, "../openapi/scanwarden.openapi.yaml"), "utf8");
  const openapiObj: unknown = YAML.parse(openapiYaml);
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(isJsonObject(openapiObj) ? openapiObj : {}));

  app.use("/v1", buildEventsRouter({ config, deps }));
  app.use("/v1", buildScansRouter({ deps }));
  app.use("/v1", buildMetaRouter({ config }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  return app;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
