import type { Router } from "express";
import express from "express";
import { z } from "zod";
import { errorMessage } from "../lib/errors.js";
import { parseImageReference } from "../lib/imageRef.js";
import { scanImage, type ScanPipelineDeps } from "../worker/scan-pipeline.js";
import { imageResultBody, scanRecordBody } from "./serialize.js";

const ScanCreateRequest = z
  .object({
    image: z.string().trim().min(1),
    tags: z.record(z.string(), z.string()).optional(),
    force: z.boolean().optional()
  })
  .strict();

const ImageQuery = z.object({ image: z.string().trim().min(1) });

export function buildScansRouter(args: { deps: ScanPipelineDeps }): Router {
  const { deps } = args;
  const router = express.Router();

  router.post("/scans", async (req, res) => {
    const parsed = ScanCreateRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }

    try {
      await deps.store.ensureStorage();
    } catch (e) {
      console.error(`Manual scan setup failed: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "SETUP_FAILED", message: "result storage unavailable" } });
    }

    const scanner_version = await deps.executor.getScannerVersion();
    const result = await scanImage(deps, parsed.data.image, {
      tags: { ...(parsed.data.tags ?? {}), trigger: "manual" },
      force: parsed.data.force ?? false,
      scanner_version
    });
    return res.status(result.status === "failed" ? 502 : 200).json(imageResultBody(result));
  });

  router.get("/scans", async (req, res) => {
    const parsed = ImageQuery.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: "image query parameter is required" } });
    }
    const ref = parseImageReference(parsed.data.image);
    try {
      const records = await deps.store.listScanRecords(ref.canonical_name);
      return res.status(200).json({ canonical_name: ref.canonical_name, scans: records.map(scanRecordBody) });
    } catch (e) {
      console.error(`Scan listing failed image=${ref.canonical_name}: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "STORAGE_ERROR", message: "scan listing failed" } });
    }
  });

  router.get("/scans/:scan_id", async (req, res) => {
    const parsed = ImageQuery.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: "image query parameter is required" } });
    }
    const ref = parseImageReference(parsed.data.image);
    try {
      const payload = await deps.store.getScanPayload(ref.canonical_name, req.params.scan_id);
      if (payload === null) {
        return res.status(404).json({ error: { error_code: "NOT_FOUND", message: "scan not found" } });
      }
      return res.status(200).json(payload);
    } catch (e) {
      console.error(`Scan lookup failed image=${ref.canonical_name} scan_id=${req.params.scan_id}: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "STORAGE_ERROR", message: "scan lookup failed" } });
    }
  });

  return router;
}
