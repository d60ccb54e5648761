import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import { DeploymentEventBatchSchema, getValidationCode } from "../lib/deploymentEvents.js";
import { errorMessage } from "../lib/errors.js";
import { runEventPlan, planDeploymentEvent, type EventHandlerDeps, type EventPlan, type EventResult } from "../worker/event-handler.js";
import { eventResultBody } from "./serialize.js";

export function buildEventsRouter(args: { config: AppConfig; deps: EventHandlerDeps }): Router {
  const { config, deps } = args;
  const router = express.Router();

  router.post("/events", async (req, res) => {
    const parsed = DeploymentEventBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }
    const events = parsed.data;

    for (const event of events) {
      const code = getValidationCode(event);
      if (code !== null) {
        console.log(`Event subscription validation event_id=${event.id}`);
        return res.status(200).json({ validationResponse: code });
      }
    }

    const plans: EventPlan[] = [];
    for (const event of events) {
      plans.push(await planDeploymentEvent(deps, event));
    }
    const planned = plans.filter((p) => p.status === "planned");
    const skipped = plans.filter((p) => p.status === "skipped");
    if (planned.length === 0) {
      return res.status(200).json({ results: skipped });
    }

    // Setup failures fail the whole delivery so the event source retries it.
    try {
      await deps.store.ensureStorage();
    } catch (e) {
      console.error(`Event batch setup failed: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "SETUP_FAILED", message: "result storage unavailable" } });
    }

    if (config.EVENTS_ASYNC) {
      runPlans(deps, planned).catch((e: unknown) => {
        console.error(`Event batch failed: ${errorMessage(e)}`);
      });
      return res.status(202).json({
        accepted: planned.map((p) => p.event_id),
        results: skipped
      });
    }

    try {
      const results = await runPlans(deps, plans);
      return res.status(200).json({ results: results.map(eventResultBody) });
    } catch (e) {
      console.error(`Event batch failed: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "SETUP_FAILED", message: "event batch failed" } });
    }
  });

  return router;
}

async function runPlans(deps: EventHandlerDeps, plans: EventPlan[]): Promise<EventResult[]> {
  const results: EventResult[] = [];
  for (const plan of plans) {
    results.push(await runEventPlan(deps, plan));
  }
  return results;
}
