import {
  buildScanTags,
  classifyContainerSubject,
  resourceName,
  type ContainerType,
  type DeploymentEvent,
  type ImageResolver
} from "../lib/deploymentEvents.js";
import { errorMessage } from "../lib/errors.js";
import type { ScanContext } from "../lib/resultStore.js";
import { processImages, type BatchResult, type ScanPipelineDeps } from "./scan-pipeline.js";

export type EventHandlerDeps = ScanPipelineDeps & {
  resolver: ImageResolver;
  scanner_container_prefix: string;
};

export type SkipReason = "non_container_event" | "scanner_container" | "no_images";

export type EventPlan =
  | { event_id: string; status: "skipped"; reason: SkipReason }
  | {
      event_id: string;
      status: "planned";
      container_type: ContainerType;
      images: string[];
      tags: Record<string, string>;
      context: ScanContext;
    };

export type EventResult =
  | { event_id: string; status: "skipped"; reason: SkipReason }
  | { event_id: string; status: "processed"; container_type: ContainerType; batch: BatchResult };

/** Decides whether an event leads to scans and which images they cover. */
export async function planDeploymentEvent(deps: EventHandlerDeps, event: DeploymentEvent): Promise<EventPlan> {
  const containerType = classifyContainerSubject(event.subject);
  if (!containerType) {
    console.log(`Event skipped, not a container deployment event_id=${event.id} subject=${event.subject}`);
    return { event_id: event.id, status: "skipped", reason: "non_container_event" };
  }

  // Scanner containers deploy through the same resource types; scanning them would loop.
  const name = resourceName(event.subject);
  if (deps.scanner_container_prefix && name.startsWith(deps.scanner_container_prefix)) {
    console.log(`Event skipped, scanner container event_id=${event.id} name=${name}`);
    return { event_id: event.id, status: "skipped", reason: "scanner_container" };
  }

  let images: string[];
  try {
    images = await deps.resolver.resolveImages(event, containerType);
  } catch (e) {
    console.error(`Image lookup failed event_id=${event.id} subject=${event.subject}: ${errorMessage(e)}`);
    images = [];
  }
  if (images.length === 0) {
    console.warn(`Event skipped, no container images found event_id=${event.id}`);
    return { event_id: event.id, status: "skipped", reason: "no_images" };
  }

  console.log(`Event planned event_id=${event.id} container_type=${containerType} images=${images.length}`);
  return {
    event_id: event.id,
    status: "planned",
    container_type: containerType,
    images,
    tags: buildScanTags(event, containerType),
    context: { container_type: containerType, event_subject: event.subject, event_id: event.id }
  };
}

export async function runEventPlan(deps: EventHandlerDeps, plan: EventPlan): Promise<EventResult> {
  if (plan.status === "skipped") return plan;
  const batch = await processImages(deps, plan.images, { tags: plan.tags, context: plan.context });
  return { event_id: plan.event_id, status: "processed", container_type: plan.container_type, batch };
}

export async function handleDeploymentEvent(deps: EventHandlerDeps, event: DeploymentEvent): Promise<EventResult> {
  return runEventPlan(deps, await planDeploymentEvent(deps, event));
}
