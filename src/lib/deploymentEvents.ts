import { z } from "zod";
import { isRecord } from "./normalizer.js";

export const SUBSCRIPTION_VALIDATION_EVENT = "Microsoft.EventGrid.SubscriptionValidationEvent";

export const DeploymentEventSchema = z.object({
  id: z.string().min(1),
  eventType: z.string().min(1),
  subject: z.string(),
  data: z.unknown().optional(),
  eventTime: z.string().optional(),
  dataVersion: z.string().optional()
});

export type DeploymentEvent = z.infer<typeof DeploymentEventSchema>;

export const DeploymentEventBatchSchema = z.union([DeploymentEventSchema.transform((e) => [e]), z.array(DeploymentEventSchema).min(1)]);

export type ContainerType = "ACI" | "ACA";

export interface ImageResolver {
  resolveImages(event: DeploymentEvent, containerType: ContainerType): Promise<string[]>;
}

export function classifyContainerSubject(subject: string): ContainerType | null {
  const lower = subject.toLowerCase();
  if (lower.includes("microsoft.containerinstance/containergroups")) return "ACI";
  if (lower.includes("microsoft.app/containerapps")) return "ACA";
  return null;
}

export function extractResourceGroup(subject: string): string {
  const parts = subject.split("/");
  const idx = parts.findIndex((p) => p.toLowerCase() === "resourcegroups");
  if (idx < 0 || idx + 1 >= parts.length || !parts[idx + 1]) return "unknown";
  return parts[idx + 1];
}

export function extractSubscriptionId(event: DeploymentEvent): string {
  if (isRecord(event.data) && typeof event.data.subscriptionId === "string" && event.data.subscriptionId) {
    return event.data.subscriptionId;
  }
  const parts = event.subject.split("/");
  const idx = parts.findIndex((p) => p.toLowerCase() === "subscriptions");
  if (idx >= 0 && parts[idx + 1]) return parts[idx + 1];
  return "unknown";
}

export function resourceName(subject: string): string {
  const parts = subject.split("/").filter((p) => p.length > 0);
  return parts[parts.length - 1] ?? "";
}

export function getValidationCode(event: DeploymentEvent): string | null {
  if (event.eventType !== SUBSCRIPTION_VALIDATION_EVENT) return null;
  if (isRecord(event.data) && typeof event.data.validationCode === "string") return event.data.validationCode;
  return null;
}

/**
 * Reads image names straight from the deployment payload. ACI lists them at
 * properties.containers[].properties.image, ACA at
 * properties.template.containers[].image. Some producers wrap the resource in
 * a second `data` object.
 */
export class EventPayloadImageResolver implements ImageResolver {
  async resolveImages(event: DeploymentEvent, containerType: ContainerType): Promise<string[]> {
    const resource = unwrapResource(event.data);
    const properties = isRecord(resource.properties) ? resource.properties : {};
    const images: string[] = [];

    if (containerType === "ACI") {
      for (const container of listOf(properties.containers)) {
        const containerProps = isRecord(container.properties) ? container.properties : {};
        pushImage(images, containerProps.image);
      }
    } else {
      const template = isRecord(properties.template) ? properties.template : {};
      for (const container of listOf(template.containers)) {
        pushImage(images, container.image);
      }
    }
    return images;
  }
}

export function buildScanTags(event: DeploymentEvent, containerType: ContainerType): Record<string, string> {
  return {
    container_type: containerType,
    subscription: extractSubscriptionId(event),
    resource_group: extractResourceGroup(event.subject),
    event_id: event.id
  };
}

function unwrapResource(data: unknown): Record<string, unknown> {
  if (!isRecord(data)) return {};
  if (!isRecord(data.properties) && isRecord(data.data)) return data.data;
  return data;
}

function listOf(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function pushImage(images: string[], value: unknown): void {
  if (typeof value === "string" && value.trim().length > 0) images.push(value.trim());
}
