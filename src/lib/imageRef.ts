export const DEFAULT_REGISTRY = "docker.io";
export const DEFAULT_NAMESPACE = "library";
export const DEFAULT_TAG = "latest";

export type ImageReference = {
  registry: string;
  repository: string;
  tag: string;
  digest: string | null;
  canonical_name: string;
  original: string;
};

const MICROSOFT_REGISTRIES = ["mcr.microsoft.com", "mcr.microsoft.azure.com"];

/**
 * Splits a free-form image string into registry, repository, tag and digest.
 *
 * Never throws: anything it cannot make sense of falls back to Docker Hub
 * defaults. The canonical name pins the digest when one is present and drops
 * the tag in that case.
 *
 *   nginx                         -> docker.io/library/nginx:latest
 *   myacr.azurecr.io/app:v1       -> myacr.azurecr.io/app:v1
 *   nginx@sha256:abc              -> docker.io/library/nginx@sha256:abc
 */
export function parseImageReference(input: string): ImageReference {
  const original = String(input ?? "").trim();
  let rest = original.length > 0 ? original : "unknown";

  let digest: string | null = null;
  const at = rest.lastIndexOf("@");
  if (at >= 0 && rest.slice(at + 1).includes(":")) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  let tag = DEFAULT_TAG;
  const colon = rest.lastIndexOf(":");
  // A colon before the last slash belongs to a registry port, not a tag.
  if (colon > rest.lastIndexOf("/")) {
    const candidate = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (candidate.length > 0) tag = candidate;
  }

  const parts = rest.split("/").filter((p) => p.length > 0);
  if (parts.length === 0) parts.push("unknown");

  let registry: string;
  let repository: string;
  if (parts.length === 1) {
    registry = DEFAULT_REGISTRY;
    repository = `${DEFAULT_NAMESPACE}/${parts[0]}`;
  } else if (parts.length === 2) {
    if (looksLikeRegistry(parts[0])) {
      registry = parts[0];
      repository = parts[1];
    } else {
      registry = DEFAULT_REGISTRY;
      repository = `${parts[0]}/${parts[1]}`;
    }
  } else {
    registry = parts[0];
    repository = parts.slice(1).join("/");
  }

  const canonical_name = digest ? `${registry}/${repository}@${digest}` : `${registry}/${repository}:${tag}`;
  return { registry, repository, tag, digest, canonical_name, original };
}

export function normalizeImageName(input: string): string {
  return parseImageReference(input).canonical_name;
}

export function isAzureRegistry(registry: string): boolean {
  return registry.toLowerCase().endsWith(".azurecr.io");
}

export function isMicrosoftRegistry(registry: string): boolean {
  return MICROSOFT_REGISTRIES.includes(registry.toLowerCase());
}

/** Storage-safe key for partitions and object paths. */
export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "_");
}

function looksLikeRegistry(segment: string): boolean {
  return segment.includes(".") || segment.includes(":") || segment === "localhost";
}
