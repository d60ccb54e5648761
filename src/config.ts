import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

const OptionalSecret = z.preprocess((value) => {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  return value;
}, z.string().optional());

function resolveDefaultVersion(): string {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const raw = fs.readFileSync(packageJsonPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),

  SQLITE_PATH: z.string().default("./scanwarden.sqlite"),
  RESULTS_STORAGE_DIR: z.string().default("./.scan-results"),
  RESULTS_CONTAINER: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/, "must be 3-63 lowercase letters, digits or dashes")
    .default("scan-results"),

  SCAN_CACHE_HOURS: z.coerce.number().nonnegative().default(24),
  SCAN_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(1800),
  SCAN_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  SCAN_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  SCAN_RETRY_ON_TIMEOUT: BooleanFromEnv.default(false),

  SCANNER_STRATEGY: z.enum(["local", "container"]).default("local"),
  SCANNER_BINARY: z.string().min(1).default("qscanner"),
  SCANNER_CONTAINER_RUNTIME: z.string().min(1).default("docker"),
  SCANNER_CONTAINER_IMAGE: z.string().min(1).default("qualys/qscanner:latest"),
  SCANNER_SCAN_TYPES: z.string().min(1).default("os,sca,secret"),
  SCANNER_EXTRA_ARGS: z.string().default(""),
  SCANNER_POD: OptionalSecret,
  SCANNER_ACCESS_TOKEN: OptionalSecret,
  SCANNER_CONTAINER_PREFIX: z.string().default("qscanner-"),

  NOTIFY_SEVERITY_THRESHOLD: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
    z.enum(["CRITICAL", "HIGH"])
  ).default("HIGH"),
  NOTIFICATION_EMAIL: OptionalSecret,

  MAX_CONCURRENT_SCANS: z.coerce.number().int().positive().default(2),
  EVENTS_ASYNC: BooleanFromEnv.default(true),

  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1024 * 1024),

  VERSION: z.string().default(resolveDefaultVersion())
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type AppConfig = Omit<ParsedEnv, "SCANNER_EXTRA_ARGS"> & {
  SCANNER_EXTRA_ARGS: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  const extraArgs = parsed.data.SCANNER_EXTRA_ARGS.split(/\s+/).filter(Boolean);
  if (extraArgs.some((arg) => /^--(access-token|password|token)\b/i.test(arg))) {
    throw new Error("Invalid environment: SCANNER_EXTRA_ARGS must not carry credentials; use SCANNER_ACCESS_TOKEN");
  }

  return {
    ...parsed.data,
    SCANNER_EXTRA_ARGS: extraArgs
  };
}
