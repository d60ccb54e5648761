import type { AppConfig } from "../config.js";
import { ScanExecutor } from "./executor.js";
import { ContainerInvocation, LocalProcessInvocation, type InvocationStrategy, type ProcessRunner } from "./invocation.js";

export function buildInvocation(config: AppConfig, baseEnv: NodeJS.ProcessEnv): InvocationStrategy {
  const shared = {
    scan_types: config.SCANNER_SCAN_TYPES,
    extra_args: config.SCANNER_EXTRA_ARGS,
    credentials: { pod: config.SCANNER_POD, access_token: config.SCANNER_ACCESS_TOKEN },
    base_env: baseEnv
  };
  if (config.SCANNER_STRATEGY === "container") {
    return new ContainerInvocation({
      ...shared,
      runtime: config.SCANNER_CONTAINER_RUNTIME,
      scanner_image: config.SCANNER_CONTAINER_IMAGE,
      name_prefix: config.SCANNER_CONTAINER_PREFIX
    });
  }
  return new LocalProcessInvocation({ ...shared, binary: config.SCANNER_BINARY });
}

export function buildExecutor(
  config: AppConfig,
  args: { base_env: NodeJS.ProcessEnv; run?: ProcessRunner; sleep?: (ms: number) => Promise<void> }
): ScanExecutor {
  return new ScanExecutor({
    invocation: buildInvocation(config, args.base_env),
    timeout_ms: config.SCAN_TIMEOUT_SECONDS * 1000,
    max_retries: config.SCAN_MAX_RETRIES,
    base_delay_ms: config.SCAN_RETRY_BASE_DELAY_MS,
    retry_on_timeout: config.SCAN_RETRY_ON_TIMEOUT,
    run: args.run,
    sleep: args.sleep
  });
}
