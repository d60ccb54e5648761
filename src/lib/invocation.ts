import { spawn } from "node:child_process";
import { v4 as uuidv4 } from "uuid";
import type { ImageReference } from "./imageRef.js";

export type ScannerCredentials = {
  pod?: string;
  access_token?: string;
};

export type ScanRequest = {
  image: ImageReference;
  tags: Record<string, string>;
};

export type ProcessCommand = {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  /** Run after a timeout kill, for work the killed process delegated elsewhere. */
  cleanup?: ProcessCommand;
};

export type ProcessResult = {
  exit_code: number;
  stdout: string;
  stderr: string;
  timed_out: boolean;
  duration_ms: number;
};

export interface InvocationStrategy {
  readonly name: string;
  buildCommand(request: ScanRequest): ProcessCommand;
  buildVersionCommand(): ProcessCommand;
}

export type ScannerArgsOptions = {
  scan_types: string;
  extra_args: string[];
};

// Credentials travel only through these child environment variables.
export const POD_ENV = "QUALYS_POD";
export const TOKEN_ENV = "QUALYS_ACCESS_TOKEN";

export function buildScannerArgs(request: ScanRequest, options: ScannerArgsOptions): string[] {
  const args = ["image", request.image.canonical_name, "--scan-types", options.scan_types, "--format", "json"];
  for (const [key, value] of Object.entries(request.tags)) {
    args.push("--tag", `${key}=${value}`);
  }
  args.push(...options.extra_args);
  return args;
}

export function credentialEnv(base: NodeJS.ProcessEnv, credentials: ScannerCredentials): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  if (credentials.pod) env[POD_ENV] = credentials.pod;
  if (credentials.access_token) env[TOKEN_ENV] = credentials.access_token;
  return env;
}

/** Runs the scanner binary directly on the host. */
export class LocalProcessInvocation implements InvocationStrategy {
  readonly name = "local";

  constructor(
    private readonly options: ScannerArgsOptions & {
      binary: string;
      credentials: ScannerCredentials;
      base_env: NodeJS.ProcessEnv;
    }
  ) {}

  buildCommand(request: ScanRequest): ProcessCommand {
    return {
      command: this.options.binary,
      args: buildScannerArgs(request, this.options),
      env: credentialEnv(this.options.base_env, this.options.credentials)
    };
  }

  buildVersionCommand(): ProcessCommand {
    return { command: this.options.binary, args: ["--version"], env: { ...this.options.base_env } };
  }
}

/**
 * Runs the scanner inside a throwaway container. `-e NAME` without a value
 * forwards the variable from our environment, so secrets never appear in the
 * runtime's argument list.
 */
export class ContainerInvocation implements InvocationStrategy {
  readonly name = "container";

  constructor(
    private readonly options: ScannerArgsOptions & {
      runtime: string;
      scanner_image: string;
      /** Scanner containers are named `<prefix><uuid>`; deployment events for that prefix are ignored. */
      name_prefix: string;
      credentials: ScannerCredentials;
      base_env: NodeJS.ProcessEnv;
    }
  ) {}

  // Killing the runtime client leaves the container running in the daemon,
  // so every run is named and a timeout removes it by name.
  buildCommand(request: ScanRequest): ProcessCommand {
    const name = `${this.options.name_prefix}${uuidv4()}`;
    const args = ["run", "--rm", "--name", name];
    if (this.options.credentials.pod) args.push("-e", POD_ENV);
    if (this.options.credentials.access_token) args.push("-e", TOKEN_ENV);
    args.push(this.options.scanner_image, ...buildScannerArgs(request, this.options));
    return {
      command: this.options.runtime,
      args,
      env: credentialEnv(this.options.base_env, this.options.credentials),
      cleanup: { command: this.options.runtime, args: ["rm", "-f", name], env: { ...this.options.base_env } }
    };
  }

  buildVersionCommand(): ProcessCommand {
    return {
      command: this.options.runtime,
      args: ["run", "--rm", this.options.scanner_image, "--version"],
      env: { ...this.options.base_env }
    };
  }
}

/**
 * Spawns a child and collects its output. Resolves once the child exits,
 * including after a timeout kill (timed_out=true). Rejects only when the
 * process cannot be launched at all.
 */
export function runProcess(cmd: ProcessCommand, args: { timeout_ms: number }): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const started = Date.now();
    let timedOut = false;
    let settled = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const child = spawn(cmd.command, cmd.args, {
      env: cmd.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, args.timeout_ms);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(new Error(`failed to launch ${cmd.command}: ${err.message}`, { cause: err }));
    });

    child.on("close", (code, signal) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({
        exit_code: code ?? (signal ? 128 : -1),
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        timed_out: timedOut,
        duration_ms: Date.now() - started
      });
    });
  });
}

export type ProcessRunner = typeof runProcess;
