import fs from "node:fs";
import path from "node:path";

export interface ObjectStore {
  /** Creates the container if missing; safe to call repeatedly. */
  ensureContainer(): Promise<void>;
  putObject(name: string, body: string, metadata?: Record<string, string>): Promise<void>;
  getObject(name: string): Promise<string | null>;
  listObjects(prefix?: string): Promise<string[]>;
}

const METADATA_SUFFIX = ".meta.json";

export function normalizeObjectName(name: string): string {
  const normalized = name.replace(/\\/g, "/");
  if (normalized.length === 0 || normalized.startsWith("/") || normalized.split("/").includes("..")) {
    throw new Error(`Invalid object name: ${name}`);
  }
  return normalized;
}

/**
 * Object container backed by a directory tree. Object metadata lives in a
 * `<name>.meta.json` sidecar next to the body.
 */
export class FileObjectStore implements ObjectStore {
  readonly root: string;

  constructor(storageDir: string, container: string) {
    this.root = path.resolve(storageDir, container);
  }

  async ensureContainer(): Promise<void> {
    fs.mkdirSync(path.dirname(this.root), { recursive: true });
    try {
      fs.mkdirSync(this.root);
      console.log(`Created results container path=${this.root}`);
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
    }
  }

  async putObject(name: string, body: string, metadata?: Record<string, string>): Promise<void> {
    const target = this.resolve(name);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    writeFileAtomic(target, body);
    if (metadata) {
      writeFileAtomic(target + METADATA_SUFFIX, JSON.stringify(metadata));
    }
  }

  async getObject(name: string): Promise<string | null> {
    const target = this.resolve(name);
    try {
      return fs.readFileSync(target, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async listObjects(prefix = ""): Promise<string[]> {
    if (!fs.existsSync(this.root)) return [];
    const out: string[] = [];
    walk(this.root, "", out);
    return out
      .filter((name) => !name.endsWith(METADATA_SUFFIX) && name.startsWith(prefix))
      .sort();
  }

  private resolve(name: string): string {
    return path.join(this.root, normalizeObjectName(name));
  }
}

function walk(dir: string, rel: string, out: string[]): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const childRel = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      walk(path.join(dir, entry.name), childRel, out);
    } else if (entry.isFile() && !entry.name.endsWith(".tmp")) {
      out.push(childRel);
    }
  }
}

function writeFileAtomic(target: string, body: string): void {
  const tmp = `${target}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, body, "utf8");
  fs.renameSync(tmp, target);
}

function isAlreadyExists(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "EEXIST";
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
