import { loadConfig } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { buildRuntime } from "./runtime.js";
import { processImages } from "./worker/scan-pipeline.js";

// Batch entry point: scans the images named on the command line once and exits.
const args = process.argv.slice(2);
const force = args.includes("--force");
const images = args.filter((a) => a !== "--force");

if (images.length === 0) {
  console.error("usage: worker [--force] <image> [image...]");
  process.exit(2);
}

const config = loadConfig(process.env);
const deps = buildRuntime(config, process.env);

try {
  const batch = await processImages(deps, images, {
    tags: { trigger: "manual" },
    force,
    concurrency: config.MAX_CONCURRENT_SCANS
  });
  process.exitCode = batch.failed > 0 ? 1 : 0;
} catch (e) {
  console.error(`Batch setup failed: ${errorMessage(e)}`);
  process.exitCode = 1;
}
