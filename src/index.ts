import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { errorMessage } from "./lib/errors.js";
import { buildRuntime } from "./runtime.js";

const config = loadConfig(process.env);
const deps = buildRuntime(config, process.env);

try {
  await deps.store.ensureStorage();
} catch (e) {
  // Provisioning is retried on the next request; start serving regardless.
  console.warn(`Result storage setup failed: ${errorMessage(e)}`);
}

const app = buildApp({ config, deps });
app.listen(config.PORT, () => {
  console.log(`scanwarden API listening port=${config.PORT} strategy=${config.SCANNER_STRATEGY}`);
});
