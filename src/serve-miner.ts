import { config } from "dotenv";

import { loadConfig } from "./config.js";
import { MockProvider } from "./providers/mock.js";
import { SkyscannerProvider } from "./providers/skyscanner.js";
import { loadRegistry } from "./registry/registry.js";
import { AxonServer } from "./server/axon.js";
import { Miner } from "./services/miner.js";
import { log, errorMessage, setLogLevel } from "./utils/logger.js";

config();

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);
  const registry = await loadRegistry(cfg.REGISTRY_FILE);

  const miner = new Miner({
    registry,
    provider: new SkyscannerProvider(cfg.RAPIDAPI_KEY, {
      timeoutMs: cfg.PROVIDER_TIMEOUT_MS,
    }),
    fallback: new MockProvider(),
    admission: {
      allowNonRegistered: cfg.ALLOW_NON_REGISTERED,
      forceValidatorPermit: cfg.FORCE_VALIDATOR_PERMIT,
    },
    providerTimeoutMs: cfg.PROVIDER_TIMEOUT_MS,
    maxOffersPerQuery: cfg.MAX_OFFERS_PER_QUERY,
    cacheTtlSeconds: cfg.CACHE_TTL_SECONDS,
  });

  const server = new AxonServer({
    port: cfg.AXON_PORT,
    host: cfg.AXON_HOST,
    hotkey: cfg.NODE_HOTKEY,
    miner,
    maxConcurrentRequests: cfg.MAX_CONCURRENT_REQUESTS,
    maxPendingRequests: cfg.MAX_PENDING_REQUESTS,
  });
  const port = await server.start();
  log.info("Miner axon listening", { hotkey: cfg.NODE_HOTKEY, port });

  const shutdown = (signal: string) => {
    log.info("Shutting down miner", { signal });
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error("Fatal error", { error: errorMessage(err) });
  process.exit(1);
});
