import { config } from "dotenv";
import { loadConfig } from "./config.js";
import { loadRegistry, type PeerRegistry } from "./registry/registry.js";
import { errorMessage, setLogLevel } from "./utils/logger.js";

config();

interface HealthResult {
  peer: string;
  serving: boolean;
  reachable: boolean | null;
  responseMs: number | null;
  error: string | null;
}

async function checkPeer(
  registry: PeerRegistry,
  peerId: string,
  timeoutMs = 5_000
): Promise<HealthResult> {
  const axon = registry.axonOf(peerId);
  const result: HealthResult = {
    peer: peerId,
    serving: axon !== undefined,
    reachable: null,
    responseMs: null,
    error: null,
  };

  if (!axon) {
    return result;
  }

  const start = performance.now();
  try {
    const resp = await fetch(`${axon}/health`, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!resp.ok) throw new Error(`HTTP ${resp.status}`);
    result.reachable = true;
  } catch (err) {
    result.reachable = false;
    result.error = errorMessage(err);
  }
  result.responseMs = Math.round(performance.now() - start);

  return result;
}

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);
  const registry = await loadRegistry(cfg.REGISTRY_FILE);
  const peers = registry
    .listKnownPeers()
    .filter((p) => p !== cfg.NODE_HOTKEY);

  console.log("Miner Axon Health Check\n");
  console.log("Checking %d peers...\n", peers.length);

  const results = await Promise.all(peers.map((p) => checkPeer(registry, p)));

  // Print table
  const nameW = 20;
  const servW = 9;
  const statusW = 12;
  const timeW = 10;
  const errorW = 30;

  const header = [
    "Peer".padEnd(nameW),
    "Serving".padEnd(servW),
    "Status".padEnd(statusW),
    "Time".padEnd(timeW),
    "Error".padEnd(errorW),
  ].join(" | ");

  const separator = [nameW, servW, statusW, timeW, errorW]
    .map((w) => "-".repeat(w))
    .join("-+-");

  console.log(header);
  console.log(separator);

  for (const r of results) {
    let statusStr: string;
    if (r.reachable === null) statusStr = "skipped";
    else if (r.reachable) statusStr = "reachable";
    else statusStr = "FAILED";

    const timeStr = r.responseMs !== null ? `${r.responseMs}ms` : "-";
    const errorStr = r.error ? r.error.slice(0, errorW) : "-";

    console.log(
      [
        r.peer.slice(0, nameW).padEnd(nameW),
        (r.serving ? "yes" : "no").padEnd(servW),
        statusStr.padEnd(statusW),
        timeStr.padEnd(timeW),
        errorStr.padEnd(errorW),
      ].join(" | ")
    );
  }

  const working = results.filter((r) => r.reachable === true).length;
  const serving = results.filter((r) => r.serving).length;

  console.log(
    "\nSummary: %d/%d peers serving, %d/%d reachable",
    serving,
    results.length,
    working,
    results.length
  );

  process.exit(working > 0 ? 0 : 1);
}

main().catch((err) => {
  console.error("Health check failed:", errorMessage(err));
  process.exit(1);
});
