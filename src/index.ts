import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "dotenv";

import { loadConfig } from "./config.js";
import { searchIntentSchema } from "./protocol.js";
import { loadReferenceData } from "./reference/loader.js";
import { loadRegistry } from "./registry/registry.js";
import { QuerySynthesizer, FULL_PROPAGATION } from "./services/synthesizer.js";
import { Validator } from "./services/validator.js";
import { ValidatorLoop } from "./services/validator-loop.js";
import { JsonScoreStore } from "./storage/score-store.js";
import { HttpTransport } from "./transport/http.js";
import { log, errorMessage, setLogLevel } from "./utils/logger.js";

import {
  searchFlightsSchema,
  handleSearchFlights,
} from "./tools/search-flights.js";
import { peerScoresSchema, handlePeerScores } from "./tools/peer-scores.js";

config();

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);

  const registry = await loadRegistry(cfg.REGISTRY_FILE);
  const reference = await loadReferenceData(cfg.MARKETS_FILE, cfg.AIRPORTS_FILE);
  const scoreStore = new JsonScoreStore(cfg.SCORES_FILE);

  const synthesizer = new QuerySynthesizer({
    reference,
    maxBatchSize: cfg.BATCH_SIZE,
    propagation: cfg.PROPAGATE_INTENT_FIELDS ? FULL_PROPAGATION : undefined,
  });

  const validator = new Validator({
    hotkey: cfg.NODE_HOTKEY,
    registry,
    transport: new HttpTransport(registry, cfg.NODE_HOTKEY),
    synthesizer,
    scoreStore,
    sampleSize: cfg.SAMPLE_SIZE,
    queryTimeoutMs: cfg.QUERY_TIMEOUT_MS,
    vpermitStakeLimit: cfg.VPERMIT_STAKE_LIMIT,
  });

  const server = new McpServer({
    name: "flight-subnet-validator",
    version: "0.1.0",
  });

  // Tool 1: search_flights
  server.tool(
    "search_flights",
    "Search cheap flights through the miner network. The intent is expanded into a batch of randomized routes across markets, sent to a sample of miners, and the offers come back ranked by price.",
    searchFlightsSchema.shape,
    async (input) => {
      try {
        const text = await handleSearchFlights(input, validator);
        return { content: [{ type: "text", text }] };
      } catch (err) {
        return {
          content: [
            { type: "text", text: `Error searching flights: ${errorMessage(err)}` },
          ],
          isError: true,
        };
      }
    }
  );

  // Tool 2: peer_scores
  server.tool(
    "peer_scores",
    "List the cumulative reward score of each miner this validator has scored.",
    peerScoresSchema.shape,
    async (input) => {
      try {
        const text = await handlePeerScores(input, scoreStore);
        return { content: [{ type: "text", text }] };
      } catch (err) {
        return {
          content: [
            { type: "text", text: `Error reading scores: ${errorMessage(err)}` },
          ],
          isError: true,
        };
      }
    }
  );

  const loop = new ValidatorLoop(
    validator,
    () => searchIntentSchema.parse({ date: new Date().toISOString().slice(0, 10) }),
    cfg.CYCLE_INTERVAL_MS
  );
  loop.start();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Validator MCP server running on stdio", {
    hotkey: cfg.NODE_HOTKEY,
    peers: registry.listKnownPeers().length,
    batchSize: synthesizer.batchSize,
  });
}

main().catch((err) => {
  log.error("Fatal error", { error: errorMessage(err) });
  process.exit(1);
});
