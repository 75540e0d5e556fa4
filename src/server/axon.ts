import Fastify, { type FastifyInstance } from "fastify";
import { batchRequestSchema } from "../protocol.js";
import type { Miner } from "../services/miner.js";
import { BATCH_ROUTE, HOTKEY_HEADER } from "../transport/transport.js";
import { log } from "../utils/logger.js";
import { PriorityQueue } from "../utils/priority-queue.js";

export interface AxonServerConfig {
  port: number;
  host?: string;
  hotkey: string;
  miner: Miner;
  maxConcurrentRequests: number;
  maxPendingRequests: number;
}

export function buildAxonApp(
  miner: Miner,
  queue: PriorityQueue,
  hotkey: string,
  maxPendingRequests = Number.POSITIVE_INFINITY
): FastifyInstance {
  const app = Fastify({ logger: false, bodyLimit: 1024 * 1024 });

  app.get("/health", async () => ({
    ok: true,
    hotkey,
    active: queue.active,
    pending: queue.pending,
  }));

  app.post(BATCH_ROUTE, async (req, reply) => {
    const header = req.headers[HOTKEY_HEADER];
    const caller = typeof header === "string" && header.length > 0 ? header : undefined;

    const decision = miner.blacklist(caller);
    if (decision.rejected) {
      return reply.code(403).send({ error: decision.reason });
    }

    const parsed = batchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_batch",
        issues: parsed.error.issues.map(
          (i) => `${i.path.join(".")}: ${i.message}`
        ),
      });
    }

    if (queue.pending >= maxPendingRequests) {
      log.warn("Shedding batch, queue full", { caller, pending: queue.pending });
      return reply.code(503).send({ error: "busy" });
    }

    const priority = miner.priority(caller);
    log.debug("Batch admitted", {
      caller,
      priority,
      queries: parsed.data.queries.length,
    });
    return queue.run(priority, () => miner.forward(parsed.data));
  });

  return app;
}

export class AxonServer {
  private readonly app: FastifyInstance;
  private actualPort = 0;

  constructor(private readonly config: AxonServerConfig) {
    const queue = new PriorityQueue(config.maxConcurrentRequests);
    this.app = buildAxonApp(
      config.miner,
      queue,
      config.hotkey,
      config.maxPendingRequests
    );
  }

  async start(): Promise<number> {
    await this.app.listen({
      port: this.config.port,
      host: this.config.host ?? "0.0.0.0",
    });
    const addr = this.app.server.address();
    this.actualPort =
      typeof addr === "object" && addr ? addr.port : this.config.port;
    return this.actualPort;
  }

  get port(): number {
    return this.actualPort;
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}
