import { describe, it, expect, vi } from "vitest";
import { Validator } from "../../src/services/validator.js";
import { QuerySynthesizer } from "../../src/services/synthesizer.js";
import { MemoryScoreStore, type ScoreStore } from "../../src/storage/score-store.js";
import type { Transport } from "../../src/transport/transport.js";
import type { BatchRequest, UntrustedBatchResponse } from "../../src/protocol.js";
import { INTENT, makeOffer, makeReference, makeRegistry, minerRegistry } from "../fixtures.js";

type Responder = (
  peerId: string,
  batch: BatchRequest
) => Promise<UntrustedBatchResponse | undefined>;

function transportFrom(responder: Responder): Transport {
  return { sendBatch: vi.fn(responder) };
}

/** Every miner answers each query with one offer priced by its table. */
function pricedResponder(prices: Record<string, number>): Responder {
  return async (peerId, batch) => ({
    responses: batch.queries.map((q) => [
      makeOffer({ price: prices[peerId], market: q.market }),
    ]),
  });
}

function makeValidator(
  transport: Transport,
  options: {
    store?: ScoreStore;
    markets?: string[];
    registry?: ReturnType<typeof minerRegistry>;
    hotkey?: string;
  } = {}
): Validator {
  return new Validator({
    hotkey: options.hotkey ?? "validator-1",
    registry: options.registry ?? minerRegistry(3),
    transport,
    synthesizer: new QuerySynthesizer({
      reference: makeReference(options.markets ?? ["US", "UK", "DE"]),
      maxBatchSize: 10,
    }),
    scoreStore: options.store ?? new MemoryScoreStore(),
    queryTimeoutMs: 200,
  });
}

describe("Validator.forward", () => {
  it("returns the top offers by price, limited by the intent", async () => {
    const transport = transportFrom(
      pricedResponder({ "miner-0": 300, "miner-1": 120, "miner-2": 200 })
    );
    const validator = makeValidator(transport);

    const offers = await validator.forward(INTENT);

    expect(offers.map((o) => [o.peerId, o.price])).toEqual([
      ["miner-1", 120],
      ["miner-1", 120],
      ["miner-1", 120],
    ]);
    expect(validator.lastCycle).toEqual({ queries: 3, sampled: 3, responded: 3, offers: 9 });
  });

  it("samples at most batch-size peers and sends each the same batch", async () => {
    const transport = transportFrom(pricedResponder({}));
    const validator = makeValidator(transport, { registry: minerRegistry(6) });

    await validator.forward(INTENT);

    const calls = vi.mocked(transport.sendBatch).mock.calls;
    expect(calls).toHaveLength(3);
    expect(new Set(calls.map((c) => c[0])).size).toBe(3);
    expect(calls[0][1].queries).toHaveLength(3);
    expect(calls[1][1]).toBe(calls[0][1]);
  });

  it("records a score entry for every rewarded peer", async () => {
    const store = new MemoryScoreStore([["miner-9", 4]]);
    const validator = makeValidator(
      transportFrom(pricedResponder({ "miner-0": 100, "miner-1": 100, "miner-2": 150 })),
      { store }
    );

    await validator.forward(INTENT);

    expect(Object.fromEntries(await store.load())).toEqual({
      "miner-9": 4,
      "miner-0": 0,
      "miner-1": 0,
      "miner-2": 0,
    });
  });

  it("returns an empty list without error when no peer responds", async () => {
    const store = new MemoryScoreStore();
    const save = vi.spyOn(store, "save");
    const transport = transportFrom(async () => undefined);
    const validator = makeValidator(transport, {
      registry: minerRegistry(5),
      markets: ["US", "UK", "DE", "FR", "JP"],
      store,
    });

    await expect(validator.forward(INTENT)).resolves.toEqual([]);
    expect(transport.sendBatch).toHaveBeenCalledTimes(5);
    expect(save).not.toHaveBeenCalled();
  });

  it("does not dispatch when reference data yields an empty batch", async () => {
    const transport = transportFrom(pricedResponder({}));
    const validator = makeValidator(transport, { markets: [] });

    await expect(validator.forward(INTENT)).resolves.toEqual([]);
    expect(transport.sendBatch).not.toHaveBeenCalled();
  });

  it("never sends to itself", async () => {
    const registry = makeRegistry([
      { hotkey: "validator-1", axonUrl: "http://10.0.0.1:8091" },
      { hotkey: "miner-a", axonUrl: "http://10.0.0.2:8091" },
    ]);
    const transport = transportFrom(pricedResponder({ "miner-a": 80 }));
    const validator = makeValidator(transport, { registry });

    await validator.forward(INTENT);

    expect(vi.mocked(transport.sendBatch).mock.calls.map((c) => c[0])).toEqual(["miner-a"]);
  });

  it("still returns offers when the score store fails", async () => {
    const store: ScoreStore = {
      load: vi.fn(async () => {
        throw new Error("disk full");
      }),
      save: vi.fn(async () => undefined),
    };
    const validator = makeValidator(transportFrom(pricedResponder({ "miner-0": 90, "miner-1": 95, "miner-2": 99 })), {
      store,
    });

    const offers = await validator.forward(INTENT);

    expect(offers[0].price).toBe(90);
    expect(store.save).not.toHaveBeenCalled();
  });

  it("serializes score updates across concurrent cycles", async () => {
    const events: string[] = [];
    const inner = new MemoryScoreStore();
    const store: ScoreStore = {
      async load() {
        events.push("load");
        await new Promise((r) => setTimeout(r, 10));
        return inner.load();
      },
      async save(scores) {
        events.push("save");
        await inner.save(scores);
      },
    };
    const validator = makeValidator(
      transportFrom(pricedResponder({ "miner-0": 10, "miner-1": 20, "miner-2": 30 })),
      { store }
    );

    await Promise.all([validator.forward(INTENT), validator.forward(INTENT)]);

    expect(events).toEqual(["load", "save", "load", "save"]);
  });
});
