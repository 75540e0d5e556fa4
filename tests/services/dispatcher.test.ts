import { describe, it, expect, vi } from "vitest";
import { alignResponses, dispatchBatch } from "../../src/services/dispatcher.js";
import type { Transport } from "../../src/transport/transport.js";
import type { UntrustedBatchResponse } from "../../src/protocol.js";
import { makeOffer, makeQuery } from "../fixtures.js";

const batch = { queries: [makeQuery(), makeQuery({ market: "UK" }), makeQuery({ market: "DE" })] };

function transportFrom(
  handler: (peerId: string) => Promise<UntrustedBatchResponse | undefined>
): Transport {
  return { sendBatch: vi.fn((peerId: string) => handler(peerId)) };
}

describe("dispatchBatch", () => {
  it("returns an empty list when no peer responds", async () => {
    const transport = transportFrom(async () => undefined);
    const peers = ["p1", "p2", "p3", "p4", "p5"];

    const result = await dispatchBatch(transport, batch, peers, 1000);

    expect(result).toEqual([]);
    expect(transport.sendBatch).toHaveBeenCalledTimes(5);
  });

  it("sends the same batch and timeout to every peer", async () => {
    const transport = transportFrom(async () => undefined);
    await dispatchBatch(transport, batch, ["p1", "p2"], 750);
    expect(transport.sendBatch).toHaveBeenCalledWith("p1", batch, 750);
    expect(transport.sendBatch).toHaveBeenCalledWith("p2", batch, 750);
  });

  it("omits peers that fail, reject or miss the deadline", async () => {
    const offer = makeOffer();
    const transport = transportFrom(async (peerId) => {
      if (peerId === "ok") return { responses: [[offer], [offer], [offer]] };
      if (peerId === "throws") throw new Error("socket hang up");
      if (peerId === "slow") return new Promise<undefined>(() => undefined);
      return undefined;
    });

    const result = await dispatchBatch(transport, batch, ["slow", "throws", "ok", "none"], 30);

    expect(result).toEqual([{ peerId: "ok", responses: [[offer], [offer], [offer]] }]);
  });

  it("keeps dispatch order regardless of completion order", async () => {
    const transport = transportFrom(async (peerId) => {
      const delay = peerId === "first" ? 20 : 0;
      await new Promise((r) => setTimeout(r, delay));
      return { responses: [[], [], []] };
    });

    const result = await dispatchBatch(transport, batch, ["first", "second"], 1000);

    expect(result.map((r) => r.peerId)).toEqual(["first", "second"]);
  });

  it("aligns short or malformed responses to the batch length", async () => {
    const offer = makeOffer();
    const transport = transportFrom(async () => ({ responses: [[offer], "garbage"] }));

    const [result] = await dispatchBatch(transport, batch, ["p1"], 1000);

    expect(result.responses).toEqual([[offer], [], []]);
  });
});

describe("alignResponses", () => {
  it("truncates extra positions and fills missing ones", () => {
    expect(alignResponses(2, [[1], [2], [3]])).toEqual([[1], [2]]);
    expect(alignResponses(3, [null, [1]])).toEqual([[], [1], []]);
    expect(alignResponses(0, [[1]])).toEqual([]);
  });
});
