import { describe, it, expect } from "vitest";
import { samplePeers, isEligiblePeer } from "../../src/services/sampler.js";
import { makeRegistry, minerRegistry, seededRandom } from "../fixtures.js";

describe("samplePeers", () => {
  it("returns min(K, P) distinct peers for every K and P", () => {
    const random = seededRandom(42);
    for (let p = 0; p <= 8; p++) {
      const registry = minerRegistry(p);
      for (let k = 0; k <= 10; k++) {
        const sample = samplePeers(registry, k, { random });
        expect(sample).toHaveLength(Math.min(k, p));
        expect(new Set(sample).size).toBe(sample.length);
        for (const id of sample) {
          expect(registry.isRegistered(id)).toBe(true);
        }
      }
    }
  });

  it("returns every peer, unpadded, when fewer than K exist", () => {
    const sample = samplePeers(minerRegistry(3), 10);
    expect([...sample].sort()).toEqual(["miner-0", "miner-1", "miner-2"]);
  });

  it("never samples itself", () => {
    const registry = minerRegistry(4);
    for (let i = 0; i < 50; i++) {
      expect(samplePeers(registry, 4, { selfId: "miner-2" })).not.toContain("miner-2");
    }
  });

  it("skips peers that are not serving", () => {
    const registry = makeRegistry([
      { hotkey: "a", axonUrl: "http://10.0.0.1:8091" },
      { hotkey: "b" },
    ]);
    expect(samplePeers(registry, 5)).toEqual(["a"]);
  });

  it("skips high-stake validators when a permit stake limit is set", () => {
    const registry = makeRegistry([
      { hotkey: "val", stake: 5000, validatorPermit: true, axonUrl: "http://10.0.0.1:8091" },
      { hotkey: "small-val", stake: 10, validatorPermit: true, axonUrl: "http://10.0.0.2:8091" },
      { hotkey: "miner", stake: 9000, axonUrl: "http://10.0.0.3:8091" },
    ]);
    expect(isEligiblePeer(registry, "val", { vpermitStakeLimit: 1024 })).toBe(false);
    expect(isEligiblePeer(registry, "small-val", { vpermitStakeLimit: 1024 })).toBe(true);
    expect(isEligiblePeer(registry, "miner", { vpermitStakeLimit: 1024 })).toBe(true);
    expect(isEligiblePeer(registry, "val")).toBe(true);
    expect(samplePeers(registry, 3, { vpermitStakeLimit: 1024 }).sort()).toEqual([
      "miner",
      "small-val",
    ]);
  });

  it("returns nothing for K <= 0", () => {
    expect(samplePeers(minerRegistry(5), 0)).toEqual([]);
    expect(samplePeers(minerRegistry(5), -3)).toEqual([]);
  });

  it("is driven by the injected random source", () => {
    const registry = minerRegistry(6);
    // random() = 0 keeps each slot in place.
    expect(samplePeers(registry, 3, { random: () => 0 })).toEqual([
      "miner-0",
      "miner-1",
      "miner-2",
    ]);
  });
});
