import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadRegistry } from "../../src/registry/registry.js";
import { makeRegistry } from "../fixtures.js";

const sample = fileURLToPath(new URL("../../data/registry.json", import.meta.url));

describe("loadRegistry", () => {
  it("reads the peer snapshot", async () => {
    const registry = await loadRegistry(sample);

    expect(registry.listKnownPeers()).toEqual([
      "validator-hotkey-1",
      "miner-hotkey-1",
      "miner-hotkey-2",
    ]);
    expect(registry.hasValidatorPermit("validator-hotkey-1")).toBe(true);
    expect(registry.stakeOf("miner-hotkey-1")).toBe(15);
    expect(registry.axonOf("miner-hotkey-2")).toBe("http://127.0.0.1:8092");
    expect(registry.axonOf("validator-hotkey-1")).toBeUndefined();
  });
});

describe("StaticPeerRegistry", () => {
  it("answers defaults for unknown peers", () => {
    const registry = makeRegistry([{ hotkey: "a", axonUrl: "http://10.0.0.1:8091/" }]);
    expect(registry.isRegistered("b")).toBe(false);
    expect(registry.stakeOf("b")).toBe(0);
    expect(registry.hasValidatorPermit("b")).toBe(false);
    expect(registry.axonOf("a")).toBe("http://10.0.0.1:8091");
  });
});
