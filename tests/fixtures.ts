import type { Offer, RankedOffer, SearchIntent, SubQuery } from "../src/protocol.js";
import { StaticPeerRegistry, type PeerInfo } from "../src/registry/registry.js";
import { StaticReferenceData, type AirportRecord } from "../src/reference/loader.js";

export function makeOffer(overrides: Partial<Offer> = {}): Offer {
  return {
    market: "US",
    price: 250,
    currency: "USD",
    departureTime: "2026-11-02T08:00:00.000Z",
    arrivalTime: "2026-11-02T14:00:00.000Z",
    departureCity: "JFK",
    arrivalCity: "LAX",
    stops: 0,
    carrier: "TestAir",
    durationDays: 0.25,
    ...overrides,
  };
}

export function makeRanked(peerId: string, price: number): RankedOffer {
  return { ...makeOffer({ price }), peerId };
}

export function makeQuery(overrides: Partial<SubQuery> = {}): SubQuery {
  return {
    date: "2026-11-02",
    origin: "JFK",
    originId: "95565058",
    destination: "LAX",
    destinationId: "95673368",
    market: "US",
    cabinClass: "Economy",
    adults: 1,
    children: 0,
    infants: 0,
    currency: "USD",
    ...overrides,
  };
}

export const INTENT: SearchIntent = Object.freeze({
  date: "2026-12-24",
  cabinClass: "Business",
  adults: 2,
  children: 1,
  infants: 1,
  currency: "EUR",
  limit: 3,
});

export const AIRPORTS: AirportRecord[] = [
  { skyId: "JFK", entityId: "1", entityType: "AIRPORT" },
  { skyId: "LHR", entityId: "2", entityType: "AIRPORT" },
  { skyId: "CDG", entityId: "3", entityType: "AIRPORT" },
  { skyId: "HND", entityId: "4", entityType: "AIRPORT" },
];

export function makeReference(
  markets: string[] = ["US", "UK", "DE", "FR", "JP"],
  airports: AirportRecord[] = AIRPORTS
): StaticReferenceData {
  return new StaticReferenceData(markets, airports);
}

export function makeRegistry(peers: Array<Partial<PeerInfo> & { hotkey: string }>): StaticPeerRegistry {
  return new StaticPeerRegistry(
    peers.map((p) => ({
      stake: 0,
      validatorPermit: false,
      ...p,
    }))
  );
}

/** Registry of `n` serving miners named miner-0 … miner-(n-1). */
export function minerRegistry(n: number): StaticPeerRegistry {
  return makeRegistry(
    Array.from({ length: n }, (_, i) => ({
      hotkey: `miner-${i}`,
      stake: i,
      axonUrl: `http://10.0.0.${i + 1}:8091`,
    }))
  );
}

/** Deterministic PRNG (mulberry32) for repeatable sampling. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
