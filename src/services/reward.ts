import type { RankedOffer } from "../protocol.js";

export interface OfferReward {
  peerId: string;
  price: number;
  profit: number;
}

// bestPrice is the first (cheapest) ranked offer.
export function computeRewards(ranked: readonly RankedOffer[]): OfferReward[] {
  if (ranked.length === 0) return [];
  const bestPrice = ranked[0].price;
  return ranked.map((offer) => ({
    peerId: offer.peerId,
    price: offer.price,
    profit: Math.max(0, bestPrice - offer.price),
  }));
}

export function applyRewards(
  scores: ReadonlyMap<string, number>,
  rewards: readonly OfferReward[]
): Map<string, number> {
  const next = new Map(scores);
  for (const r of rewards) {
    next.set(r.peerId, (next.get(r.peerId) ?? 0) + r.profit);
  }
  return next;
}
