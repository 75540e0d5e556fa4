import { offerSchema, type RankedOffer } from "../protocol.js";
import { log } from "../utils/logger.js";
import type { PeerBatchResponse } from "./dispatcher.js";

export function collectOffers(
  responses: readonly PeerBatchResponse[]
): RankedOffer[] {
  const offers: RankedOffer[] = [];
  let dropped = 0;

  for (const { peerId, responses: positions } of responses) {
    positions.forEach((entries, position) => {
      for (const entry of entries) {
        const parsed = offerSchema.safeParse(entry);
        if (!parsed.success) {
          dropped++;
          log.debug("Dropping malformed offer", {
            peerId,
            position,
            issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
          });
          continue;
        }
        offers.push({ ...parsed.data, peerId });
      }
    });
  }

  if (dropped > 0) {
    log.warn("Dropped malformed offers", { dropped, kept: offers.length });
  }
  return offers;
}

/** Ascending by price; equal prices keep their arrival order. */
export function rankOffers(offers: readonly RankedOffer[]): RankedOffer[] {
  // Array.prototype.sort is stable.
  return [...offers].sort((a, b) => a.price - b.price);
}

export function aggregateOffers(
  responses: readonly PeerBatchResponse[]
): RankedOffer[] {
  return rankOffers(collectOffers(responses));
}
