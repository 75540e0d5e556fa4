import {
  offerSchema,
  type BatchRequest,
  type BatchResponse,
  type Offer,
  type SubQuery,
} from "../protocol.js";
import { MockProvider } from "../providers/mock.js";
import type { IFlightProvider } from "../providers/provider.js";
import type { PeerRegistry } from "../registry/registry.js";
import { log, errorMessage } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { TTLCache } from "./cache.js";

export interface AdmissionPolicy {
  allowNonRegistered: boolean;
  forceValidatorPermit: boolean;
}

export interface AdmissionDecision {
  rejected: boolean;
  reason: string;
}

export type FulfillmentStatus = "OFFER_RETURNED" | "FALLBACK_RETURNED";

export interface Fulfillment {
  status: FulfillmentStatus;
  offers: Offer[];
}

export interface MinerOptions {
  registry: PeerRegistry;
  provider: IFlightProvider;
  admission: AdmissionPolicy;
  fallback?: MockProvider;
  providerTimeoutMs?: number;
  maxOffersPerQuery?: number;
  cacheTtlSeconds?: number;
}

export class Miner {
  private readonly registry: PeerRegistry;
  private readonly provider: IFlightProvider;
  private readonly fallback: MockProvider;
  private readonly admission: AdmissionPolicy;
  private readonly providerTimeoutMs: number;
  private readonly maxOffersPerQuery: number;
  private readonly cache: TTLCache<Offer[]>;

  constructor(options: MinerOptions) {
    this.registry = options.registry;
    this.provider = options.provider;
    this.fallback = options.fallback ?? new MockProvider();
    this.admission = options.admission;
    this.providerTimeoutMs = options.providerTimeoutMs ?? 10_000;
    this.maxOffersPerQuery = Math.max(1, options.maxOffersPerQuery ?? 1);
    this.cache = new TTLCache<Offer[]>(options.cacheTtlSeconds ?? 300);

    if (!this.provider.isAvailable()) {
      log.warn(
        `Pricing provider "${this.provider.name}" unavailable (no API key); every query will use mock flights`
      );
    }
  }

  blacklist(hotkey: string | undefined): AdmissionDecision {
    if (!hotkey) {
      log.warn("Received a request without a hotkey");
      return { rejected: true, reason: "Missing hotkey" };
    }

    const registered = this.registry.isRegistered(hotkey);
    if (!this.admission.allowNonRegistered && !registered) {
      return { rejected: true, reason: "Unrecognized hotkey" };
    }

    if (
      this.admission.forceValidatorPermit &&
      !this.registry.hasValidatorPermit(hotkey)
    ) {
      log.warn("Blacklisting request from non-validator hotkey", { hotkey });
      return { rejected: true, reason: "Non-validator hotkey" };
    }

    return { rejected: false, reason: "Hotkey recognized!" };
  }

  /** Stake-based queue priority; anonymous and unknown callers get 0. */
  priority(hotkey: string | undefined): number {
    if (!hotkey || !this.registry.isRegistered(hotkey)) return 0;
    return this.registry.stakeOf(hotkey);
  }

  async forward(batch: BatchRequest): Promise<BatchResponse> {
    const responses: Offer[][] = [];
    let fallbacks = 0;

    for (const query of batch.queries) {
      const result = await this.fulfil(query);
      if (result.status === "FALLBACK_RETURNED") fallbacks++;
      responses.push(result.offers);
    }

    log.info("Fulfilled batch", { queries: batch.queries.length, fallbacks });
    return { responses };
  }

  async fulfil(query: SubQuery): Promise<Fulfillment> {
    if (!this.provider.isAvailable()) {
      return this.useFallback(query);
    }

    const key = this.cache.buildKey(this.provider.name, query);
    const cached = this.cache.get(key);
    if (cached) {
      return { status: "OFFER_RETURNED", offers: cached };
    }

    let raw: Offer[];
    try {
      raw = await withTimeout(
        this.provider.searchFlights(query, this.maxOffersPerQuery),
        this.providerTimeoutMs,
        `${this.provider.name} search`
      );
    } catch (err) {
      log.warn("Pricing request failed", {
        provider: this.provider.name,
        error: errorMessage(err),
      });
      return this.useFallback(query);
    }

    const offers: Offer[] = [];
    for (const candidate of raw) {
      const parsed = offerSchema.safeParse(candidate);
      if (parsed.success) offers.push(parsed.data);
      if (offers.length >= this.maxOffersPerQuery) break;
    }

    if (offers.length === 0) {
      log.info("No usable flights returned for query", {
        provider: this.provider.name,
        route: `${query.origin}-${query.destination}`,
        date: query.date,
      });
      return this.useFallback(query);
    }

    this.cache.set(key, offers);
    return { status: "OFFER_RETURNED", offers };
  }

  private useFallback(query: SubQuery): Fulfillment {
    log.debug("Using mock flight data as a fallback", {
      route: `${query.origin}-${query.destination}`,
    });
    return { status: "FALLBACK_RETURNED", offers: [this.fallback.offerFor(query)] };
  }
}
