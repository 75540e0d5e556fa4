import type { Offer, SubQuery } from "../protocol.js";
import type { IFlightProvider } from "./provider.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface MockProviderOptions {
  minPrice?: number;
  maxPrice?: number;
  random?: () => number;
  now?: () => Date;
}

// Fallback pricing: one offer, 5h flight departing in 5h.
export class MockProvider implements IFlightProvider {
  readonly name = "mock" as const;
  private readonly minPrice: number;
  private readonly maxPrice: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: MockProviderOptions = {}) {
    this.minPrice = options.minPrice ?? 100;
    this.maxPrice = options.maxPrice ?? 2000;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  isAvailable(): boolean {
    return true;
  }

  async searchFlights(query: SubQuery): Promise<Offer[]> {
    return [this.offerFor(query)];
  }

  offerFor(query: SubQuery): Offer {
    const start = this.now().getTime();
    const departure = start + 5 * HOUR_MS;
    const arrival = start + 10 * HOUR_MS;
    const spread = this.maxPrice - this.minPrice;
    const price = Math.round((this.minPrice + this.random() * spread) * 100) / 100;

    return {
      market: query.market,
      price: Math.max(0.01, price),
      currency: query.currency || "USD",
      departureTime: new Date(departure).toISOString(),
      arrivalTime: new Date(arrival).toISOString(),
      departureCity: query.origin,
      arrivalCity: query.destination,
      stops: 1,
      carrier: "MockAir",
      durationDays: (arrival - departure) / DAY_MS,
    };
  }
}
