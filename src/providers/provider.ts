import type { Offer, SubQuery } from "../protocol.js";

export type PricingSource = "skyscanner" | "mock";

export interface IFlightProvider {
  readonly name: PricingSource;
  searchFlights(query: SubQuery, limit: number): Promise<Offer[]>;
  isAvailable(): boolean;
}

export class UpstreamUnavailableError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "UpstreamUnavailableError";
    this.status = status;
  }
}
