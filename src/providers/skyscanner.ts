import type { Offer, SubQuery } from "../protocol.js";
import { errorMessage } from "../utils/logger.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { UpstreamUnavailableError, type IFlightProvider } from "./provider.js";

const RAPIDAPI_HOST = "skyscanner89.p.rapidapi.com";
const BASE_URL = `https://${RAPIDAPI_HOST}`;
const MINUTES_PER_DAY = 24 * 60;

export interface SkyscannerOptions {
  timeoutMs?: number;
  limiter?: RateLimiter;
}

export class SkyscannerProvider implements IFlightProvider {
  readonly name = "skyscanner" as const;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly limiter: RateLimiter;

  constructor(apiKey: string, options: SkyscannerOptions = {}) {
    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.limiter = options.limiter ?? new RateLimiter(3, 1); // 3 tokens, 1/sec refill
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  async searchFlights(query: SubQuery, limit: number): Promise<Offer[]> {
    await this.limiter.acquire();

    const params = new URLSearchParams({
      origin: query.origin,
      originId: query.originId,
      destination: query.destination,
      destinationId: query.destinationId,
      date: query.date,
      market: query.market,
      cabinClass: query.cabinClass.toLowerCase(),
      adults: String(query.adults),
      children: String(query.children),
      infants: String(query.infants),
      currency: query.currency,
    });

    let resp: Response;
    try {
      resp = await fetch(`${BASE_URL}/flights/one-way/list?${params}`, {
        headers: {
          "x-rapidapi-key": this.apiKey,
          "x-rapidapi-host": RAPIDAPI_HOST,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamUnavailableError(
        `Skyscanner request failed: ${errorMessage(err)}`
      );
    }

    if (!resp.ok) {
      throw new UpstreamUnavailableError(
        `Skyscanner API error: ${resp.status} ${resp.statusText}`,
        resp.status
      );
    }

    let data: SkyscannerOneWayResponse;
    try {
      data = (await resp.json()) as SkyscannerOneWayResponse;
    } catch (err) {
      throw new UpstreamUnavailableError(
        `Skyscanner returned invalid JSON: ${errorMessage(err)}`
      );
    }
    return this.parseOffers(data, query).slice(0, Math.max(1, limit));
  }

  private parseOffers(data: SkyscannerOneWayResponse, query: SubQuery): Offer[] {
    const results: Offer[] = [];

    for (const item of data.data?.itineraries ?? []) {
      const leg = item.legs?.[0];
      if (!leg) continue;

      results.push({
        market: query.market,
        price: item.price?.raw ?? 0,
        currency: query.currency,
        departureTime: leg.departure ?? "",
        arrivalTime: leg.arrival ?? "",
        departureCity: leg.origin?.name ?? query.origin,
        arrivalCity: leg.destination?.name ?? query.destination,
        stops: leg.stopCount ?? 0,
        carrier: leg.carriers?.marketing?.[0]?.name ?? "Skyscanner",
        durationDays: durationDays(leg),
      });
    }

    return results;
  }
}

function durationDays(leg: SkyscannerLeg): number {
  if (leg.durationInMinutes !== undefined) {
    return leg.durationInMinutes / MINUTES_PER_DAY;
  }
  const dep = Date.parse(leg.departure ?? "");
  const arr = Date.parse(leg.arrival ?? "");
  if (Number.isNaN(dep) || Number.isNaN(arr)) return 0;
  return (arr - dep) / (MINUTES_PER_DAY * 60_000);
}

// --- Skyscanner API response types ---

interface SkyscannerPlace {
  id?: string;
  name?: string;
  displayCode?: string;
}

interface SkyscannerLeg {
  id?: string;
  origin?: SkyscannerPlace;
  destination?: SkyscannerPlace;
  departure?: string;
  arrival?: string;
  durationInMinutes?: number;
  stopCount?: number;
  carriers?: {
    marketing?: Array<{ name?: string; alternateId?: string }>;
  };
}

interface SkyscannerItinerary {
  id?: string;
  price?: { raw?: number; formatted?: string };
  legs?: SkyscannerLeg[];
}

interface SkyscannerOneWayResponse {
  data?: {
    itineraries?: SkyscannerItinerary[];
  };
}
