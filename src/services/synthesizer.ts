import type {
  BatchRequest,
  CabinClass,
  SearchIntent,
  SubQuery,
} from "../protocol.js";
import type {
  AirportRecord,
  ReferenceDataProvider,
} from "../reference/loader.js";

// false: take the value from SUBQUERY_DEFAULTS (date: randomized).
export interface PropagationConfig {
  date: boolean;
  cabinClass: boolean;
  passengers: boolean;
  currency: boolean;
}

export const NO_PROPAGATION: PropagationConfig = {
  date: false,
  cabinClass: false,
  passengers: false,
  currency: false,
};

export const FULL_PROPAGATION: PropagationConfig = {
  date: false,
  cabinClass: true,
  passengers: true,
  currency: true,
};

export const SUBQUERY_DEFAULTS: {
  cabinClass: CabinClass;
  adults: number;
  children: number;
  infants: number;
  currency: string;
} = {
  cabinClass: "Economy",
  adults: 1,
  children: 0,
  infants: 0,
  currency: "USD",
};

export interface SynthesizerOptions {
  reference: ReferenceDataProvider;
  maxBatchSize: number;
  propagation?: PropagationConfig;
  /** Date window, in days from today, for randomized departure dates. */
  minDaysAhead?: number;
  maxDaysAhead?: number;
  random?: () => number;
  now?: () => Date;
}

export function randomFutureDate(
  random: () => number,
  now: Date,
  minDays = 1,
  maxDays = 90
): string {
  const span = Math.max(0, maxDays - minDays);
  const offset = minDays + Math.floor(random() * (span + 1));
  const d = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + offset)
  );
  return d.toISOString().slice(0, 10);
}

export class QuerySynthesizer {
  private readonly reference: ReferenceDataProvider;
  private readonly maxBatchSize: number;
  private readonly propagation: PropagationConfig;
  private readonly minDaysAhead: number;
  private readonly maxDaysAhead: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: SynthesizerOptions) {
    this.reference = options.reference;
    this.maxBatchSize = options.maxBatchSize;
    this.propagation = options.propagation ?? NO_PROPAGATION;
    this.minDaysAhead = options.minDaysAhead ?? 1;
    this.maxDaysAhead = options.maxDaysAhead ?? 90;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  get batchSize(): number {
    return Math.max(
      0,
      Math.min(this.reference.getMarkets().length, this.maxBatchSize)
    );
  }

  synthesize(intent: SearchIntent, requested?: number): BatchRequest {
    const markets = this.reference.getMarkets();
    const airports = this.reference.getAirports();
    const size = Math.min(requested ?? this.batchSize, this.batchSize);

    if (size <= 0 || markets.length === 0 || airports.length < 2) {
      return { queries: [] };
    }

    const queries: SubQuery[] = [];
    for (let i = 0; i < size; i++) {
      const market = markets[this.pickIndex(markets.length)];
      const [origin, destination] = this.pickTwo(airports);
      queries.push(this.buildQuery(intent, market, origin, destination));
    }
    return { queries };
  }

  private buildQuery(
    intent: SearchIntent,
    market: string,
    origin: AirportRecord,
    destination: AirportRecord
  ): SubQuery {
    const p = this.propagation;
    return {
      date: p.date
        ? intent.date
        : randomFutureDate(
            this.random,
            this.now(),
            this.minDaysAhead,
            this.maxDaysAhead
          ),
      origin: origin.skyId,
      originId: origin.entityId,
      destination: destination.skyId,
      destinationId: destination.entityId,
      market,
      cabinClass: p.cabinClass ? intent.cabinClass : SUBQUERY_DEFAULTS.cabinClass,
      adults: p.passengers ? intent.adults : SUBQUERY_DEFAULTS.adults,
      children: p.passengers ? intent.children : SUBQUERY_DEFAULTS.children,
      infants: p.passengers ? intent.infants : SUBQUERY_DEFAULTS.infants,
      currency: p.currency ? intent.currency : SUBQUERY_DEFAULTS.currency,
    };
  }

  private pickIndex(n: number): number {
    return Math.min(n - 1, Math.floor(this.random() * n));
  }

  // Two distinct records, uniform without replacement.
  private pickTwo(
    airports: readonly AirportRecord[]
  ): [AirportRecord, AirportRecord] {
    const first = this.pickIndex(airports.length);
    let second = this.pickIndex(airports.length - 1);
    if (second >= first) second++;
    return [airports[first], airports[second]];
  }
}
