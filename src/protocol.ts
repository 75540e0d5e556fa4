import { z } from "zod";

// ----------------------------------------------------------------------
// Wire protocol between validator and miners. Requests and responses are
// plain JSON; every field a peer sends us is re-validated on arrival.
// ----------------------------------------------------------------------

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const cabinClassSchema = z.enum([
  "Economy",
  "Business",
  "First",
  "Premium_Economy",
]);

export type CabinClass = z.infer<typeof cabinClassSchema>;

export const searchIntentSchema = z.object({
  date: isoDate.describe("Departure date YYYY-MM-DD"),
  cabinClass: cabinClassSchema
    .default("Economy")
    .describe("Cabin class for the search"),
  adults: z
    .number()
    .int()
    .min(1)
    .default(1)
    .describe("Number of adult passengers (>= 1)"),
  children: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe("Number of child passengers"),
  infants: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe("Number of infant passengers"),
  currency: z
    .string()
    .min(3)
    .default("USD")
    .describe("Currency code for price values (USD, INR, EUR)"),
  limit: z
    .number()
    .int()
    .min(1)
    .default(5)
    .describe("Number of ranked offers to return"),
});

export type SearchIntent = Readonly<z.infer<typeof searchIntentSchema>>;

export const subQuerySchema = z.object({
  date: isoDate,
  origin: z.string().min(1),
  originId: z.string(),
  destination: z.string().min(1),
  destinationId: z.string(),
  market: z.string().min(1),
  cabinClass: cabinClassSchema,
  adults: z.number().int().min(1),
  children: z.number().int().min(0),
  infants: z.number().int().min(0),
  currency: z.string().min(1),
});

export type SubQuery = z.infer<typeof subQuerySchema>;

export const batchRequestSchema = z.object({
  queries: z.array(subQuerySchema),
});

export type BatchRequest = z.infer<typeof batchRequestSchema>;

export const offerSchema = z.object({
  market: z.string(),
  price: z.number().finite().positive(),
  currency: z.string(),
  departureTime: z.string(), // ISO 8601
  arrivalTime: z.string(), // ISO 8601
  departureCity: z.string(),
  arrivalCity: z.string(),
  stops: z.number().int().nonnegative(),
  carrier: z.string(),
  durationDays: z.number().finite().positive(),
});

export type Offer = z.infer<typeof offerSchema>;

export interface BatchResponse {
  responses: Offer[][];
}

/**
 * What the validator receives. Only the outer shape is trusted; positions
 * and offers are checked individually during aggregation.
 */
export const untrustedBatchResponseSchema = z.object({
  responses: z.array(z.unknown()),
});

export type UntrustedBatchResponse = z.infer<
  typeof untrustedBatchResponseSchema
>;

export interface RankedOffer extends Offer {
  peerId: string;
}
