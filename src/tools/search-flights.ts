import type { z } from "zod";
import { searchIntentSchema } from "../protocol.js";
import type { Validator } from "../services/validator.js";
import { formatOffersTable } from "../utils/formatting.js";

export const searchFlightsSchema = searchIntentSchema;

export type SearchFlightsInput = z.infer<typeof searchFlightsSchema>;

export async function handleSearchFlights(
  input: SearchFlightsInput,
  validator: Validator
): Promise<string> {
  const intent = Object.freeze({ ...input });
  const offers = await validator.forward(intent);
  return formatOffersTable(offers);
}
