import { z } from "zod";
import type { ScoreStore } from "../storage/score-store.js";
import { formatScoresTable } from "../utils/formatting.js";

export const peerScoresSchema = z.object({
  top: z
    .number()
    .int()
    .min(1)
    .default(20)
    .describe("Number of miners to list, highest score first"),
});

export type PeerScoresInput = z.infer<typeof peerScoresSchema>;

export async function handlePeerScores(
  input: PeerScoresInput,
  store: ScoreStore
): Promise<string> {
  const scores = await store.load();
  const top = [...scores.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, input.top);
  return formatScoresTable(new Map(top));
}
