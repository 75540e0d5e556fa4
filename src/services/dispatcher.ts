import type { BatchRequest } from "../protocol.js";
import type { Transport } from "../transport/transport.js";
import { log, errorMessage } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";

// responses[i] holds the raw entries for query i.
export interface PeerBatchResponse {
  peerId: string;
  responses: unknown[][];
}

export function alignResponses(
  batchLength: number,
  responses: readonly unknown[]
): unknown[][] {
  const aligned: unknown[][] = [];
  for (let i = 0; i < batchLength; i++) {
    const entry = responses[i];
    aligned.push(Array.isArray(entry) ? [...entry] : []);
  }
  return aligned;
}

export async function dispatchBatch(
  transport: Transport,
  batch: BatchRequest,
  peers: readonly string[],
  timeoutMs: number
): Promise<PeerBatchResponse[]> {
  const results = await Promise.allSettled(
    peers.map((peerId) =>
      withTimeout(
        transport.sendBatch(peerId, batch, timeoutMs),
        timeoutMs,
        `batch to ${peerId}`
      )
    )
  );

  const collected: PeerBatchResponse[] = [];
  const missing: string[] = [];

  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    const peerId = peers[i];
    if (result.status === "rejected") {
      missing.push(`${peerId}: ${errorMessage(result.reason)}`);
      continue;
    }
    if (!result.value) {
      missing.push(`${peerId}: no response`);
      continue;
    }
    if (result.value.responses.length !== batch.queries.length) {
      log.debug("Peer response length mismatch", {
        peerId,
        expected: batch.queries.length,
        received: result.value.responses.length,
      });
    }
    collected.push({
      peerId,
      responses: alignResponses(batch.queries.length, result.value.responses),
    });
  }

  if (missing.length > 0) {
    log.debug("Peers without response", { missing });
  }
  return collected;
}
