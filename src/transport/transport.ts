import type { BatchRequest, UntrustedBatchResponse } from "../protocol.js";

// Resolves to undefined on any failure; never rejects.
export interface Transport {
  sendBatch(
    peerId: string,
    batch: BatchRequest,
    timeoutMs: number
  ): Promise<UntrustedBatchResponse | undefined>;
}

export const BATCH_ROUTE = "/flight-search/batch";
export const HOTKEY_HEADER = "x-hotkey";
