import {
  untrustedBatchResponseSchema,
  type BatchRequest,
  type UntrustedBatchResponse,
} from "../protocol.js";
import type { PeerRegistry } from "../registry/registry.js";
import { log, errorMessage } from "../utils/logger.js";
import { BATCH_ROUTE, HOTKEY_HEADER, type Transport } from "./transport.js";

export class HttpTransport implements Transport {
  private readonly registry: PeerRegistry;
  private readonly hotkey: string;

  constructor(registry: PeerRegistry, hotkey: string) {
    this.registry = registry;
    this.hotkey = hotkey;
  }

  async sendBatch(
    peerId: string,
    batch: BatchRequest,
    timeoutMs: number
  ): Promise<UntrustedBatchResponse | undefined> {
    const axon = this.registry.axonOf(peerId);
    if (!axon) {
      log.debug("Peer has no axon address", { peerId });
      return undefined;
    }

    let resp: Response;
    try {
      resp = await fetch(`${axon}${BATCH_ROUTE}`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          [HOTKEY_HEADER]: this.hotkey,
        },
        body: JSON.stringify(batch),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      log.debug("Peer unreachable", { peerId, error: errorMessage(err) });
      return undefined;
    }

    if (!resp.ok) {
      const reason = await resp.text().catch(() => "");
      log.debug("Peer refused batch", { peerId, status: resp.status, reason });
      return undefined;
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (err) {
      log.debug("Peer sent invalid JSON", { peerId, error: errorMessage(err) });
      return undefined;
    }

    const parsed = untrustedBatchResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.debug("Peer sent malformed batch response", { peerId });
      return undefined;
    }
    return parsed.data;
  }
}
