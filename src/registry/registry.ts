import { readFile } from "node:fs/promises";
import { z } from "zod";

export interface PeerRegistry {
  listKnownPeers(): string[];
  stakeOf(peerId: string): number;
  hasValidatorPermit(peerId: string): boolean;
  isRegistered(peerId: string): boolean;
  // undefined when the peer is not serving
  axonOf(peerId: string): string | undefined;
}

export const peerInfoSchema = z.object({
  hotkey: z.string().min(1),
  stake: z.number().nonnegative().default(0),
  validatorPermit: z.boolean().default(false),
  axonUrl: z.string().url().optional(),
});

export type PeerInfo = z.infer<typeof peerInfoSchema>;

const registryFileSchema = z.object({
  peers: z.array(peerInfoSchema),
});

export class StaticPeerRegistry implements PeerRegistry {
  private readonly peers = new Map<string, PeerInfo>();

  constructor(peers: Iterable<PeerInfo>) {
    for (const p of peers) {
      this.peers.set(p.hotkey, p);
    }
  }

  listKnownPeers(): string[] {
    return [...this.peers.keys()];
  }

  stakeOf(peerId: string): number {
    return this.peers.get(peerId)?.stake ?? 0;
  }

  hasValidatorPermit(peerId: string): boolean {
    return this.peers.get(peerId)?.validatorPermit ?? false;
  }

  isRegistered(peerId: string): boolean {
    return this.peers.has(peerId);
  }

  axonOf(peerId: string): string | undefined {
    const url = this.peers.get(peerId)?.axonUrl;
    return url ? url.replace(/\/+$/, "") : undefined;
  }
}

export async function loadRegistry(path: string): Promise<StaticPeerRegistry> {
  const raw = await readFile(path, "utf8");
  const parsed = registryFileSchema.parse(JSON.parse(raw));
  return new StaticPeerRegistry(parsed.peers);
}
