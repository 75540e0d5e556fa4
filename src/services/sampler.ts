import type { PeerRegistry } from "../registry/registry.js";

export interface SamplerOptions {
  selfId?: string;
  /**
   * Peers holding a validator permit with more stake than this are treated
   * as validators and skipped. Unset: no stake filter.
   */
  vpermitStakeLimit?: number;
  random?: () => number;
}

export function isEligiblePeer(
  registry: PeerRegistry,
  peerId: string,
  options: SamplerOptions = {}
): boolean {
  if (peerId === options.selfId) return false;
  if (!registry.axonOf(peerId)) return false;
  if (
    options.vpermitStakeLimit !== undefined &&
    registry.hasValidatorPermit(peerId) &&
    registry.stakeOf(peerId) > options.vpermitStakeLimit
  ) {
    return false;
  }
  return true;
}

export function samplePeers(
  registry: PeerRegistry,
  k: number,
  options: SamplerOptions = {}
): string[] {
  const random = options.random ?? Math.random;
  const pool = [...new Set(registry.listKnownPeers())].filter((id) =>
    isEligiblePeer(registry, id, options)
  );
  const count = Math.max(0, Math.min(Math.floor(k), pool.length));

  // Partial Fisher-Yates: the first `count` slots end up uniformly sampled.
  for (let i = 0; i < count; i++) {
    const j = i + Math.min(pool.length - i - 1, Math.floor(random() * (pool.length - i)));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}
