import type { RankedOffer, SearchIntent } from "../protocol.js";
import type { PeerRegistry } from "../registry/registry.js";
import type { ScoreStore } from "../storage/score-store.js";
import type { Transport } from "../transport/transport.js";
import { log, errorMessage } from "../utils/logger.js";
import { aggregateOffers } from "./aggregator.js";
import { dispatchBatch } from "./dispatcher.js";
import { applyRewards, computeRewards } from "./reward.js";
import { samplePeers } from "./sampler.js";
import type { QuerySynthesizer } from "./synthesizer.js";

export interface ValidatorOptions {
  hotkey: string;
  registry: PeerRegistry;
  transport: Transport;
  synthesizer: QuerySynthesizer;
  scoreStore: ScoreStore;
  /** Peers per cycle. Defaults to the synthesizer's batch size. */
  sampleSize?: number;
  queryTimeoutMs: number;
  vpermitStakeLimit?: number;
  random?: () => number;
}

export interface CycleReport {
  queries: number;
  sampled: number;
  responded: number;
  offers: number;
}

export class Validator {
  private readonly options: ValidatorOptions;
  private rewardTail: Promise<void> = Promise.resolve();
  private lastReport: CycleReport | undefined;

  constructor(options: ValidatorOptions) {
    this.options = options;
  }

  get hotkey(): string {
    return this.options.hotkey;
  }

  get lastCycle(): CycleReport | undefined {
    return this.lastReport;
  }

  async forward(intent: SearchIntent): Promise<RankedOffer[]> {
    const { synthesizer, registry, transport, queryTimeoutMs } = this.options;

    const batch = synthesizer.synthesize(intent);
    const report: CycleReport = {
      queries: batch.queries.length,
      sampled: 0,
      responded: 0,
      offers: 0,
    };
    this.lastReport = report;

    if (batch.queries.length === 0) {
      log.warn("Empty batch: no reference data to build queries from");
      return [];
    }

    const peers = samplePeers(
      registry,
      this.options.sampleSize ?? synthesizer.batchSize,
      {
        selfId: this.options.hotkey,
        vpermitStakeLimit: this.options.vpermitStakeLimit,
        random: this.options.random,
      }
    );
    report.sampled = peers.length;
    log.info("Dispatching batch", {
      queries: batch.queries.length,
      peers: peers.length,
      sample: batch.queries.slice(0, 2),
    });

    const responses = await dispatchBatch(
      transport,
      batch,
      peers,
      queryTimeoutMs
    );
    report.responded = responses.length;
    log.info("Received batch responses", { count: responses.length });

    const ranked = aggregateOffers(responses);
    report.offers = ranked.length;
    if (ranked.length === 0) {
      log.warn("No flight options returned from miners");
      return [];
    }

    await this.rewardSerialized(ranked);
    return ranked.slice(0, intent.limit);
  }

  private rewardSerialized(ranked: readonly RankedOffer[]): Promise<void> {
    const run = this.rewardTail.then(() => this.reward(ranked));
    this.rewardTail = run;
    return run;
  }

  // Never rejects: a failed load or save is logged and the cycle still
  // returns its offers.
  private async reward(ranked: readonly RankedOffer[]): Promise<void> {
    const { scoreStore } = this.options;
    try {
      const scores = await scoreStore.load();
      const rewards = computeRewards(ranked);
      for (const r of rewards) {
        log.debug("Rewarding miner", r);
      }
      await scoreStore.save(applyRewards(scores, rewards));
    } catch (err) {
      log.error("Failed to apply rewards", { error: errorMessage(err) });
    }
  }
}
