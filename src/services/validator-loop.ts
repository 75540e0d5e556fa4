import type { SearchIntent } from "../protocol.js";
import { log, errorMessage } from "../utils/logger.js";
import type { Validator } from "./validator.js";

export class ValidatorLoop {
  private timer?: ReturnType<typeof setInterval>;
  private running = false;
  private cycles = 0;

  constructor(
    private readonly validator: Pick<Validator, "forward">,
    private readonly intent: () => SearchIntent,
    private readonly intervalMs: number
  ) {}

  get completedCycles(): number {
    return this.cycles;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      const offers = await this.validator.forward(this.intent());
      this.cycles++;
      log.info("Validator cycle finished", {
        cycle: this.cycles,
        offers: offers.length,
      });
    } catch (err) {
      log.error("Validator cycle failed", { error: errorMessage(err) });
    } finally {
      this.running = false;
    }
  }
}
