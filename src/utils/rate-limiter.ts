export interface RateLimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateLimiter {
  private tokens: number;
  private last_refill: number;
  private readonly max_tokens: number;
  private readonly refill_rate: number; // tokens per second
  private readonly clock: RateLimiterClock;

  constructor(max_tokens: number, refill_rate: number, clock = systemClock) {
    this.max_tokens = max_tokens;
    this.tokens = max_tokens;
    this.refill_rate = refill_rate;
    this.clock = clock;
    this.last_refill = clock.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }
    // Reserve the token now; concurrent callers queue behind us in debt.
    const wait_ms = ((1 - this.tokens) / this.refill_rate) * 1000;
    this.tokens -= 1;
    await this.clock.sleep(wait_ms);
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed_s = (now - this.last_refill) / 1000;
    this.tokens = Math.min(this.max_tokens, this.tokens + elapsed_s * this.refill_rate);
    this.last_refill = now;
  }
}
