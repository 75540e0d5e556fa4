interface Waiter {
  priority: number;
  seq: number;
  start: () => void;
}

// Highest priority first, FIFO among equals.
export class PriorityQueue {
  private readonly concurrency: number;
  private readonly waiting: Waiter[] = [];
  private running = 0;
  private seq = 0;

  constructor(concurrency: number) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.waiting.length;
  }

  run<T>(priority: number, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.running++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.next();
          });
      };

      if (this.running < this.concurrency) {
        start();
        return;
      }
      this.waiting.push({ priority, seq: this.seq++, start });
      this.waiting.sort((a, b) => b.priority - a.priority || a.seq - b.seq);
    });
  }

  private next(): void {
    if (this.running >= this.concurrency) return;
    const waiter = this.waiting.shift();
    waiter?.start();
  }
}
