export type QueueTask<T> = () => Promise<T>;

type QueuedItem = () => Promise<void>;

export class PromiseQueue {
  private readonly concurrency: number;
  private activeCount = 0;
  private readonly queue: QueuedItem[] = [];

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) throw new Error("Concurrency must be an integer >= 1");
    this.concurrency = concurrency;
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.activeCount;
  }

  enqueue<T>(task: QueueTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(task).then(resolve, reject));
      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.activeCount >= this.concurrency) return;
    const item = this.queue.shift();
    if (!item) return;

    this.activeCount += 1;
    void item().finally(() => {
      this.activeCount -= 1;
      this.processQueue();
    });
  }
}
