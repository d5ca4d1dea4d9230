/**
 * Runs tasks one at a time in submission order
 *
 * A session has a single stdin/stdout pair and untagged result lines, so a
 * search must not start writing until the previous one has its answer.
 */

export type QueuedTask<T> = () => Promise<T>;

export class CommandQueue {
  private readonly pending: Array<() => Promise<void>> = [];
  private running = false;

  enqueue<T>(task: QueuedTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      });
      void this.next();
    });
  }

  /** Tasks waiting behind the running one */
  get size(): number {
    return this.pending.length;
  }

  get isRunning(): boolean {
    return this.running;
  }

  private async next(): Promise<void> {
    if (this.running) return;

    const task = this.pending.shift();
    if (!task) return;

    this.running = true;
    try {
      await task();
    } finally {
      this.running = false;
      void this.next();
    }
  }
}
