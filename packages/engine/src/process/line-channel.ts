/**
 * Unbounded FIFO hand-off between the output scanner and the session
 *
 * Lines pushed before close() stay receivable; once the buffer is empty a
 * closed channel rejects receivers with the error given to close().
 */

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export class LineChannel {
  private readonly buffer: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closeReason: Error | null = null;

  get isClosed(): boolean {
    return this.closeReason !== null;
  }

  /** Number of buffered lines not yet received */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Hand a line to the oldest waiting receiver, or buffer it
   * Lines pushed after close are dropped; returns whether the line was accepted
   */
  push(line: string): boolean {
    if (this.closeReason) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      this.buffer.push(line);
    }
    return true;
  }

  receive(): Promise<string> {
    const line = this.buffer.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }

    if (this.closeReason) {
      return Promise.reject(this.closeReason);
    }

    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Remove and return every buffered line
   */
  drain(): string[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  /**
   * Stop accepting lines and fail pending receivers; only the first reason is kept
   */
  close(reason: Error): void {
    if (this.closeReason) {
      return;
    }

    this.closeReason = reason;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter.reject(reason);
    }
  }
}
