export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly buf: Array<{ value: T }> = [];
  private readonly waiters: Array<(v: IteratorResult<T>) => void> = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    const w = this.waiters.shift();
    if (w) w({ value, done: false });
    else this.buf.push({ value });
  }

  /** Buffered values stay readable after close. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const w of this.waiters.splice(0)) w({ value: undefined, done: true });
  }

  async next(): Promise<IteratorResult<T>> {
    const head = this.buf.shift();
    if (head) return { value: head.value, done: false };
    if (this.closed) return { value: undefined, done: true };
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buf.length;
  }
}
