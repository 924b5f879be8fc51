/**
 * Replayable asynchronous stream of install events.
 *
 * Every iterator starts from the first event, so a consumer that attaches
 * late still sees the full phase sequence. Iteration ends once the stream
 * is closed and drained.
 */
export class InstallStream<T> implements AsyncIterable<T> {
  private events: T[] = [];
  private closed = false;
  private waiters: Array<() => void> = [];

  push(event: T): void {
    if (this.closed) return;
    this.events.push(event);
    this.wake();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    let index = 0;
    while (true) {
      if (index < this.events.length) {
        const event = this.events[index];
        index++;
        if (event !== undefined) yield event;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
  }
}
