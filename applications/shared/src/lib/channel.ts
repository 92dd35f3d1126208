/**
 * One-directional message queue between the session loop and the audio
 * backend. Producers `post`, the single consumer `drain`s everything pending
 * in arrival order without waiting.
 */
export class MessageQueue<T> {
  private pending: T[] = [];
  private closed = false;

  post(message: T): boolean {
    if (this.closed) {
      return false;
    }
    this.pending.push(message);
    return true;
  }

  drain(): T[] {
    if (this.pending.length === 0) {
      return [];
    }
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }

  close(): void {
    this.closed = true;
    this.pending = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
