/**
 * Single-producer, single-consumer queue of move notations.
 *
 * The engine output listener is the only producer and the interaction loop
 * the only consumer. Once closed, sends are dropped and nothing more can be
 * received.
 */
export class MoveChannel {
  private queue: string[] = [];
  private closed = false;

  /**
   * Enqueue a notation. Returns false if the channel is closed.
   */
  send(notation: string): boolean {
    if (this.closed) {
      return false;
    }
    this.queue.push(notation);
    return true;
  }

  /**
   * Dequeue the oldest notation without waiting
   */
  tryReceive(): string | undefined {
    return this.queue.shift();
  }

  /**
   * Close the channel and discard anything not yet received
   */
  close(): void {
    this.closed = true;
    this.queue = [];
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
