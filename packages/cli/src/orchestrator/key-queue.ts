/**
 * Key queue: turns raw key presses into input events for the interaction
 * loop. Keys arrive from the terminal UI at any time; the loop drains one
 * event per tick.
 */

import { SquareInput, type InputEvent, type InputSource } from '@termchess/game';

export class KeyQueue implements InputSource {
  private readonly squareInput = new SquareInput();
  private readonly events: InputEvent[] = [];

  /**
   * Feed typed text, one character at a time
   */
  push(text: string): void {
    for (const key of text) {
      const result = this.squareInput.feed(key);
      switch (result.kind) {
        case 'square':
          this.events.push({ type: 'square', square: result.square });
          break;
        case 'rejected':
          this.events.push({ type: 'invalid', input: result.input });
          break;
        case 'pending':
        case 'ignored':
          break;
      }
    }
  }

  /**
   * Drop a partially typed square
   */
  cancel(): void {
    this.squareInput.reset();
  }

  quit(): void {
    this.events.push({ type: 'quit' });
  }

  poll(): InputEvent | undefined {
    return this.events.shift();
  }

  pending(): string | null {
    return this.squareInput.pending;
  }
}
