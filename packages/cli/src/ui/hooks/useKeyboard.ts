/**
 * Keyboard Input Hook
 *
 * Forwards key presses to the key queue drained by the interaction loop.
 */

import { useInput } from 'ink';

import type { KeyQueue } from '../../orchestrator/key-queue.js';

export interface UseKeyboardOptions {
  keys: KeyQueue;
}

export function useKeyboard({ keys }: UseKeyboardOptions): void {
  useInput((input, key) => {
    // Quit
    if (input.toLowerCase() === 'q' || (key.ctrl && input === 'c')) {
      keys.quit();
      return;
    }

    // Clear a half-typed square
    if (key.escape) {
      keys.cancel();
      return;
    }

    keys.push(input);
  });
}
