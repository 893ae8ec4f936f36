/**
 * Main game application
 *
 * Renders whatever snapshot the interaction loop last published.
 */

import { Box, Text } from 'ink';

import type { KeyQueue } from '../orchestrator/key-queue.js';

import { BoardPanel } from './components/BoardPanel.js';
import { StatusBar } from './components/StatusBar.js';
import { useKeyboard } from './hooks/useKeyboard.js';
import { useGameStore } from './store.js';

export interface AppProps {
  keys: KeyQueue;
  color: boolean;
}

export function App({ keys, color }: AppProps): JSX.Element {
  const snapshot = useGameStore((state) => state.snapshot);

  useKeyboard({ keys });

  if (!snapshot) {
    return <Text dimColor>Setting up the board...</Text>;
  }

  return (
    <Box flexDirection="column">
      <BoardPanel snapshot={snapshot} color={color} />
      <StatusBar snapshot={snapshot} color={color} />
    </Box>
  );
}
