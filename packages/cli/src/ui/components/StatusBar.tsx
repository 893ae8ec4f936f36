/**
 * Status Bar Component
 *
 * Shows the status message, whose turn it is, the half-typed square and
 * keyboard shortcuts.
 */

import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';

import type { GameSnapshot } from '@termchess/game';

export interface StatusBarProps {
  snapshot: GameSnapshot;
  color: boolean;
}

export function StatusBar({ snapshot, color }: StatusBarProps): JSX.Element {
  const turn = snapshot.sideToMove === 'white' ? 'White' : 'Black';
  const yours = snapshot.sideToMove === snapshot.humanSide;

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={color ? 'gray' : undefined} paddingX={1}>
      <Box>
        {snapshot.thinking && (
          <Text color={color ? 'yellow' : undefined}>
            <Spinner type="dots" />{' '}
          </Text>
        )}
        <Text color={color ? getMessageColor(snapshot) : undefined} bold>
          {snapshot.message}
        </Text>
      </Box>

      <Box justifyContent="space-between">
        <Box>
          <Text dimColor>To move: </Text>
          <Text>
            {turn}
            {snapshot.result === null && yours ? ' (you)' : ''}
          </Text>
          {snapshot.pendingInput !== null && (
            <Text color={color ? 'cyan' : undefined}> | Square: {snapshot.pendingInput}_</Text>
          )}
        </Box>
        <Text dimColor>type a square (e.g. e2) | Esc: clear | q: quit</Text>
      </Box>
    </Box>
  );
}

function getMessageColor(snapshot: GameSnapshot): string {
  if (snapshot.result !== null) return 'magenta';
  if (snapshot.message.startsWith('Engine error') || snapshot.message.startsWith('Engine process')) {
    return 'red';
  }
  if (snapshot.message.startsWith('Invalid')) return 'yellow';
  return 'white';
}
