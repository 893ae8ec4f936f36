/**
 * Board Panel
 *
 * Draws the board from the human's side with file and rank labels.
 */

import { Box, Text } from 'ink';

import type { GameSnapshot } from '@termchess/game';

import { boardRows, fileHeader, type BoardCellView } from '../board-format.js';

export interface BoardPanelProps {
  snapshot: GameSnapshot;
  color: boolean;
}

export function BoardPanel({ snapshot, color }: BoardPanelProps): JSX.Element {
  const header = fileHeader(snapshot.humanSide);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={color ? 'gray' : undefined} paddingX={1}>
      <Text dimColor>{header}</Text>
      {boardRows(snapshot).map((row) => (
        <Box key={row.label}>
          <Text dimColor>{row.label} </Text>
          {row.cells.map((cell, index) => (
            <Text key={index}>
              {index > 0 ? ' ' : ''}
              <Text color={color ? getCellColor(cell) : undefined} bold={cell.highlight !== null}>
                {cell.text}
              </Text>
            </Text>
          ))}
          <Text dimColor>  {row.label}</Text>
        </Box>
      ))}
      <Text dimColor>{header}</Text>
    </Box>
  );
}

function getCellColor(cell: BoardCellView): string | undefined {
  switch (cell.highlight) {
    case 'selected':
      return 'yellow';
    case 'destination':
      return 'green';
    default:
      return cell.side === 'black' ? 'cyan' : cell.side === 'white' ? 'whiteBright' : 'gray';
  }
}
