/**
 * Terminal UI exports
 */

export { App, type AppProps } from './App.js';
export { useGameStore, storeRenderer, type GameUiState } from './store.js';
export { useKeyboard, type UseKeyboardOptions } from './hooks/useKeyboard.js';
export {
  boardRows,
  fileHeader,
  pieceSymbol,
  renderBoardText,
  type BoardCellView,
  type BoardRowView,
  type CellHighlight,
} from './board-format.js';
export * from './components/index.js';
