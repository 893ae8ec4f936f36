/**
 * Component exports
 */

export { BoardPanel, type BoardPanelProps } from './BoardPanel.js';
export { StatusBar, type StatusBarProps } from './StatusBar.js';
