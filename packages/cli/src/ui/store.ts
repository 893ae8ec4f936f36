/**
 * Zustand store holding the latest game snapshot for the Ink UI
 */

import type { GameSnapshot, Renderer } from '@termchess/game';
import { create } from 'zustand';

export interface GameUiState {
  snapshot: GameSnapshot | null;
  setSnapshot: (snapshot: GameSnapshot) => void;
}

export const useGameStore = create<GameUiState>((set) => ({
  snapshot: null,
  setSnapshot: (snapshot) => set({ snapshot }),
}));

/**
 * Renderer that publishes snapshots to the store; Ink re-renders from there
 */
export const storeRenderer: Renderer = {
  render(snapshot: GameSnapshot): void {
    useGameStore.getState().setSnapshot(snapshot);
  },
};
