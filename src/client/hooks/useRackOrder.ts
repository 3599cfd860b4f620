import { useReducer, useCallback } from 'react';
import type { RackMove } from '../../types.js';

export interface RackOrderState {
  /** Letters the rack started with. */
  initialLetters: string;
  /** Current letter order, as reported by the last drop. */
  letters: string;
  lastMove: RackMove | null;
  /** Drops that changed the order. */
  moveCount: number;
  /** Bumped on reset so the board can be remounted. */
  resetCount: number;
}

type Action =
  | { type: 'REORDERED'; move: RackMove; letters: string }
  | { type: 'RESET' };

function init(initialLetters: string): RackOrderState {
  return {
    initialLetters,
    letters: initialLetters,
    lastMove: null,
    moveCount: 0,
    resetCount: 0,
  };
}

export function rackOrderReducer(state: RackOrderState, action: Action): RackOrderState {
  switch (action.type) {
    case 'REORDERED':
      return {
        ...state,
        letters: action.letters,
        lastMove: action.move,
        moveCount: action.move.from === action.move.to ? state.moveCount : state.moveCount + 1,
      };
    case 'RESET':
      return {
        ...init(state.initialLetters),
        resetCount: state.resetCount + 1,
      };
    default:
      return state;
  }
}

export function useRackOrder(initialLetters: string) {
  const [state, dispatch] = useReducer(rackOrderReducer, initialLetters, init);

  const recordMove = useCallback((move: RackMove, letters: string) => {
    dispatch({ type: 'REORDERED', move, letters });
  }, []);

  const reset = useCallback(() => {
    dispatch({ type: 'RESET' });
  }, []);

  return { ...state, recordMove, reset };
}
