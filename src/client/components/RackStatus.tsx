/**
 * RackStatus — current letter order, last drop and a reset button.
 */

import type { CSSProperties } from 'react';
import type { RackMove } from '../../types.js';
import { describeMove } from '../letters.js';

export interface RackStatusProps {
  letters: string;
  lastMove: RackMove | null;
  moveCount: number;
  onReset: () => void;
}

const containerStyle: CSSProperties = {
  display: 'flex',
  alignItems: 'center',
  justifyContent: 'space-between',
  gap: 16,
  padding: 12,
  marginTop: 12,
  borderRadius: 8,
  background: '#1e293b',
  color: '#e2e8f0',
};

const labelStyle: CSSProperties = {
  fontSize: 12,
  fontWeight: 600,
  textTransform: 'uppercase',
  letterSpacing: 1,
  color: '#94a3b8',
};

const buttonStyle: CSSProperties = {
  padding: '0.5rem 1.25rem',
  borderRadius: 8,
  border: 'none',
  background: '#3b82f6',
  color: '#fff',
  fontWeight: 'bold',
  cursor: 'pointer',
};

export function RackStatus({ letters, lastMove, moveCount, onReset }: RackStatusProps) {
  return (
    <div style={containerStyle} data-testid="rack-status">
      <div>
        <div style={labelStyle}>Order</div>
        <div style={{ fontSize: 24, fontWeight: 700, letterSpacing: 4 }} data-testid="rack-order">
          {letters}
        </div>
      </div>
      <div style={{ flex: 1 }}>
        <div style={labelStyle}>Moves: {moveCount}</div>
        <div style={{ fontSize: 14 }} data-testid="last-move">
          {lastMove ? describeMove(lastMove) : 'Drag a tile to reorder the rack'}
        </div>
      </div>
      <button type="button" style={buttonStyle} onClick={onReset}>
        Reset
      </button>
    </div>
  );
}
