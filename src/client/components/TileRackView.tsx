/**
 * TileRackView — hosts a rack board inside a React tree.
 *
 * The board is created when the component mounts and destroyed when it
 * unmounts or its letters/config change. Construction errors are shown in
 * place of the rack.
 */

import { useEffect, useRef, useState } from 'react';
import type { CSSProperties } from 'react';
import type { RackConfig, RackMove } from '../../types.js';
import type { RenderContext, RenderStyle } from '../types.js';
import { createRackBoard } from '../board.js';

export interface TileRackViewProps {
  letters: string;
  config?: RackConfig;
  style?: RenderStyle;
  onReorder?: (move: RackMove, letters: string) => void;
  /** Drawing context override, passed through to the board. */
  context?: RenderContext;
}

const containerStyle: CSSProperties = {
  width: '100%',
  height: 200,
  borderRadius: 8,
  overflow: 'hidden',
  background: '#ffffff',
  boxShadow: '0 2px 8px rgba(0,0,0,0.15)',
};

const errorStyle: CSSProperties = {
  padding: 12,
  marginBottom: 8,
  borderRadius: 8,
  background: '#fee2e2',
  color: '#991b1b',
  fontSize: 14,
};

export function TileRackView({ letters, config, style, onReorder, context }: TileRackViewProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const [error, setError] = useState<string | null>(null);

  // Latest callback without recreating the board on every render
  const onReorderRef = useRef(onReorder);
  onReorderRef.current = onReorder;

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    try {
      const board = createRackBoard(container, letters, {
        config,
        style,
        context,
        onReorder: (move, order) => onReorderRef.current?.(move, order),
      });
      setError(null);
      return () => board.destroy();
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Could not create the tile rack');
      return undefined;
    }
  }, [letters, config, style, context]);

  return (
    <div>
      {error && (
        <div role="alert" style={errorStyle}>
          {error}
        </div>
      )}
      <div
        ref={containerRef}
        data-testid="tile-rack"
        aria-label={`Tile rack: ${letters}`}
        style={containerStyle}
      />
    </div>
  );
}
