import { useParams, Navigate } from 'react-router-dom';
import { TileRackView } from '../components/TileRackView.js';
import { RackStatus } from '../components/RackStatus.js';
import { useRackOrder } from '../hooks/useRackOrder.js';
import { parseRackLetters } from '../letters.js';

const styles = {
  container: {
    display: 'flex',
    flexDirection: 'column' as const,
    alignItems: 'center',
    minHeight: '100vh',
    padding: '2rem 1rem',
    background: '#0f172a',
    fontFamily: 'system-ui, sans-serif',
  },
  title: {
    color: '#f8fafc',
    fontSize: '2rem',
    fontWeight: 'bold' as const,
    letterSpacing: '0.1em',
    margin: '0 0 0.25rem',
  },
  subtitle: {
    color: '#94a3b8',
    margin: '0 0 1.5rem',
  },
  content: {
    width: '100%',
    maxWidth: '720px',
  },
};

export interface RackPageProps {
  letters: string;
}

export function RackPage({ letters }: RackPageProps) {
  const order = useRackOrder(letters);

  return (
    <div style={styles.container}>
      <h1 style={styles.title}>Tile Rack</h1>
      <p style={styles.subtitle}>Drag the tiles to rearrange them.</p>
      <div style={styles.content}>
        <TileRackView
          key={order.resetCount}
          letters={order.initialLetters}
          onReorder={order.recordMove}
        />
        <RackStatus
          letters={order.letters}
          lastMove={order.lastMove}
          moveCount={order.moveCount}
          onReset={order.reset}
        />
      </div>
    </div>
  );
}

/** `/rack/:letters` — a rack of the requested letters, or home if invalid. */
export function RackRoute() {
  const params = useParams();
  const letters = parseRackLetters(params['letters'] ?? '');
  if (!letters) {
    return <Navigate to="/" replace />;
  }
  // Keyed so a new sequence starts from a fresh order state
  return <RackPage key={letters} letters={letters} />;
}
