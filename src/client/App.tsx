import { Routes, Route, Navigate } from 'react-router-dom';
import { DEFAULT_LETTERS } from '../types.js';
import { RackPage, RackRoute } from './pages/RackPage.js';

export function App() {
  return (
    <Routes>
      <Route path="/" element={<RackPage letters={DEFAULT_LETTERS} />} />
      <Route path="/rack/:letters" element={<RackRoute />} />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
}
