/**
 * Production server entry point.
 *
 * Serves the Vite-built client as static files.
 *
 * Usage:
 *   npm run build && npm start
 *   PORT=9000 npm start
 */

import { createServer } from 'http';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createStaticHandler } from './static-files.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));
const DIST_DIR = join(__dirname, '../../dist/client');

const port = parseInt(process.env['PORT'] ?? '3000', 10);

const httpServer = createServer(createStaticHandler(DIST_DIR));

httpServer.listen(port, () => {
  console.log(`Tile rack server running on http://localhost:${port}`);
  console.log('Press Ctrl+C to stop.');
});

function shutdown() {
  console.log('\nShutting down...');
  httpServer.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
