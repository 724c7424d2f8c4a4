// ============================================
// CAPITOL - Main Entry Point
// ============================================

// Load environment variables from .env file
import 'dotenv/config';

import { startApp } from './app.js';

async function main() {
  const app = await startApp();

  // Graceful shutdown
  const shutdown = async () => {
    app.log.info('Shutting down Capitol...');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error('Failed to start Capitol:', err);
  process.exit(1);
});
