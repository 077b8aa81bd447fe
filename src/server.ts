import { createApp } from './app';
import { loadConfig } from './config/env';

const config = loadConfig();
const app = createApp(config);

const server = app.listen(config.port, () => {
  console.log(`[Server] Listening on port ${config.port}`);
  if (config.parseOptions.maxDepth !== undefined) {
    console.log(`[Server] Outline depth limit: ${config.parseOptions.maxDepth}`);
  }
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, closing`);
  server.close((err) => {
    if (err) {
      console.error('[Server] Close failed:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
