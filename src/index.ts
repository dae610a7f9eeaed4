import 'dotenv/config';
import { config, validateEnv } from './config.js';
import { ActivityRegistry } from './activities/registry.js';
import { loadSeedFile } from './activities/seed.js';
import type { ActivityMap } from './activities/types.js';
import { createActivitiesServer, listenOn } from './http/server.js';

validateEnv();

let seed: ActivityMap;
try {
  seed = loadSeedFile(config.ACTIVITIES_FILE || undefined);
} catch (err) {
  console.error('[Server] Failed to load activities:', err instanceof Error ? err.message : err);
  process.exit(1);
}

const registry = new ActivityRegistry(seed);
const server = createActivitiesServer(registry);

listenOn(server, config.PORT, config.HOST)
  .then(() => {
    console.log(`[Server] Activities API on http://${config.HOST}:${config.PORT} (${registry.size} activities)`);
  })
  .catch((err: unknown) => {
    console.error('[Server] Failed to listen:', err instanceof Error ? err.message : err);
    process.exit(1);
  });

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, closing`);
  server.close(err => {
    if (err) {
      console.error('[Server] Close failed:', err);
      process.exit(1);
    }
    process.exit(0);
  });
  server.closeIdleConnections();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
