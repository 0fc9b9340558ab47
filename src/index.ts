import { config, validateEnv } from './config.js';
import { ActivityCatalog } from './activities/catalog.js';
import { RegistrationEngine } from './activities/engine.js';
import { createSeedActivities } from './activities/seed.js';
import { createAppServer } from './http/server.js';
import { formatBanner } from './banner.js';

validateEnv();

const catalog = new ActivityCatalog(createSeedActivities());
const engine = new RegistrationEngine(catalog);
const server = createAppServer({ engine, staticDir: config.STATIC_DIR });

console.log(`[Server] Loaded ${catalog.size} activities: ${catalog.names().join(', ')}`);

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, closing`);
  server.close(err => {
    if (err) {
      console.error('[Server] Error during close:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

server.listen(config.PORT, config.HOST, () => {
  console.log(formatBanner(config.PORT));
  console.log(`[Server] Serving static files from ${config.STATIC_DIR}`);
});
