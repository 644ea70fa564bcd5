import { serve } from '@hono/node-server';
import { DataApiClient, StudyEngine, createDatabase } from '@vocab-drill/engine';
import { loadConfig } from './config';
import { createApp } from './index';
import { createStoreSaver, loadStore, storePath } from './persistence';

async function main() {
  const config = loadConfig();
  const client = config.DATA_API_URL
    ? new DataApiClient({ baseUrl: config.DATA_API_URL, timeoutMs: config.DATA_API_TIMEOUT_MS })
    : null;

  const engine = new StudyEngine({
    db: createDatabase(config.DB_NAME),
    dataDir: config.DATA_DIR,
    client,
    sessionCap: config.SESSION_CAP,
    syncAttempts: config.SYNC_ATTEMPTS,
  });

  const path = storePath(config.DATA_DIR);
  await loadStore(engine.store, path);

  const app = createApp({ engine, persist: createStoreSaver(engine.store, path) });

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`[server] listening on http://localhost:${info.port}`);
    if (!client) {
      console.warn('[server] DATA_API_URL not set; sync routes are disabled');
    }
  });

  const shutdown = () => {
    console.log('[server] shutting down');
    server.close();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[server] failed to start:', error);
  process.exitCode = 1;
});
