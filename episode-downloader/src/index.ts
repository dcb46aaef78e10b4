import { getConfig } from './config.js';
import { closeDatabase, getDatabase } from './db/schema.js';
import { SqliteRecordStore } from './db/repository.js';
import { buildServer } from './routes/index.js';
import { CatalogClient } from './services/catalog-client.js';
import { DownloadScheduler } from './services/download-scheduler.js';
import { NodeFileStorage } from './services/file-storage.js';
import { ConsoleNotificationSink } from './services/notifications.js';
import { AxiosHttpClient } from './utils/http.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  Episode Downloader Service');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Download path: ${config.downloadPath}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log(`Catalog API: ${config.catalogApiUrl}`);
  console.log(`Server-side MP4: ${config.preferServerMp4 ? 'enabled' : 'disabled'}`);
  console.log('');

  const http = new AxiosHttpClient({
    timeoutMs: config.requestTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
  });

  const scheduler = new DownloadScheduler({
    store: new SqliteRecordStore(getDatabase()),
    storage: new NodeFileStorage(config.downloadPath),
    http,
    catalog: new CatalogClient(http, config.catalogApiUrl, { preferServerMp4: config.preferServerMp4 }),
    notifications: new ConsoleNotificationSink(),
    options: {
      maxPlaylistDepth: config.maxPlaylistDepth,
      minSegmentSuccessRatio: config.minSegmentSuccessRatio,
      minDirectFileBytes: config.minDirectFileBytes,
    },
  });

  const fastify = await buildServer(scheduler);

  // Resume downloads on startup
  scheduler.resumeOnStartup();

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    fastify.close()
      .catch((err: unknown) => console.error('Error closing server:', err))
      .finally(() => {
        closeDatabase();
        process.exit(0);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
