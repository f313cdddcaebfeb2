import { fileURLToPath } from 'node:url';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { sanitizeErrorMessage } from './errors.js';
import { createMemoryStore } from './store/memory-store.js';
import { loadReferenceData } from './store/reference-data.js';

const DEFAULT_REFERENCE_DATA_PATH = fileURLToPath(new URL('../data/reference-data.json', import.meta.url));

/**
 * Global error handlers to prevent process crashes
 */
process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught exception:', sanitizeErrorMessage(error.message));
  console.error('[FATAL] Stack:', sanitizeErrorMessage(error.stack || ''));
});

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  console.error('[ERROR] Unhandled rejection:', sanitizeErrorMessage(message));
  if (reason instanceof Error && reason.stack) {
    console.error('[ERROR] Stack:', sanitizeErrorMessage(reason.stack));
  }
});

const start = async () => {
  const config = loadConfig();
  const referenceDataPath = config.referenceDataPath ?? DEFAULT_REFERENCE_DATA_PATH;
  const store = createMemoryStore(await loadReferenceData(referenceDataPath));

  const app = buildApp({
    store,
    routing: config.routing,
    requestTimeoutMs: config.requestTimeoutMs,
    logger: { level: config.logLevel },
  });

  app.log.info({ referenceDataPath, routingProvider: config.routing.provider }, 'Reference data loaded');

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('[FATAL] Startup failed:', sanitizeErrorMessage(message));
  process.exit(1);
});
