import Fastify from 'fastify';
import { createCalculatorService } from './calculator/service.js';
import { defaultRoutingConfig, type RoutingConfig } from './config.js';
import { toApiError, sanitizeErrorMessage } from './errors.js';
import { createRouteResolver } from './routing/resolver.js';
import type { RouteResolver } from './routing/types.js';
import { registerCalculatorRoutes, registerRegionRoutes } from './routes/index.js';
import type { ReferenceDataStore } from './store/types.js';

// Request timeout in milliseconds (30 seconds)
const REQUEST_TIMEOUT_MS = 30000;

export interface AppOptions {
  store?: ReferenceDataStore;
  routing?: RoutingConfig;
  /** Replaces the resolver built from `routing` */
  resolver?: RouteResolver;
  requestTimeoutMs?: number;
  logger?: boolean | { level: string };
}

export function buildApp(options: AppOptions = {}) {
  const timeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;

  const app = Fastify({
    logger: options.logger ?? true,
    // Set connection timeout to prevent socket hang up
    connectionTimeout: timeoutMs,
    // Disable request timeout here, we handle it in the hook
    requestTimeout: 0,
  });

  /**
   * Add request timeout hook
   */
  app.addHook('onRequest', async (request, reply) => {
    const timeoutId = setTimeout(() => {
      if (!reply.sent) {
        request.log.error('Request timeout');
        reply.status(504).send({
          error: {
            code: 'TIMEOUT_ERROR',
            message: 'Request timed out',
          },
        });
      }
    }, timeoutMs);

    // Clean up timeout when request completes
    reply.raw.on('close', () => clearTimeout(timeoutId));
  });

  /**
   * Global error handler for unhandled errors in routes
   */
  app.setErrorHandler((error, request, reply) => {
    const message = error instanceof Error ? error.message : String(error);
    request.log.error(
      { error: sanitizeErrorMessage(message || 'Unknown error'), stack: error instanceof Error ? error.stack : undefined },
      'Unhandled route error'
    );

    const apiError = toApiError(error);
    reply.status(apiError.statusCode).send(apiError.toResponse());
  });

  app.get('/health', async () => {
    return { ok: true, service: 'delivery-calc' };
  });

  // Register API routes if reference data is available
  if (options.store) {
    const resolver = options.resolver ?? createRouteResolver(options.routing ?? defaultRoutingConfig(), app.log);
    const calculator = createCalculatorService({ store: options.store, resolver, logger: app.log });

    registerCalculatorRoutes(app, calculator);
    registerRegionRoutes(app, options.store);
  }

  return app;
}
