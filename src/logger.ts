/**
 * Logger contract shared by domain modules.
 * Fastify's pino instance (`app.log`, `request.log`) satisfies it.
 */

import type { FastifyBaseLogger } from 'fastify';

export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
