/**
 * Configuration loaded from environment variables
 */

import { z } from 'zod/v4';

export const ROUTING_PROVIDERS = ['openroute', 'yandex', 'fallback'] as const;

export type RoutingProviderName = (typeof ROUTING_PROVIDERS)[number];

export const DEFAULT_OPENROUTESERVICE_API_URL = 'https://api.openrouteservice.org/v2/directions/driving-car';
export const DEFAULT_YANDEX_ROUTER_API_URL = 'https://api.routing.yandex.net/v2/route';
export const DEFAULT_PROVIDER_TIMEOUT_MS = 10000;
export const DEFAULT_FALLBACK_COEFFICIENT = 1.3;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REFERENCE_DATA_PATH: z.string().optional(),

  ROUTING_PROVIDER: z.string().default('fallback'),
  DISTANCE_FALLBACK_COEFFICIENT: z.coerce.number().positive().default(DEFAULT_FALLBACK_COEFFICIENT),

  OPENROUTESERVICE_API_KEY: z.string().optional(),
  OPENROUTESERVICE_API_URL: z.url().default(DEFAULT_OPENROUTESERVICE_API_URL),
  OPENROUTESERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),

  YANDEX_API_KEY: z.string().optional(),
  YANDEX_ROUTER_API_URL: z.url().default(DEFAULT_YANDEX_ROUTER_API_URL),
  YANDEX_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),
});

export interface ProviderCredentials {
  apiKey?: string;
  apiUrl: string;
  timeoutMs: number;
}

/**
 * Routing settings, passed explicitly to the route resolver.
 * `provider` stays a free string: unknown names degrade to the fallback.
 */
export interface RoutingConfig {
  provider: string;
  fallbackCoefficient: number;
  openroute: ProviderCredentials;
  yandex: ProviderCredentials;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  requestTimeoutMs: number;
  referenceDataPath?: string;
  routing: RoutingConfig;
}

/**
 * Parse and validate configuration
 * @throws ZodError if a variable is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  // Empty env vars count as unset
  const orUndefined = (value: string | undefined) => (value ? value : undefined);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    referenceDataPath: orUndefined(parsed.REFERENCE_DATA_PATH),
    routing: {
      provider: parsed.ROUTING_PROVIDER.trim().toLowerCase(),
      fallbackCoefficient: parsed.DISTANCE_FALLBACK_COEFFICIENT,
      openroute: {
        apiKey: orUndefined(parsed.OPENROUTESERVICE_API_KEY),
        apiUrl: parsed.OPENROUTESERVICE_API_URL,
        timeoutMs: parsed.OPENROUTESERVICE_TIMEOUT_MS,
      },
      yandex: {
        apiKey: orUndefined(parsed.YANDEX_API_KEY),
        apiUrl: parsed.YANDEX_ROUTER_API_URL,
        timeoutMs: parsed.YANDEX_API_TIMEOUT_MS,
      },
    },
  };
}

/**
 * Routing settings with every variable unset: fallback provider, default coefficient
 */
export function defaultRoutingConfig(): RoutingConfig {
  return loadConfig({}).routing;
}
