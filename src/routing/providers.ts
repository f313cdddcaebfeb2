/**
 * Road-distance providers: OpenRouteService directions and Yandex Router
 */

import { z } from 'zod/v4';
import type { ProviderCredentials } from '../config.js';
import type { Coordinates } from '../geo/distance.js';
import { createRoutingClient, RoutingApiError, type QueryParams } from './http-client.js';
import type { RouteFailure, RouteOutcome, RouteProvider, RouteProviderName } from './types.js';

const OpenRouteResponseSchema = z.object({
  features: z.array(
    z.object({
      properties: z.object({
        summary: z.object({
          distance: z.number().nonnegative(),
        }),
      }),
    })
  ).min(1),
});

const YandexRouteResponseSchema = z.object({
  route: z.object({
    distance: z.number().nonnegative(),
  }),
});

/**
 * Both providers take positions as "lng,lat"
 */
function formatLngLat(point: Coordinates): string {
  return `${point.lng},${point.lat}`;
}

/**
 * Describe a thrown error as a provider failure
 */
export function toRouteFailure(error: unknown): RouteFailure {
  if (error instanceof RoutingApiError) {
    if (error.isTimeout) {
      return { reason: 'timeout', message: error.message };
    }
    if (error.statusCode !== undefined) {
      return { reason: 'http_error', message: error.message, statusCode: error.statusCode };
    }
    return { reason: 'network_error', message: error.message };
  }

  return {
    reason: 'network_error',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}

interface ProviderDefinition {
  name: RouteProviderName;
  apiKeyParam: string;
  buildParams: (from: Coordinates, to: Coordinates) => QueryParams;
  extractMeters: (body: unknown) => number | null;
}

/**
 * Build a provider from its wire definition.
 * Without a key every call reports `missing_credentials`.
 */
function createProvider(definition: ProviderDefinition, credentials: ProviderCredentials): RouteProvider {
  const { name, apiKeyParam, buildParams, extractMeters } = definition;
  const client = credentials.apiKey
    ? createRoutingClient({ apiKey: credentials.apiKey, apiKeyParam, timeoutMs: credentials.timeoutMs })
    : null;

  async function route(from: Coordinates, to: Coordinates): Promise<RouteOutcome> {
    if (!client) {
      return {
        ok: false,
        failure: { reason: 'missing_credentials', message: `${name} API key not configured` },
      };
    }

    let body: unknown;
    try {
      body = await client.getJson(credentials.apiUrl, buildParams(from, to));
    } catch (error) {
      return { ok: false, failure: toRouteFailure(error) };
    }

    const distanceMeters = extractMeters(body);
    if (distanceMeters === null) {
      return {
        ok: false,
        failure: { reason: 'malformed_response', message: `Unexpected ${name} response format` },
      };
    }

    return { ok: true, distanceMeters };
  }

  return { name, route };
}

export function createOpenRouteProvider(credentials: ProviderCredentials): RouteProvider {
  return createProvider(
    {
      name: 'openroute',
      apiKeyParam: 'api_key',
      buildParams: (from, to) => ({ start: formatLngLat(from), end: formatLngLat(to) }),
      extractMeters: (body) => {
        const parsed = OpenRouteResponseSchema.safeParse(body);
        return parsed.success ? parsed.data.features[0].properties.summary.distance : null;
      },
    },
    credentials
  );
}

export function createYandexProvider(credentials: ProviderCredentials): RouteProvider {
  return createProvider(
    {
      name: 'yandex',
      apiKeyParam: 'apikey',
      buildParams: (from, to) => ({
        waypoints: `${formatLngLat(from)}|${formatLngLat(to)}`,
        mode: 'driving',
      }),
      extractMeters: (body) => {
        const parsed = YandexRouteResponseSchema.safeParse(body);
        return parsed.success ? parsed.data.route.distance : null;
      },
    },
    credentials
  );
}
