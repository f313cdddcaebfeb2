/**
 * Road distance resolution with straight-line fallback
 */

import type { RoutingConfig } from '../config.js';
import { haversineDistanceKm, type Coordinates } from '../geo/distance.js';
import type { Logger } from '../logger.js';
import { createOpenRouteProvider, createYandexProvider, toRouteFailure } from './providers.js';
import type { ResolvedDistance, RouteOutcome, RouteProvider, RouteResolver } from './types.js';

function formatPoint(point: Coordinates): string {
  return `(${point.lat},${point.lng})`;
}

/**
 * Straight-line distance stretched by the road indirection coefficient
 */
export function fallbackDistance(from: Coordinates, to: Coordinates, coefficient: number): ResolvedDistance {
  return {
    distanceKm: haversineDistanceKm(from, to) * coefficient,
    method: 'fallback_coefficient',
  };
}

/**
 * Wrap a provider so that any failure resolves to `haversine × coefficient`.
 * With no provider every call takes the fallback path.
 */
export function withFallback(
  provider: RouteProvider | null,
  coefficient: number,
  logger: Logger
): RouteResolver {
  async function resolve(from: Coordinates, to: Coordinates): Promise<ResolvedDistance> {
    if (provider) {
      let outcome: RouteOutcome;
      try {
        outcome = await provider.route(from, to);
      } catch (error) {
        outcome = { ok: false, failure: toRouteFailure(error) };
      }

      if (outcome.ok) {
        const distanceKm = outcome.distanceMeters / 1000;
        logger.info(
          { provider: provider.name, distanceKm, from, to },
          `Route distance ${distanceKm.toFixed(2)} km from ${formatPoint(from)} to ${formatPoint(to)}`
        );
        return { distanceKm, method: `${provider.name}_api` as const };
      }

      logger.warn(
        { provider: provider.name, failure: outcome.failure, from, to },
        `${provider.name} route lookup failed (${outcome.failure.reason}), using fallback`
      );
    }

    const result = fallbackDistance(from, to, coefficient);
    logger.info(
      { distanceKm: result.distanceKm, coefficient },
      `Using fallback distance calculation: ${result.distanceKm.toFixed(2)} km`
    );
    return result;
  }

  return { resolve };
}

/**
 * Pick the routing provider named in the config
 */
export function createRouteProvider(config: RoutingConfig, logger: Logger): RouteProvider | null {
  switch (config.provider) {
    case 'openroute':
      if (!config.openroute.apiKey) {
        logger.warn('OpenRouteService API key not configured, distances will use the fallback coefficient');
      }
      return createOpenRouteProvider(config.openroute);
    case 'yandex':
      if (!config.yandex.apiKey) {
        logger.warn('Yandex API key not configured, distances will use the fallback coefficient');
      }
      return createYandexProvider(config.yandex);
    case 'fallback':
      return null;
    default:
      logger.warn(`Unknown ROUTING_PROVIDER: ${config.provider}. Using fallback.`);
      return null;
  }
}

/**
 * Creates the route resolver for the configured provider
 */
export function createRouteResolver(config: RoutingConfig, logger: Logger): RouteResolver {
  return withFallback(createRouteProvider(config, logger), config.fallbackCoefficient, logger);
}
