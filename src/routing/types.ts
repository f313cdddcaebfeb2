/**
 * Route resolution types
 */

import type { Coordinates } from '../geo/distance.js';

export type RouteProviderName = 'openroute' | 'yandex';

export type DistanceMethod = `${RouteProviderName}_api` | 'fallback_coefficient';

export type RouteFailureReason =
  | 'missing_credentials'
  | 'timeout'
  | 'http_error'
  | 'network_error'
  | 'malformed_response';

export interface RouteFailure {
  reason: RouteFailureReason;
  message: string;
  statusCode?: number;
}

/**
 * Provider answer: a road distance or a described failure, never a rejection
 */
export type RouteOutcome =
  | { ok: true; distanceMeters: number }
  | { ok: false; failure: RouteFailure };

export interface RouteProvider {
  readonly name: RouteProviderName;
  route(from: Coordinates, to: Coordinates): Promise<RouteOutcome>;
}

export interface ResolvedDistance {
  distanceKm: number;
  method: DistanceMethod;
}

export interface RouteResolver {
  resolve(from: Coordinates, to: Coordinates): Promise<ResolvedDistance>;
}
