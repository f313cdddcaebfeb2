/**
 * Routing provider HTTP client with timeout and error handling.
 * A single attempt per call: a failed route lookup goes straight to the fallback distance.
 */

export interface RoutingClientConfig {
  apiKey: string;
  /** Query parameter carrying the key (`api_key` for OpenRouteService, `apikey` for Yandex) */
  apiKeyParam: string;
  timeoutMs?: number;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export class RoutingApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly isTimeout: boolean = false
  ) {
    super(message);
    this.name = 'RoutingApiError';
  }
}

const DEFAULT_TIMEOUT_MS = 10000;
const MAX_ERROR_BODY_SIZE = 10000; // Limit error body read to 10KB

/**
 * Creates a routing provider HTTP client
 */
export function createRoutingClient(config: RoutingClientConfig) {
  const { apiKey, apiKeyParam, timeoutMs = DEFAULT_TIMEOUT_MS } = config;

  if (!apiKey) {
    throw new Error('Routing API key is required');
  }

  /**
   * Sanitize any occurrence of the API key from a string
   */
  function sanitizeApiKey(message: string): string {
    const keyPattern = new RegExp(`${apiKeyParam}=[^&\\s]+`, 'gi');
    return message.replace(keyPattern, `${apiKeyParam}=***`).split(apiKey).join('***');
  }

  /**
   * Build URL with query parameters
   */
  function buildUrl(baseUrl: string, params: QueryParams): string {
    const url = new URL(baseUrl);

    url.searchParams.set(apiKeyParam, apiKey);

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    return url.toString();
  }

  function timeoutError(): RoutingApiError {
    return new RoutingApiError(`Request timeout after ${timeoutMs}ms`, undefined, true);
  }

  /**
   * Settle with `promise`, or reject as soon as `signal` aborts.
   * Body streams that ignore the fetch signal still end at the deadline.
   */
  function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(timeoutError());
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      void promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Read at most MAX_ERROR_BODY_SIZE bytes of an error body
   */
  async function safeReadResponseText(response: Response): Promise<string> {
    try {
      const reader = response.body?.getReader();
      if (!reader) {
        return '';
      }

      const decoder = new TextDecoder();
      let text = '';
      let totalSize = 0;

      while (totalSize < MAX_ERROR_BODY_SIZE) {
        const { done, value } = await reader.read();
        if (done) {
          return text + decoder.decode();
        }
        totalSize += value.length;
        text += decoder.decode(value, { stream: true });
      }

      await reader.cancel();
      return `${text.slice(0, MAX_ERROR_BODY_SIZE)}...[truncated]`;
    } catch {
      return '[Error reading response body]';
    }
  }

  /**
   * Fetch and read the body; every step runs under the caller's abort signal
   */
  async function request(url: string, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { 'Accept': 'application/json' },
        signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new RoutingApiError(`Network error: ${sanitizeApiKey(reason)}`);
    }

    if (!response.ok) {
      const body = await safeReadResponseText(response);
      throw new RoutingApiError(
        sanitizeApiKey(`Routing API error: ${response.status} - ${body.slice(0, 200)}`),
        response.status
      );
    }

    try {
      return await response.json();
    } catch {
      throw new RoutingApiError('Routing API returned a non-JSON body', response.status);
    }
  }

  /**
   * GET a JSON document from the provider.
   * The timeout covers the whole exchange, body read included.
   * @throws RoutingApiError on timeout, network failure, non-2xx status or non-JSON body
   */
  async function getJson(baseUrl: string, params: QueryParams = {}): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await untilAborted(request(buildUrl(baseUrl, params), controller.signal), controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw timeoutError();
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return { getJson };
}

export type RoutingClient = ReturnType<typeof createRoutingClient>;
