/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so an upstream call can never hang.
 * A request-scoped signal (client disconnect) aborts the call as well.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  requestId?: string;
  provider?: string;
  /** Request-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly host: string,
    public readonly durationMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

function classifyFetchFailure(err: unknown, timedOut: boolean, callerAborted: boolean): FetchErrorKind {
  if (callerAborted) return 'ABORT';
  if (timedOut) return 'TIMEOUT';
  const message = err instanceof Error ? `${err.message} ${String(err.cause ?? '')}` : String(err);
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) return 'DNS_FAIL';
  return 'NETWORK_ERROR';
}

/**
 * Fetch with automatic timeout using AbortController
 *
 * @throws FetchError when the request times out, is aborted or fails at the network level.
 * HTTP error statuses are returned as-is; callers inspect `response.ok`.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Never log the query string: it carries the API key
  const { host, pathname } = new URL(url);

  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (config.signal) {
    if (config.signal.aborted) {
      controller.abort();
    } else {
      config.signal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  logger.debug({
    requestId: config.requestId,
    provider: config.provider,
    method: options.method ?? 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    event: 'upstream_fetch_start'
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });

    logger.debug({
      requestId: config.requestId,
      provider: config.provider,
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime,
      event: 'upstream_fetch_done'
    }, '[FETCH] Response received');

    return response;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind = classifyFetchFailure(err, timedOut, config.signal?.aborted === true);

    logger.warn({
      requestId: config.requestId,
      provider: config.provider,
      host,
      errorKind,
      durationMs,
      error: err instanceof Error ? err.message : String(err),
      event: 'upstream_fetch_failed'
    }, '[FETCH] Request failed');

    const reason = errorKind.toLowerCase().replace('_', ' ');
    throw new FetchError(
      `${config.provider ?? 'Upstream API'} ${reason} after ${durationMs}ms (${host})`,
      errorKind,
      host,
      durationMs,
      { cause: err }
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onCallerAbort);
  }
}
