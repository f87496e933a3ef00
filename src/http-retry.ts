export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
}

export const sleep = (delayMs: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, delayMs));

export const isRetryableStatus = (status: number): boolean =>
  status === 408 ||
  status === 429 ||
  status === 500 ||
  status === 502 ||
  status === 503 ||
  status === 504;

export const parseRetryAfterMs = (value: string | null): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) {
    return Math.max(0, timestamp - Date.now());
  }
  return null;
};

export interface RetryHandlers {
  retry: RetryConfig;
  /** Error for a failed response that will not be retried. */
  httpError: (response: Response, retries: number) => Error | Promise<Error>;
  /** Error for a request that never got a response. */
  requestError: (error: unknown) => Error;
}

/**
 * Sends until a response comes back ok. Retryable statuses and network
 * errors are retried up to `maxRetries` times with exponential backoff; a
 * 429 waits at least as long as its `Retry-After` asks.
 */
export const fetchWithRetry = async (
  send: () => Promise<Response>,
  handlers: RetryHandlers,
): Promise<Response> => {
  const { maxRetries, baseDelayMs } = handlers.retry;
  for (let attempts = 0; ; attempts += 1) {
    const backoffMs = baseDelayMs * 2 ** attempts;
    let response: Response;
    try {
      response = await send();
    } catch (error) {
      if (attempts < maxRetries) {
        await sleep(backoffMs);
        continue;
      }
      throw handlers.requestError(error);
    }

    if (response.ok) {
      return response;
    }
    if (isRetryableStatus(response.status) && attempts < maxRetries) {
      const retryAfterMs =
        response.status === 429
          ? parseRetryAfterMs(response.headers.get("retry-after"))
          : null;
      await sleep(retryAfterMs ? Math.max(backoffMs, retryAfterMs) : backoffMs);
      continue;
    }
    throw await handlers.httpError(response, attempts);
  }
};
