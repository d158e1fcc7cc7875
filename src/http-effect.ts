import { Data, Duration, Effect, Schedule } from "effect";

export class NetworkError extends Data.TaggedError("NetworkError")<{
  message: string;
  cause?: unknown;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  status: number;
  statusText: string;
  bodyText: string;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  message: string;
  bodyText: string;
}> {}

export type HttpFetchError = NetworkError | HttpError | ParseError;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type JsonResponse<A> = {
  body: A;
  headers: Record<string, string>;
};

/** Fetch with an AbortController-based timeout that composes with an existing signal. */
export const fetchWithTimeout = async (
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch,
): Promise<Response> => {
  const controller = new AbortController();
  const upstream = init.signal;

  const abortFromUpstream = () => controller.abort(upstream?.reason);
  if (upstream) {
    if (upstream.aborted) abortFromUpstream();
    else upstream.addEventListener("abort", abortFromUpstream, { once: true });
  }

  const timeoutId = setTimeout(() => controller.abort("timeout"), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
    upstream?.removeEventListener("abort", abortFromUpstream);
  }
};

export const headersToRecord = (headers: Headers): Record<string, string> => {
  const out: Record<string, string> = {};
  headers.forEach((v, k) => {
    out[k] = v;
  });
  return out;
};

const isAbortError = (e: unknown): boolean =>
  e instanceof Error && e.name === "AbortError";

/**
 * One HTTP exchange whose body is JSON. Non-2xx responses fail with
 * `HttpError` (body text kept), unparseable bodies with `ParseError`, and
 * anything thrown by fetch itself with `NetworkError`.
 */
export const requestJson = (
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchImpl?: FetchLike,
): Effect.Effect<JsonResponse<unknown>, HttpFetchError> =>
  Effect.tryPromise({
    try: async () => {
      const resp = await fetchWithTimeout(url, init, timeoutMs, fetchImpl);
      const headers = headersToRecord(resp.headers);
      const bodyText = await resp.text();

      if (!resp.ok) {
        throw new HttpError({
          status: resp.status,
          statusText: resp.statusText,
          bodyText,
        });
      }

      let body: unknown;
      try {
        body = bodyText.length === 0 ? {} : JSON.parse(bodyText);
      } catch {
        throw new ParseError({
          message: "Failed to parse JSON response",
          bodyText,
        });
      }
      return { body, headers };
    },
    catch: (e) => {
      if (
        e instanceof HttpError ||
        e instanceof ParseError ||
        e instanceof NetworkError
      ) {
        return e;
      }
      if (isAbortError(e)) {
        return new NetworkError({ message: "Request aborted", cause: e });
      }
      return new NetworkError({
        message: e instanceof Error ? e.message : "Network error",
        cause: e,
      });
    },
  });

export const isRetriableStatus = (status: number): boolean =>
  status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;

/**
 * Build a retry schedule: exponential backoff starting at `baseMs`,
 * up to `maxRetries`, only retrying when `shouldRetry` returns true.
 */
export const retrySchedule = <E>(opts: {
  baseMs: number;
  maxRetries: number;
  shouldRetry: (err: E) => boolean;
}) =>
  Schedule.intersect(
    Schedule.exponential(Duration.millis(opts.baseMs)),
    Schedule.recurs(opts.maxRetries - 1),
  ).pipe(Schedule.whileInput(opts.shouldRetry));
