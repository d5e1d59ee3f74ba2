import fetch, { FetchError as NodeFetchError } from "node-fetch";
import type { RequestInit, Response } from "node-fetch";
import type { HttpTransport, HttpResponse } from "../ports/http.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "./real-timers.js";
import {
  fetchAborted,
  fetchConnectionRefused,
  fetchDnsFailed,
  fetchNetworkError,
  fetchTimeout,
} from "../errors/catalog.js";
import type { FetchError } from "../errors/types.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const DNS_ERROR_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

/**
 * Map whatever node-fetch threw onto the FetchError taxonomy.
 */
export function toFetchError(
  url: string,
  error: unknown,
  state: { timedOut: boolean; timeoutMs: number }
): FetchError {
  if (state.timedOut) {
    return fetchTimeout(url, state.timeoutMs);
  }

  if (error instanceof Error && error.name === "AbortError") {
    return fetchAborted(url);
  }

  if (error instanceof NodeFetchError) {
    if (error.code && DNS_ERROR_CODES.has(error.code)) {
      return fetchDnsFailed(url, error);
    }
    if (error.code === "ECONNREFUSED") {
      return fetchConnectionRefused(url, error);
    }
  }

  return fetchNetworkError(url, error instanceof Error ? error : new Error(String(error)));
}

/**
 * Create an HTTP transport on node-fetch.
 * Buffers the whole body; redirects are followed.
 */
export function createNodeFetchTransport(
  fetchImpl: FetchLike = fetch,
  timers: TimerService = realTimerService
): HttpTransport {
  return {
    async get(url, options): Promise<HttpResponse> {
      const controller = new AbortController();
      const state = { timedOut: false, timeoutMs: options.timeoutMs };

      const timer = timers.setTimeout(() => {
        state.timedOut = true;
        controller.abort();
      }, options.timeoutMs);

      const onExternalAbort = () => controller.abort();
      if (options.signal?.aborted) {
        controller.abort();
      } else {
        options.signal?.addEventListener("abort", onExternalAbort, { once: true });
      }

      try {
        const response = await fetchImpl(url, {
          method: "GET",
          headers: options.headers,
          redirect: "follow",
          signal: controller.signal,
        });
        const body = new Uint8Array(await response.arrayBuffer());

        return {
          status: response.status,
          statusText: response.statusText,
          contentType: response.headers.get("content-type") ?? undefined,
          body,
        };
      } catch (error) {
        throw toFetchError(url, error, state);
      } finally {
        timers.clearTimeout(timer);
        options.signal?.removeEventListener("abort", onExternalAbort);
      }
    },
  };
}
