/**
 * Abstraction for outbound HTTP requests.
 * Allows testing downloads without actual network requests.
 */
export interface HttpGetOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  headers: Record<string, string>;
  /** Aborts the request from outside (interrupt) */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  /** Value of the Content-Type header, if any */
  contentType?: string;
  body: Uint8Array;
}

export interface HttpTransport {
  /**
   * Issue a GET and buffer the whole body.
   * Rejects with FetchError on transport failure; non-2xx statuses resolve.
   */
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}
