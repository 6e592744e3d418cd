/**
 * Minimal fetch surface used by the source adapters and the webhook sink.
 */
export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchLike = (
  url: string,
  init?: HttpRequestInit
) => Promise<HttpResponseLike>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export const BROWSER_HEADERS = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36",
} as const;

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = "HttpStatusError";
  }
}

type TimedInit = HttpRequestInit & { timeoutMs: number; fetchFn?: FetchLike };

/**
 * Runs the request and `consume` under one abort timer, so a stalled body
 * read is cut off by the same deadline as the headers.
 */
async function withTimeout<T>(
  url: string,
  init: TimedInit,
  consume: (res: HttpResponseLike) => Promise<T>
): Promise<T> {
  const { timeoutMs, fetchFn = defaultFetch, ...rest } = init;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchFn(url, { ...rest, signal: controller.signal });
    if (!res.ok) throw new HttpStatusError(url, res.status);
    return await consume(res);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetch with an abort-based timeout. Rejects on non-2xx with HttpStatusError.
 * The body is left unread.
 */
export function fetchWithTimeout(url: string, init: TimedInit): Promise<HttpResponseLike> {
  return withTimeout(url, init, async (res) => res);
}

/** Fetches and reads the body within `timeoutMs`. */
export function fetchText(url: string, init: TimedInit): Promise<string> {
  return withTimeout(url, init, (res) => res.text());
}
