import { UpstreamFetchError } from "../errors/PublicError.js";
import type { FetchLike, HeaderValues } from "./types.js";

// never forwarded between connections
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
  "content-length"
]);

/**
 * Copies the inbound headers minus hop-by-hop ones, then replaces every
 * header named in `extra` with all of its values.
 */
export function buildOutboundHeaders(inbound: Headers, extra: HeaderValues = {}): Headers {
  const headers = new Headers();
  inbound.forEach((value, name) => {
    if (!HOP_BY_HOP_HEADERS.has(name)) headers.append(name, value);
  });

  for (const [name, values] of Object.entries(extra)) {
    headers.delete(name);
    for (const value of values) headers.append(name, value);
  }
  return headers;
}

export function methodAllowsBody(method: string): boolean {
  return method !== "GET" && method !== "HEAD";
}

/**
 * Runs one outbound fetch. `timeoutMs` bounds the wait for response headers
 * only; the body keeps streaming afterwards. `signal` aborting (the client
 * leaving) aborts the fetch while it waits for headers. Once they arrive the
 * body belongs to the caller, who cancels it.
 */
export async function fetchHop(
  fetchImpl: FetchLike,
  target: string | URL,
  init: RequestInit,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<Response> {
  const controller = new AbortController();
  const { signal } = options;
  let timedOut = false;

  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) controller.abort(signal.reason);
  else signal?.addEventListener("abort", onAbort, { once: true });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  try {
    return await fetchImpl(target, { ...init, signal: controller.signal });
  } catch (err) {
    throw new UpstreamFetchError(timedOut, { cause: err });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
