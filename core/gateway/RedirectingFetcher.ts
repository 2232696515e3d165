import { RedirectLimitError } from "../errors/PublicError.js";
import type { LinkgateLogger } from "../logging/createLogger.js";
import { buildOutboundHeaders, fetchHop, methodAllowsBody } from "./headers.js";
import type { FetchLike, FetchOutcome, HeaderValues, ProxyRequest } from "./types.js";

/**
 * Redirects followed for one top-level request, external hops and
 * self-redirects alike.
 */
export class HopBudget {
  private used = 0;

  constructor(readonly limit: number) {}

  get hops(): number {
    return this.used;
  }

  take(): void {
    if (this.used >= this.limit) throw new RedirectLimitError(this.limit);
    this.used++;
  }
}

export interface RedirectingFetcherOptions {
  /** Public base address of this gateway, used to spot self-redirects. */
  publicUrl: string;
  hopTimeoutMs: number;
  fetch?: FetchLike;
}

export interface FetchContext {
  budget: HopBudget;
  logger?: LinkgateLogger;
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

export class RedirectingFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly publicOrigin: string;
  private readonly publicPath: string;

  constructor(private readonly options: RedirectingFetcherOptions) {
    const base = new URL(options.publicUrl);
    this.fetchImpl = options.fetch ?? fetch;
    this.publicOrigin = base.origin;
    this.publicPath = base.pathname.replace(/\/+$/, "");
  }

  /**
   * True when `location` points back into this gateway: same origin, and at
   * or below the public base path.
   */
  isSelf(location: URL): boolean {
    if (location.origin !== this.publicOrigin) return false;
    if (!this.publicPath) return true;
    return (
      location.pathname === this.publicPath ||
      location.pathname.startsWith(`${this.publicPath}/`)
    );
  }

  /**
   * Fetches `resolvedUrl` with the original method, body and headers plus the
   * backend-supplied ones, following external redirects one hop at a time.
   * A redirect into this gateway is handed back to the caller instead.
   */
  async fetch(
    resolvedUrl: string,
    original: ProxyRequest,
    extraHeaders: HeaderValues,
    context: FetchContext
  ): Promise<FetchOutcome> {
    const headers = buildOutboundHeaders(original.headers, extraHeaders);
    let target = new URL(resolvedUrl);
    let response = await this.hop(target, original, headers);

    while (isRedirect(response.status)) {
      const location = response.headers.get("location");
      if (!location) break;

      let next: URL;
      try {
        next = new URL(location, target);
      } catch {
        context.logger?.({ level: "warn", msg: "unparseable redirect location", location });
        break;
      }

      await response.body?.cancel();
      context.budget.take();

      if (this.isSelf(next)) {
        return { kind: "self-redirect", location: next };
      }

      context.logger?.({
        level: "debug",
        msg: "following redirect",
        status: response.status,
        host: next.host,
        hop: context.budget.hops
      });
      target = next;
      response = await this.hop(target, original, headers);
    }

    return { kind: "response", response };
  }

  private hop(target: URL, original: ProxyRequest, headers: Headers): Promise<Response> {
    return fetchHop(
      this.fetchImpl,
      target,
      {
        method: original.method,
        headers,
        body: methodAllowsBody(original.method) ? original.body : undefined,
        redirect: "manual"
      },
      { timeoutMs: this.options.hopTimeoutMs, signal: original.signal }
    );
  }
}
