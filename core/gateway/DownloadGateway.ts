import { randomUUID } from "crypto";
import { MalformedPathError, PublicError } from "../errors/PublicError.js";
import { bindLogger, type LinkgateLogger } from "../logging/createLogger.js";
import type { SignatureVerifier } from "../security/SignatureVerifier.js";
import { CorsPolicy } from "./CorsPolicy.js";
import type { LinkResolver } from "./LinkResolver.js";
import { HopBudget, type RedirectingFetcher } from "./RedirectingFetcher.js";
import { ResponseSanitizer } from "./ResponseSanitizer.js";
import type { ProxyRequest } from "./types.js";

export interface DownloadGatewayOptions {
  verifier: SignatureVerifier;
  resolver: LinkResolver;
  fetcher: RedirectingFetcher;
  maxRedirects: number;
  sanitizer?: ResponseSanitizer;
  cors?: CorsPolicy;
  logger?: LinkgateLogger;
}

/** Percent-decoded request path, the resource identifier that gets signed. */
export function resourcePath(url: URL): string {
  try {
    return decodeURIComponent(url.pathname);
  } catch (err) {
    throw new MalformedPathError({ cause: err });
  }
}

export class DownloadGateway {
  private readonly sanitizer: ResponseSanitizer;
  private readonly cors: CorsPolicy;

  constructor(private readonly options: DownloadGatewayOptions) {
    this.sanitizer = options.sanitizer ?? new ResponseSanitizer();
    this.cors = options.cors ?? new CorsPolicy();
  }

  async handle(request: ProxyRequest): Promise<Response> {
    if (request.method === "OPTIONS") return this.cors.respond(request.headers);

    const started = Date.now();
    const origin = request.headers.get("origin");
    const budget = new HopBudget(this.options.maxRedirects);
    const logger = bindLogger(this.options.logger, {
      requestId: randomUUID(),
      method: request.method,
      path: request.url.pathname
    });

    let response: Response;
    try {
      response = await this.download(request, budget, logger);
    } catch (err) {
      if (!(err instanceof PublicError)) throw err;

      logger?.({
        level: err.statusCode >= 500 ? "error" : "warn",
        msg: "download rejected",
        code: err.code,
        status: err.statusCode,
        error: err.message,
        cause: err.cause,
        ...err.logFields()
      });
      response = err.toResponse();
    }

    logger?.({
      level: "info",
      msg: "request completed",
      status: response.status,
      hops: budget.hops,
      durationMs: Date.now() - started
    });

    return this.sanitizer.sanitize(response, origin);
  }

  /**
   * verify → resolve → fetch. A redirect back into this gateway restarts the
   * loop as a new top-level request for the redirect target, which carries
   * its own signature.
   */
  private async download(
    initial: ProxyRequest,
    budget: HopBudget,
    logger?: LinkgateLogger
  ): Promise<Response> {
    let request = initial;

    for (;;) {
      const path = resourcePath(request.url);
      const verdict = this.options.verifier.verify(path, request.url.searchParams.get("sign") ?? "");
      if (!verdict.ok) throw verdict.error;

      if (verdict.nonExpiring) {
        logger?.({ level: "warn", msg: "accepted non-expiring signature", resource: path });
      }

      const link = await this.options.resolver.resolve(path, request.signal);
      const outcome = await this.options.fetcher.fetch(link.url, request, link.extraHeaders, {
        budget,
        logger
      });

      if (outcome.kind === "response") return outcome.response;

      logger?.({
        level: "debug",
        msg: "self-redirect",
        target: outcome.location.pathname,
        hop: budget.hops
      });
      request = { ...request, url: outcome.location };
    }
  }
}
