import express from "express";

import type { LinkgateConfig } from "../config/linkgateConfig.js";
import { DownloadGateway } from "../core/gateway/DownloadGateway.js";
import { LinkResolver } from "../core/gateway/LinkResolver.js";
import { RedirectingFetcher } from "../core/gateway/RedirectingFetcher.js";
import type { FetchLike } from "../core/gateway/types.js";
import type { LinkgateLogger } from "../core/logging/createLogger.js";
import { clientIp, createRateLimit } from "../core/middleware/rateLimitMiddleware.js";
import { SignatureVerifier } from "../core/security/SignatureVerifier.js";
import { ExpressGatewayAdapter } from "../adapters/express/ExpressGatewayAdapter.js";
import { createErrorHandler } from "../adapters/express/errorHandler.js";
import { createGatewayRouter } from "../adapters/express/gatewayRouter.js";

export interface LinkgateAppDeps {
  logger?: LinkgateLogger;
  /** Outbound fetch, for the backend call and every download hop. */
  fetch?: FetchLike;
}

export function createLinkgateGateway(
  config: LinkgateConfig,
  deps: LinkgateAppDeps = {}
): DownloadGateway {
  const verifier = new SignatureVerifier(config.signSecret, {
    allowNonExpiring: config.allowNonExpiring
  });

  const resolver = new LinkResolver({
    backendUrl: config.backendUrl,
    linkEndpoint: config.linkEndpoint,
    backendToken: config.backendToken,
    verifyHeader: config.verifyHeader,
    hopTimeoutMs: config.hopTimeoutMs,
    fetch: deps.fetch
  });

  const fetcher = new RedirectingFetcher({
    publicUrl: config.publicUrl,
    hopTimeoutMs: config.hopTimeoutMs,
    fetch: deps.fetch
  });

  return new DownloadGateway({
    verifier,
    resolver,
    fetcher,
    maxRedirects: config.maxRedirects,
    logger: deps.logger
  });
}

export function createLinkgateApp(
  config: LinkgateConfig,
  deps: LinkgateAppDeps = {}
): express.Express {
  const { logger } = deps;

  const app = express();
  app.disable("x-powered-by");
  app.disable("etag");

  // ---- Health check ----
  app.get(config.healthPath, (_req, res) => {
    res.json({ status: "ok" });
  });

  // ---- Rate limiter ----
  const rateLimit = config.rateLimit.enabled
    ? createRateLimit({
      windowMs: config.rateLimit.windowMs,
      max: config.rateLimit.max,
      blockMs: config.rateLimit.blockMs,
      keyFn: (req) => clientIp(req, config.rateLimit.realIpHeader)
    })
    : undefined;

  // ---- Gateway ----
  const adapter = new ExpressGatewayAdapter({
    gateway: createLinkgateGateway(config, deps),
    logger
  });

  app.use(
    createGatewayRouter({
      adapter,
      maxBodyBytes: config.maxBodyBytes,
      rateLimit
    })
  );

  app.use(createErrorHandler(logger));

  return app;
}
