import express, { type RequestHandler, type Router } from "express";
import type { GatewayHttpAdapter } from "../GatewayHttpAdapter.js";

// --- Async handler wrapper: rejections go to the error middleware ---
function safeHandler(
  fn: (req: express.Request, res: express.Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export interface GatewayRouterOptions {
  adapter: GatewayHttpAdapter<express.Request, express.Response>;
  maxBodyBytes: number;
  rateLimit?: RequestHandler;
}

/**
 * Catch-all router: every method and path goes to the gateway. Bodies are
 * buffered whatever their content type so redirect hops can replay them.
 */
export function createGatewayRouter(options: GatewayRouterOptions): Router {
  const router = express.Router();
  const { adapter, maxBodyBytes, rateLimit } = options;

  if (rateLimit) router.use(rateLimit);

  router.use(express.raw({ type: () => true, limit: maxBodyBytes }));

  router.all("*", safeHandler((req, res) => adapter.handle(req, res)));

  return router;
}
