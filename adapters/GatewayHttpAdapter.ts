import type { DownloadGateway } from "../core/gateway/DownloadGateway.js";
import type { LinkgateLogger } from "../core/logging/createLogger.js";

export interface GatewayHttpAdapterOptions {
  gateway: DownloadGateway;
  logger?: LinkgateLogger;
}

/**
 * Binds the gateway to one HTTP framework: turns its request into a
 * ProxyRequest and streams the resulting Response back.
 */
export interface GatewayHttpAdapter<Req, Res> {
  handle(req: Req, res: Res): Promise<void>;
}
