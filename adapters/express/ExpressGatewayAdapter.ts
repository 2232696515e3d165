import type { Request, Response } from "express";
import type { GatewayHttpAdapter, GatewayHttpAdapterOptions } from "../GatewayHttpAdapter.js";
import type { ProxyRequest } from "../../core/gateway/types.js";
import { methodAllowsBody } from "../../core/gateway/headers.js";
import { writeResponse } from "./writeResponse.js";

function requestUrl(req: Request): URL {
  // origin-form targets keep a leading "//" as part of the path
  if (req.originalUrl.startsWith("/")) {
    return new URL(`http://linkgate.internal${req.originalUrl}`);
  }
  return new URL(req.originalUrl);
}

function requestHeaders(req: Request): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.set(name, value);
    }
  }
  return headers;
}

export function toProxyRequest(req: Request, signal?: AbortSignal): ProxyRequest {
  const body: unknown = req.body;
  return {
    method: req.method,
    url: requestUrl(req),
    headers: requestHeaders(req),
    body:
      methodAllowsBody(req.method) && Buffer.isBuffer(body) && body.length > 0
        ? body
        : undefined,
    signal
  };
}

export class ExpressGatewayAdapter implements GatewayHttpAdapter<Request, Response> {
  constructor(private options: GatewayHttpAdapterOptions) { }

  async handle(req: Request, res: Response): Promise<void> {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const response = await this.options.gateway.handle(toProxyRequest(req, controller.signal));

    try {
      await writeResponse(res, response);
    } catch (err) {
      if (controller.signal.aborted) {
        this.options.logger?.({
          level: "debug",
          msg: "client disconnected mid-stream",
          path: req.path
        });
        return;
      }
      this.options.logger?.({
        level: "error",
        msg: "response stream failed",
        path: req.path,
        err
      });
      res.destroy(err instanceof Error ? err : undefined);
    }
  }
}
