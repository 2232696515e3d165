import type { Response as ExpressResponse } from "express";
import { Readable, pipeline } from "stream";
import { promisify } from "util";
import { HOP_BY_HOP_HEADERS } from "../../core/gateway/headers.js";

const pipelineAsync = promisify(pipeline);

/**
 * Copies a fetch Response onto an Express response and pipes the body.
 *
 * fetch has already decoded any content-encoding, so that header and the
 * stale content-length are not copied for encoded bodies.
 */
export async function writeResponse(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  if (response.statusText) res.statusMessage = response.statusText;

  const decoded = response.headers.has("content-encoding");
  response.headers.forEach((value, name) => {
    if (HOP_BY_HOP_HEADERS.has(name) && name !== "content-length") return;
    if (decoded && (name === "content-encoding" || name === "content-length")) return;
    res.setHeader(name, value);
  });

  if (!response.body) {
    res.end();
    return;
  }

  await pipelineAsync(Readable.fromWeb(response.body), res);
}
