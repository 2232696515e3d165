import type { ErrorRequestHandler } from "express";
import { PublicError } from "../../core/errors/PublicError.js";
import { applyCors } from "../../core/gateway/ResponseSanitizer.js";
import type { LinkgateLogger } from "../../core/logging/createLogger.js";
import { writeResponse } from "./writeResponse.js";

// body-parser and friends attach a status to their errors
function declaredStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status <= 599 ? status : undefined;
}

function toPublicError(err: unknown): PublicError {
  if (err instanceof PublicError) return err;

  const status = declaredStatus(err);
  if (status !== undefined && status < 500 && err instanceof Error) {
    return new PublicError(err.message, status, "BAD_REQUEST");
  }
  return new PublicError("internal server error", 500, "INTERNAL_ERROR", { cause: err });
}

/**
 * Last-resort JSON error responder. Still sends CORS headers so browsers can
 * read the body.
 */
export function createErrorHandler(logger?: LinkgateLogger): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const publicError = toPublicError(err);

    logger?.({
      level: publicError.statusCode >= 500 ? "error" : "warn",
      msg: "HTTP handler error",
      method: req.method,
      path: req.originalUrl,
      status: publicError.statusCode,
      code: publicError.code,
      error: err instanceof Error ? err.message : String(err)
    });

    const response = publicError.toResponse();
    applyCors(response.headers, req.get("origin") ?? null);

    writeResponse(res, response).catch(next);
  };
}
