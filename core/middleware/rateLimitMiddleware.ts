import type { Request, RequestHandler } from "express";
import { RateLimiter } from "../rateLimiter/rateLimiter.js";
import { RateLimitError } from "../errors/PublicError.js";

/**
 * First address in the real-IP header, else the socket peer.
 */
export function clientIp(req: Request, realIpHeader: string): string {
    const forwarded = req.get(realIpHeader)?.split(",")[0]?.trim();
    return forwarded || req.ip || req.socket.remoteAddress || "unknown";
}

export function createRateLimit({
    max,
    windowMs,
    blockMs,
    keyFn
}: {
    max: number;
    windowMs: number;
    blockMs?: number;
    keyFn: (req: Request) => string;
}): RequestHandler {
    const limiter = new RateLimiter(windowMs, max, blockMs);

    return (req, _res, next) => {
        // preflights are never limited
        if (req.method === "OPTIONS") return next();

        if (!limiter.check(keyFn(req))) {
            return next(new RateLimitError());
        }

        next();
    };
}
