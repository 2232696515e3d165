export const ALLOWED_METHODS = ["GET", "HEAD", "POST", "OPTIONS"] as const;

export class CorsPolicy {
  constructor(private readonly maxAgeSeconds: number = 86_400) {}

  isPreflight(headers: Headers): boolean {
    return headers.get("origin") !== null && headers.get("access-control-request-method") !== null;
  }

  /**
   * Answers an OPTIONS request: a full CORS preflight when the browser sent
   * one, otherwise a bare `Allow` listing.
   */
  respond(headers: Headers): Response {
    if (!this.isPreflight(headers)) {
      return new Response(null, {
        headers: { allow: ALLOWED_METHODS.join(", ") }
      });
    }

    return new Response(null, {
      headers: {
        "access-control-allow-origin": "*",
        "access-control-allow-methods": ALLOWED_METHODS.join(","),
        "access-control-allow-headers": headers.get("access-control-request-headers") ?? "",
        "access-control-max-age": String(this.maxAgeSeconds)
      }
    });
  }
}
