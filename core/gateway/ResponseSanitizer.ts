/**
 * Sets the CORS origin header (the request origin, or `*`) and adds
 * `Vary: Origin`.
 */
export function applyCors(headers: Headers, origin: string | null): void {
  headers.set("access-control-allow-origin", origin ?? "*");
  headers.append("vary", "Origin");
}

/**
 * Last stop before the client: drops upstream cookies and attaches CORS.
 * Status and body pass through untouched; the body stays a stream.
 */
export class ResponseSanitizer {
  sanitize(response: Response, origin: string | null): Response {
    const headers = new Headers(response.headers);
    headers.delete("set-cookie");
    applyCors(headers, origin);

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers
    });
  }
}
