import { describe, expect, it } from "vitest";
import { CorsPolicy } from "../../../core/gateway/CorsPolicy.js";

describe("CorsPolicy", () => {
  const cors = new CorsPolicy();

  it("answers a browser preflight", async () => {
    const response = cors.respond(
      new Headers({
        origin: "https://ex.com",
        "access-control-request-method": "GET",
        "access-control-request-headers": "range, x-custom"
      })
    );

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    expect(response.headers.get("access-control-allow-methods")).toBe("GET,HEAD,POST,OPTIONS");
    expect(response.headers.get("access-control-allow-headers")).toBe("range, x-custom");
    expect(response.headers.get("access-control-max-age")).toBe("86400");
    expect(response.body).toBeNull();
  });

  it("echoes an empty header list when none was requested", () => {
    const response = cors.respond(
      new Headers({ origin: "https://ex.com", "access-control-request-method": "GET" })
    );
    expect(response.headers.get("access-control-allow-headers")).toBe("");
  });

  it.each<Record<string, string>>([
    {},
    { origin: "https://ex.com" },
    { "access-control-request-method": "GET" }
  ])("answers a plain OPTIONS request with an Allow list (case %#)", (init) => {
    const response = cors.respond(new Headers(init));

    expect(response.headers.get("allow")).toBe("GET, HEAD, POST, OPTIONS");
    expect(response.headers.has("access-control-allow-origin")).toBe(false);
    expect(response.headers.has("access-control-allow-methods")).toBe(false);
  });

  it("uses the configured max age", () => {
    const response = new CorsPolicy(600).respond(
      new Headers({ origin: "https://ex.com", "access-control-request-method": "PUT" })
    );
    expect(response.headers.get("access-control-max-age")).toBe("600");
  });
});
