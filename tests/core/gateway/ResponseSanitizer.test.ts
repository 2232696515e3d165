import { describe, expect, it } from "vitest";
import { ResponseSanitizer } from "../../../core/gateway/ResponseSanitizer.js";

describe("ResponseSanitizer", () => {
  const sanitizer = new ResponseSanitizer();

  it("drops set-cookie and echoes the request origin", async () => {
    const upstream = new Response("file-bytes", {
      status: 206,
      headers: {
        "set-cookie": "session=abc",
        "content-type": "application/octet-stream",
        "content-range": "bytes 0-9/100"
      }
    });

    const response = sanitizer.sanitize(upstream, "https://app.test");

    expect(response.status).toBe(206);
    expect(response.headers.has("set-cookie")).toBe(false);
    expect(response.headers.get("access-control-allow-origin")).toBe("https://app.test");
    expect(response.headers.get("vary")).toBe("Origin");
    expect(response.headers.get("content-type")).toBe("application/octet-stream");
    expect(response.headers.get("content-range")).toBe("bytes 0-9/100");
    await expect(response.text()).resolves.toBe("file-bytes");
  });

  it("falls back to a wildcard origin", () => {
    const response = sanitizer.sanitize(new Response("x"), null);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("appends to an existing Vary header", () => {
    const upstream = new Response("x", { headers: { vary: "Accept-Encoding" } });
    expect(sanitizer.sanitize(upstream, null).headers.get("vary")).toBe("Accept-Encoding, Origin");
  });

  it("removes every cookie the upstream set", () => {
    const headers = new Headers();
    headers.append("set-cookie", "a=1");
    headers.append("set-cookie", "b=2");

    const response = sanitizer.sanitize(new Response("x", { headers }), null);
    expect(response.headers.has("set-cookie")).toBe(false);
  });
});
