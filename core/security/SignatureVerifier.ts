import crypto from "crypto";
import { SignatureError } from "../errors/PublicError.js";

export type VerifyResult =
  | { ok: true; expiry: number; nonExpiring: boolean }
  | { ok: false; error: SignatureError };

export interface SignatureVerifierOptions {
  /** Accept tokens whose expiry is 0 or negative. */
  allowNonExpiring?: boolean;
  now?: () => number;
}

const EXPIRY_PATTERN = /^-?\d+$/;

/**
 * Signed path tokens have the form `<signature>:<expiry>`, where the
 * signature is the url-safe base64 HMAC-SHA256 of `<path>:<expiry>` and
 * expiry is in unix seconds. An expiry of 0 or below never expires.
 */
export class SignatureVerifier {
  private readonly allowNonExpiring: boolean;
  private readonly now: () => number;

  constructor(
    private readonly secret: string,
    options: SignatureVerifierOptions = {}
  ) {
    this.allowNonExpiring = options.allowNonExpiring ?? true;
    this.now = options.now ?? Date.now;
  }

  sign(path: string, expiry: number): string {
    const signature = crypto
      .createHmac("sha256", this.secret)
      .update(`${path}:${expiry}`)
      .digest("base64")
      .replace(/\+/g, "-")
      .replace(/\//g, "_");
    return `${signature}:${expiry}`;
  }

  /**
   * Builds `<encoded path>?sign=<token>`. A ttl of 0 yields a non-expiring
   * link.
   */
  signPath(path: string, ttlSeconds: number, nowMs: number = this.now()): string {
    const expiry = ttlSeconds === 0 ? 0 : Math.floor(nowMs / 1000) + ttlSeconds;
    const encodedPath = path.split("/").map(encodeURIComponent).join("/");
    return `${encodedPath}?sign=${encodeURIComponent(this.sign(path, expiry))}`;
  }

  verify(path: string, token: string, nowMs: number = this.now()): VerifyResult {
    const segments = token.split(":");
    const rawExpiry = segments[segments.length - 1];

    if (segments.length < 2 || !rawExpiry) return reject("MissingExpiry");
    if (!EXPIRY_PATTERN.test(rawExpiry)) return reject("InvalidExpiry");

    const expiry = Number(rawExpiry);
    if (!Number.isSafeInteger(expiry)) return reject("InvalidExpiry");

    const nonExpiring = expiry <= 0;
    if (nonExpiring && !this.allowNonExpiring) return reject("Expired");
    if (!nonExpiring && expiry * 1000 <= nowMs) return reject("Expired");

    const expected = Buffer.from(this.sign(path, expiry));
    const supplied = Buffer.from(token);
    if (
      expected.length !== supplied.length ||
      !crypto.timingSafeEqual(expected, supplied)
    ) {
      return reject("SignatureMismatch");
    }

    return { ok: true, expiry, nonExpiring };
  }
}

function reject(kind: SignatureError["kind"]): VerifyResult {
  return { ok: false, error: new SignatureError(kind) };
}
