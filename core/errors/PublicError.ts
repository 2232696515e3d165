export const JSON_CONTENT_TYPE = "application/json;charset=UTF-8";

export interface PublicErrorBody {
  code: number;
  message: string;
}

/**
 * An error whose message is safe to show to the client. `statusCode` is the
 * HTTP status, `code` a stable identifier for logs.
 */
export class PublicError extends Error {
  statusCode: number;
  code: string;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = "BAD_REQUEST",
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = toHttpStatus(statusCode);
    this.code = code;
  }

  /** Serialized client payload. */
  body(): string {
    const payload: PublicErrorBody = {
      code: this.statusCode,
      message: this.message
    };
    return JSON.stringify(payload);
  }

  /** Fields that go into the rejection log entry beside code and status. */
  logFields(): Record<string, unknown> {
    return {};
  }

  toResponse(): Response {
    const body = NULL_BODY_STATUSES.has(this.statusCode) ? null : this.body();
    return new Response(body, {
      status: this.statusCode,
      headers: { "content-type": JSON_CONTENT_TYPE }
    });
  }
}

// a Response with one of these statuses must not have a body
export const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205, 304]);

/**
 * Maps an arbitrary code onto a status a Response can carry. Informational
 * codes fall back to 500 like everything else outside 200..599. Null-body
 * statuses are kept and sent without a body.
 */
export function toHttpStatus(code: unknown, fallback = 500): number {
  if (typeof code !== "number" || !Number.isInteger(code)) return fallback;
  return code >= 200 && code <= 599 ? code : fallback;
}

/* ----------------------------------
 * Signed path rejections
 * ---------------------------------- */

export type SignatureErrorKind =
  | "MissingExpiry"
  | "InvalidExpiry"
  | "Expired"
  | "SignatureMismatch";

const SIGNATURE_MESSAGES: Record<SignatureErrorKind, string> = {
  MissingExpiry: "expire missing",
  InvalidExpiry: "expire invalid",
  Expired: "expire expired",
  SignatureMismatch: "sign mismatch"
};

export class SignatureError extends PublicError {
  readonly kind: SignatureErrorKind;

  constructor(kind: SignatureErrorKind) {
    super(SIGNATURE_MESSAGES[kind], 401, "SIGNATURE_INVALID");
    this.kind = kind;
  }
}

export class MalformedPathError extends PublicError {
  constructor(options?: ErrorOptions) {
    super("malformed path", 400, "MALFORMED_PATH", options);
  }
}

/* ----------------------------------
 * Backend resolution failures
 * ---------------------------------- */

/**
 * The backend answered with something other than JSON. Only its status
 * reaches the client.
 */
export class BackendNonJsonError extends PublicError {
  readonly backendStatus: number;

  constructor(backendStatus: number) {
    super(
      `Request failed with status: ${backendStatus}`,
      backendStatus,
      "BACKEND_NON_JSON"
    );
    this.backendStatus = backendStatus;
  }

  override logFields(): Record<string, unknown> {
    return { backendStatus: this.backendStatus };
  }

  override body(): string {
    const payload: PublicErrorBody = {
      code: this.backendStatus,
      message: this.message
    };
    return JSON.stringify(payload);
  }
}

/**
 * The backend answered with its own error payload, which is forwarded as
 * received.
 */
export class BackendDeclaredError extends PublicError {
  readonly declaredCode: unknown;
  readonly payload: string;

  constructor(declaredCode: unknown, payload: string, message: string) {
    super(message, toHttpStatus(declaredCode), "BACKEND_DECLARED_ERROR");
    this.declaredCode = declaredCode;
    this.payload = payload;
  }

  override logFields(): Record<string, unknown> {
    return { declaredCode: this.declaredCode };
  }

  override body(): string {
    return this.payload;
  }
}

export class BackendInvalidLinkError extends PublicError {
  constructor() {
    super("backend returned no link", 502, "BACKEND_INVALID_LINK");
  }
}

/* ----------------------------------
 * Outbound fetch failures
 * ---------------------------------- */

export class UpstreamFetchError extends PublicError {
  readonly timedOut: boolean;

  constructor(timedOut: boolean, options?: ErrorOptions) {
    super(
      timedOut ? "upstream timed out" : "upstream fetch failed",
      timedOut ? 504 : 502,
      timedOut ? "UPSTREAM_TIMEOUT" : "UPSTREAM_FETCH_FAILED",
      options
    );
    this.timedOut = timedOut;
  }

  override logFields(): Record<string, unknown> {
    return { timedOut: this.timedOut };
  }
}

export class RedirectLimitError extends PublicError {
  readonly limit: number;

  constructor(limit: number) {
    super("too many redirects", 508, "REDIRECT_LIMIT_EXCEEDED");
    this.limit = limit;
  }

  override logFields(): Record<string, unknown> {
    return { limit: this.limit };
  }
}

export class RateLimitError extends PublicError {
  constructor() {
    super("rate limit exceeded", 429, "RATE_LIMIT_EXCEEDED");
  }
}
