export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * One inbound request as the gateway sees it. The body is buffered so every
 * redirect hop can replay it.
 */
export interface ProxyRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly body?: Uint8Array;
  /** Aborted when the client goes away. */
  readonly signal?: AbortSignal;
}

export type HeaderValues = Record<string, string[]>;

export interface BackendLinkResult {
  statusCode: number;
  url: string;
  extraHeaders: HeaderValues;
}

export type FetchOutcome =
  | { kind: "response"; response: Response }
  | { kind: "self-redirect"; location: URL };
