import {
  BackendDeclaredError,
  BackendInvalidLinkError,
  BackendNonJsonError,
  JSON_CONTENT_TYPE
} from "../errors/PublicError.js";
import type { VerifyHeaderConfig } from "../../config/linkgateConfig.js";
import { fetchHop } from "./headers.js";
import type { BackendLinkResult, FetchLike, HeaderValues } from "./types.js";

export interface LinkResolverOptions {
  backendUrl: string;
  linkEndpoint: string;
  backendToken: string;
  verifyHeader?: VerifyHeaderConfig;
  hopTimeoutMs: number;
  fetch?: FetchLike;
}

const JSON_MEDIA_TYPE = /^application\/([\w.-]+\+)?json\b/i;

/**
 * Asks the storage backend for the direct location of a path.
 *
 * Success payload: `{ code: 200, data: { url, header? } }`.
 */
export class LinkResolver {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: LinkResolverOptions) {
    this.endpoint = `${options.backendUrl}${options.linkEndpoint}`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async resolve(path: string, signal?: AbortSignal): Promise<BackendLinkResult> {
    const headers: Record<string, string> = {
      "content-type": JSON_CONTENT_TYPE,
      authorization: this.options.backendToken
    };
    if (this.options.verifyHeader) {
      headers[this.options.verifyHeader.name] = this.options.verifyHeader.value;
    }

    const resp = await fetchHop(
      this.fetchImpl,
      this.endpoint,
      { method: "POST", headers, body: JSON.stringify({ path }) },
      { timeoutMs: this.options.hopTimeoutMs, signal }
    );

    const contentType = resp.headers.get("content-type") ?? "";
    if (!JSON_MEDIA_TYPE.test(contentType.trim())) {
      await resp.body?.cancel();
      throw new BackendNonJsonError(resp.status);
    }

    const raw = await resp.text();
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      throw new BackendNonJsonError(resp.status);
    }
    if (!isRecord(payload)) throw new BackendNonJsonError(resp.status);

    const code = payload.code;
    if (code !== 200) {
      const message = typeof payload.message === "string" ? payload.message : "backend error";
      throw new BackendDeclaredError(code, raw, message);
    }

    const data = isRecord(payload.data) ? payload.data : {};
    const url = data.url;
    if (typeof url !== "string" || url === "") {
      throw new BackendInvalidLinkError();
    }

    return {
      statusCode: code,
      url,
      extraHeaders: toHeaderValues(data.header)
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toHeaderValues(value: unknown): HeaderValues {
  const result: HeaderValues = {};
  if (!isRecord(value)) return result;

  for (const [name, entry] of Object.entries(value)) {
    const values = Array.isArray(entry) ? entry : [entry];
    const strings = values.filter((v): v is string => typeof v === "string");
    if (strings.length > 0) result[name] = strings;
  }
  return result;
}
