import {
  isLoggerMode,
  isLogLevel,
  type LoggerMode,
  type LogLevel
} from "../core/logging/createLogger.js";

export interface VerifyHeaderConfig {
  readonly name: string;
  readonly value: string;
}

export interface RateLimitConfig {
  readonly enabled: boolean;
  readonly windowMs: number;
  readonly max: number;
  readonly blockMs: number;
  readonly realIpHeader: string;
}

export interface LinkgateConfig {
  readonly backendUrl: string;
  readonly backendToken: string;
  readonly linkEndpoint: string;
  readonly signSecret: string;
  readonly verifyHeader?: VerifyHeaderConfig;
  readonly publicUrl: string;
  readonly port: number;
  readonly maxRedirects: number;
  readonly hopTimeoutMs: number;
  readonly maxBodyBytes: number;
  readonly allowNonExpiring: boolean;
  readonly healthPath: string;
  readonly logger: LoggerMode;
  readonly logFile: string;
  readonly logLevel: LogLevel;
  readonly rateLimit: RateLimitConfig;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, reason: string) {
    super(`${variable}: ${reason}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (value === undefined) throw new ConfigError(name, "is required");
  return value;
}

function baseUrl(env: Env, name: string): string {
  const value = required(env, name);
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(name, `not a valid URL (${value})`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(name, "must be an http(s) URL");
  }
  // stored without trailing slash so `${base}/path` joins cleanly
  return value.replace(/\/+$/, "");
}

function integer(env: Env, name: string, fallback: number, min = 0): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) throw new ConfigError(name, `expected an integer, got "${raw}"`);
  const value = Number(raw);
  if (value < min) throw new ConfigError(name, `must be >= ${min}`);
  return value;
}

function toggle(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["off", "false", "0", "no"].includes(raw)) return false;
  if (["on", "true", "1", "yes"].includes(raw)) return true;
  throw new ConfigError(name, `expected on/off, got "${raw}"`);
}

function pathSetting(env: Env, name: string, fallback: string): string {
  const value = optional(env, name) ?? fallback;
  if (!value.startsWith("/")) throw new ConfigError(name, "must start with /");
  return value;
}

/**
 * Reads and validates the process configuration. The result is frozen and
 * meant to be built once at startup.
 */
export function loadLinkgateConfig(env: Env = process.env): LinkgateConfig {
  const backendToken = required(env, "LINKGATE_BACKEND_TOKEN");

  const verifyName = optional(env, "LINKGATE_VERIFY_HEADER");
  const verifyValue = optional(env, "LINKGATE_VERIFY_SECRET");
  if (verifyName && !verifyValue) {
    throw new ConfigError("LINKGATE_VERIFY_SECRET", "is required when LINKGATE_VERIFY_HEADER is set");
  }

  const logger = optional(env, "LINKGATE_LOGGER") ?? "console";
  if (!isLoggerMode(logger)) {
    throw new ConfigError("LINKGATE_LOGGER", `unknown logger mode "${logger}"`);
  }
  const logLevel = optional(env, "LINKGATE_LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("LINKGATE_LOG_LEVEL", `unknown log level "${logLevel}"`);
  }

  const config: LinkgateConfig = {
    backendUrl: baseUrl(env, "LINKGATE_BACKEND_URL"),
    backendToken,
    linkEndpoint: pathSetting(env, "LINKGATE_LINK_ENDPOINT", "/api/fs/link"),
    signSecret: optional(env, "LINKGATE_SIGN_SECRET") ?? backendToken,
    verifyHeader:
      verifyName && verifyValue ? Object.freeze({ name: verifyName, value: verifyValue }) : undefined,
    publicUrl: baseUrl(env, "LINKGATE_PUBLIC_URL"),
    port: integer(env, "LINKGATE_PORT", 3000),
    maxRedirects: integer(env, "LINKGATE_MAX_REDIRECTS", 10),
    hopTimeoutMs: integer(env, "LINKGATE_HOP_TIMEOUT_MS", 30_000, 1),
    maxBodyBytes: integer(env, "LINKGATE_MAX_BODY_BYTES", 10 * 1024 * 1024),
    allowNonExpiring: toggle(env, "LINKGATE_ALLOW_NON_EXPIRING", true),
    healthPath: pathSetting(env, "LINKGATE_HEALTH_PATH", "/-/health"),
    logger,
    logFile: optional(env, "LINKGATE_LOG_FILE") ?? "./logs/linkgate.log",
    logLevel,
    rateLimit: Object.freeze({
      enabled: toggle(env, "LINKGATE_RATE_LIMIT", true),
      windowMs: integer(env, "LINKGATE_RL_WINDOW_MS", 10_000, 1),
      max: integer(env, "LINKGATE_RL_MAX", 50, 1),
      blockMs: integer(env, "LINKGATE_RL_BLOCK_MS", 1_200_000),
      realIpHeader: (optional(env, "LINKGATE_REAL_IP_HEADER") ?? "cf-connecting-ip").toLowerCase()
    })
  };

  return Object.freeze(config);
}
