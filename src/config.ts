import path from "path";
import type { CodecName } from "./infrastructure/codec/registry.js";

export interface GatewayConfig {
  httpPort: number;
  host: string;
  upstream: string;
  protoDir: string;
  routeDir: string;
  defaultCodec: CodecName;
  /** 0 means upstream calls get no deadline unless the client sends Grpc-Timeout */
  requestTimeoutMs: number;
  maxBodyBytes: number;
  corsEnabled: boolean;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

const CODEC_NAMES: readonly CodecName[] = ["json", "protojson", "yaml"];

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const v = value.toLowerCase();
  return v === "true" || v === "1";
}

function int(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  return n;
}

function codecName(value: string | undefined): CodecName {
  const v = (value || "json").toLowerCase();
  const match = CODEC_NAMES.find(name => name === v);
  if (!match) throw new Error(`GATEWAY_DEFAULT_CODEC must be one of ${CODEC_NAMES.join(", ")}, got "${value}"`);
  return match;
}

/**
 * Read gateway settings from environment variables. Directories resolve
 * against the working directory.
 *
 * @throws Error when a numeric or enumerated variable holds an invalid value
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  return {
    httpPort: int("GATEWAY_HTTP_PORT", env.GATEWAY_HTTP_PORT, 8080),
    host: env.GATEWAY_HOST || "0.0.0.0",
    upstream: env.GATEWAY_UPSTREAM || "127.0.0.1:50051",
    protoDir: path.resolve(env.GATEWAY_PROTO_DIR || "protos"),
    routeDir: path.resolve(env.GATEWAY_ROUTE_DIR || "routes"),
    defaultCodec: codecName(env.GATEWAY_DEFAULT_CODEC),
    requestTimeoutMs: int("GATEWAY_REQUEST_TIMEOUT_MS", env.GATEWAY_REQUEST_TIMEOUT_MS, 0),
    maxBodyBytes: int("GATEWAY_MAX_BODY_BYTES", env.GATEWAY_MAX_BODY_BYTES, 4 * 1024 * 1024),
    corsEnabled: flag(env.GATEWAY_CORS_ENABLED, false),
    corsOrigins: (env.GATEWAY_CORS_ORIGINS || "*").split(",").map(o => o.trim()).filter(Boolean),
  };
}
