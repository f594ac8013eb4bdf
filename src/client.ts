import { DingTalkStreamClient, type StreamClientOptions } from "./dingtalk_stream/index.js";
import type { StreamConfig } from "./types.js";
import { resolveStreamCredentials } from "./accounts.js";
import { ConfigurationError } from "./errors.js";

let cached: { client: DingTalkStreamClient; options: StreamClientOptions } | null = null;

export type CreateClientOverrides = Omit<StreamClientOptions, "clientId" | "clientSecret">;

/**
 * One cached client. Asking again with the same credentials, config and overrides returns it;
 * anything else disposes it and builds a new one.
 */
export function createStreamClient(
  cfg: StreamConfig,
  overrides: CreateClientOverrides = {},
): DingTalkStreamClient {
  const creds = resolveStreamCredentials(cfg);
  if (!creds) {
    throw new ConfigurationError("DingTalk credentials not configured (clientId, clientSecret required)");
  }

  const options: StreamClientOptions = {
    clientId: creds.clientId,
    clientSecret: creds.clientSecret,
    userAgent: cfg.userAgent,
    heartbeatIntervalMs: cfg.heartbeatIntervalMs,
    reconnectIntervalMs: cfg.reconnectIntervalMs,
    debug: cfg.debug,
    tokenUrl: cfg.tokenUrl,
    gatewayUrl: cfg.gatewayUrl,
    ...overrides,
  };
  if (cached && sameOptions(cached.options, options)) {
    return cached.client;
  }

  const client = new DingTalkStreamClient(options);
  cached?.client.dispose();
  cached = { client, options };

  return client;
}

export function clearClientCache(): void {
  cached?.client.dispose();
  cached = null;
}

function sameOptions(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (!Object.is(a[key], b[key])) return false;
  }
  return true;
}
