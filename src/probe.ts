import { DingTalkStreamClient } from "./dingtalk_stream/index.js";
import type { CreateClientOverrides } from "./client.js";
import type { ProbeResult, StreamConfig } from "./types.js";
import { resolveStreamCredentials } from "./accounts.js";
import { errorMessage } from "./errors.js";

/**
 * Check that the configured credentials can obtain an access token.
 */
export async function probeCredentials(cfg?: StreamConfig, overrides: CreateClientOverrides = {}): Promise<ProbeResult> {
  const creds = resolveStreamCredentials(cfg);
  if (!creds) {
    return {
      ok: false,
      error: "missing credentials (clientId, clientSecret)",
    };
  }

  try {
    const client = new DingTalkStreamClient({
      clientId: creds.clientId,
      clientSecret: creds.clientSecret,
      tokenUrl: cfg?.tokenUrl,
      ...overrides,
    });
    await client.getAccessToken();

    return {
      ok: true,
      clientId: creds.clientId,
    };
  } catch (err) {
    return {
      ok: false,
      clientId: creds.clientId,
      error: errorMessage(err),
    };
  }
}
