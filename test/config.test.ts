import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { resolveStreamCredentials } from "../src/accounts.js";
import { clearClientCache, createStreamClient } from "../src/client.js";
import { parseStreamConfig } from "../src/config-schema.js";
import {
  AuthError,
  ConfigurationError,
  NotConnectedError,
  StreamError,
  TransportError,
  errorMessage,
} from "../src/errors.js";
import { probeCredentials } from "../src/probe.js";
import { CaptureLogger, TOKEN_URL, stubHttp } from "./helpers.js";

describe("parseStreamConfig", () => {
  test("fills interval and debug defaults", () => {
    const config = parseStreamConfig({ clientId: "ding-app", clientSecret: "test-secret" });

    expect(config).toEqual({
      clientId: "ding-app",
      clientSecret: "test-secret",
      heartbeatIntervalMs: 8000,
      reconnectIntervalMs: 3000,
      debug: false,
    });
  });

  test("rejects unknown keys", () => {
    expect(() => parseStreamConfig({ clientId: "ding-app", colour: "red" })).toThrow(
      "invalid stream config: (root): Unrecognized key(s) in object: 'colour'",
    );
  });

  test("rejects negative intervals", () => {
    expect(() => parseStreamConfig({ heartbeatIntervalMs: -5 })).toThrow(ConfigurationError);
    expect(() => parseStreamConfig({ heartbeatIntervalMs: -5 })).toThrow(/heartbeatIntervalMs/);
  });

  test("rejects a clientId that contradicts the legacy appKey", () => {
    expect(() => parseStreamConfig({ clientId: "a", appKey: "b" })).toThrow(
      "invalid stream config: appKey: clientId and legacy appKey are both set and differ",
    );
  });

  test("rejects malformed URLs", () => {
    expect(() => parseStreamConfig({ gatewayUrl: "not a url" })).toThrow(/gatewayUrl: Invalid url/);
  });
});

describe("resolveStreamCredentials", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  test("inline credentials win and are trimmed", () => {
    expect(
      resolveStreamCredentials({ clientId: " ding-app ", clientSecret: "test-secret", appKey: "legacy", appSecret: "old" }),
    ).toEqual({ clientId: "ding-app", clientSecret: "test-secret" });
  });

  test("falls back to the legacy appKey/appSecret", () => {
    expect(resolveStreamCredentials({ appKey: "legacy", appSecret: "test-secret" })).toEqual({
      clientId: "legacy",
      clientSecret: "test-secret",
    });
  });

  test("reads a client JSON file", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stream-creds-"));
    const file = path.join(dir, "client.json");
    fs.writeFileSync(file, JSON.stringify({ clientId: "from-file", clientSecret: "test-secret" }));

    expect(resolveStreamCredentials({ clientJsonFile: file })).toEqual({
      clientId: "from-file",
      clientSecret: "test-secret",
    });
  });

  test("missing or unreadable sources resolve to null", () => {
    expect(resolveStreamCredentials()).toBeNull();
    expect(resolveStreamCredentials({ clientId: "ding-app" })).toBeNull();
    expect(resolveStreamCredentials({ clientJsonFile: "/nonexistent/client.json" })).toBeNull();
  });
});

describe("createStreamClient", () => {
  afterEach(() => {
    clearClientCache();
  });

  test("reuses the client for the same credentials", () => {
    const config = parseStreamConfig({ clientId: "ding-app", clientSecret: "test-secret", heartbeatIntervalMs: 0 });
    const first = createStreamClient(config);

    expect(createStreamClient(config)).toBe(first);
    expect(first.credentials.heartbeatIntervalMs).toBe(0);
    expect(first.credentials.reconnectIntervalMs).toBe(3000);
  });

  test("new credentials replace the cached client", () => {
    const first = createStreamClient(parseStreamConfig({ clientId: "a", clientSecret: "test-secret" }));
    const second = createStreamClient(parseStreamConfig({ clientId: "b", clientSecret: "test-secret" }));

    expect(second).not.toBe(first);
    expect(second.credentials.identity.clientId).toBe("b");
  });

  test("different overrides or config build a new client", () => {
    const config = parseStreamConfig({ clientId: "ding-app", clientSecret: "test-secret" });
    const first = new CaptureLogger();
    const second = new CaptureLogger();
    const client = createStreamClient(config, { logger: first.logger });

    expect(createStreamClient(config, { logger: first.logger })).toBe(client);
    expect(createStreamClient(config, { logger: second.logger })).not.toBe(client);

    const current = createStreamClient(config, { logger: second.logger });
    const slower = createStreamClient({ ...config, heartbeatIntervalMs: 20_000 }, { logger: second.logger });
    expect(slower).not.toBe(current);
    expect(slower.credentials.heartbeatIntervalMs).toBe(20_000);
  });

  test("missing credentials are a ConfigurationError", () => {
    expect(() => createStreamClient(parseStreamConfig({}))).toThrow(ConfigurationError);
  });
});

describe("probeCredentials", () => {
  test("reports success with the client id", async () => {
    const { http } = stubHttp(() => ({ data: { errcode: 0, accessToken: "T1", expiresIn: 7200 } }));
    const config = parseStreamConfig({ clientId: "ding-app", clientSecret: "test-secret", tokenUrl: TOKEN_URL });

    expect(await probeCredentials(config, { http })).toEqual({ ok: true, clientId: "ding-app" });
  });

  test("reports the token error", async () => {
    const { http } = stubHttp(() => ({ data: { errcode: 40089, errmsg: "invalid appkey" } }));
    const config = parseStreamConfig({ clientId: "ding-app", clientSecret: "test-secret" });

    expect(await probeCredentials(config, { http })).toEqual({
      ok: false,
      clientId: "ding-app",
      error: "get token content error: 40089 - invalid appkey",
    });
  });

  test("reports missing credentials without a request", async () => {
    const { http, requests } = stubHttp(() => ({ data: {} }));

    expect(await probeCredentials(parseStreamConfig({}), { http })).toEqual({
      ok: false,
      error: "missing credentials (clientId, clientSecret)",
    });
    expect(requests).toHaveLength(0);
  });
});

describe("errors", () => {
  test("subclasses keep their prototype chain and code", () => {
    const err = new AuthError("denied");

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toBeInstanceOf(StreamError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("AuthError");
    expect(err.code).toBe("AUTH_FAILED");
  });

  test("transport and not-connected errors are retryable by default", () => {
    expect(new TransportError("x").retryable).toBe(true);
    expect(new NotConnectedError().message).toBe("stream not connected");
    expect(new NotConnectedError().retryable).toBe(true);
  });

  test("errorMessage handles non-errors", () => {
    expect(errorMessage(new Error("a"))).toBe("a");
    expect(errorMessage("b")).toBe("b");
  });
});
