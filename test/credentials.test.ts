import { describe, expect, test } from "vitest";
import {
  Credentials,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_RECONNECT_INTERVAL_MS,
  DEFAULT_USER_AGENT,
} from "../src/dingtalk_stream/credentials.js";
import { createStreamLogger } from "../src/dingtalk_stream/logger.js";

describe("Credentials", () => {
  test("starts with wildcard EVENT and SYSTEM subscriptions", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" });

    expect(creds.snapshot()).toEqual({
      clientId: "ding-app",
      clientSecret: "test-secret",
      ua: DEFAULT_USER_AGENT,
      subscriptions: [
        { type: "EVENT", topic: "*" },
        { type: "SYSTEM", topic: "*" },
      ],
    });
  });

  test("addSubscription keeps (type, topic) pairs unique", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" });

    expect(creds.addSubscription("CALLBACK", "/v1.0/im/bot/messages/get")).toBe(true);
    expect(creds.addSubscription("CALLBACK", "/v1.0/im/bot/messages/get")).toBe(false);
    expect(creds.addSubscription("EVENT", "*")).toBe(false);
    expect(creds.snapshot().subscriptions).toHaveLength(3);
    expect(creds.hasSubscription("CALLBACK", "/v1.0/im/bot/messages/get")).toBe(true);
  });

  test("snapshot is detached from the live subscription list", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" });
    const snapshot = creds.snapshot();
    snapshot.subscriptions.push({ type: "CALLBACK", topic: "/x" });
    snapshot.subscriptions[0].topic = "changed";

    expect(creds.snapshot().subscriptions).toEqual([
      { type: "EVENT", topic: "*" },
      { type: "SYSTEM", topic: "*" },
    ]);
  });

  test("identity is frozen", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" });
    expect(Object.isFrozen(creds.identity)).toBe(true);
  });

  test("intervals default, floor and reject negatives", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" });
    expect(creds.heartbeatIntervalMs).toBe(DEFAULT_HEARTBEAT_INTERVAL_MS);
    expect(creds.reconnectIntervalMs).toBe(DEFAULT_RECONNECT_INTERVAL_MS);

    creds.heartbeatIntervalMs = 0;
    creds.reconnectIntervalMs = 1500.9;
    expect(creds.heartbeatIntervalMs).toBe(0);
    expect(creds.reconnectIntervalMs).toBe(1500);

    expect(() => {
      creds.heartbeatIntervalMs = -1;
    }).toThrow(RangeError);
    expect(() => {
      creds.reconnectIntervalMs = Number.NaN;
    }).toThrow("reconnectIntervalMs must be a non-negative number, got NaN");
  });

  test("token and expiry are set and cleared together", () => {
    const creds = new Credentials({ clientId: "ding-app", clientSecret: "test-secret" }, "custom-ua/1");
    expect(creds.ua).toBe("custom-ua/1");
    expect(creds.accessToken).toBe("");
    expect(creds.expiresAt).toBe(0);

    creds.setToken("T1", 5_000);
    expect(creds.accessToken).toBe("T1");
    expect(creds.expiresAt).toBe(5_000);

    creds.clearToken();
    expect(creds.accessToken).toBe("");
    expect(creds.expiresAt).toBe(0);
  });
});

describe("createStreamLogger", () => {
  test("prefixes the tag and routes debug to info when the host has no debug level", () => {
    const infos: string[] = [];
    const log = createStreamLogger({ info: (m) => infos.push(m) }, { debug: true, tag: "dingtalk_stream" });

    log.debug("state Disconnected -> Connecting");
    log.info("endpoint is wss://gw.test");

    expect(infos).toEqual([
      "[dingtalk_stream] state Disconnected -> Connecting",
      "[dingtalk_stream] endpoint is wss://gw.test",
    ]);
  });

  test("drops debug lines unless debug is on", () => {
    const debugs: string[] = [];
    const log = createStreamLogger({ debug: (m) => debugs.push(m) });

    log.debug("hidden");
    expect(debugs).toEqual([]);
  });

  test("works without a host logger", () => {
    const log = createStreamLogger(undefined, { debug: true });
    expect(() => {
      log.debug("a");
      log.info("b");
      log.warn("c");
      log.error("d");
    }).not.toThrow();
  });
});
