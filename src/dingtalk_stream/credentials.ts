import type { StreamSubscription, SubscriptionKind } from "./types.js";

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 8_000;
export const DEFAULT_RECONNECT_INTERVAL_MS = 3_000;
export const DEFAULT_USER_AGENT = "dingtalk-stream-kit/0.1";

export type ClientIdentity = {
  readonly clientId: string;
  readonly clientSecret: string;
};

/**
 * Body sent to the gateway when asking for a websocket endpoint.
 */
export type CredentialsSnapshot = {
  clientId: string;
  clientSecret: string;
  ua: string;
  subscriptions: StreamSubscription[];
};

/**
 * Shared connection settings. Every method is synchronous, so a call never interleaves with
 * another task; callers copy values out before awaiting anything.
 */
export class Credentials {
  readonly identity: ClientIdentity;
  private userAgent: string;
  private subscriptions: StreamSubscription[] = [
    { type: "EVENT", topic: "*" },
    { type: "SYSTEM", topic: "*" },
  ];
  private token = "";
  private tokenExpiresAt = 0;
  private heartbeatMs = DEFAULT_HEARTBEAT_INTERVAL_MS;
  private reconnectMs = DEFAULT_RECONNECT_INTERVAL_MS;

  constructor(identity: ClientIdentity, userAgent = DEFAULT_USER_AGENT) {
    this.identity = Object.freeze({ clientId: identity.clientId, clientSecret: identity.clientSecret });
    this.userAgent = userAgent;
  }

  snapshot(): CredentialsSnapshot {
    return {
      clientId: this.identity.clientId,
      clientSecret: this.identity.clientSecret,
      ua: this.userAgent,
      subscriptions: this.subscriptions.map((s) => ({ ...s })),
    };
  }

  hasSubscription(type: SubscriptionKind, topic: string): boolean {
    return this.subscriptions.some((s) => s.type === type && s.topic === topic);
  }

  /**
   * @returns false when the (type, topic) pair is already present.
   */
  addSubscription(type: SubscriptionKind, topic: string): boolean {
    if (this.hasSubscription(type, topic)) return false;
    this.subscriptions.push({ type, topic });
    return true;
  }

  get accessToken(): string {
    return this.token;
  }

  /** Epoch milliseconds. */
  get expiresAt(): number {
    return this.tokenExpiresAt;
  }

  setToken(token: string, expiresAt: number): void {
    this.token = token;
    this.tokenExpiresAt = expiresAt;
  }

  clearToken(): void {
    this.token = "";
    this.tokenExpiresAt = 0;
  }

  get ua(): string {
    return this.userAgent;
  }

  set ua(value: string) {
    this.userAgent = value;
  }

  get heartbeatIntervalMs(): number {
    return this.heartbeatMs;
  }

  set heartbeatIntervalMs(ms: number) {
    this.heartbeatMs = assertInterval("heartbeatIntervalMs", ms);
  }

  get reconnectIntervalMs(): number {
    return this.reconnectMs;
  }

  set reconnectIntervalMs(ms: number) {
    this.reconnectMs = assertInterval("reconnectIntervalMs", ms);
  }
}

function assertInterval(name: string, ms: number): number {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${ms}`);
  }
  return Math.floor(ms);
}
