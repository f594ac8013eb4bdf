import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { AuthError, NegotiationError, errorMessage } from "../errors.js";
import type { Credentials } from "./credentials.js";
import type { Log } from "./logger.js";
import { systemClock, type Clock } from "./types.js";

export const GET_TOKEN_URL = "https://oapi.dingtalk.com/gettoken";
export const GATEWAY_URL = "https://api.dingtalk.com/v1.0/gateway/connections/open";

const TokenResponseSchema = z.object({
  errcode: z.number(),
  errmsg: z.string().default(""),
  access_token: z.string().optional(),
  accessToken: z.string().optional(),
  expires_in: z.number().optional(),
  expiresIn: z.number().optional(),
});

const EndpointResponseSchema = z.object({
  endpoint: z.string().min(1),
  ticket: z.string().min(1),
});

export type NegotiatorOptions = {
  credentials: Credentials;
  log: Log;
  http?: AxiosInstance;
  clock?: Clock;
  tokenUrl?: string;
  gatewayUrl?: string;
};

/**
 * Access token cache and single-use endpoint exchange.
 */
export class TokenNegotiator {
  private readonly credentials: Credentials;
  private readonly log: Log;
  private readonly http: AxiosInstance;
  private readonly clock: Clock;
  private readonly tokenUrl: string;
  private readonly gatewayUrl: string;

  constructor(opts: NegotiatorOptions) {
    this.credentials = opts.credentials;
    this.log = opts.log;
    this.http = opts.http ?? axios.create({ timeout: 30_000 });
    this.clock = opts.clock ?? systemClock;
    this.tokenUrl = opts.tokenUrl ?? GET_TOKEN_URL;
    this.gatewayUrl = opts.gatewayUrl ?? GATEWAY_URL;
  }

  /**
   * Cached token, fetched again only once `now` is past its expiry.
   */
  async getToken(): Promise<string> {
    const token = this.credentials.accessToken;
    if (token && this.clock.now() <= this.credentials.expiresAt) {
      return token;
    }
    return this.refreshToken();
  }

  async refreshToken(): Promise<string> {
    const { clientId, clientSecret } = this.credentials.identity;
    let status: number;
    let body: unknown;
    try {
      const resp = await this.http.get<unknown>(this.tokenUrl, {
        params: { appkey: clientId, appsecret: clientSecret },
        validateStatus: () => true,
      });
      status = resp.status;
      body = resp.data;
    } catch (err) {
      throw new AuthError(`get token request failed: ${errorMessage(err)}`, { cause: err, retryable: true });
    }

    if (status < 200 || status >= 300) {
      throw new AuthError(`get token http error: ${status} - ${stringify(body)}`);
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError(`get token bad response: ${stringify(body)}`, { cause: parsed.error });
    }
    const json = parsed.data;
    if (json.errcode !== 0) {
      throw new AuthError(`get token content error: ${json.errcode} - ${json.errmsg}`);
    }

    const accessToken = json.accessToken ?? json.access_token;
    const expiresIn = json.expiresIn ?? json.expires_in;
    if (!accessToken || expiresIn === undefined) {
      throw new AuthError(`get token bad response, missing token/expiry: ${stringify(body)}`);
    }

    this.credentials.setToken(accessToken, this.clock.now() + expiresIn * 1000);
    this.log.debug(`access token refreshed, expires in ${expiresIn}s`);
    return accessToken;
  }

  resetToken(): void {
    this.credentials.clearToken();
  }

  /**
   * Exchange a fresh token for a one-time websocket URL.
   */
  async getEndpoint(): Promise<string> {
    const token = await this.refreshToken();
    const snapshot = this.credentials.snapshot();

    let status: number;
    let body: unknown;
    try {
      const resp = await this.http.post<unknown>(this.gatewayUrl, snapshot, {
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "User-Agent": snapshot.ua,
          "access-token": token,
        },
        validateStatus: () => true,
      });
      status = resp.status;
      body = resp.data;
    } catch (err) {
      throw new NegotiationError(`open connection request failed: ${errorMessage(err)}`, {
        cause: err,
        retryable: true,
      });
    }

    if (status < 200 || status >= 300) {
      throw new NegotiationError(`get endpoint http error: ${status} - ${stringify(body)}`);
    }

    const parsed = EndpointResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new NegotiationError(`get endpoint bad response: ${stringify(body)}`, { cause: parsed.error });
    }

    const { endpoint, ticket } = parsed.data;
    this.log.info(`endpoint is ${endpoint}`);
    return `${endpoint}?ticket=${encodeURIComponent(ticket)}`;
  }
}

function stringify(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body);
}
