/**
 * Authenticated REST calls to the open platform, sharing the stream client's access token.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { z } from "zod";
import type { DingTalkStreamClient, StreamLogger } from "./dingtalk_stream/index.js";
import { OpenApiError, errorMessage } from "./errors.js";
import type { StreamConfig } from "./types.js";

export const DINGTALK_API = "https://api.dingtalk.com";
export const DINGTALK_OAPI = "https://oapi.dingtalk.com";

export type OpenApiClientOpts = {
  http?: AxiosInstance;
  /** Base URL of the v1.0 API. */
  baseUrl?: string;
  /** Base URL of the legacy oapi host (media upload). */
  oapiUrl?: string;
  log?: StreamLogger;
};

export class OpenApiClient {
  readonly http: AxiosInstance;
  readonly baseUrl: string;
  readonly oapiUrl: string;
  readonly log?: StreamLogger;

  constructor(
    private readonly stream: DingTalkStreamClient,
    opts: OpenApiClientOpts = {},
  ) {
    this.http = opts.http ?? axios.create({ timeout: 30_000 });
    this.baseUrl = opts.baseUrl ?? DINGTALK_API;
    this.oapiUrl = opts.oapiUrl ?? DINGTALK_OAPI;
    this.log = opts.log;
  }

  /** The robot code equals the app's client id. */
  get robotCode(): string {
    return this.stream.credentials.identity.clientId;
  }

  accessToken(): Promise<string> {
    return this.stream.getAccessToken();
  }

  async postRaw(path: string, body: unknown): Promise<AxiosResponse<unknown>> {
    const token = await this.accessToken();
    const url = `${this.baseUrl}${path}`;
    this.log?.debug?.(`[DingTalk][OpenAPI] POST ${url}`);
    return this.request(url, {
      method: "POST",
      data: body,
      headers: {
        "Content-Type": "application/json",
        "x-acs-dingtalk-access-token": token,
      },
    });
  }

  async post<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const resp = await this.postRaw(path, body);
    return parseBody(resp.data, schema, path);
  }

  /**
   * Send a request and fail with {@link OpenApiError} on transport errors and non-2xx statuses.
   */
  async request(url: string, config: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    let resp: AxiosResponse<unknown>;
    try {
      resp = await this.http.request<unknown>({ ...config, url, validateStatus: () => true });
    } catch (err) {
      throw new OpenApiError(`${config.method ?? "GET"} ${url} failed: ${errorMessage(err)}`, {
        cause: err,
        retryable: true,
      });
    }
    if (resp.status < 200 || resp.status >= 300) {
      const text = typeof resp.data === "string" ? resp.data : JSON.stringify(resp.data);
      throw new OpenApiError(`${config.method ?? "GET"} ${url} error: [${resp.status}] ${text}`, {
        status: resp.status,
      });
    }
    return resp;
  }
}

/**
 * Client whose v1.0 base URL comes from the `openApiUrl` config override, if set.
 */
export function createOpenApiClient(
  stream: DingTalkStreamClient,
  config: Pick<StreamConfig, "openApiUrl">,
  opts: Omit<OpenApiClientOpts, "baseUrl"> = {},
): OpenApiClient {
  return new OpenApiClient(stream, { ...opts, baseUrl: config.openApiUrl });
}

export function parseBody<T>(data: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new OpenApiError(`${what}: unexpected response ${JSON.stringify(data)}`, { cause: parsed.error });
  }
  return parsed.data;
}
