import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { parseDownstreamFrame, type DownstreamFrame } from "../src/dingtalk_stream/frames.js";
import { createStreamLogger, type Log, type StreamLogger } from "../src/dingtalk_stream/logger.js";
import type { SocketFactory, SocketHandlers, StreamSocket } from "../src/dingtalk_stream/transport.js";
import { NotConnectedError } from "../src/errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export class CaptureLogger {
  readonly lines: { level: LogLevel; message: string }[] = [];

  readonly logger: StreamLogger = {
    debug: (m) => this.record("debug", m),
    info: (m) => this.record("info", m),
    warn: (m) => this.record("warn", m),
    error: (m) => this.record("error", m),
  };

  log(debug = true): Log {
    return createStreamLogger(this.logger, { debug });
  }

  at(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }

  private record(level: LogLevel, message: string): void {
    this.lines.push({ level, message });
  }
}

export type RecordedRequest = {
  method: string;
  url: string;
  params: unknown;
  headers: InternalAxiosRequestConfig["headers"];
  body: unknown;
  responseType?: string;
};

export type StubReply = { status?: number; data?: unknown } | Error;

/**
 * Axios instance whose adapter answers from `route` and records every request.
 */
export function stubHttp(route: (req: RecordedRequest) => StubReply | Promise<StubReply>): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    adapter: async (config) => {
      const req: RecordedRequest = {
        method: (config.method ?? "get").toUpperCase(),
        url: config.url ?? "",
        params: config.params,
        headers: config.headers,
        body: parseJsonBody(config.data),
        responseType: config.responseType,
      };
      requests.push(req);
      const reply = await route(req);
      if (reply instanceof Error) throw reply;
      return { data: reply.data, status: reply.status ?? 200, statusText: "", headers: {}, config };
    },
  });
  return { http, requests };
}

function parseJsonBody(data: unknown): unknown {
  if (typeof data !== "string") return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

export const TOKEN_URL = "https://auth.test/gettoken";
export const GATEWAY_URL = "https://gw.test/connections/open";

export class FakeSocket implements StreamSocket {
  readonly sent: string[] = [];
  pings = 0;
  autoPong = false;
  terminated = false;

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers,
  ) {}

  async send(data: string): Promise<void> {
    this.assertWritable();
    this.sent.push(data);
  }

  async ping(): Promise<void> {
    this.assertWritable();
    this.pings++;
    if (this.autoPong) {
      void Promise.resolve().then(() => this.handlers.pong());
    }
  }

  close(): void {
    this.terminated = true;
  }

  terminate(): void {
    this.terminated = true;
  }

  open(): void {
    this.handlers.open();
  }

  receive(frame: unknown): void {
    this.handlers.message(typeof frame === "string" ? frame : JSON.stringify(frame), false);
  }

  receiveBinary(data: string): void {
    this.handlers.message(data, true);
  }

  pong(): void {
    this.handlers.pong();
  }

  peerClose(code = 1000, reason = "bye"): void {
    this.handlers.close(code, reason);
  }

  fail(err: Error): void {
    this.handlers.error(err);
  }

  sentJson(): unknown[] {
    return this.sent.map((s) => JSON.parse(s));
  }

  private assertWritable(): void {
    if (this.terminated) throw new NotConnectedError("fake socket closed");
  }
}

export function fakeSockets(opts: { autoOpen?: boolean; autoPong?: boolean } = {}) {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url, handlers) => {
    const socket = new FakeSocket(url, handlers);
    socket.autoPong = opts.autoPong ?? false;
    sockets.push(socket);
    if (opts.autoOpen ?? true) {
      void Promise.resolve().then(() => handlers.open());
    }
    return socket;
  };
  return {
    factory,
    sockets,
    last(): FakeSocket {
      const socket = sockets.at(-1);
      if (!socket) throw new Error("no socket was opened");
      return socket;
    },
  };
}

/**
 * Let pending promise chains settle. Real timers only.
 */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export async function rejectionOf<T>(promise: Promise<unknown>, type: new (...args: never[]) => T): Promise<T> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

export function frameText(
  type: string,
  headers: { topic: string; messageId: string } & Record<string, unknown>,
  data: unknown,
): string {
  return JSON.stringify({ specVersion: "1.0", type, headers: { contentType: "application/json", ...headers }, data });
}

export function callbackFrame(topic: string, messageId: string, payload: unknown): DownstreamFrame {
  return parseDownstreamFrame(frameText("CALLBACK", { topic, messageId }, JSON.stringify(payload)));
}

export const robotPayload = {
  msgId: "msg-1",
  msgtype: "text",
  text: { content: "hello" },
  conversationId: "cid-1",
  conversationType: "1",
  chatbotUserId: "bot-1",
  senderId: "user-1",
  senderNick: "Tester",
  sessionWebhookExpiredTime: 4_102_444_800_000,
  sessionWebhook: "https://hooks.test/session",
  createAt: 1_700_000_000_000,
};
