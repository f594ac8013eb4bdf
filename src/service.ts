import { z } from "zod";
import type {
  ConnectionState,
  DingTalkStreamClient,
  DownstreamFrame,
  EventListener,
  RobotMessage,
  StateListener,
  StreamLogger,
  TopicListener,
} from "./dingtalk_stream/index.js";
import { consoleLogger } from "./dingtalk_stream/index.js";
import { createStreamClient, type CreateClientOverrides } from "./client.js";
import { parseStreamConfig, type StreamConfigInput } from "./config-schema.js";
import { errorMessage } from "./errors.js";
import { createOpenApiClient, type OpenApiClient, type OpenApiClientOpts } from "./openapi.js";
import type { StreamConfig } from "./types.js";

export type StreamServiceOpts = {
  config: StreamConfigInput;
  logger?: StreamLogger;
  abortSignal?: AbortSignal;
  onRobotMessage?: TopicListener<RobotMessage>;
  onEvent?: EventListener;
  /** Receives frames of the extra topics listed in `config.topics`. */
  onCallback?: (topic: string, payload: unknown, frame: DownstreamFrame) => void | Promise<void>;
  onStateChange?: StateListener;
  clientOptions?: CreateClientOverrides;
};

export type StreamServiceStatus = {
  running: boolean;
  state: ConnectionState;
  connectedAt?: number;
  lastError?: string;
};

/**
 * Start/stop/status wrapper the host drives; the connection loop runs in the background.
 */
export class StreamService {
  private readonly config: StreamConfig;
  private readonly logger: StreamLogger;
  private client: DingTalkStreamClient | null = null;
  private loop: Promise<void> | null = null;
  private unsubscribeState: (() => void) | null = null;
  private connectedAt?: number;
  private lastError?: string;

  constructor(private readonly opts: StreamServiceOpts) {
    this.config = parseStreamConfig(opts.config);
    this.logger = opts.logger ?? consoleLogger();
  }

  /**
   * Resolves once the first connection is up; rejects when the first negotiation or handshake fails.
   */
  async start(): Promise<void> {
    if (this.loop) {
      throw new Error("stream service already started");
    }
    if (this.opts.abortSignal?.aborted) {
      return;
    }

    const client = createStreamClient(this.config, { logger: this.logger, ...this.opts.clientOptions });
    this.client = client;
    this.lastError = undefined;

    if (this.opts.onEvent) {
      client.registerEventListener(this.opts.onEvent);
    }
    if (this.opts.onRobotMessage) {
      client.registerRobotListener(this.opts.onRobotMessage);
    }
    for (const topic of this.config.topics ?? []) {
      client.registerTopicListener(topic, z.unknown(), async (payload, frame) => {
        await this.opts.onCallback?.(topic, payload, frame);
      });
    }

    let firstConnect: () => void = () => {};
    const connected = new Promise<void>((resolve) => {
      firstConnect = resolve;
    });
    this.unsubscribeState = client.onStateChange((state, previous) => {
      if (state === "Connected") {
        this.connectedAt = Date.now();
        firstConnect();
      }
      this.opts.onStateChange?.(state, previous);
    });

    this.opts.abortSignal?.addEventListener("abort", this.handleAbort, { once: true });

    this.logger.info?.("dingtalk: starting Stream connection...");
    const loop = client.connect();
    this.loop = loop.then(
      () => this.finish(),
      (err: unknown) => this.finish(err),
    );

    await Promise.race([connected, loop]);
  }

  /**
   * REST client sharing the service's access token and honouring `config.openApiUrl`.
   */
  openApi(opts: Omit<OpenApiClientOpts, "baseUrl"> = {}): OpenApiClient {
    if (!this.client) {
      throw new Error("stream service not started");
    }
    return createOpenApiClient(this.client, this.config, { log: this.logger, ...opts });
  }

  stop(): void {
    this.client?.exit();
  }

  /**
   * Resolves when the background loop has ended.
   */
  async wait(): Promise<void> {
    await this.loop;
  }

  status(): StreamServiceStatus {
    return {
      running: this.loop !== null,
      state: this.client?.state ?? "Disconnected",
      connectedAt: this.connectedAt,
      lastError: this.lastError,
    };
  }

  private handleAbort = () => {
    this.logger.info?.("dingtalk: abort signal received, stopping Stream client");
    this.stop();
  };

  private finish(err?: unknown): void {
    if (err !== undefined) {
      this.lastError = errorMessage(err);
      this.logger.error?.(`dingtalk: stream loop failed: ${this.lastError}`);
    } else {
      this.logger.info?.("dingtalk: stream loop stopped");
    }
    this.opts.abortSignal?.removeEventListener("abort", this.handleAbort);
    this.unsubscribeState?.();
    this.unsubscribeState = null;
    this.loop = null;
  }
}
