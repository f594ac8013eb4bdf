import type { AxiosInstance } from "axios";
import type { z } from "zod";
import { errorMessage } from "../errors.js";
import { Credentials, type CredentialsSnapshot } from "./credentials.js";
import { InboundDispatcher } from "./dispatcher.js";
import { HeartbeatWatchdog } from "./heartbeat.js";
import { createStreamLogger, type Log, type StreamLogger } from "./logger.js";
import {
  CardCallbackSchema,
  RobotMessageSchema,
  TOPIC_CARD,
  TOPIC_ROBOT,
  type CardCallback,
  type RobotMessage,
} from "./messages.js";
import { TokenNegotiator } from "./negotiator.js";
import { CallbackRegistry, type EventListener, type TopicListener } from "./registry.js";
import { TransportSession, createWsSocket, type InboundFrame, type SocketFactory } from "./transport.js";
import type { Clock, ConnectionState, StateListener, TaskScheduler } from "./types.js";

export type StreamClientOptions = {
  clientId: string;
  clientSecret: string;
  userAgent?: string;
  /** 0 disables the heartbeat. */
  heartbeatIntervalMs?: number;
  /** 0 disables reconnecting. */
  reconnectIntervalMs?: number;
  debug?: boolean;
  logger?: StreamLogger;
  scheduler?: TaskScheduler;
  http?: AxiosInstance;
  socketFactory?: SocketFactory;
  clock?: Clock;
  tokenUrl?: string;
  gatewayUrl?: string;
};

class Notify {
  private resolve: () => void = () => {};
  readonly notified: Promise<void>;

  constructor() {
    this.notified = new Promise<void>((resolve) => {
      this.resolve = resolve;
    });
  }

  notify(): void {
    this.resolve();
  }
}

export function createTaskScheduler(log: Log): TaskScheduler {
  return {
    spawn(task) {
      void task().catch((err: unknown) => log.error(`background task failed: ${errorMessage(err)}`));
    },
  };
}

/**
 * Stream mode client: negotiates an endpoint, keeps one websocket alive, dispatches frames to the
 * registered listeners and reconnects with a fresh endpoint after every disconnect.
 */
export class DingTalkStreamClient {
  readonly credentials: Credentials;
  private readonly log: Log;
  private readonly negotiator: TokenNegotiator;
  private readonly registry: CallbackRegistry;
  private readonly scheduler: TaskScheduler;
  private readonly socketFactory: SocketFactory;

  private session: TransportSession | null = null;
  private currentState: ConnectionState = "Disconnected";
  private stateListeners = new Set<StateListener>();
  private running = false;
  private userExited = false;
  private abort: Notify | null = null;
  private wake: (() => void) | null = null;

  constructor(opts: StreamClientOptions) {
    this.log = createStreamLogger(opts.logger, { debug: opts.debug, tag: "dingtalk_stream" });
    this.credentials = new Credentials({ clientId: opts.clientId, clientSecret: opts.clientSecret }, opts.userAgent);
    if (opts.heartbeatIntervalMs !== undefined) this.credentials.heartbeatIntervalMs = opts.heartbeatIntervalMs;
    if (opts.reconnectIntervalMs !== undefined) this.credentials.reconnectIntervalMs = opts.reconnectIntervalMs;

    this.scheduler = opts.scheduler ?? createTaskScheduler(this.log);
    this.socketFactory = opts.socketFactory ?? createWsSocket;
    this.negotiator = new TokenNegotiator({
      credentials: this.credentials,
      log: this.log,
      http: opts.http,
      clock: opts.clock,
      tokenUrl: opts.tokenUrl,
      gatewayUrl: opts.gatewayUrl,
    });
    this.registry = new CallbackRegistry(this.credentials, this.scheduler, this.log);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.session?.isAlive ?? false;
  }

  /**
   * @returns a function that removes the listener.
   */
  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  registerEventListener(listener: EventListener): void {
    this.registry.registerEventListener(listener);
  }

  registerTopicListener<T>(topic: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, listener: TopicListener<T>): void {
    this.registry.registerTopicListener(topic, schema, listener);
  }

  registerRobotListener(listener: TopicListener<RobotMessage>): void {
    this.registry.registerTopicListener(TOPIC_ROBOT, RobotMessageSchema, listener);
  }

  registerCardListener(listener: TopicListener<CardCallback>): void {
    this.registry.registerTopicListener(TOPIC_CARD, CardCallbackSchema, listener);
  }

  // interval and UA changes apply from the next negotiation, never to a live session

  setHeartbeatInterval(ms: number): void {
    this.credentials.heartbeatIntervalMs = ms;
  }

  setReconnectInterval(ms: number): void {
    this.credentials.reconnectIntervalMs = ms;
  }

  setUserAgent(ua: string): void {
    this.credentials.ua = ua;
  }

  snapshot(): CredentialsSnapshot {
    return this.credentials.snapshot();
  }

  async getAccessToken(): Promise<string> {
    return this.negotiator.getToken();
  }

  resetAccessToken(): void {
    this.negotiator.resetToken();
  }

  /**
   * Run the connect/serve/reconnect loop. Resolves after {@link exit} or, with reconnecting
   * disabled, after the first disconnect. Token, endpoint and handshake failures reject.
   */
  async connect(): Promise<void> {
    if (this.running) {
      throw new Error("stream client is already running");
    }
    this.running = true;
    this.userExited = false;

    try {
      while (!this.userExited) {
        this.setState("Connecting");
        const url = await this.negotiator.getEndpoint();
        if (this.userExited) break;

        const heartbeatIntervalMs = this.credentials.heartbeatIntervalMs;
        const session = new TransportSession(this.log, this.socketFactory);
        this.session = session;
        let frames: AsyncIterable<InboundFrame>;
        try {
          frames = await session.open(url);
        } catch (err) {
          if (this.userExited) break;
          throw err;
        }
        if (this.userExited) break;

        this.setState("Connected");
        await this.serve(session, frames, heartbeatIntervalMs);
        session.close();
        this.setState("Disconnected");

        const reconnectIntervalMs = this.credentials.reconnectIntervalMs;
        if (this.userExited || reconnectIntervalMs <= 0) break;
        this.log.info(`reconnecting in ${reconnectIntervalMs}ms`);
        await this.sleep(reconnectIntervalMs);
      }
    } finally {
      this.session?.close();
      this.session = null;
      this.running = false;
      this.setState("Disconnected");
    }
  }

  /**
   * Stop the loop: ends a live or opening connection now and prevents any further reconnect.
   * Idempotent.
   */
  exit(): void {
    this.userExited = true;
    this.session?.close();
    this.abort?.notify();
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /**
   * {@link exit} and end every topic consumer.
   */
  dispose(): void {
    this.exit();
    this.registry.close();
  }

  private async serve(session: TransportSession, frames: AsyncIterable<InboundFrame>, heartbeatIntervalMs: number) {
    const abort = new Notify();
    this.abort = abort;
    if (this.userExited) abort.notify();

    const watchdog = new HeartbeatWatchdog({
      intervalMs: heartbeatIntervalMs,
      ping: () => session.ping(),
      onTimeout: () => abort.notify(),
      log: this.log,
    });
    const dispatcher = new InboundDispatcher({
      registry: this.registry,
      send: (ack) => session.send(ack),
      onPong: () => watchdog.markAlive(),
      log: this.log,
    });

    if (watchdog.enabled) {
      this.scheduler.spawn(() => watchdog.run());
    }

    try {
      await Promise.race([dispatcher.run(frames), abort.notified]);
    } finally {
      watchdog.stop();
      this.abort = null;
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.log.debug(`state ${previous} -> ${next}`);
    for (const listener of this.stateListeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.error(`state listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
