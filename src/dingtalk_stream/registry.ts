import type { z } from "zod";
import { DispatchHandlerError, ProtocolParseError, errorMessage } from "../errors.js";
import { Broadcaster, type BroadcastSubscription } from "./broadcast.js";
import type { Credentials } from "./credentials.js";
import { EventAck, type DownstreamFrame, type EventData } from "./frames.js";
import type { Log } from "./logger.js";
import type { TaskScheduler } from "./types.js";

export type EventListener = (event: EventData) => EventAck | Promise<EventAck>;

export type TopicListener<T> = (message: T, frame: DownstreamFrame) => void | Promise<void>;

type TopicConsumer = {
  topic: string;
  subscription: BroadcastSubscription<DownstreamFrame>;
  deliver: (frame: DownstreamFrame) => Promise<void>;
};

/**
 * Handlers for inbound frames: one replaceable EVENT slot, and one consumer task per CALLBACK
 * topic, each fed from its own subscription to a shared broadcast channel.
 */
export class CallbackRegistry {
  private eventListener: EventListener = () => EventAck.success();
  private consumers = new Map<string, TopicConsumer>();
  private channel = new Broadcaster<DownstreamFrame>();
  private closed = false;

  constructor(
    private readonly credentials: Credentials,
    private readonly scheduler: TaskScheduler,
    private readonly log: Log,
  ) {}

  registerEventListener(listener: EventListener): void {
    this.eventListener = listener;
  }

  /**
   * Run the current event listener. Failures surface as {@link DispatchHandlerError}.
   */
  async handleEvent(event: EventData): Promise<EventAck> {
    const listener = this.eventListener;
    try {
      return await listener(event);
    } catch (err) {
      throw new DispatchHandlerError(`event listener failed: ${errorMessage(err)}`, event.topic, { cause: err });
    }
  }

  /**
   * Subscribe `listener` to CALLBACK frames of `topic`. The topic is advertised on the next
   * endpoint negotiation. Registering a topic again swaps the listener of its existing consumer.
   * Throws once the registry is closed.
   */
  registerTopicListener<T>(
    topic: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    listener: TopicListener<T>,
  ): void {
    if (this.closed) {
      throw new Error(`callback registry is closed, cannot register topic=${topic}`);
    }
    this.credentials.addSubscription("CALLBACK", topic);
    const deliver = (frame: DownstreamFrame) => this.deliver(frame, schema, listener);

    const existing = this.consumers.get(topic);
    if (existing) {
      existing.deliver = deliver;
      this.log.debug(`replaced listener for topic=${topic}`);
      return;
    }

    const consumer: TopicConsumer = { topic, subscription: this.channel.subscribe(), deliver };
    this.consumers.set(topic, consumer);
    this.scheduler.spawn(() => this.consume(consumer));
  }

  hasTopic(topic: string): boolean {
    return this.consumers.has(topic);
  }

  get topics(): string[] {
    return [...this.consumers.keys()];
  }

  /**
   * Queue a CALLBACK frame for every consumer without waiting for them.
   */
  publish(frame: DownstreamFrame): number {
    return this.channel.publish(frame);
  }

  /**
   * End every consumer after it drains what was already published.
   */
  close(): void {
    this.closed = true;
    this.channel.close();
    this.consumers.clear();
  }

  private async consume(consumer: TopicConsumer): Promise<void> {
    for await (const frame of consumer.subscription.messages) {
      if (frame.headers.topic !== consumer.topic) continue;
      await consumer.deliver(frame);
    }
    this.log.debug(`consumer for topic=${consumer.topic} stopped`);
  }

  private async deliver<T>(
    frame: DownstreamFrame,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    listener: TopicListener<T>,
  ): Promise<void> {
    const { topic, messageId } = frame.headers;
    let message: T;
    try {
      message = decodePayload(frame.data, schema);
    } catch (err) {
      this.log.warn(`skip callback topic=${topic} messageId=${messageId}: ${errorMessage(err)}`);
      return;
    }

    try {
      await listener(message, frame);
    } catch (err) {
      const failure = new DispatchHandlerError(`topic listener failed: ${errorMessage(err)}`, topic, { cause: err });
      this.log.error(`${failure.message} (messageId=${messageId})`);
    }
  }
}

export function decodePayload<T>(data: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    throw new ProtocolParseError("payload is not valid JSON", { cause: err });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ProtocolParseError(`payload does not match: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}
