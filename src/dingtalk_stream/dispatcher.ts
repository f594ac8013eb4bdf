import { errorMessage } from "../errors.js";
import {
  AckMessage,
  EventAck,
  SYSTEM_TOPIC,
  eventDataOf,
  parseDownstreamFrame,
  type DownstreamFrame,
} from "./frames.js";
import type { Log } from "./logger.js";
import type { CallbackRegistry } from "./registry.js";
import type { InboundFrame } from "./transport.js";

export type DispatcherDeps = {
  registry: CallbackRegistry;
  send: (ack: AckMessage) => Promise<void>;
  onPong: () => void;
  log: Log;
};

/**
 * Reads one connection's frames in order and answers the ones the protocol wants acknowledged.
 */
export class InboundDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Resolves when the stream ends, errors, or a close frame arrives.
   */
  async run(frames: AsyncIterable<InboundFrame>): Promise<void> {
    const { log } = this.deps;
    try {
      for await (const frame of frames) {
        switch (frame.kind) {
          case "text":
            await this.onText(frame.data);
            break;
          case "pong":
            this.deps.onPong();
            break;
          case "close":
            log.info(`connection closed by peer, code=${frame.code} reason=${frame.reason}`);
            return;
          default:
            log.debug(`ignored ${frame.kind} frame (${frame.size} bytes)`);
        }
      }
    } catch (err) {
      log.warn(`read loop ended: ${errorMessage(err)}`);
    }
  }

  async onText(raw: string): Promise<void> {
    let frame: DownstreamFrame;
    try {
      frame = parseDownstreamFrame(raw);
    } catch (err) {
      this.deps.log.warn(errorMessage(err));
      return;
    }

    const { type, headers } = frame;
    this.deps.log.debug(`inbound type=${type} topic=${headers.topic} messageId=${headers.messageId}`);

    switch (type) {
      case "SYSTEM":
        await this.onSystem(frame);
        break;
      case "EVENT":
        await this.onEvent(frame);
        break;
      case "CALLBACK":
        await this.reply(AckMessage.forCallback(headers.messageId));
        this.deps.registry.publish(frame);
        break;
      default:
        this.deps.log.error(`unknown message type: ${type}`);
    }
  }

  private async onSystem(frame: DownstreamFrame): Promise<void> {
    const { topic, messageId } = frame.headers;
    switch (topic) {
      case SYSTEM_TOPIC.PING:
        await this.reply(new AckMessage(messageId, frame.data));
        break;
      case SYSTEM_TOPIC.CONNECTED:
      case SYSTEM_TOPIC.REGISTERED:
      case SYSTEM_TOPIC.DISCONNECT:
      case SYSTEM_TOPIC.KEEPALIVE:
        this.deps.log.debug(`[SYSTEM] ${topic}`);
        break;
      default:
        this.deps.log.warn(`unknown system message: ${topic}`);
    }
  }

  private async onEvent(frame: DownstreamFrame): Promise<void> {
    let ack: EventAck;
    try {
      ack = await this.deps.registry.handleEvent(eventDataOf(frame));
    } catch (err) {
      this.deps.log.error(errorMessage(err));
      ack = EventAck.later(errorMessage(err));
    }
    await this.reply(AckMessage.forEvent(frame.headers.messageId, ack));
  }

  private async reply(ack: AckMessage): Promise<void> {
    try {
      await this.deps.send(ack);
    } catch (err) {
      this.deps.log.warn(`ack for messageId=${ack.messageId} not sent: ${errorMessage(err)}`);
    }
  }
}
