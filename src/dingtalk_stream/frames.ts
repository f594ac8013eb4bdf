/**
 * Stream protocol frames.
 *
 * Downstream frames arrive as JSON text and are validated on the way in; upstream acks are built
 * by {@link AckMessage} and always echo the `messageId` of the frame that triggered them.
 */

import { z } from "zod";
import { ProtocolParseError } from "../errors.js";

export const CONTENT_TYPE_APPLICATION_JSON = "application/json";

const stringish = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .default("");

export const DownstreamHeadersSchema = z
  .object({
    appId: stringish,
    connectionId: stringish,
    contentType: z.string().default(CONTENT_TYPE_APPLICATION_JSON),
    messageId: z.string(),
    time: stringish,
    topic: z.string(),
    eventType: stringish,
    eventBornTime: stringish,
    eventId: stringish,
    eventCorpId: stringish,
    eventUnifiedAppId: stringish,
  })
  .passthrough();

export const DownstreamFrameSchema = z.object({
  specVersion: z.string().default(""),
  type: z.string(),
  headers: DownstreamHeadersSchema,
  // payloads are JSON strings; tolerate servers that inline the object
  data: z.unknown().transform((v) => (typeof v === "string" ? v : JSON.stringify(v ?? {}))),
});

export type DownstreamHeaders = z.infer<typeof DownstreamHeadersSchema>;
export type DownstreamFrame = Readonly<z.infer<typeof DownstreamFrameSchema>>;

export type FrameType = "SYSTEM" | "EVENT" | "CALLBACK";

export const SYSTEM_TOPIC = {
  CONNECTED: "CONNECTED",
  REGISTERED: "REGISTERED",
  DISCONNECT: "disconnect",
  KEEPALIVE: "KEEPALIVE",
  PING: "ping",
} as const;

/**
 * Event fields carried in the headers of EVENT frames.
 */
export type EventData = {
  eventType: string;
  eventBornTime: string;
  eventId: string;
  eventCorpId: string;
  eventUnifiedAppId: string;
  topic: string;
  messageId: string;
  /** Raw event payload (JSON text). */
  data: string;
};

export function parseDownstreamFrame(raw: string): DownstreamFrame {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolParseError(`frame is not valid JSON: ${raw.slice(0, 200)}`, { cause: err });
  }
  const parsed = DownstreamFrameSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ProtocolParseError(`malformed frame: ${issues}`, { cause: parsed.error });
  }
  return Object.freeze(parsed.data);
}

export function eventDataOf(frame: DownstreamFrame): EventData {
  const h = frame.headers;
  return {
    eventType: h.eventType,
    eventBornTime: h.eventBornTime,
    eventId: h.eventId,
    eventCorpId: h.eventCorpId,
    eventUnifiedAppId: h.eventUnifiedAppId,
    topic: h.topic,
    messageId: h.messageId,
    data: frame.data,
  };
}

export type EventAckStatus = "SUCCESS" | "LATER";

/**
 * Result of the event handler. `LATER` asks the server to redeliver.
 */
export class EventAck {
  static readonly SUCCESS: EventAckStatus = "SUCCESS";
  static readonly LATER: EventAckStatus = "LATER";

  constructor(
    readonly status: EventAckStatus = EventAck.SUCCESS,
    readonly message = "",
  ) {}

  static success(message = ""): EventAck {
    return new EventAck(EventAck.SUCCESS, message);
  }

  static later(message = ""): EventAck {
    return new EventAck(EventAck.LATER, message);
  }

  toJSON(): { status: EventAckStatus; message: string } {
    return { status: this.status, message: this.message };
  }
}

export type UpstreamAck = {
  code: number;
  headers: { contentType: string; messageId: string };
  message: string;
  data: string;
};

export class AckMessage {
  static readonly STATUS_OK = 200;

  /** Payload of the ack sent for every CALLBACK frame. */
  static readonly EMPTY_CALLBACK_RESPONSE = JSON.stringify({ response: {} });

  readonly code = AckMessage.STATUS_OK;
  readonly message = "OK";

  constructor(
    readonly messageId: string,
    readonly data: string,
  ) {}

  static forEvent(messageId: string, ack: EventAck): AckMessage {
    return new AckMessage(messageId, JSON.stringify(ack));
  }

  static forCallback(messageId: string): AckMessage {
    return new AckMessage(messageId, AckMessage.EMPTY_CALLBACK_RESPONSE);
  }

  toJSON(): UpstreamAck {
    return {
      code: this.code,
      headers: { contentType: CONTENT_TYPE_APPLICATION_JSON, messageId: this.messageId },
      message: this.message,
      data: this.data,
    };
  }
}
