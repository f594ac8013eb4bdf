// Stream client
export { DingTalkStreamClient, createTaskScheduler, type StreamClientOptions } from "./stream.js";

// Engine parts
export { Credentials, DEFAULT_HEARTBEAT_INTERVAL_MS, DEFAULT_RECONNECT_INTERVAL_MS, DEFAULT_USER_AGENT } from "./credentials.js";
export type { ClientIdentity, CredentialsSnapshot } from "./credentials.js";
export { TokenNegotiator, GET_TOKEN_URL, GATEWAY_URL, type NegotiatorOptions } from "./negotiator.js";
export { TransportSession, createWsSocket } from "./transport.js";
export type { InboundFrame, SocketFactory, SocketHandlers, StreamSocket } from "./transport.js";
export { HeartbeatWatchdog, MAX_MISSED_PONGS, type HeartbeatOptions } from "./heartbeat.js";
export { InboundDispatcher, type DispatcherDeps } from "./dispatcher.js";
export { CallbackRegistry, decodePayload, type EventListener, type TopicListener } from "./registry.js";
export { AsyncQueue, Broadcaster, type BroadcastSubscription } from "./broadcast.js";
export { Mutex } from "./mutex.js";
export { createStreamLogger, consoleLogger, type Log, type StreamLogger } from "./logger.js";

// Frame types
export {
  AckMessage,
  EventAck,
  SYSTEM_TOPIC,
  CONTENT_TYPE_APPLICATION_JSON,
  DownstreamFrameSchema,
  parseDownstreamFrame,
  eventDataOf,
} from "./frames.js";
export type { DownstreamFrame, DownstreamHeaders, EventAckStatus, EventData, FrameType, UpstreamAck } from "./frames.js";

// Payloads
export {
  TOPIC_ROBOT,
  TOPIC_CARD,
  RobotMessageSchema,
  MessageContentSchema,
  CardCallbackSchema,
  isTextContent,
} from "./messages.js";
export type { RobotMessage, MessageContent, CardCallback } from "./messages.js";

// Handlers
export { EventHandler, ChatbotHandler, type ChatbotReplyOptions, type ChatbotReplyResult } from "./handlers.js";

// Types
export { systemClock } from "./types.js";
export type {
  Clock,
  ConnectionState,
  StateListener,
  StreamSubscription,
  SubscriptionKind,
  TaskScheduler,
} from "./types.js";
