export * from "./src/dingtalk_stream/index.js";

export {
  StreamError,
  AuthError,
  NegotiationError,
  TransportError,
  NotConnectedError,
  ProtocolParseError,
  DispatchHandlerError,
  ConfigurationError,
  OpenApiError,
  type StreamErrorCode,
} from "./src/errors.js";

// Configuration
export { StreamConfigSchema, parseStreamConfig, type StreamConfigInput } from "./src/config-schema.js";
export { resolveStreamCredentials } from "./src/accounts.js";
export type {
  StreamConfig,
  ResolvedCredentials,
  ProbeResult,
  UploadType,
  SendMessageTarget,
  SendMessageResult,
} from "./src/types.js";

// Host wiring
export { createStreamClient, clearClientCache, type CreateClientOverrides } from "./src/client.js";
export { StreamService, type StreamServiceOpts, type StreamServiceStatus } from "./src/service.js";
export { probeCredentials } from "./src/probe.js";

// OpenAPI helpers
export { OpenApiClient, createOpenApiClient, DINGTALK_API, DINGTALK_OAPI, type OpenApiClientOpts } from "./src/openapi.js";
export {
  RobotSendMessage,
  templateParams,
  toMsgParam,
  BATCH_SEND_PATH,
  GROUP_SEND_PATH,
  type MessageTemplate,
  type MessageKey,
  type ActionButton,
} from "./src/send.js";
export { uploadMedia, getDownloadUrl, downloadFile, DOWNLOAD_PATH, MAX_FILE_SIZE } from "./src/media.js";
