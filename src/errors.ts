/**
 * Error taxonomy for the stream client.
 *
 * Negotiation-phase errors (auth, endpoint exchange, handshake) reject `connect()`.
 * Parse and handler errors are logged at the dispatch boundary and never reach the caller.
 */
export type StreamErrorCode =
  | "AUTH_FAILED"
  | "NEGOTIATION_FAILED"
  | "TRANSPORT_FAILED"
  | "NOT_CONNECTED"
  | "PROTOCOL_PARSE"
  | "HANDLER_FAILED"
  | "CONFIGURATION_ERROR"
  | "OPENAPI_FAILED";

type ErrorOptions = {
  retryable?: boolean;
  cause?: unknown;
};

/**
 * Base error class. Check `code` for programmatic handling.
 */
export class StreamError extends Error {
  declare readonly code: StreamErrorCode;

  /**
   * Whether retrying the same call may succeed.
   */
  retryable: boolean;

  override cause?: unknown;

  constructor(message: string, options?: ErrorOptions & { code?: StreamErrorCode }) {
    super(message);
    this.name = "StreamError";
    this.code = options?.code ?? "TRANSPORT_FAILED";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, StreamError.prototype);
  }
}

/**
 * Access token could not be obtained.
 */
export class AuthError extends StreamError {
  declare readonly code: "AUTH_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, { code: "AUTH_FAILED", ...options });
    this.name = "AuthError";
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * Gateway refused or garbled the endpoint exchange.
 */
export class NegotiationError extends StreamError {
  declare readonly code: "NEGOTIATION_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, { code: "NEGOTIATION_FAILED", ...options });
    this.name = "NegotiationError";
    Object.setPrototypeOf(this, NegotiationError.prototype);
  }
}

/**
 * Websocket handshake did not complete.
 */
export class TransportError extends StreamError {
  declare readonly code: "TRANSPORT_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, { code: "TRANSPORT_FAILED", retryable: true, ...options });
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class NotConnectedError extends StreamError {
  declare readonly code: "NOT_CONNECTED";

  constructor(message = "stream not connected") {
    super(message, { code: "NOT_CONNECTED", retryable: true });
    this.name = "NotConnectedError";
    Object.setPrototypeOf(this, NotConnectedError.prototype);
  }
}

/**
 * Inbound frame is not valid JSON or lacks required fields.
 */
export class ProtocolParseError extends StreamError {
  declare readonly code: "PROTOCOL_PARSE";

  constructor(message: string, options?: ErrorOptions) {
    super(message, { code: "PROTOCOL_PARSE", ...options });
    this.name = "ProtocolParseError";
    Object.setPrototypeOf(this, ProtocolParseError.prototype);
  }
}

/**
 * A user event or topic handler threw or returned a rejected promise.
 */
export class DispatchHandlerError extends StreamError {
  declare readonly code: "HANDLER_FAILED";

  readonly topic: string;

  constructor(message: string, topic: string, options?: ErrorOptions) {
    super(message, { code: "HANDLER_FAILED", ...options });
    this.name = "DispatchHandlerError";
    this.topic = topic;
    Object.setPrototypeOf(this, DispatchHandlerError.prototype);
  }
}

export class ConfigurationError extends StreamError {
  declare readonly code: "CONFIGURATION_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, { code: "CONFIGURATION_ERROR", ...options });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * REST call to the open platform failed.
 */
export class OpenApiError extends StreamError {
  declare readonly code: "OPENAPI_FAILED";

  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, { code: "OPENAPI_FAILED", ...options });
    this.name = "OpenApiError";
    this.status = options?.status;
    Object.setPrototypeOf(this, OpenApiError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
