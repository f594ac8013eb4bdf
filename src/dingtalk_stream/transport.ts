import WebSocket from "ws";
import { NotConnectedError, TransportError, errorMessage } from "../errors.js";
import { AsyncQueue } from "./broadcast.js";
import type { Log } from "./logger.js";
import { Mutex } from "./mutex.js";

export type InboundFrame =
  | { kind: "text"; data: string }
  | { kind: "binary"; size: number }
  | { kind: "pong" }
  | { kind: "close"; code: number; reason: string };

export interface SocketHandlers {
  open(): void;
  message(data: string, isBinary: boolean): void;
  pong(): void;
  close(code: number, reason: string): void;
  error(err: Error): void;
}

/**
 * The slice of a websocket the session needs. `send` and `ping` resolve once the write completes.
 */
export interface StreamSocket {
  send(data: string): Promise<void>;
  ping(): Promise<void>;
  close(): void;
  terminate(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => StreamSocket;

/**
 * Default factory backed by `ws`. The gateway serves self-signed certificates, so certificate and
 * hostname checks are off.
 */
export const HANDSHAKE_TIMEOUT_MS = 30_000;

export const createWsSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url, { rejectUnauthorized: false, handshakeTimeout: HANDSHAKE_TIMEOUT_MS });

  ws.on("open", () => handlers.open());
  ws.on("message", (data, isBinary) => {
    const buf = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
    handlers.message(buf.toString(isBinary ? "latin1" : "utf8"), isBinary);
  });
  ws.on("pong", () => handlers.pong());
  ws.on("close", (code, reason) => handlers.close(code, reason.toString("utf8")));
  ws.on("error", (err) => handlers.error(err));

  const write = (fn: (cb: (err?: Error) => void) => void) =>
    new Promise<void>((resolve, reject) => {
      if (ws.readyState !== WebSocket.OPEN) {
        reject(new NotConnectedError(`socket is not open (readyState=${ws.readyState})`));
        return;
      }
      fn((err) => (err ? reject(err) : resolve()));
    });

  return {
    send: (data) => write((cb) => ws.send(data, cb)),
    ping: () => write((cb) => ws.ping(undefined, undefined, cb)),
    close: () => ws.close(),
    terminate: () => ws.terminate(),
  };
};

/**
 * One websocket connection. The send side is serialised through a mutex so pings and acks never
 * interleave; the receive side is an async iterable consumed by the dispatcher.
 */
export class TransportSession {
  private socket: StreamSocket | null = null;
  private inbound: AsyncQueue<InboundFrame> | null = null;
  private writeLock = new Mutex();
  private alive = false;
  private cancelOpen: (() => void) | null = null;

  constructor(
    private readonly log: Log,
    private readonly socketFactory: SocketFactory = createWsSocket,
  ) {}

  get isAlive(): boolean {
    return this.alive;
  }

  /**
   * Open a connection and return its receive side. Any previous connection is dropped first.
   * {@link close} during the handshake terminates the socket and rejects with a `TransportError`.
   */
  async open(url: string): Promise<AsyncIterable<InboundFrame>> {
    this.close();

    const inbound = new AsyncQueue<InboundFrame>();
    let opened = false;

    const socket = await new Promise<StreamSocket>((resolve, reject) => {
      let created: StreamSocket | null = null;
      let failure: Error | null = null;
      const handlers: SocketHandlers = {
        open: () => {
          opened = true;
          if (created) resolve(created);
        },
        message: (data, isBinary) => {
          inbound.push(isBinary ? { kind: "binary", size: data.length } : { kind: "text", data });
        },
        pong: () => {
          inbound.push({ kind: "pong" });
        },
        close: (code, reason) => {
          if (!opened) {
            created?.terminate();
            reject(new TransportError(`websocket closed during handshake, code=${code} ${reason}`));
            return;
          }
          inbound.push({ kind: "close", code, reason });
          inbound.close();
        },
        error: (err) => {
          if (!opened) {
            failure = err;
            created?.terminate();
            reject(new TransportError(`websocket handshake failed: ${err.message}`, { cause: err }));
            return;
          }
          this.log.warn(`websocket read error: ${err.message}`);
          inbound.close();
        },
      };
      this.cancelOpen = () => {
        created?.terminate();
        reject(new TransportError("websocket open cancelled"));
      };
      try {
        created = this.socketFactory(url, handlers);
      } catch (err) {
        reject(new TransportError(`cannot open websocket: ${errorMessage(err)}`, { cause: err }));
        return;
      }
      if (failure) {
        created.terminate();
      } else if (opened) {
        resolve(created);
      }
    }).finally(() => {
      this.cancelOpen = null;
    });

    this.socket = socket;
    this.inbound = inbound;
    this.alive = true;
    return inbound;
  }

  async send(frame: unknown): Promise<void> {
    const text = JSON.stringify(frame);
    await this.write((socket) => socket.send(text));
  }

  async ping(): Promise<void> {
    await this.write((socket) => socket.ping());
  }

  /**
   * Tear the connection down and end the receive side. Frames not yet read are dropped.
   */
  close(): void {
    const cancelOpen = this.cancelOpen;
    this.cancelOpen = null;
    cancelOpen?.();
    this.alive = false;
    const socket = this.socket;
    this.socket = null;
    this.inbound?.close(true);
    this.inbound = null;
    if (socket) {
      try {
        socket.terminate();
      } catch (err) {
        this.log.debug(`terminate failed: ${errorMessage(err)}`);
      }
    }
  }

  private write(fn: (socket: StreamSocket) => Promise<void>): Promise<void> {
    return this.writeLock.lock(async () => {
      const socket = this.socket;
      if (!socket) throw new NotConnectedError();
      await fn(socket);
    });
  }
}
