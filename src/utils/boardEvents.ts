// WebSocket subscription to the board's event stream, reconnecting after a
// fixed delay whenever the connection drops.

import WebSocket from "ws";
import { decodeFrame } from "../board/decode";
import { DecodeError, TransportError } from "../board/errors";
import type { Message } from "../board/types";
import { createConnectionStore, type ConnectionStore } from "../store/connection";
import type { ReconnectPolicy } from "./config";
import { dinfo, dlog, dwarn } from "./logger";

/** The slice of a `ws` socket the subscription relies on. */
export interface BoardSocket {
  on(event: "open", listener: () => void): unknown;
  on(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  close(): void;
}

export type SocketFactory = (url: string) => BoardSocket;

export type BoardEventHandlers = {
  onMessage: (message: Message) => void;
  onDecodeError?: (err: DecodeError, raw: string) => void;
  onOpen?: () => void;
  onError?: (err: TransportError) => void;
  onClose?: (code: number, reason: string) => void;
};

export type BoardSubscription = {
  close: () => void;
  store: ConnectionStore;
};

const openWebSocket: SocketFactory = (url) => new WebSocket(url);

export function rawToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export function subscribeBoardEvents(
  url: string,
  handlers: BoardEventHandlers,
  policy: ReconnectPolicy,
  opts: { createSocket?: SocketFactory; store?: ConnectionStore } = {},
): BoardSubscription {
  const createSocket = opts.createSocket ?? openWebSocket;
  const store = opts.store ?? createConnectionStore();
  let socket: BoardSocket | null = null;
  let alive = true;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;

  function handleFrame(text: string) {
    let message: Message | null;
    try {
      message = decodeFrame(text);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      if (handlers.onDecodeError) handlers.onDecodeError(err, text);
      else dwarn("[Board] dropped frame:", err.message);
      return;
    }
    if (message) handlers.onMessage(message);
    else dlog("[Board] ignored non-state frame");
  }

  function reportError(err: TransportError) {
    store.getState().failed(err.message);
    handlers.onError?.(err);
  }

  function scheduleReconnect() {
    const { attempts } = store.getState();
    if (policy.maxAttempts !== null && attempts >= policy.maxAttempts) {
      dwarn(`[Board] giving up after ${attempts} reconnect attempt(s)`);
      alive = false;
      store.getState().stopped();
      return;
    }
    store.getState().waiting();
    dinfo(`[Board] reconnecting in ${policy.delayMs}ms`);
    retryTimer = setTimeout(() => {
      retryTimer = null;
      connect();
    }, policy.delayMs);
  }

  function connect() {
    if (!alive) return;
    store.getState().connecting();
    let s: BoardSocket;
    try {
      s = createSocket(url);
    } catch (err) {
      reportError(new TransportError(`cannot open ${url}`, { cause: err }));
      scheduleReconnect();
      return;
    }
    socket = s;
    s.on("open", () => {
      store.getState().opened();
      handlers.onOpen?.();
    });
    s.on("message", (data) => handleFrame(rawToText(data)));
    s.on("error", (err) => {
      // aborting a pending handshake on close() reports an error we asked for
      if (!alive) return;
      reportError(new TransportError(err.message, { cause: err }));
    });
    s.on("close", (code, reason) => {
      if (socket === s) socket = null;
      store.getState().dropped(code);
      handlers.onClose?.(code, reason.toString("utf8"));
      if (alive) scheduleReconnect();
      else store.getState().stopped();
    });
  }

  connect();
  return {
    store,
    close: () => {
      alive = false;
      if (retryTimer) {
        clearTimeout(retryTimer);
        retryTimer = null;
      }
      if (socket) socket.close();
      else store.getState().stopped();
    },
  };
}
