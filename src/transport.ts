// Lv.1 — Transport: one duplex text connection to the messaging server

import WebSocket from "ws";
import { ChatSessionError } from "./errors.js";

export type TransportHandlers = {
  onMessage: (frame: string) => void;
  /** Fires once, and only for a connection that had opened. */
  onClose: (code: number, reason: string) => void;
};

export interface Transport {
  readonly isOpen: boolean;
  open(): Promise<void>;
  send(frame: string): Promise<void>;
  close(): void;
}

export type TransportFactory = (handlers: TransportHandlers) => Transport;

export type WsTransportOptions = {
  url: string;
  headers?: Record<string, string>;
  handshakeTimeoutMs?: number;
};

function frameText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export class WsTransport implements Transport {
  private ws: WebSocket | null = null;
  private opened = false;

  constructor(
    private readonly options: WsTransportOptions,
    private readonly handlers: TransportHandlers,
  ) {}

  get isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  open(): Promise<void> {
    if (this.ws) {
      return Promise.reject(new ChatSessionError("connection_failed", "transport already used"));
    }
    const ws = new WebSocket(this.options.url, {
      headers: this.options.headers,
      handshakeTimeout: this.options.handshakeTimeoutMs ?? 10_000,
    });
    this.ws = ws;

    return new Promise<void>((resolve, reject) => {
      ws.once("open", () => {
        this.opened = true;
        resolve();
      });

      // text and binary frames both carry UTF-8 JSON
      ws.on("message", (data) => {
        this.handlers.onMessage(frameText(data));
      });

      ws.on("error", (err) => {
        if (!this.opened) {
          reject(new ChatSessionError("connection_failed", err.message, { cause: err }));
        }
        // after open, "close" follows and reports the failure
      });

      ws.once("close", (code, reason) => {
        if (!this.opened) {
          reject(new ChatSessionError("connection_failed", `closed before open (code=${code})`));
          return;
        }
        this.opened = false;
        this.handlers.onClose(code, reason.toString("utf8"));
      });
    });
  }

  send(frame: string): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChatSessionError("not_connected", "connection is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      ws.send(frame, (err) => {
        if (err) reject(new ChatSessionError("send_failed", err.message, { cause: err }));
        else resolve();
      });
    });
  }

  close(): void {
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    } else if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000, "client disconnect");
    }
  }
}

export function wsTransportFactory(options: WsTransportOptions): TransportFactory {
  return (handlers) => new WsTransport(options, handlers);
}
