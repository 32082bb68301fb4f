// Lv.3 — Chat session: connect -> authenticate -> ready, heartbeat, reconnect, correlation

import type { TokenProvider } from "./auth.js";
import { CorrelationRegistry } from "./correlation.js";
import { ChatSessionError } from "./errors.js";
import { type Dispatcher, type ErrorHandler, EventRouter, microtaskDispatcher } from "./event-router.js";
import { type LogSink, describeError } from "./log.js";
import { decodeFrame, encodeEnvelope } from "./protocol.js";
import type { Transport, TransportFactory } from "./transport.js";
import {
  type CurrentUser,
  type OutboundEnvelope,
  type SessionState,
  HEARTBEAT_INTERVAL_MS,
  MAX_RECONNECT_ATTEMPTS,
} from "./types.js";

export type ChatSessionOptions = {
  transportFactory: TransportFactory;
  tokenProvider: TokenProvider;
  log?: LogSink;
  dispatcher?: Dispatcher;
  authTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  reconnectBaseDelayMs?: number;
  maxReconnectAttempts?: number;
  sendTimeoutMs?: number;
};

export type SessionSnapshot = {
  state: SessionState;
  isAuthenticated: boolean;
  currentUser: CurrentUser | null;
  lastError: string | null;
  reconnectAttempt: number;
};

type PendingAuth = {
  resolve: () => void;
  reject: (err: ChatSessionError) => void;
  timer: ReturnType<typeof setTimeout>;
};

const silentLog: LogSink = { info: () => {}, warn: () => {}, error: () => {} };

export class ChatSession {
  readonly router: EventRouter;

  private readonly registry = new CorrelationRegistry();
  private readonly log: LogSink;
  private readonly authTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly reconnectBaseDelayMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly sendTimeoutMs: number;

  private transport: Transport | null = null;
  private connecting: Promise<void> | null = null;
  private pendingAuth: PendingAuth | null = null;
  private manualDisconnect = false;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private lastSequence: number | null = null;

  private snapshot: SessionSnapshot = {
    state: "disconnected",
    isAuthenticated: false,
    currentUser: null,
    lastError: null,
    reconnectAttempt: 0,
  };
  private readonly stateListeners = new Set<(state: SessionState) => void>();

  constructor(private readonly options: ChatSessionOptions) {
    this.log = options.log ?? silentLog;
    this.router = new EventRouter(options.dispatcher ?? microtaskDispatcher, this.log);
    this.authTimeoutMs = options.authTimeoutMs ?? 5_000;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? 2_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS;
    this.sendTimeoutMs = options.sendTimeoutMs ?? 5_000;
  }

  // ===== Observation =====

  get state(): SessionState {
    return this.snapshot.state;
  }

  get isAuthenticated(): boolean {
    return this.snapshot.isAuthenticated;
  }

  get currentUser(): CurrentUser | null {
    return this.snapshot.currentUser;
  }

  get lastError(): string | null {
    return this.snapshot.lastError;
  }

  get reconnectAttempt(): number {
    return this.snapshot.reconnectAttempt;
  }

  get pendingCorrelations(): number {
    return this.registry.size;
  }

  /** Immutable; replaced whenever any observed field changes. */
  getSnapshot(): SessionSnapshot {
    return this.snapshot;
  }

  onStateChange(listener: (state: SessionState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onError(handler: ErrorHandler): () => void {
    return this.router.onError(handler);
  }

  // ===== Lifecycle =====

  connect(): Promise<void> {
    this.manualDisconnect = false;
    if (this.connecting) return this.connecting;
    // an explicit connect after the reconnect budget ran out starts a fresh budget
    if (!this.reconnectTimer && this.snapshot.reconnectAttempt >= this.maxReconnectAttempts) {
      this.update({ reconnectAttempt: 0 });
    }
    return this.startConnect();
  }

  private startConnect(): Promise<void> {
    if (this.connecting) return this.connecting;
    const live = this.transport !== null && this.transport.isOpen;
    return this.track(live ? this.authenticate() : this.openAndAuthenticate());
  }

  disconnect(): void {
    this.manualDisconnect = true;
    this.clearReconnectTimer();
    this.stopHeartbeat();

    const transport = this.transport;
    this.transport = null;
    this.connecting = null;
    this.lastSequence = null;
    this.update({
      state: "disconnected",
      isAuthenticated: false,
      currentUser: null,
      reconnectAttempt: 0,
    });
    this.finishAuth(new ChatSessionError("connection_closed", "disconnected by client"));
    transport?.close();

    this.registry.clear();
    this.router.clear();
    this.log.info("chatline: disconnected");
  }

  private track(attempt: Promise<void>): Promise<void> {
    const tracked = attempt.finally(() => {
      if (this.connecting === tracked) this.connecting = null;
    });
    this.connecting = tracked;
    return tracked;
  }

  private async openAndAuthenticate(): Promise<void> {
    this.clearReconnectTimer();
    const transport = this.options.transportFactory({
      onMessage: (frame) => {
        if (this.transport !== transport) return; // stale connection
        this.handleFrame(frame);
      },
      onClose: (code, reason) => {
        if (this.transport !== transport) return;
        this.handleClose(code, reason);
      },
    });
    this.transport = transport;
    this.lastSequence = null;
    this.update({ state: "connecting" });

    try {
      await transport.open();
    } catch (err) {
      if (this.transport !== transport) {
        throw new ChatSessionError("connection_closed", "connection abandoned while opening", {
          cause: err,
        });
      }
      this.transport = null;
      this.update({ state: "disconnected" });
      this.log.warn(`chatline: connection failed: ${describeError(err)}`);
      this.scheduleReconnect();
      throw err instanceof ChatSessionError
        ? err
        : new ChatSessionError("connection_failed", describeError(err), { cause: err });
    }

    if (this.transport !== transport) {
      throw new ChatSessionError("connection_closed", "connection abandoned while opening");
    }
    this.log.info("chatline: connected");
    this.update({ state: "connected" });
    this.startHeartbeat();
    await this.authenticate();
  }

  private async authenticate(): Promise<void> {
    const transport = this.transport;
    if (!transport) throw new ChatSessionError("not_connected", "connection is not open");

    let token: string | null;
    try {
      token = await this.options.tokenProvider();
    } catch (err) {
      throw new ChatSessionError("auth_failed", `token lookup failed: ${describeError(err)}`, {
        cause: err,
      });
    }
    if (!token) {
      this.log.warn("chatline: no access token, authentication skipped");
      throw new ChatSessionError("auth_failed", "no access token available");
    }
    if (this.transport !== transport) {
      throw new ChatSessionError("connection_closed", "connection closed before authentication");
    }

    this.finishAuth(new ChatSessionError("auth_failed", "superseded by a newer authentication"));
    this.update({ state: "authenticating", isAuthenticated: false, currentUser: null });

    const result = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.finishAuth(
          new ChatSessionError("auth_failed", `no auth_success within ${this.authTimeoutMs}ms`),
        );
      }, this.authTimeoutMs);
      this.pendingAuth = { resolve, reject, timer };
    });

    try {
      await transport.send(encodeEnvelope({ type: "auth", token }));
    } catch (err) {
      this.finishAuth(
        new ChatSessionError("auth_failed", `auth frame not sent: ${describeError(err)}`, {
          cause: err,
        }),
      );
    }
    return result;
  }

  private finishAuth(error: ChatSessionError | null): void {
    const pending = this.pendingAuth;
    if (!pending) return;
    this.pendingAuth = null;
    clearTimeout(pending.timer);
    if (!error) {
      pending.resolve();
      return;
    }
    if (this.snapshot.state === "authenticating") {
      this.update({ state: "connected" });
    }
    if (error.code === "auth_failed") {
      this.log.warn(`chatline: authentication failed: ${error.message}`);
    }
    pending.reject(error);
  }

  private handleClose(code: number, reason: string): void {
    this.transport = null;
    this.stopHeartbeat();
    this.update({ state: "disconnected", isAuthenticated: false, currentUser: null });
    this.finishAuth(new ChatSessionError("connection_closed", `connection closed (code=${code})`));
    this.log.warn(`chatline: connection closed code=${code}${reason ? ` reason=${reason}` : ""}`);
    if (!this.manualDisconnect) this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.manualDisconnect || this.reconnectTimer) return;

    const attempt = this.snapshot.reconnectAttempt;
    if (attempt >= this.maxReconnectAttempts) {
      const message = `Failed to reconnect after ${this.maxReconnectAttempts} attempts`;
      this.log.error(`chatline: ${message}`);
      this.update({ lastError: message });
      this.router.reportError({ code: "RECONNECT_FAILED", message });
      return;
    }

    const next = attempt + 1;
    const delay = next * this.reconnectBaseDelayMs;
    this.update({ reconnectAttempt: next });
    this.log.info(`chatline: reconnecting in ${delay}ms (attempt ${next}/${this.maxReconnectAttempts})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.startConnect().catch((err: unknown) => {
        this.log.warn(`chatline: reconnect attempt ${next} failed: ${describeError(err)}`);
        if (!(err instanceof ChatSessionError) || err.code !== "auth_failed") return;
        // server error frames already set lastError and reached the error channel
        if (this.snapshot.lastError !== err.message) {
          this.update({ lastError: err.message });
          this.router.reportError({ code: "AUTH_FAILED", message: err.message });
        }
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (this.snapshot.state !== "authenticated") return;
      void this.send({ type: "ping" });
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // ===== Inbound =====

  private handleFrame(raw: string): void {
    const envelope = decodeFrame(raw, this.log);
    if (!envelope) return;

    if (envelope.type !== "pong") this.trackSequence(envelope.sequence);

    switch (envelope.type) {
      case "pong":
        return;

      case "auth_success":
        if (!this.pendingAuth) {
          this.log.debug?.("chatline: unsolicited auth_success ignored");
          return;
        }
        this.log.info(`chatline: authenticated as ${envelope.userId}`);
        this.update({
          state: "authenticated",
          isAuthenticated: true,
          currentUser: { id: envelope.userId, name: envelope.userName },
          lastError: null,
          reconnectAttempt: 0,
        });
        this.finishAuth(null);
        return;

      case "error": {
        const text = `${envelope.error.code}: ${envelope.error.message}`;
        this.log.warn(`chatline: server error ${text}`);
        this.update({ lastError: text });
        this.finishAuth(new ChatSessionError("auth_failed", text));
        this.router.dispatch(envelope);
        return;
      }

      case "message": {
        const user = this.snapshot.currentUser;
        if (user && envelope.message.senderId === user.id) {
          this.registry.resolveNext(envelope.message.id);
        }
        this.router.dispatch(envelope);
        return;
      }

      default:
        this.router.dispatch(envelope);
    }
  }

  private trackSequence(sequence: number | undefined): void {
    if (sequence === undefined) return;
    const expected = this.lastSequence === null ? null : this.lastSequence + 1;
    if (expected !== null && sequence !== expected) {
      this.log.warn(`chatline: sequence gap expected=${expected} got=${sequence}`);
    }
    this.lastSequence = sequence;
  }

  // ===== Outbound =====

  /** Resolves false (and logs) when nothing could be written. */
  async send(envelope: OutboundEnvelope): Promise<boolean> {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      this.log.warn(`chatline: cannot send ${envelope.type}, not connected`);
      return false;
    }
    try {
      await transport.send(encodeEnvelope(envelope));
      return true;
    } catch (err) {
      this.log.error(`chatline: send ${envelope.type} failed: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * Sends and waits for the next self-authored `message` echo.
   * Concurrent calls are matched oldest first and can swap ids.
   */
  async sendAndAwait(
    envelope: OutboundEnvelope,
    timeoutMs: number = this.sendTimeoutMs,
  ): Promise<string | null> {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      throw new ChatSessionError("not_connected", "connection is not open");
    }
    if (this.snapshot.state !== "authenticated") {
      throw new ChatSessionError("not_authenticated", "session is not authenticated");
    }

    const { key, promise } = this.registry.register(timeoutMs);
    try {
      await transport.send(encodeEnvelope(envelope));
    } catch (err) {
      this.registry.cancel(key);
      throw new ChatSessionError("send_failed", describeError(err), { cause: err });
    }
    return promise;
  }

  subscribe(conversationId: string): Promise<boolean> {
    return this.send({ type: "subscribe", conversationId });
  }

  unsubscribe(conversationId: string): Promise<boolean> {
    return this.send({ type: "unsubscribe", conversationId });
  }

  markRead(conversationId: string, messageId: string): Promise<boolean> {
    return this.send({ type: "mark_read", conversationId, messageId });
  }

  startTyping(conversationId: string): Promise<boolean> {
    return this.send({ type: "typing_start", conversationId });
  }

  stopTyping(conversationId: string): Promise<boolean> {
    return this.send({ type: "typing_stop", conversationId });
  }

  sendMessage(
    conversationId: string,
    content: string,
    extra: { forwardedFromId?: string; mediaIds?: string[] } = {},
  ): Promise<boolean> {
    return this.send({ type: "message", conversationId, content, ...extra });
  }

  editMessage(messageId: string, content: string): Promise<boolean> {
    return this.send({ type: "message_edit", messageId, content });
  }

  deleteMessage(messageId: string): Promise<boolean> {
    return this.send({ type: "message_delete", messageId });
  }

  forwardMessage(messageId: string, conversationId: string): Promise<boolean> {
    return this.send({ type: "message_forward", messageId, conversationId });
  }

  acknowledge(messageId: string, sequence?: number): Promise<boolean> {
    return this.send({ type: "ack", messageId, sequence });
  }

  // ===== Internal =====

  private update(patch: Partial<SessionSnapshot>): void {
    const prev = this.snapshot;
    const next: SessionSnapshot = { ...prev, ...patch };
    if (
      next.state === prev.state &&
      next.isAuthenticated === prev.isAuthenticated &&
      next.currentUser === prev.currentUser &&
      next.lastError === prev.lastError &&
      next.reconnectAttempt === prev.reconnectAttempt
    ) {
      return;
    }
    this.snapshot = next;
    for (const listener of [...this.stateListeners]) {
      try {
        listener(next.state);
      } catch (err) {
        this.log.error(`chatline: state listener threw: ${describeError(err)}`);
      }
    }
  }
}
