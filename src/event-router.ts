// Lv.2 — Event router: inbound envelopes -> callbacks keyed by scope and kind

import type { LogSink } from "./log.js";
import type {
  ChatMessage,
  InboundEnvelope,
  MessageDeleteEvent,
  MessageEditEvent,
  MessageForwardEvent,
  PresenceEvent,
  ReadReceiptEvent,
  ServerError,
  TypingEvent,
} from "./types.js";

/** Execution context callbacks are delivered on. Must preserve submission order. */
export type Dispatcher = (task: () => void) => void;

export const microtaskDispatcher: Dispatcher = (task) => queueMicrotask(task);
export const immediateDispatcher: Dispatcher = (task) => task();

export type EventPayloads = {
  message: ChatMessage;
  message_edit: MessageEditEvent;
  message_delete: MessageDeleteEvent;
  message_forward: MessageForwardEvent;
  typing: TypingEvent;
  read: ReadReceiptEvent;
  presence: PresenceEvent;
};

export type EventKind = keyof EventPayloads;
export type EventHandler<K extends EventKind> = (payload: EventPayloads[K]) => void;
export type ErrorHandler = (error: ServerError) => void;

// per kind, the newest registration on top; only the top handler is called
type HandlerTable = { [K in EventKind]?: EventHandler<K>[] };

/** One implementation per UI scope (a conversation view, a presence badge). */
export interface ScopeListener {
  onMessage?(message: ChatMessage): void;
  onMessageEdit?(edit: MessageEditEvent): void;
  onMessageDelete?(deletion: MessageDeleteEvent): void;
  onMessageForward?(forward: MessageForwardEvent): void;
  onTyping?(typing: TypingEvent): void;
  onRead?(receipt: ReadReceiptEvent): void;
  onPresence?(presence: PresenceEvent): void;
}

export class EventRouter {
  private readonly scopes = new Map<string, HandlerTable>();
  private readonly errorHandlers = new Set<ErrorHandler>();

  constructor(
    private readonly dispatcher: Dispatcher = microtaskDispatcher,
    private readonly log?: LogSink,
  ) {}

  register<K extends EventKind>(scope: string, kind: K, handler: EventHandler<K>): void {
    let table = this.scopes.get(scope);
    if (!table) {
      table = {};
      this.scopes.set(scope, table);
    }
    const stack: EventHandler<K>[] = (table[kind] ?? []).filter((h) => h !== handler);
    stack.push(handler);
    table[kind] = stack;
  }

  /**
   * Removes `handler` from the kind's stack, so an earlier registration takes over again.
   * Without a handler every registration for the kind goes.
   */
  unregister<K extends EventKind>(scope: string, kind: K, handler?: EventHandler<K>): void {
    const table = this.scopes.get(scope);
    if (!table) return;
    const rest = handler ? (table[kind] ?? []).filter((h) => h !== handler) : [];
    if (rest.length > 0) table[kind] = rest;
    else delete table[kind];
    if (Object.keys(table).length === 0) this.scopes.delete(scope);
  }

  /** Replaces every registration under `scope`. */
  registerScope(scope: string, listener: ScopeListener): void {
    const table: HandlerTable = {};
    if (listener.onMessage) table.message = [(payload) => listener.onMessage?.(payload)];
    if (listener.onMessageEdit) table.message_edit = [(payload) => listener.onMessageEdit?.(payload)];
    if (listener.onMessageDelete) {
      table.message_delete = [(payload) => listener.onMessageDelete?.(payload)];
    }
    if (listener.onMessageForward) {
      table.message_forward = [(payload) => listener.onMessageForward?.(payload)];
    }
    if (listener.onTyping) table.typing = [(payload) => listener.onTyping?.(payload)];
    if (listener.onRead) table.read = [(payload) => listener.onRead?.(payload)];
    if (listener.onPresence) table.presence = [(payload) => listener.onPresence?.(payload)];
    this.scopes.set(scope, table);
  }

  unregisterScope(scope: string): void {
    this.scopes.delete(scope);
  }

  hasScope(scope: string): boolean {
    return this.scopes.has(scope);
  }

  onError(handler: ErrorHandler): () => void {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  reportError(error: ServerError): void {
    for (const handler of [...this.errorHandlers]) {
      this.dispatcher(() => handler(error));
    }
  }

  clear(): void {
    this.scopes.clear();
    this.errorHandlers.clear();
  }

  dispatch(envelope: InboundEnvelope): void {
    switch (envelope.type) {
      case "message":
        this.deliver(envelope.message.conversationId, "message", envelope.message);
        return;
      case "message_edit":
        this.deliver(envelope.edit.conversationId, "message_edit", envelope.edit);
        return;
      case "message_delete":
        this.deliver(envelope.deletion.conversationId, "message_delete", envelope.deletion);
        return;
      case "message_forward":
        this.deliver(envelope.forward.conversationId, "message_forward", envelope.forward);
        return;
      case "typing_start":
      case "typing_stop":
        this.deliver(envelope.typing.conversationId, "typing", envelope.typing);
        return;
      case "message_read":
        this.deliver(envelope.receipt.conversationId, "read", envelope.receipt);
        return;
      case "user_online":
      case "user_offline":
        this.deliver(envelope.presence.userId, "presence", envelope.presence);
        return;
      case "error":
        this.reportError(envelope.error);
        return;
      case "message_ack":
      case "mark_read_success":
      case "auth_success":
      case "pong":
        this.log?.debug?.(`chatline: no scope for ${envelope.type}, dropped`);
        return;
    }
  }

  private deliver<K extends EventKind>(
    scope: string | null,
    kind: K,
    payload: EventPayloads[K],
  ): void {
    if (scope === null) {
      this.log?.debug?.(`chatline: ${kind} without conversation id, dropped`);
      return;
    }
    const stack = this.scopes.get(scope)?.[kind];
    const handler = stack?.at(-1);
    if (!handler) return;
    this.dispatcher(() => handler(payload));
  }
}
