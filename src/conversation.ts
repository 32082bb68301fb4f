// Lv.4 — Conversation view: history, pagination, live merge, two-phase send

import type { ClientConfig } from "./config.js";
import type { ScopeListener } from "./event-router.js";
import { type LogSink, describeError } from "./log.js";
import type { MessageCache } from "./message-cache.js";
import type { ChatApi } from "./rest-client.js";
import type { ChatSession } from "./session.js";
import {
  type Attachment,
  type AttachmentPayload,
  type AttachmentState,
  type ChatMessage,
  type DisplayMessage,
  type MessageDeleteEvent,
  type MessageEditEvent,
  type MessageForwardEvent,
  type PresenceEvent,
  type ReadReceiptEvent,
  type TypingEvent,
  LOCAL_ECHO_WINDOW_MS,
} from "./types.js";

export type ConversationSnapshot = {
  conversationId: string;
  messages: readonly DisplayMessage[];
  oldestLoadedId: string | null;
  hasMore: boolean;
  totalLoaded: number;
  attachments: readonly Attachment[];
  isLoading: boolean;
  isLoadingOlder: boolean;
  isSending: boolean;
  errorMessage: string | null;
  peerTyping: { userName: string } | null;
  peerOnline: boolean | null;
};

export type LoadResult =
  | { source: "cache"; freshnessCheck: Promise<boolean> }
  | { source: "network" }
  | { source: "failed"; reason: string };

export type SendResult =
  | { status: "skipped" }
  | { status: "sent"; messageId: string | null; failedUploads: number }
  | { status: "unconfirmed" }
  | { status: "failed"; reason: string };

export type ConversationTuning = Pick<
  ClientConfig,
  "pageSize" | "historyBatchSize" | "sendTimeoutMs" | "typingIdleMs" | "mediaRefreshDelayMs"
>;

export type ConversationOptions = {
  conversationId: string;
  session: ChatSession;
  api: ChatApi;
  cache: MessageCache;
  /** The other participant of a dialog; enables presence tracking. */
  peerUserId?: string;
  log?: LogSink;
  tuning?: Partial<ConversationTuning>;
  now?: () => number;
};

const DEFAULT_TUNING: ConversationTuning = {
  pageSize: 50,
  historyBatchSize: 100,
  sendTimeoutMs: 5_000,
  typingIdleMs: 3_000,
  mediaRefreshDelayMs: 2_000,
};

export function toDisplayMessage(message: ChatMessage, currentUserId: string | null): DisplayMessage {
  return {
    id: message.id,
    content: message.content,
    timestamp: message.createdAt,
    updatedAt: message.updatedAt,
    isFromCurrentUser: currentUserId !== null && message.senderId === currentUserId,
    senderName: message.senderName,
    isEdited: message.isEdited,
    isDeleted: message.isDeleted,
    isRead: false,
    media: message.media,
  };
}

// Array.prototype.sort is stable, so equal timestamps keep arrival order
function sortByTimestamp(messages: DisplayMessage[]): DisplayMessage[] {
  return messages.sort((a, b) => a.timestamp - b.timestamp);
}

function carriesMoreThan(incoming: DisplayMessage, existing: DisplayMessage): boolean {
  if (existing.isPending) return true;
  if (incoming.media.length !== existing.media.length) {
    return incoming.media.length > existing.media.length;
  }
  return incoming.updatedAt > existing.updatedAt;
}

function uniqueById(messages: ChatMessage[]): ChatMessage[] {
  const seen = new Set<string>();
  return messages.filter((m) => {
    if (seen.has(m.id)) return false;
    seen.add(m.id);
    return true;
  });
}

const silentLog: LogSink = { info: () => {}, warn: () => {}, error: () => {} };

export class Conversation {
  readonly conversationId: string;

  private readonly session: ChatSession;
  private readonly api: ChatApi;
  private readonly cache: MessageCache;
  private readonly peerUserId: string | null;
  private readonly log: LogSink;
  private readonly tuning: ConversationTuning;
  private readonly now: () => number;

  private state: ConversationSnapshot;
  private readonly listeners = new Set<() => void>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private typingIdleTimer: ReturnType<typeof setTimeout> | null = null;
  private isTyping = false;
  private olderInFlight = false;
  private closed = true;
  private epoch = 0;
  private localCounter = 0;
  private attachmentCounter = 0;

  private readonly listener: ScopeListener = {
    onMessage: (message) => this.handleIncoming(message),
    onMessageEdit: (edit) => this.handleEdit(edit),
    onMessageDelete: (deletion) => this.handleDelete(deletion),
    onMessageForward: (forward) => this.handleForward(forward),
    onTyping: (typing) => this.handleTyping(typing),
    onRead: (receipt) => this.handleRead(receipt),
  };
  private readonly onPeerPresence = (presence: PresenceEvent) => this.handlePresence(presence);

  constructor(options: ConversationOptions) {
    this.conversationId = options.conversationId;
    this.session = options.session;
    this.api = options.api;
    this.cache = options.cache;
    this.peerUserId = options.peerUserId ?? null;
    this.log = options.log ?? silentLog;
    this.tuning = { ...DEFAULT_TUNING, ...options.tuning };
    this.now = options.now ?? Date.now;
    this.state = {
      conversationId: options.conversationId,
      messages: [],
      oldestLoadedId: null,
      hasMore: true,
      totalLoaded: 0,
      attachments: [],
      isLoading: false,
      isLoadingOlder: false,
      isSending: false,
      errorMessage: null,
      peerTyping: null,
      peerOnline: null,
    };
  }

  // ===== Observation =====

  getSnapshot(): ConversationSnapshot {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===== Lifecycle =====

  async open(): Promise<LoadResult> {
    if (this.closed) {
      this.closed = false;
      this.epoch += 1;
      const router = this.session.router;
      router.registerScope(this.conversationId, this.listener);
      if (this.peerUserId) router.register(this.peerUserId, "presence", this.onPeerPresence);
      await this.session.subscribe(this.conversationId);
    }
    return this.loadMessages();
  }

  close(): void {
    if (this.closed) return;
    this.stopTyping();
    this.closed = true;
    this.epoch += 1;

    const router = this.session.router;
    router.unregisterScope(this.conversationId);
    if (this.peerUserId) router.unregister(this.peerUserId, "presence", this.onPeerPresence);
    void this.session.unsubscribe(this.conversationId);

    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.olderInFlight = false;
    this.patch({ isLoading: false, isLoadingOlder: false, isSending: false, peerTyping: null });
  }

  private isStale(epoch: number): boolean {
    return this.closed || epoch !== this.epoch;
  }

  // ===== History =====

  async loadMessages(options: { force?: boolean } = {}): Promise<LoadResult> {
    if (!options.force) {
      const cached = this.cache.get(this.conversationId);
      if (cached) {
        this.applyPage([...cached.messages], cached.hasMore);
        return { source: "cache", freshnessCheck: this.checkForNewMessages() };
      }
    }

    const epoch = this.epoch;
    const { pageSize, historyBatchSize } = this.tuning;
    this.patch({ isLoading: true, errorMessage: null });
    try {
      const collected: ChatMessage[] = [];
      let exhausted = false;
      while (collected.length < pageSize) {
        const batch = await this.api.fetchMessages(
          this.conversationId,
          collected.length,
          historyBatchSize,
        );
        if (this.isStale(epoch)) return { source: "failed", reason: "closed" };
        collected.push(...batch);
        if (batch.length < historyBatchSize) {
          exhausted = true;
          break;
        }
      }

      const newest = uniqueById(collected);
      const hasMore = !exhausted || newest.length > pageSize;
      const userId = this.currentUserId();
      // newest first on the wire; reverse so ties keep their arrival order
      const page = newest
        .slice(0, pageSize)
        .reverse()
        .map((m) => toDisplayMessage(m, userId));

      this.applyPage(page, hasMore);
      this.writeCache();
      this.log.debug?.(`chatline: loaded ${page.length} messages for ${this.conversationId}`);
      return { source: "network" };
    } catch (err) {
      const reason = describeError(err);
      if (!this.isStale(epoch)) {
        this.patch({ isLoading: false, errorMessage: `Failed to load messages: ${reason}` });
      }
      this.log.error(`chatline: loading ${this.conversationId} failed: ${reason}`);
      return { source: "failed", reason };
    }
  }

  /** Resolves true when the newest server message differed and the view was reloaded. */
  async checkForNewMessages(): Promise<boolean> {
    const epoch = this.epoch;
    try {
      const [latest] = await this.api.fetchMessages(this.conversationId, 0, 1);
      if (this.isStale(epoch) || !latest) return false;
      if (latest.id === this.newestConfirmedId()) return false;
      this.log.debug?.(`chatline: ${this.conversationId} has newer messages, reloading`);
      const result = await this.loadMessages({ force: true });
      return result.source === "network";
    } catch (err) {
      this.log.warn(`chatline: freshness check for ${this.conversationId} failed: ${describeError(err)}`);
      return false;
    }
  }

  /** Resolves with the number of older messages added. */
  async loadOlderMessages(): Promise<number> {
    const oldestId = this.state.oldestLoadedId;
    if (!this.state.hasMore || this.olderInFlight || oldestId === null) return 0;

    const epoch = this.epoch;
    const { pageSize, historyBatchSize } = this.tuning;
    this.olderInFlight = true;
    this.patch({ isLoadingOlder: true });
    try {
      const older: ChatMessage[] = [];
      let seenOldest = false;
      let skip = 0;
      let more = true;

      scan: for (;;) {
        const batch = await this.api.fetchMessages(this.conversationId, skip, historyBatchSize);
        if (this.isStale(epoch)) return 0;
        skip += batch.length;
        for (const [index, message] of batch.entries()) {
          if (!seenOldest) {
            seenOldest = message.id === oldestId;
            continue;
          }
          older.push(message);
          if (older.length >= pageSize) {
            more = index < batch.length - 1 || batch.length === historyBatchSize;
            break scan;
          }
        }
        if (batch.length < historyBatchSize) {
          more = false;
          break;
        }
      }

      if (!seenOldest) {
        this.log.warn(`chatline: ${oldestId} no longer in ${this.conversationId} history`);
      }

      const known = new Set(this.state.messages.map((m) => m.id));
      const userId = this.currentUserId();
      const added = uniqueById(older)
        .filter((m) => !known.has(m.id))
        .reverse()
        .map((m) => toDisplayMessage(m, userId));

      this.commitMessages(sortByTimestamp([...added, ...this.state.messages]), { hasMore: more });
      return added.length;
    } catch (err) {
      this.log.error(`chatline: loading older messages failed: ${describeError(err)}`);
      if (!this.isStale(epoch)) {
        this.patch({ errorMessage: `Failed to load messages: ${describeError(err)}` });
      }
      return 0;
    } finally {
      if (!this.isStale(epoch)) {
        this.olderInFlight = false;
        this.patch({ isLoadingOlder: false });
      }
    }
  }

  // ===== Live events =====

  private handleIncoming(message: ChatMessage): void {
    if (this.closed) return;
    const incoming = toDisplayMessage(message, this.currentUserId());
    const messages = [...this.state.messages];

    const index = messages.findIndex((m) => m.id === incoming.id);
    if (index >= 0) {
      const existing = messages[index];
      if (!carriesMoreThan(incoming, existing)) return;
      messages[index] = { ...incoming, isRead: existing.isRead };
      this.commitMessages(messages);
      return;
    }

    // local entries carry the device clock; compare arrival time, not the server timestamp
    const arrivedAt = this.now();
    const echoIndex = incoming.isFromCurrentUser
      ? messages.findIndex(
          (m) =>
            m.isPending === true &&
            m.content === incoming.content &&
            arrivedAt - m.timestamp < LOCAL_ECHO_WINDOW_MS,
        )
      : -1;

    if (echoIndex >= 0) {
      messages[echoIndex] = incoming;
    } else {
      messages.push(incoming);
    }
    this.commitMessages(sortByTimestamp(messages));

    if (!incoming.isFromCurrentUser) {
      if (this.state.peerTyping) this.patch({ peerTyping: null });
      if (incoming.media.length === 0) this.scheduleMediaRefresh(incoming.id);
    }
  }

  // media can be attached after the text arrives; look once more a bit later
  private scheduleMediaRefresh(messageId: string): void {
    const delay = this.tuning.mediaRefreshDelayMs;
    if (delay <= 0) return;
    const epoch = this.epoch;
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.api
        .fetchMessage(this.conversationId, messageId)
        .then((fresh) => {
          if (fresh && !this.isStale(epoch)) this.handleIncoming(fresh);
        })
        .catch((err: unknown) => {
          this.log.warn(`chatline: refreshing ${messageId} failed: ${describeError(err)}`);
        });
    }, delay);
    this.timers.add(timer);
  }

  private handleEdit(edit: MessageEditEvent): void {
    this.updateMessage(edit.messageId, (m) => ({
      ...m,
      content: edit.content ?? m.content,
      isEdited: true,
      updatedAt: edit.updatedAt ?? m.updatedAt,
    }));
  }

  private handleDelete(deletion: MessageDeleteEvent): void {
    this.updateMessage(deletion.messageId, (m) => ({
      ...m,
      isDeleted: true,
      updatedAt: deletion.deletedAt ?? m.updatedAt,
    }));
  }

  private handleForward(forward: MessageForwardEvent): void {
    const newId = forward.newMessageId;
    if (this.closed || !newId || this.state.messages.some((m) => m.id === newId)) return;
    const epoch = this.epoch;
    this.api
      .fetchMessage(this.conversationId, newId)
      .then((message) => {
        if (message && !this.isStale(epoch)) this.handleIncoming(message);
      })
      .catch((err: unknown) => {
        this.log.warn(`chatline: loading forwarded ${newId} failed: ${describeError(err)}`);
      });
  }

  // a receipt for one of our messages covers everything we sent before it
  private handleRead(receipt: ReadReceiptEvent): void {
    if (this.closed || receipt.readerId === this.currentUserId()) return;
    const target = this.state.messages.find((m) => m.id === receipt.messageId);
    if (!target) return;
    let changed = false;
    const messages = this.state.messages.map((m) => {
      if (!m.isFromCurrentUser || m.isRead || m.isPending || m.timestamp > target.timestamp) {
        return m;
      }
      changed = true;
      return { ...m, isRead: true };
    });
    if (changed) this.commitMessages(messages);
  }

  private handleTyping(typing: TypingEvent): void {
    if (this.closed || typing.userId === this.currentUserId()) return;
    this.patch({ peerTyping: typing.isTyping ? { userName: typing.userName } : null });
  }

  private handlePresence(presence: PresenceEvent): void {
    if (this.closed) return;
    this.patch({ peerOnline: presence.isOnline });
  }

  // ===== Sending =====

  async sendMessage(text: string): Promise<SendResult> {
    const trimmed = text.trim();
    const attachments = this.state.attachments;
    if (this.closed || this.state.isSending || (!trimmed && attachments.length === 0)) {
      return { status: "skipped" };
    }

    this.stopTyping();
    const epoch = this.epoch;
    this.patch({ isSending: true, errorMessage: null });
    try {
      return attachments.length === 0
        ? await this.sendText(trimmed, epoch)
        : await this.sendWithAttachments(trimmed, attachments, epoch);
    } finally {
      if (!this.isStale(epoch)) this.patch({ isSending: false });
    }
  }

  private async sendText(content: string, epoch: number): Promise<SendResult> {
    const localId = this.insertLocal(content);
    const sent = await this.session.sendMessage(this.conversationId, content);
    if (sent) return { status: "sent", messageId: null, failedUploads: 0 };

    const reason = "not connected";
    if (!this.isStale(epoch)) {
      this.removeMessage(localId);
      this.patch({ errorMessage: `Could not send message: ${reason}` });
    }
    return { status: "failed", reason };
  }

  private async sendWithAttachments(
    text: string,
    attachments: readonly Attachment[],
    epoch: number,
  ): Promise<SendResult> {
    const content = text || " ";
    const sentIds = new Set(attachments.map((a) => a.id));
    const localId = this.insertLocal(content);

    try {
      // phase 1: the text, correlated to learn the server id
      let messageId: string | null;
      try {
        messageId = await this.session.sendAndAwait(
          { type: "message", conversationId: this.conversationId, content },
          this.tuning.sendTimeoutMs,
        );
      } catch (err) {
        const reason = describeError(err);
        if (!this.isStale(epoch)) {
          this.removeMessage(localId);
          this.patch({ errorMessage: `Could not send message: ${reason}` });
        }
        return { status: "failed", reason };
      }

      if (messageId === null) {
        if (!this.isStale(epoch)) {
          this.patch({
            errorMessage:
              "Message sent, but its id could not be confirmed, so attachments were not uploaded.",
          });
        }
        return { status: "unconfirmed" };
      }

      // phase 2: uploads tagged with the id
      const failures: string[] = [];
      for (const attachment of attachments) {
        this.setAttachmentState(attachment.id, { status: "uploading" });
        try {
          const mediaId = await this.api.uploadMedia({
            conversationId: this.conversationId,
            messageId,
            data: attachment.payload.data,
            contentType: attachment.payload.contentType,
            fileName: attachment.payload.fileName,
          });
          this.setAttachmentState(attachment.id, { status: "uploaded", mediaId });
        } catch (err) {
          const reason = describeError(err);
          failures.push(reason);
          this.setAttachmentState(attachment.id, { status: "failed", reason });
          this.log.warn(`chatline: upload of ${attachment.id} failed: ${reason}`);
        }
      }

      // phase 3: the authoritative record, with whatever media made it
      try {
        const fresh = await this.api.fetchMessage(this.conversationId, messageId);
        if (fresh && !this.isStale(epoch)) this.replaceMessage([localId, messageId], fresh);
      } catch (err) {
        this.log.warn(`chatline: reloading ${messageId} failed: ${describeError(err)}`);
      }

      if (failures.length > 0 && !this.isStale(epoch)) {
        this.patch({
          errorMessage: `Message sent, but ${failures.length} attachment(s) failed to upload: ${failures[0]}`,
        });
      }
      return { status: "sent", messageId, failedUploads: failures.length };
    } finally {
      if (!this.isStale(epoch)) {
        this.patch({ attachments: this.state.attachments.filter((a) => !sentIds.has(a.id)) });
      }
    }
  }

  // ===== Attachments =====

  addAttachment(payload: AttachmentPayload): string {
    this.attachmentCounter += 1;
    const id = `att-${this.attachmentCounter}`;
    this.patch({
      attachments: [...this.state.attachments, { id, payload, state: { status: "pending" } }],
    });
    return id;
  }

  removeAttachment(id: string): void {
    const attachments = this.state.attachments.filter((a) => a.id !== id);
    if (attachments.length !== this.state.attachments.length) this.patch({ attachments });
  }

  private setAttachmentState(id: string, state: AttachmentState): void {
    this.patch({
      attachments: this.state.attachments.map((a) => (a.id === id ? { ...a, state } : a)),
    });
  }

  // ===== Typing, receipts, edits =====

  startTyping(): void {
    if (this.closed) return;
    if (this.typingIdleTimer) clearTimeout(this.typingIdleTimer);
    this.typingIdleTimer = setTimeout(() => {
      this.typingIdleTimer = null;
      this.stopTyping();
    }, this.tuning.typingIdleMs);
    if (this.isTyping) return;
    this.isTyping = true;
    void this.session.startTyping(this.conversationId);
  }

  stopTyping(): void {
    if (this.typingIdleTimer) {
      clearTimeout(this.typingIdleTimer);
      this.typingIdleTimer = null;
    }
    if (!this.isTyping) return;
    this.isTyping = false;
    void this.session.stopTyping(this.conversationId);
  }

  markRead(messageId: string): Promise<boolean> {
    return this.session.markRead(this.conversationId, messageId);
  }

  editMessage(messageId: string, content: string): Promise<boolean> {
    return this.session.editMessage(messageId, content);
  }

  deleteMessage(messageId: string): Promise<boolean> {
    return this.session.deleteMessage(messageId);
  }

  forwardMessage(messageId: string, targetConversationId: string): Promise<boolean> {
    return this.session.forwardMessage(messageId, targetConversationId);
  }

  // ===== Internal =====

  private currentUserId(): string | null {
    return this.session.currentUser?.id ?? null;
  }

  private newestConfirmedId(): string | null {
    const confirmed = this.state.messages.filter((m) => !m.isPending);
    return confirmed.length > 0 ? confirmed[confirmed.length - 1].id : null;
  }

  private insertLocal(content: string): string {
    this.localCounter += 1;
    const id = `local-${this.localCounter}`;
    const now = this.now();
    const local: DisplayMessage = {
      id,
      content,
      timestamp: now,
      updatedAt: now,
      isFromCurrentUser: true,
      senderName: this.session.currentUser?.name ?? "",
      isEdited: false,
      isDeleted: false,
      isRead: false,
      media: [],
      isPending: true,
    };
    this.commitMessages(sortByTimestamp([...this.state.messages, local]));
    return id;
  }

  private removeMessage(id: string): void {
    const messages = this.state.messages.filter((m) => m.id !== id);
    if (messages.length !== this.state.messages.length) this.commitMessages(messages);
  }

  private replaceMessage(ids: readonly string[], fresh: ChatMessage): void {
    const display = toDisplayMessage(fresh, this.currentUserId());
    const rest = this.state.messages.filter((m) => !ids.includes(m.id) && m.id !== fresh.id);
    this.commitMessages(sortByTimestamp([...rest, display]));
  }

  private updateMessage(id: string, update: (m: DisplayMessage) => DisplayMessage): void {
    if (this.closed) return;
    const index = this.state.messages.findIndex((m) => m.id === id);
    if (index < 0) return;
    const messages = [...this.state.messages];
    messages[index] = update(messages[index]);
    this.commitMessages(messages);
  }

  private applyPage(page: DisplayMessage[], hasMore: boolean): void {
    // each own confirmed message in the page settles at most one pending entry with its text
    const ownContents = page.filter((p) => p.isFromCurrentUser).map((p) => p.content);
    const pending = this.state.messages.filter((m) => {
      if (m.isPending !== true || page.some((p) => p.id === m.id)) return false;
      const match = ownContents.indexOf(m.content);
      if (match < 0) return true;
      ownContents.splice(match, 1);
      return false;
    });
    const messages = sortByTimestamp([...page, ...pending]);
    this.patch({
      messages,
      hasMore,
      oldestLoadedId: page.length > 0 ? page[0].id : null,
      totalLoaded: page.length,
      isLoading: false,
      errorMessage: null,
    });
  }

  private commitMessages(messages: DisplayMessage[], extra: { hasMore?: boolean } = {}): void {
    const confirmed = messages.filter((m) => !m.isPending);
    this.patch({
      messages,
      oldestLoadedId: confirmed.length > 0 ? confirmed[0].id : null,
      totalLoaded: confirmed.length,
      ...extra,
    });
    this.writeCache();
  }

  private writeCache(): void {
    this.cache.set(this.conversationId, {
      messages: this.state.messages.filter((m) => !m.isPending),
      hasMore: this.state.hasMore,
    });
  }

  private patch(partial: Partial<ConversationSnapshot>): void {
    this.state = { ...this.state, ...partial };
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (err) {
        this.log.error(`chatline: conversation listener threw: ${describeError(err)}`);
      }
    }
  }
}
