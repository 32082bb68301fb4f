// Lv.0 — Primitives

export type MessageMedia = {
  id: string;
  contentType: string;
  url: string;
  size: number;
  messageId: string | null;
  createdAt: number;
  updatedAt: number;
};

export type ChatMessage = {
  id: string;
  content: string;
  senderId: string;
  senderName: string;
  conversationId: string;
  forwardedFromId: string | null;
  media: MessageMedia[];
  createdAt: number;
  updatedAt: number;
  isEdited: boolean;
  isDeleted: boolean;
};

export type DisplayMessage = {
  id: string;
  content: string;
  timestamp: number;
  updatedAt: number;
  isFromCurrentUser: boolean;
  senderName: string;
  isEdited: boolean;
  isDeleted: boolean;
  isRead: boolean;
  media: MessageMedia[];
  isPending?: boolean; // local optimistic entry, not yet echoed by the server
};

export type CurrentUser = { id: string; name: string };

export type ConversationParticipant = {
  id: string;
  userId: string;
  userName: string;
  isOnline: boolean;
};

export type ConversationSummary = {
  id: string;
  name: string | null;
  conversationType: "dialog" | "polylogue";
  participants: ConversationParticipant[];
  updatedAt: number;
  isDeleted: boolean;
};

// ===== Wire envelopes =====

export type OutboundEnvelope =
  | { type: "auth"; token: string }
  | {
      type: "message";
      conversationId: string;
      content: string;
      forwardedFromId?: string;
      mediaIds?: string[];
    }
  | { type: "message_edit"; messageId: string; content: string }
  | { type: "message_delete"; messageId: string }
  | { type: "message_forward"; messageId: string; conversationId: string }
  | { type: "typing_start"; conversationId: string }
  | { type: "typing_stop"; conversationId: string }
  | { type: "mark_read"; messageId: string; conversationId: string }
  | { type: "subscribe"; conversationId: string }
  | { type: "unsubscribe"; conversationId: string }
  | { type: "ack"; messageId: string; sequence?: number }
  | { type: "ping" };

export type TypingEvent = {
  conversationId: string;
  userId: string;
  userName: string;
  isTyping: boolean;
};

export type PresenceEvent = {
  userId: string;
  userName: string;
  isOnline: boolean;
  lastSeen: number | null;
};

export type ReadReceiptEvent = {
  messageId: string;
  conversationId: string;
  readerId: string;
  readerName: string;
};

export type MessageEditEvent = {
  messageId: string;
  conversationId: string | null;
  content: string | null;
  updatedAt: number | null;
};

export type MessageDeleteEvent = {
  messageId: string;
  conversationId: string | null;
  deletedAt: number | null;
};

export type MessageForwardEvent = {
  originalMessageId: string | null;
  newMessageId: string | null;
  conversationId: string | null;
};

export type ServerError = {
  code: string;
  message: string;
  details?: Record<string, string>;
};

type Sequenced = { sequence?: number };

export type InboundEnvelope =
  | ({ type: "auth_success"; userId: string; userName: string } & Sequenced)
  | ({ type: "message"; message: ChatMessage } & Sequenced)
  | ({ type: "message_edit"; edit: MessageEditEvent } & Sequenced)
  | ({ type: "message_delete"; deletion: MessageDeleteEvent } & Sequenced)
  | ({ type: "message_forward"; forward: MessageForwardEvent } & Sequenced)
  | ({ type: "typing_start" | "typing_stop"; typing: TypingEvent } & Sequenced)
  | ({ type: "mark_read_success"; messageId: string | null; conversationId: string | null } & Sequenced)
  | ({ type: "message_read"; receipt: ReadReceiptEvent } & Sequenced)
  | ({ type: "user_online" | "user_offline"; presence: PresenceEvent } & Sequenced)
  | ({ type: "message_ack"; messageId: string; status: string } & Sequenced)
  | { type: "pong" }
  | ({ type: "error"; error: ServerError } & Sequenced);

export type SessionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "authenticating"
  | "authenticated";

export type AttachmentState =
  | { status: "pending" }
  | { status: "uploading" }
  | { status: "uploaded"; mediaId: string }
  | { status: "failed"; reason: string };

export type AttachmentPayload = {
  data: Uint8Array;
  contentType: string;
  fileName?: string;
};

export type Attachment = {
  id: string;
  payload: AttachmentPayload;
  state: AttachmentState;
};

export const CLIENT_NAME = "chatline" as const;
export const MAX_RECONNECT_ATTEMPTS = 5;
export const HEARTBEAT_INTERVAL_MS = 30_000;
export const LOCAL_ECHO_WINDOW_MS = 5_000;
