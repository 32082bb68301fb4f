import type { ChatMessage, MessageMedia } from "../../src/types.js";
import type { ServerFrame } from "./fake-transport.js";

export const BASE_TIME = Date.parse("2024-05-01T10:00:00.000Z");
export const ME = { id: "user-me", name: "Me" };
export const PEER = { id: "user-peer", name: "Peer" };

export function makeMessage(id: string, overrides: Partial<ChatMessage> = {}): ChatMessage {
  const createdAt = overrides.createdAt ?? BASE_TIME;
  return {
    id,
    content: `text of ${id}`,
    senderId: PEER.id,
    senderName: PEER.name,
    conversationId: "conv-1",
    forwardedFromId: null,
    media: [],
    createdAt,
    updatedAt: createdAt,
    isEdited: false,
    isDeleted: false,
    ...overrides,
  };
}

/** `count` messages m1..mN, oldest first, one second apart. */
export function makeHistory(count: number, conversationId = "conv-1"): ChatMessage[] {
  return Array.from({ length: count }, (_, i) =>
    makeMessage(`m${i + 1}`, { conversationId, createdAt: BASE_TIME + (i + 1) * 1000 }),
  );
}

export function makeMedia(id: string, messageId: string | null, overrides: Partial<MessageMedia> = {}): MessageMedia {
  return {
    id,
    contentType: "image/jpeg",
    url: `https://files.test/${id}.jpg`,
    size: 1024,
    messageId,
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    ...overrides,
  };
}

export function wireMedia(media: MessageMedia): Record<string, unknown> {
  return {
    id: media.id,
    content_type: media.contentType,
    url: media.url,
    size: media.size,
    message_id: media.messageId,
    created_at: new Date(media.createdAt).toISOString(),
    updated_at: new Date(media.updatedAt).toISOString(),
  };
}

export function wireMessage(message: ChatMessage, sequence?: number): ServerFrame {
  return {
    type: "message",
    id: message.id,
    content: message.content,
    sender_id: message.senderId,
    sender_name: message.senderName,
    conversation_id: message.conversationId,
    forwarded_from_id: message.forwardedFromId,
    media: message.media.map(wireMedia),
    created_at: new Date(message.createdAt).toISOString(),
    updated_at: new Date(message.updatedAt).toISOString(),
    is_edited: message.isEdited,
    is_deleted: message.isDeleted,
    ...(sequence === undefined ? {} : { sequence }),
  };
}
