// In-memory ChatApi over one ordered history (oldest first)

import { vi } from "vitest";
import type { ChatApi, MediaUpload } from "../../src/rest-client.js";
import type { ChatMessage, ConversationSummary, CurrentUser } from "../../src/types.js";
import { BASE_TIME, ME, makeMedia } from "./fixtures.js";

export class FakeChatApi implements ChatApi {
  messages: ChatMessage[] = [];
  conversations: ConversationSummary[] = [];
  readonly uploads: MediaUpload[] = [];
  /** 1-based upload call numbers that fail. */
  failingUploads = new Set<number>();
  private mediaCounter = 0;

  constructor(messages: ChatMessage[] = []) {
    this.messages = [...messages];
  }

  fetchMessages = vi.fn(async (conversationId: string, skip: number, limit: number) => {
    const newestFirst = this.messages.filter((m) => m.conversationId === conversationId).reverse();
    return newestFirst.slice(skip, skip + limit);
  });

  fetchMessage = vi.fn(async (conversationId: string, messageId: string) => {
    const recent = await this.fetchMessages(conversationId, 0, 100);
    return recent.find((m) => m.id === messageId) ?? null;
  });

  uploadMedia = vi.fn(async (upload: MediaUpload) => {
    this.uploads.push(upload);
    if (this.failingUploads.has(this.uploads.length)) {
      throw new Error("413 payload too large");
    }
    this.mediaCounter += 1;
    const media = makeMedia(`media-${this.mediaCounter}`, upload.messageId ?? null);
    this.messages = this.messages.map((m) =>
      m.id === upload.messageId ? { ...m, media: [...m.media, media] } : m,
    );
    return media.id;
  });

  fetchConversations = vi.fn(async () => this.conversations);

  createConversation = vi.fn(async (participantIds: string[], name?: string) => {
    const created: ConversationSummary = {
      id: `conv-${this.conversations.length + 1}`,
      name: name ?? null,
      conversationType: participantIds.length > 1 ? "polylogue" : "dialog",
      participants: participantIds.map((userId, i) => ({
        id: `p-${i + 1}`,
        userId,
        userName: userId,
        isOnline: false,
      })),
      updatedAt: BASE_TIME,
      isDeleted: false,
    };
    this.conversations.push(created);
    return created;
  });

  fetchCurrentUser = vi.fn(async (): Promise<CurrentUser> => ME);

  /** Appends a message as the server would store it. */
  store(message: ChatMessage): void {
    this.messages.push(message);
  }
}
