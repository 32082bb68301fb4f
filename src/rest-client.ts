// REST collaborator: conversations, history, media upload, current user

import { z } from "zod";
import { type TokenProvider, bearerHeader } from "./auth.js";
import { ApiError } from "./errors.js";
import { describeError } from "./log.js";
import { MediaSchema, RestMessageSchema, ServerDate, toChatMessage } from "./protocol.js";
import type { ChatMessage, ConversationSummary, CurrentUser } from "./types.js";

export type MediaUpload = {
  conversationId: string;
  messageId?: string;
  data: Uint8Array;
  contentType: string;
  fileName?: string;
};

export interface ChatApi {
  fetchConversations(skip?: number, limit?: number): Promise<ConversationSummary[]>;
  /** Newest first; `skip` counts back from the most recent message. */
  fetchMessages(conversationId: string, skip: number, limit: number): Promise<ChatMessage[]>;
  fetchMessage(conversationId: string, messageId: string): Promise<ChatMessage | null>;
  createConversation(participantIds: string[], name?: string): Promise<ConversationSummary>;
  /** Resolves with the stored media id. */
  uploadMedia(upload: MediaUpload): Promise<string>;
  fetchCurrentUser(): Promise<CurrentUser>;
}

const ApiEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  message: z.string().nullish(),
  error: z.string().nullish(),
});

const ErrorBodySchema = z.object({
  error: z.string().nullish(),
  message: z.string().nullish(),
  detail: z
    .union([
      z.string(),
      z.object({ error: z.string().nullish(), message: z.string().nullish() }).passthrough(),
    ])
    .nullish(),
});

const ParticipantSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  user_name: z.string(),
  is_online: z.boolean().nullish(),
});

const ConversationSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  conversation_type: z.enum(["dialog", "polylogue"]),
  participants: z.array(ParticipantSchema).nullish(),
  updated_at: ServerDate,
  is_deleted: z.boolean().nullish(),
});

const UserSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

function toConversationSummary(raw: z.infer<typeof ConversationSchema>): ConversationSummary {
  return {
    id: raw.id,
    name: raw.name ?? null,
    conversationType: raw.conversation_type,
    participants: (raw.participants ?? []).map((p) => ({
      id: p.id,
      userId: p.user_id,
      userName: p.user_name,
      isOnline: p.is_online ?? false,
    })),
    updatedAt: raw.updated_at,
    isDeleted: raw.is_deleted ?? false,
  };
}

function errorText(body: unknown): string | null {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) return null;
  const { error, message, detail } = parsed.data;
  if (error) return error;
  if (message) return message;
  if (typeof detail === "string") return detail;
  return detail?.error ?? detail?.message ?? null;
}

export type RestChatApiOptions = {
  baseUrl: string;
  tokenProvider: TokenProvider;
  fetchImpl?: typeof fetch;
};

const MESSAGE_LOOKUP_WINDOW = 100;

export class RestChatApi implements ChatApi {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: RestChatApiOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchConversations(skip = 0, limit = 50): Promise<ConversationSummary[]> {
    const data = await this.request(
      "GET",
      "/api/v1/conversation/",
      { skip, limit },
      undefined,
      z.array(ConversationSchema),
    );
    return data.map(toConversationSummary);
  }

  async fetchMessages(conversationId: string, skip: number, limit: number): Promise<ChatMessage[]> {
    const data = await this.request(
      "GET",
      "/api/v1/conversation/messages",
      { conversation_id: conversationId, skip, limit },
      undefined,
      z.array(RestMessageSchema),
    );
    return data.map(toChatMessage);
  }

  async fetchMessage(conversationId: string, messageId: string): Promise<ChatMessage | null> {
    const recent = await this.fetchMessages(conversationId, 0, MESSAGE_LOOKUP_WINDOW);
    return recent.find((m) => m.id === messageId) ?? null;
  }

  async createConversation(participantIds: string[], name = ""): Promise<ConversationSummary> {
    const data = await this.request(
      "POST",
      "/api/v1/conversation/",
      {},
      { participant_ids: participantIds, name },
      ConversationSchema,
    );
    return toConversationSummary(data);
  }

  async uploadMedia(upload: MediaUpload): Promise<string> {
    const form = new FormData();
    const blob = new Blob([new Uint8Array(upload.data)], { type: upload.contentType });
    form.append("files", blob, upload.fileName ?? "media.jpg");

    const query: Record<string, string> = { conversation_id: upload.conversationId };
    if (upload.messageId) query.message_id = upload.messageId;

    const data = await this.request(
      "POST",
      "/api/v1/media/upload",
      query,
      form,
      z.array(MediaSchema),
    );
    const first = data[0];
    if (!first) throw new ApiError(200, "upload returned no media");
    return first.id;
  }

  async fetchCurrentUser(): Promise<CurrentUser> {
    const data = await this.request("GET", "/api/v1/users/me", {}, undefined, UserSchema);
    return { id: data.id, name: data.name };
  }

  private async request<T extends z.ZodTypeAny>(
    method: "GET" | "POST" | "PATCH" | "DELETE",
    path: string,
    query: Record<string, string | number>,
    body: FormData | Record<string, unknown> | undefined,
    schema: T,
  ): Promise<z.output<T>> {
    const token = await this.options.tokenProvider();
    if (!token) throw new ApiError(401, "Missing access token");

    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = {
      Authorization: bearerHeader(token),
      Accept: "application/json",
    };
    let payload: FormData | string | undefined;
    if (body instanceof FormData) {
      payload = body;
    } else if (body) {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body: payload });
    } catch (err) {
      throw new ApiError(0, `${method} ${path} failed: ${describeError(err)}`, { cause: err });
    }

    const text = await response.text();
    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch {
        json = null;
      }
    }

    if (!response.ok) {
      throw new ApiError(response.status, errorText(json) ?? `HTTP ${response.status}`);
    }

    const envelope = ApiEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ApiError(response.status, `unexpected response from ${path}`, {
        cause: envelope.error,
      });
    }
    if (!envelope.data.success) {
      throw new ApiError(
        response.status,
        envelope.data.error ?? envelope.data.message ?? "request failed",
      );
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new ApiError(response.status, `malformed data from ${path}`, { cause: data.error });
    }
    return data.data;
  }
}

function dialogWith(conversations: ConversationSummary[], peerUserId: string): ConversationSummary | undefined {
  return conversations.find(
    (c) =>
      c.conversationType === "dialog" &&
      !c.isDeleted &&
      c.participants.some((p) => p.userId === peerUserId),
  );
}

/** Reuses a live one-to-one conversation with the peer, or creates one. */
export async function findOrCreateDialog(
  api: ChatApi,
  peerUserId: string,
): Promise<ConversationSummary> {
  const existing = dialogWith(await api.fetchConversations(), peerUserId);
  if (existing) return existing;

  try {
    return await api.createConversation([peerUserId]);
  } catch (err) {
    // 422: the server already has this dialog; it shows up on a reload
    if (err instanceof ApiError && err.status === 422) {
      const found = dialogWith(await api.fetchConversations(), peerUserId);
      if (found) return found;
    }
    throw err;
  }
}
