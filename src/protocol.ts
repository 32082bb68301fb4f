// Lv.1 — Wire codec: typed envelopes <-> JSON text frames

import { z } from "zod";
import type { LogSink } from "./log.js";
import type { ChatMessage, InboundEnvelope, MessageMedia, OutboundEnvelope } from "./types.js";

// Server timestamps come with 0-6 fractional digits and usually without a zone (UTC).
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

export function parseServerDate(value: string): number | null {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;
  const base = match[1];
  const millis = (match[2] ?? "").padEnd(3, "0").slice(0, 3);
  const zone = match[3] ?? "Z";
  const normalizedZone =
    zone === "Z" || zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  const ts = Date.parse(`${base}.${millis}${normalizedZone}`);
  return Number.isNaN(ts) ? null : ts;
}

export const ServerDate = z.string().transform((value, ctx) => {
  const ts = parseServerDate(value);
  if (ts === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return ts;
});

export const MediaSchema = z.object({
  id: z.string(),
  content_type: z.string(),
  url: z.string(),
  size: z.number(),
  message_id: z.string().nullish(),
  created_at: ServerDate,
  updated_at: ServerDate.nullish(),
});

const messageFields = {
  id: z.string(),
  content: z.string(),
  sender_id: z.string(),
  sender_name: z.string().nullish(),
  conversation_id: z.string(),
  forwarded_from_id: z.string().nullish(),
  media: z.array(MediaSchema).nullish(),
  created_at: ServerDate,
  updated_at: ServerDate.nullish(),
  is_edited: z.boolean().nullish(),
  is_deleted: z.boolean().nullish(),
};

// REST payloads nest the sender instead of flattening its name.
export const RestMessageSchema = z.object({
  ...messageFields,
  sender: z.object({ name: z.string() }).passthrough().nullish(),
});

export function toMessageMedia(raw: z.infer<typeof MediaSchema>): MessageMedia {
  return {
    id: raw.id,
    contentType: raw.content_type,
    url: raw.url,
    size: raw.size,
    messageId: raw.message_id ?? null,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? raw.created_at,
  };
}

export function toChatMessage(raw: z.infer<typeof RestMessageSchema>): ChatMessage {
  return {
    id: raw.id,
    content: raw.content,
    senderId: raw.sender_id,
    senderName: raw.sender_name ?? raw.sender?.name ?? "Unknown",
    conversationId: raw.conversation_id,
    forwardedFromId: raw.forwarded_from_id ?? null,
    media: (raw.media ?? []).map(toMessageMedia),
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? raw.created_at,
    isEdited: raw.is_edited ?? false,
    isDeleted: raw.is_deleted ?? false,
  };
}

const sequence = z.number().int().optional();

const typingFields = {
  user_id: z.string(),
  user_name: z.string().nullish(),
  conversation_id: z.string(),
  sequence,
};

const presenceFields = {
  user_id: z.string(),
  user_name: z.string().nullish(),
  last_seen: ServerDate.nullish(),
  sequence,
};

export const InboundFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("auth_success"), user_id: z.string(), user_name: z.string().nullish(), sequence }),
  z.object({ type: z.literal("message"), ...messageFields, sequence }),
  z.object({
    type: z.literal("message_edit"),
    message_id: z.string(),
    conversation_id: z.string().nullish(),
    content: z.string().nullish(),
    updated_at: ServerDate.nullish(),
    sequence,
  }),
  z.object({
    type: z.literal("message_delete"),
    message_id: z.string(),
    conversation_id: z.string().nullish(),
    deleted_at: ServerDate.nullish(),
    sequence,
  }),
  z.object({
    type: z.literal("message_forward"),
    original_message_id: z.string().nullish(),
    new_message_id: z.string().nullish(),
    conversation_id: z.string().nullish(),
    sequence,
  }),
  z.object({ type: z.literal("typing_start"), ...typingFields }),
  z.object({ type: z.literal("typing_stop"), ...typingFields }),
  z.object({
    type: z.literal("mark_read_success"),
    message_id: z.string().nullish(),
    conversation_id: z.string().nullish(),
    sequence,
  }),
  z.object({
    type: z.literal("message_read"),
    message_id: z.string(),
    conversation_id: z.string(),
    reader_id: z.string(),
    reader_name: z.string().nullish(),
    sequence,
  }),
  z.object({ type: z.literal("user_online"), ...presenceFields }),
  z.object({ type: z.literal("user_offline"), ...presenceFields }),
  z.object({ type: z.literal("message_ack"), message_id: z.string(), status: z.string(), sequence }),
  z.object({ type: z.literal("pong") }),
  z.object({
    type: z.literal("error"),
    code: z.string().nullish(),
    message: z.string().nullish(),
    details: z.record(z.string()).nullish(),
    sequence,
  }),
]);

type InboundFrame = z.infer<typeof InboundFrameSchema>;

function toInboundEnvelope(frame: InboundFrame): InboundEnvelope {
  switch (frame.type) {
    case "auth_success":
      return {
        type: "auth_success",
        sequence: frame.sequence,
        userId: frame.user_id,
        userName: frame.user_name ?? "",
      };
    case "message":
      return { type: "message", sequence: frame.sequence, message: toChatMessage(frame) };
    case "message_edit":
      return {
        type: "message_edit",
        sequence: frame.sequence,
        edit: {
          messageId: frame.message_id,
          conversationId: frame.conversation_id ?? null,
          content: frame.content ?? null,
          updatedAt: frame.updated_at ?? null,
        },
      };
    case "message_delete":
      return {
        type: "message_delete",
        sequence: frame.sequence,
        deletion: {
          messageId: frame.message_id,
          conversationId: frame.conversation_id ?? null,
          deletedAt: frame.deleted_at ?? null,
        },
      };
    case "message_forward":
      return {
        type: "message_forward",
        sequence: frame.sequence,
        forward: {
          originalMessageId: frame.original_message_id ?? null,
          newMessageId: frame.new_message_id ?? null,
          conversationId: frame.conversation_id ?? null,
        },
      };
    case "typing_start":
    case "typing_stop":
      return {
        type: frame.type,
        sequence: frame.sequence,
        typing: {
          conversationId: frame.conversation_id,
          userId: frame.user_id,
          userName: frame.user_name ?? (frame.type === "typing_start" ? "Someone" : ""),
          isTyping: frame.type === "typing_start",
        },
      };
    case "mark_read_success":
      return {
        type: "mark_read_success",
        sequence: frame.sequence,
        messageId: frame.message_id ?? null,
        conversationId: frame.conversation_id ?? null,
      };
    case "message_read":
      return {
        type: "message_read",
        sequence: frame.sequence,
        receipt: {
          messageId: frame.message_id,
          conversationId: frame.conversation_id,
          readerId: frame.reader_id,
          readerName: frame.reader_name ?? "",
        },
      };
    case "user_online":
    case "user_offline":
      return {
        type: frame.type,
        sequence: frame.sequence,
        presence: {
          userId: frame.user_id,
          userName: frame.user_name ?? "",
          isOnline: frame.type === "user_online",
          lastSeen: frame.last_seen ?? null,
        },
      };
    case "message_ack":
      return {
        type: "message_ack",
        sequence: frame.sequence,
        messageId: frame.message_id,
        status: frame.status,
      };
    case "pong":
      return { type: "pong" };
    case "error":
      return {
        type: "error",
        sequence: frame.sequence,
        error: {
          code: frame.code ?? "UNKNOWN_ERROR",
          message: frame.message ?? "Unknown error",
          ...(frame.details ? { details: frame.details } : {}),
        },
      };
  }
}

function frameKind(json: unknown): string {
  if (json && typeof json === "object" && "type" in json && typeof json.type === "string") {
    return json.type;
  }
  return typeof json;
}

/** Returns null for frames that are not JSON, carry an unknown type, or miss required fields. */
export function decodeFrame(raw: string, log?: LogSink): InboundEnvelope | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    log?.warn(`chatline: dropped non-JSON frame (${raw.length} chars)`);
    return null;
  }

  const parsed = InboundFrameSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    log?.warn(`chatline: dropped malformed frame type=${frameKind(json)}${where}`);
    return null;
  }
  return toInboundEnvelope(parsed.data);
}

function toWire(envelope: OutboundEnvelope): Record<string, unknown> {
  switch (envelope.type) {
    case "auth":
      return { type: "auth", token: envelope.token };
    case "message":
      return {
        type: "message",
        conversation_id: envelope.conversationId,
        content: envelope.content,
        forwarded_from_id: envelope.forwardedFromId,
        media_ids: envelope.mediaIds,
      };
    case "message_edit":
      return { type: "message_edit", message_id: envelope.messageId, content: envelope.content };
    case "message_delete":
      return { type: "message_delete", message_id: envelope.messageId };
    case "message_forward":
      return {
        type: "message_forward",
        message_id: envelope.messageId,
        conversation_id: envelope.conversationId,
      };
    case "typing_start":
    case "typing_stop":
    case "subscribe":
    case "unsubscribe":
      return { type: envelope.type, conversation_id: envelope.conversationId };
    case "mark_read":
      return {
        type: "mark_read",
        message_id: envelope.messageId,
        conversation_id: envelope.conversationId,
      };
    case "ack":
      return { type: "ack", message_id: envelope.messageId, sequence: envelope.sequence };
    case "ping":
      return { type: "ping" };
  }
}

export function encodeEnvelope(envelope: OutboundEnvelope): string {
  // undefined optionals are dropped by JSON.stringify
  return JSON.stringify(toWire(envelope));
}
