// Errors that cross the engine boundary

export type ChatSessionErrorCode =
  | "not_connected"
  | "not_authenticated"
  | "auth_failed"
  | "connection_failed"
  | "connection_closed"
  | "send_failed";

export class ChatSessionError extends Error {
  readonly code: ChatSessionErrorCode;

  constructor(code: ChatSessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChatSessionError";
    this.code = code;
  }
}

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApiError";
    this.status = status;
  }
}
