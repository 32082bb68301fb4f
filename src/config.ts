// Client configuration: one validated section with defaults and env overrides

import { readFile } from "node:fs/promises";
import { z } from "zod";

export const ClientConfigSchema = z.object({
  wsUrl: z.string().url().default("ws://127.0.0.1:8000/ws"),
  apiUrl: z.string().url().default("http://127.0.0.1:8000"),
  token: z.string().min(1).optional(),
  authTimeoutMs: z.number().int().positive().default(5_000),
  heartbeatIntervalMs: z.number().int().positive().default(30_000),
  reconnectBaseDelayMs: z.number().int().nonnegative().default(2_000),
  maxReconnectAttempts: z.number().int().nonnegative().default(5),
  sendTimeoutMs: z.number().int().positive().default(5_000),
  cacheTtlMs: z.number().int().nonnegative().default(10_000),
  pageSize: z.number().int().positive().default(50),
  historyBatchSize: z.number().int().positive().default(100),
  typingIdleMs: z.number().int().positive().default(3_000),
  // 0 disables the delayed re-fetch of media-less incoming messages
  mediaRefreshDelayMs: z.number().int().nonnegative().default(2_000),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export const CONFIG_ENV = {
  wsUrl: "CHATLINE_WS_URL",
  apiUrl: "CHATLINE_API_URL",
  token: "CHATLINE_TOKEN",
} as const;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

function sectionOf(raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError("chatline config must be an object");
  }
  // accept either the bare section or a file with a "chatline" key
  const nested = "chatline" in raw ? raw.chatline : undefined;
  if (nested && typeof nested === "object" && !Array.isArray(nested)) {
    return { ...nested };
  }
  return { ...raw };
}

export function resolveClientConfig(
  raw: unknown = {},
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const section = sectionOf(raw);
  for (const [key, name] of Object.entries(CONFIG_ENV)) {
    const value = env[name];
    if (value) section[key] = value;
  }

  const parsed = ClientConfigSchema.safeParse(section);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid chatline config: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function loadClientConfig(
  path: string,
  env: Record<string, string | undefined> = process.env,
): Promise<ClientConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`config file ${path} is not valid JSON`, { cause: err });
  }
  return resolveClientConfig(json, env);
}
