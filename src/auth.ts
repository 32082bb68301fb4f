// Access token lookup for the socket handshake and REST calls

import type { ClientConfig } from "./config.js";
import { CONFIG_ENV } from "./config.js";

/** Returns null when no token is available; the session then fails authentication. */
export type TokenProvider = () => string | null | Promise<string | null>;

export function staticToken(token: string | null): TokenProvider {
  return () => token;
}

export function resolveAccessToken(
  config: Pick<ClientConfig, "token">,
  env: Record<string, string | undefined> = process.env,
): string | null {
  const fromEnv = env[CONFIG_ENV.token]?.trim();
  if (fromEnv) return fromEnv;
  return config.token?.trim() || null;
}

export function bearerHeader(token: string): string {
  return `Bearer ${token.replace(/^Bearer\s+/i, "")}`;
}
