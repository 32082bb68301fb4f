#!/usr/bin/env node
// Lv.5 — TUI Client: terminal chat over one ChatSession + Conversation

import { realpathSync } from "node:fs";
import * as readline from "node:readline";
import { pathToFileURL } from "node:url";
import { resolveAccessToken, staticToken } from "./auth.js";
import { type ClientConfig, loadClientConfig, resolveClientConfig } from "./config.js";
import { Conversation } from "./conversation.js";
import { createConsoleLog, describeError } from "./log.js";
import { MessageCache } from "./message-cache.js";
import { RestChatApi, findOrCreateDialog } from "./rest-client.js";
import { ChatSession } from "./session.js";
import { wsTransportFactory } from "./transport.js";
import type { DisplayMessage } from "./types.js";

export type TuiArgs = {
  configPath: string | null;
  conversationId: string | null;
  peerUserId: string | null;
  verbose: boolean;
};

export function parseArgs(argv: readonly string[]): TuiArgs {
  const value = (name: string): string | null => {
    const idx = argv.indexOf(name);
    if (idx === -1 || idx + 1 >= argv.length) return null;
    return argv[idx + 1];
  };
  return {
    configPath: value("--config"),
    conversationId: value("--conversation"),
    peerUserId: value("--peer"),
    verbose: argv.includes("--verbose"),
  };
}

export function formatClock(timestamp: number): string {
  const d = new Date(timestamp);
  return `${String(d.getHours()).padStart(2, "0")}:${String(d.getMinutes()).padStart(2, "0")}`;
}

export function formatMessage(m: DisplayMessage): string {
  const who = m.isFromCurrentUser ? "you" : m.senderName || "unknown";
  const body = m.isDeleted ? "(deleted)" : m.content.trim();
  const media =
    m.media.length === 0 ? "" : ` [${m.media.length} attachment${m.media.length === 1 ? "" : "s"}]`;
  const edited = m.isEdited && !m.isDeleted ? " (edited)" : "";
  const read = m.isFromCurrentUser && m.isRead ? " ✓" : "";
  return `[${formatClock(m.timestamp)}] ${who}> ${body}${media}${edited}${read}`;
}

/** Confirmed messages not printed yet, marking them as printed. */
export function takeUnprinted(messages: readonly DisplayMessage[], printed: Set<string>): DisplayMessage[] {
  const fresh = messages.filter((m) => !m.isPending && !printed.has(m.id));
  for (const m of fresh) printed.add(m.id);
  return fresh;
}

const gray = (s: string) => `\x1b[90m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config: ClientConfig = args.configPath
    ? await loadClientConfig(args.configPath)
    : resolveClientConfig({});
  const log = createConsoleLog({ verbose: args.verbose });

  const token = resolveAccessToken(config);
  if (!token) {
    console.error(red("No access token: set CHATLINE_TOKEN or \"token\" in the config file"));
    process.exitCode = 1;
    return;
  }
  const tokenProvider = staticToken(token);

  const session = new ChatSession({
    transportFactory: wsTransportFactory({ url: config.wsUrl }),
    tokenProvider,
    log,
    authTimeoutMs: config.authTimeoutMs,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    reconnectBaseDelayMs: config.reconnectBaseDelayMs,
    maxReconnectAttempts: config.maxReconnectAttempts,
    sendTimeoutMs: config.sendTimeoutMs,
  });
  const api = new RestChatApi({ baseUrl: config.apiUrl, tokenProvider });

  console.log(gray(`Connecting to ${config.wsUrl}...`));
  try {
    await session.connect();
  } catch (err) {
    session.disconnect(); // no retries for the first connect
    throw err;
  }
  console.log(green(`● Connected as ${session.currentUser?.name || session.currentUser?.id}\n`));
  session.onError((err) => console.error(red(`${err.code}: ${err.message}`)));
  session.onStateChange((state) => {
    if (state === "disconnected") console.log(red("● Disconnected"));
    if (state === "authenticated") console.log(green("● Reconnected"));
  });

  const conversationId =
    args.conversationId ??
    (args.peerUserId ? (await findOrCreateDialog(api, args.peerUserId)).id : null);
  if (!conversationId) {
    console.error(red("Usage: chatline (--conversation <id> | --peer <userId>) [--config <file>]"));
    session.disconnect();
    process.exitCode = 1;
    return;
  }

  const conversation = new Conversation({
    conversationId,
    session,
    api,
    cache: new MessageCache(config.cacheTtlMs),
    peerUserId: args.peerUserId ?? undefined,
    log,
    tuning: config,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "\x1b[36myou>\x1b[0m ",
  });

  const printed = new Set<string>();
  let lastError: string | null = null;
  let lastTyping: string | null = null;
  conversation.subscribe(() => {
    const snap = conversation.getSnapshot();
    const fresh = takeUnprinted(snap.messages, printed);
    if (fresh.length > 0) {
      process.stdout.write("\r\x1b[K");
      for (const m of fresh) console.log(formatMessage(m));
      rl.prompt(true);
    }
    if (snap.errorMessage && snap.errorMessage !== lastError) console.log(red(snap.errorMessage));
    lastError = snap.errorMessage;
    const typing = snap.peerTyping?.userName ?? null;
    if (typing && typing !== lastTyping) console.log(gray(`${typing} is typing...`));
    lastTyping = typing;
  });

  await conversation.open();
  rl.prompt();

  if (process.stdin.isTTY) {
    readline.emitKeypressEvents(process.stdin);
    process.stdin.on("keypress", () => conversation.startTyping());
  }

  rl.on("line", (line) => {
    const text = line.trim();
    if (text === "/quit" || text === "/exit") {
      rl.close();
      return;
    }
    if (text === "/older") {
      conversation
        .loadOlderMessages()
        .then((count) => console.log(gray(`--- ${count} older message(s) ---`)))
        .catch((err: unknown) => console.error(red(describeError(err))))
        .finally(() => rl.prompt());
      return;
    }
    if (!text) {
      rl.prompt();
      return;
    }
    conversation
      .sendMessage(text)
      .catch((err: unknown) => console.error(red(describeError(err))))
      .finally(() => rl.prompt());
  });

  rl.on("close", () => {
    conversation.close();
    session.disconnect();
    console.log("Bye!");
  });
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMain()) {
  main().catch((err: unknown) => {
    console.error(red(`chatline: ${describeError(err)}`));
    process.exitCode = 1;
  });
}
