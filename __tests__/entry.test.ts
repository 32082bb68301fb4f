import { describe, it, expect, vi } from "vitest";

// the engine must load in processes that have no react installed
vi.mock("react", () => {
  throw new Error("Cannot find package 'react'");
});

describe("index.ts — 메인 진입점", () => {
  it("react 없이 로드되고 훅은 내보내지 않음", async () => {
    const entry = await import("../index.js");

    expect(typeof entry.ChatSession).toBe("function");
    expect(typeof entry.Conversation).toBe("function");
    expect("useChatSession" in entry).toBe(false);
    expect("useConversation" in entry).toBe(false);
  });

  it("훅은 react 서브패스에서만", async () => {
    await expect(import("../react.js")).rejects.toThrow();
  });
});
