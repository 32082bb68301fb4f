// @vitest-environment jsdom
import { describe, it, expect, afterEach } from "vitest";
import { act, renderHook } from "@testing-library/react";
import { staticToken } from "../../auth.js";
import { immediateDispatcher } from "../../event-router.js";
import { ChatSession } from "../../session.js";
import { FakeTransportHub } from "../../../__tests__/helpers/fake-transport.js";
import { ME } from "../../../__tests__/helpers/fixtures.js";
import { useChatSession } from "../../../react.js";

describe("useChatSession — 세션 스냅샷 구독", () => {
  let session: ChatSession | null = null;

  afterEach(() => {
    session?.disconnect();
    session = null;
  });

  it("연결과 인증 상태를 따라감", async () => {
    const hub = new FakeTransportHub().autoAuthenticate(ME);
    const current = new ChatSession({
      transportFactory: hub.factory,
      tokenProvider: staticToken("test-token"),
      dispatcher: immediateDispatcher,
    });
    session = current;

    const { result } = renderHook(() => useChatSession(current));
    expect(result.current.state).toBe("disconnected");
    expect(result.current.isAuthenticated).toBe(false);

    await act(async () => {
      await current.connect();
    });
    expect(result.current.state).toBe("authenticated");
    expect(result.current.currentUser).toEqual(ME);

    act(() => {
      hub.current.drop();
    });
    expect(result.current.state).toBe("disconnected");
    expect(result.current.currentUser).toBeNull();
    expect(result.current.reconnectAttempt).toBe(1);
  });
});
