import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FakeTransportHub, flushMicrotasks } from "../__tests__/helpers/fake-transport.js";
import { ME, PEER, makeMessage, wireMessage } from "../__tests__/helpers/fixtures.js";
import { staticToken } from "./auth.js";
import { immediateDispatcher } from "./event-router.js";
import { ChatSession, type ChatSessionOptions } from "./session.js";
import type { SessionState } from "./types.js";

function createLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function setup(options: Partial<ChatSessionOptions> = {}, hub = new FakeTransportHub().autoAuthenticate(ME)) {
  const log = createLog();
  const session = new ChatSession({
    transportFactory: hub.factory,
    tokenProvider: staticToken("test-token"),
    dispatcher: immediateDispatcher,
    log,
    ...options,
  });
  return { hub, session, log };
}

describe("session.ts — 연결 세션", () => {
  let cleanup: ChatSession | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    cleanup?.disconnect();
    cleanup = null;
    vi.useRealTimers();
  });

  describe("connect / 인증", () => {
    it("연결 후 auth를 보내고 auth_success에서 authenticated", async () => {
      const { hub, session } = setup();
      cleanup = session;
      const states: SessionState[] = [];
      session.onStateChange((s) => states.push(s));

      await session.connect();

      expect(states).toEqual(["connecting", "connected", "authenticating", "authenticated"]);
      expect(session.isAuthenticated).toBe(true);
      expect(session.currentUser).toEqual({ id: "user-me", name: "Me" });
      expect(hub.current.frames()).toEqual([{ type: "auth", token: "test-token" }]);
    });

    it("진행 중인 connect는 같은 promise를 반환", async () => {
      const { session } = setup();
      cleanup = session;

      const a = session.connect();
      const b = session.connect();

      expect(b).toBe(a);
      await a;
    });

    it("이미 연결된 상태의 connect는 인증만 다시 수행", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();

      hub.autoAuthenticate({ id: "user-other", name: "Other" });
      await session.connect();

      expect(hub.transports).toHaveLength(1);
      expect(hub.current.framesOfType("auth")).toHaveLength(2);
      expect(session.currentUser).toEqual({ id: "user-other", name: "Other" });
    });

    it("auth_success가 오지 않으면 auth_failed, 재연결 없음", async () => {
      const { session } = setup({}, new FakeTransportHub());
      cleanup = session;

      const attempt = session.connect();
      const assertion = expect(attempt).rejects.toMatchObject({ code: "auth_failed" });
      await flushMicrotasks();
      await vi.advanceTimersByTimeAsync(5_000);
      await assertion;

      expect(session.state).toBe("connected");
      expect(session.isAuthenticated).toBe(false);
      expect(vi.getTimerCount()).toBe(1); // heartbeat only
    });

    it("인증 중 error 프레임은 connect를 거부하고 에러 채널로 전달", async () => {
      const hub = new FakeTransportHub();
      hub.respond = (frame, transport) => {
        if (frame.type !== "auth") return;
        queueMicrotask(() =>
          transport.receive({ type: "error", code: "INVALID_TOKEN", message: "bad token", sequence: 1 }),
        );
      };
      const { session } = setup({}, hub);
      cleanup = session;
      const onError = vi.fn();
      session.onError(onError);

      await expect(session.connect()).rejects.toMatchObject({
        code: "auth_failed",
        message: "INVALID_TOKEN: bad token",
      });

      expect(onError).toHaveBeenCalledWith({ code: "INVALID_TOKEN", message: "bad token" });
      expect(session.state).toBe("connected");
      expect(session.lastError).toBe("INVALID_TOKEN: bad token");
    });

    it("토큰이 없으면 auth 프레임 없이 실패", async () => {
      const { hub, session } = setup({ tokenProvider: staticToken(null) });
      cleanup = session;

      await expect(session.connect()).rejects.toMatchObject({
        code: "auth_failed",
        message: "no access token available",
      });
      expect(hub.current.sent).toEqual([]);
      expect(session.state).toBe("connected");
    });
  });

  describe("heartbeat", () => {
    it("인증된 동안 30초마다 ping", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();

      vi.advanceTimersByTime(30_000);
      expect(hub.current.framesOfType("ping")).toHaveLength(1);

      vi.advanceTimersByTime(60_000);
      expect(hub.current.framesOfType("ping")).toHaveLength(3);
    });

    it("pong은 조용히 소비", async () => {
      const { hub, session, log } = setup();
      cleanup = session;
      await session.connect();

      hub.current.receive({ type: "pong" });

      expect(log.warn).not.toHaveBeenCalled();
      expect(log.debug).not.toHaveBeenCalled();
    });
  });

  describe("재연결 정책", () => {
    it("연속 실패 시 지연이 늘어나며 최대 횟수에서 멈춤", async () => {
      const hub = new FakeTransportHub().autoAuthenticate(ME);
      hub.failNextOpens = 100;
      const { session, log } = setup({}, hub);
      cleanup = session;
      const onError = vi.fn();
      session.onError(onError);

      await expect(session.connect()).rejects.toMatchObject({ code: "connection_failed" });
      for (const delay of [2_000, 4_000, 6_000, 8_000, 10_000]) {
        await vi.advanceTimersByTimeAsync(delay);
      }

      const delays = log.info.mock.calls
        .map(([line]) => /reconnecting in (\d+)ms/.exec(String(line)))
        .filter((m): m is RegExpExecArray => m !== null)
        .map((m) => Number(m[1]));
      expect(delays).toEqual([2_000, 4_000, 6_000, 8_000, 10_000]);
      expect(hub.transports).toHaveLength(6);
      expect(session.lastError).toBe("Failed to reconnect after 5 attempts");
      expect(onError).toHaveBeenCalledWith({
        code: "RECONNECT_FAILED",
        message: "Failed to reconnect after 5 attempts",
      });

      await vi.advanceTimersByTimeAsync(60_000);
      expect(hub.transports).toHaveLength(6);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("N번 실패 후 성공하면 정확히 N번 재시도하고 카운트 초기화", async () => {
      const hub = new FakeTransportHub().autoAuthenticate(ME);
      hub.failNextOpens = 3;
      const { session } = setup({}, hub);
      cleanup = session;

      await expect(session.connect()).rejects.toMatchObject({ code: "connection_failed" });
      await vi.advanceTimersByTimeAsync(2_000);
      await vi.advanceTimersByTimeAsync(4_000);
      expect(session.reconnectAttempt).toBe(3);
      await vi.advanceTimersByTimeAsync(6_000);

      expect(hub.transports).toHaveLength(4);
      expect(session.state).toBe("authenticated");
      expect(session.reconnectAttempt).toBe(0);
    });

    it("예기치 않은 종료 후 재연결", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();

      hub.current.drop();
      expect(session.state).toBe("disconnected");
      expect(session.currentUser).toBeNull();

      await vi.advanceTimersByTimeAsync(2_000);
      expect(hub.transports).toHaveLength(2);
      expect(session.state).toBe("authenticated");
    });

    it("재연결 후 인증 응답이 없으면 lastError와 AUTH_FAILED 전달", async () => {
      const { hub, session } = setup();
      cleanup = session;
      const onError = vi.fn();
      session.onError(onError);
      await session.connect();

      hub.respond = null;
      hub.current.drop();
      await vi.advanceTimersByTimeAsync(2_000);
      expect(hub.transports).toHaveLength(2);
      expect(session.state).toBe("authenticating");

      await vi.advanceTimersByTimeAsync(5_000);
      expect(session.state).toBe("connected");
      expect(session.lastError).toBe("no auth_success within 5000ms");
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith({ code: "AUTH_FAILED", message: "no auth_success within 5000ms" });
    });

    it("재연결 중 서버 error 프레임은 에러 채널로 한 번만", async () => {
      const { hub, session } = setup();
      cleanup = session;
      const onError = vi.fn();
      session.onError(onError);
      await session.connect();

      hub.respond = (frame, transport) => {
        if (frame.type !== "auth") return;
        queueMicrotask(() => transport.receive({ type: "error", code: "INVALID_TOKEN", message: "bad token" }));
      };
      hub.current.drop();
      await vi.advanceTimersByTimeAsync(2_000);

      expect(session.lastError).toBe("INVALID_TOKEN: bad token");
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith({ code: "INVALID_TOKEN", message: "bad token" });
    });
  });

  describe("disconnect", () => {
    it("타이머 정리, 대기 중인 대응은 null, 핸들러 제거", async () => {
      const { hub, session } = setup();
      await session.connect();
      const handler = vi.fn();
      session.router.register("conv-1", "message", handler);
      const pending = session.sendAndAwait({ type: "message", conversationId: "conv-1", content: "hi" });
      await flushMicrotasks();

      session.disconnect();

      await expect(pending).resolves.toBeNull();
      expect(session.state).toBe("disconnected");
      expect(session.currentUser).toBeNull();
      expect(session.pendingCorrelations).toBe(0);
      expect(hub.current.closed).toBe(true);
      expect(session.router.hasScope("conv-1")).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("이전 연결에서 온 프레임과 종료는 무시", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();
      const old = hub.current;
      session.disconnect();
      await session.connect();
      const handler = vi.fn();
      session.router.register("conv-1", "message", handler);

      old.receive(wireMessage(makeMessage("m1")));
      old.drop();

      expect(handler).not.toHaveBeenCalled();
      expect(session.state).toBe("authenticated");
      expect(vi.getTimerCount()).toBe(1);
    });
  });

  describe("sendAndAwait", () => {
    it("자기 메시지 에코의 id로 해결되고 라우터에도 전달", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();
      const handler = vi.fn();
      session.router.register("conv-1", "message", handler);

      const pending = session.sendAndAwait({ type: "message", conversationId: "conv-1", content: "hi" });
      await flushMicrotasks();
      hub.current.receive(wireMessage(makeMessage("srv-1", { senderId: ME.id, content: "hi" })));

      await expect(pending).resolves.toBe("srv-1");
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0]).toMatchObject({ id: "srv-1", senderId: "user-me" });
      expect(hub.current.framesOfType("message")).toEqual([
        { type: "message", conversation_id: "conv-1", content: "hi" },
      ]);
    });

    it("다른 사용자의 메시지는 대응을 해결하지 않음, 시간 초과 시 null", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();

      const pending = session.sendAndAwait({ type: "message", conversationId: "conv-1", content: "hi" }, 5_000);
      await flushMicrotasks();
      hub.current.receive(wireMessage(makeMessage("peer-1", { senderId: PEER.id })));
      expect(session.pendingCorrelations).toBe(1);

      await vi.advanceTimersByTimeAsync(5_000);
      await expect(pending).resolves.toBeNull();
      expect(session.pendingCorrelations).toBe(0);
    });

    it("연결 전에는 not_connected", async () => {
      const { session } = setup();
      await expect(
        session.sendAndAwait({ type: "message", conversationId: "c", content: "x" }),
      ).rejects.toMatchObject({ code: "not_connected" });
    });

    it("인증 전에는 not_authenticated", async () => {
      const { session } = setup({ tokenProvider: staticToken(null) });
      cleanup = session;
      await expect(session.connect()).rejects.toMatchObject({ code: "auth_failed" });

      await expect(
        session.sendAndAwait({ type: "message", conversationId: "c", content: "x" }),
      ).rejects.toMatchObject({ code: "not_authenticated" });
    });

    it("전송 실패 시 send_failed, 대기 항목 없음", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();
      hub.failSends = true;

      await expect(
        session.sendAndAwait({ type: "message", conversationId: "c", content: "x" }),
      ).rejects.toMatchObject({ code: "send_failed", message: "socket write failed" });
      expect(session.pendingCorrelations).toBe(0);
    });
  });

  describe("송신 헬퍼", () => {
    it("연결이 없으면 false와 경고", async () => {
      const { session, log } = setup();
      await expect(session.subscribe("conv-1")).resolves.toBe(false);
      expect(log.warn).toHaveBeenCalledWith("chatline: cannot send subscribe, not connected");
    });

    it("각 헬퍼가 해당 봉투를 전송", async () => {
      const { hub, session } = setup();
      cleanup = session;
      await session.connect();

      await session.subscribe("c1");
      await session.markRead("c1", "m1");
      await session.startTyping("c1");
      await session.stopTyping("c1");
      await session.editMessage("m1", "edited");
      await session.deleteMessage("m1");
      await session.forwardMessage("m1", "c2");
      await session.acknowledge("m1", 9);
      await session.unsubscribe("c1");

      expect(hub.current.frames().slice(1)).toEqual([
        { type: "subscribe", conversation_id: "c1" },
        { type: "mark_read", message_id: "m1", conversation_id: "c1" },
        { type: "typing_start", conversation_id: "c1" },
        { type: "typing_stop", conversation_id: "c1" },
        { type: "message_edit", message_id: "m1", content: "edited" },
        { type: "message_delete", message_id: "m1" },
        { type: "message_forward", message_id: "m1", conversation_id: "c2" },
        { type: "ack", message_id: "m1", sequence: 9 },
        { type: "unsubscribe", conversation_id: "c1" },
      ]);
    });
  });

  it("시퀀스 건너뜀을 경고", async () => {
    const { hub, session, log } = setup();
    cleanup = session;
    await session.connect();

    for (const sequence of [1, 2, 4]) {
      hub.current.receive({ type: "typing_start", user_id: "u2", conversation_id: "c1", sequence });
    }

    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith("chatline: sequence gap expected=3 got=4");
  });

  it("잘못된 프레임은 버리고 수신은 계속", async () => {
    const { hub, session } = setup();
    cleanup = session;
    await session.connect();
    const handler = vi.fn();
    session.router.register("conv-1", "message", handler);

    hub.current.receiveRaw("not json");
    hub.current.receive(wireMessage(makeMessage("m1")));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(session.state).toBe("authenticated");
  });
});
