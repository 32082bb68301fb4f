import { useCallback, useSyncExternalStore } from "react";
import type { ChatSession, SessionSnapshot } from "../../session.js";

export function useChatSession(session: ChatSession): SessionSnapshot {
  const subscribe = useCallback(
    (onChange: () => void) => session.onStateChange(onChange),
    [session],
  );
  const getSnapshot = useCallback(() => session.getSnapshot(), [session]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
