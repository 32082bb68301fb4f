import { useCallback, useEffect, useSyncExternalStore } from "react";
import type { Conversation, ConversationSnapshot } from "../../conversation.js";

export type UseConversationOptions = {
  /** Open on mount and close on unmount. Defaults to true. */
  manageLifecycle?: boolean;
};

export function useConversation(
  conversation: Conversation,
  options: UseConversationOptions = {},
): ConversationSnapshot {
  const manageLifecycle = options.manageLifecycle ?? true;

  useEffect(() => {
    if (!manageLifecycle) return;
    conversation.open().catch((err: unknown) => {
      console.warn("[chatline] opening conversation failed", err);
    });
    return () => conversation.close();
  }, [conversation, manageLifecycle]);

  const subscribe = useCallback(
    (onChange: () => void) => conversation.subscribe(onChange),
    [conversation],
  );
  const getSnapshot = useCallback(() => conversation.getSnapshot(), [conversation]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
