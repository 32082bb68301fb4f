export { useChatSession } from "./src/client/hooks/useChatSession.js";
export { useConversation, type UseConversationOptions } from "./src/client/hooks/useConversation.js";
