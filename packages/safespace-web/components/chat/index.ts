// Chat components barrel export
export { ChatLayout } from "./chat-layout";
export { ChatHeader } from "./chat-header";
export { ChatInput } from "./chat-input";
export { MessageBubble, ThinkingBubble, EmptyState } from "./message-bubble";
export { useChatScroll } from "./hooks/use-chat-scroll";
