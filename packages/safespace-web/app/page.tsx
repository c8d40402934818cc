"use client";

import { useCallback, useEffect, useState } from "react";
import { toast } from "sonner";
import { ChatLayout, ChatHeader, ChatInput, MessageBubble, ThinkingBubble, EmptyState, useChatScroll } from "@/components/chat";
import { SessionSidebar } from "@/components/sidebar/session-sidebar";
import { chatApi } from "@/lib/api";
import { CONFIGURATION_ERROR_MESSAGE, useSessionChat } from "@/lib/use-session-chat";

const AGENT_NAME = "Friday";

const showError = (message: string) => {
  toast.error(message);
};

export default function ChatPage() {
  const { sessionId, name, transcript, isSending, startSession, sendMessage, clearChat } = useSessionChat({ onError: showError });
  const [input, setInput] = useState("");
  const { containerRef } = useChatScroll(transcript.length, isSending);

  // Warn up front when the server has no LLM credential
  useEffect(() => {
    chatApi
      .health()
      .then((status) => {
        if (!status.llmConfigured) toast.warning(CONFIGURATION_ERROR_MESSAGE);
      })
      .catch((err: unknown) => console.error("Health check failed:", err));
  }, []);

  const handleInputChange = useCallback((event: React.ChangeEvent<HTMLInputElement>) => {
    setInput(event.target.value);
  }, []);

  const handleSubmit = useCallback(
    (event: React.FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      const text = input.trim();
      if (!text) return;
      setInput("");
      void sendMessage(text);
    },
    [input, sendMessage],
  );

  const sidebar = (
    <SessionSidebar
      hasSession={sessionId !== null}
      isBusy={isSending}
      onStart={(newName, newPhone) => void startSession(newName, newPhone)}
      onClear={() => void clearChat()}
    />
  );

  return (
    <ChatLayout sidebar={sidebar}>
      <div className="flex h-full flex-col">
        <ChatHeader agentName={AGENT_NAME} userName={sessionId ? name : undefined} />

        <div ref={containerRef} className="flex-1 overflow-y-auto p-6">
          <div className="mx-auto max-w-3xl space-y-4">
            {transcript.length === 0 ? <EmptyState /> : transcript.map((entry, index) => <MessageBubble key={`${sessionId}-${index}`} entry={entry} />)}
            {isSending && <ThinkingBubble agentName={AGENT_NAME} />}
          </div>
        </div>

        <ChatInput value={input} onChange={handleInputChange} onSubmit={handleSubmit} isLoading={isSending} disabled={sessionId === null} />
      </div>
    </ChatLayout>
  );
}
