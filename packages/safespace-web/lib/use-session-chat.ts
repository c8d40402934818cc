"use client";

import { useCallback, useState } from "react";
import type { SessionView, TranscriptEntry } from "@safespace/chat";
import { chatApi, type ChatApi } from "./api";
import { isApiError } from "./errors";

export const CONFIGURATION_ERROR_MESSAGE = "Server not configured. Please set GROQ_API_KEY in your environment and restart.";

interface UseSessionChatOptions {
  /** API client (tests pass a fake) */
  api?: ChatApi;
  /** Called with a user-facing message whenever a request fails */
  onError?: (message: string) => void;
}

interface UseSessionChatReturn {
  sessionId: string | null;
  name: string;
  transcript: TranscriptEntry[];
  isSending: boolean;
  startSession: (name: string, phone: string) => Promise<void>;
  sendMessage: (text: string) => Promise<void>;
  clearChat: () => Promise<void>;
}

function describeError(error: unknown): string {
  if (isApiError(error)) {
    return error.isConfigurationError ? CONFIGURATION_ERROR_MESSAGE : error.message;
  }
  return error instanceof Error ? error.message : "Something went wrong";
}

/**
 * Session state for the chat page: the server owns the transcript, the
 * hook mirrors it and shows the user's message while the reply is pending.
 */
export function useSessionChat({ api = chatApi, onError }: UseSessionChatOptions = {}): UseSessionChatReturn {
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [name, setName] = useState("");
  const [transcript, setTranscript] = useState<TranscriptEntry[]>([]);
  const [isSending, setIsSending] = useState(false);

  const report = useCallback(
    (err: unknown) => {
      onError?.(describeError(err));
    },
    [onError],
  );

  const startSession = useCallback(
    async (newName: string, newPhone: string) => {
      let view: SessionView;
      try {
        view = await api.startSession(newName, newPhone);
      } catch (err) {
        // The previous session, if any, is still live
        report(err);
        return;
      }
      setSessionId(view.sessionId);
      setName(view.name);
      setTranscript(view.transcript);

      if (sessionId) {
        // Restart: discard the previous session once the new one exists
        await api.endSession(sessionId).catch((err: unknown) => console.error("Failed to end previous session:", err));
      }
    },
    [api, sessionId, report],
  );

  const sendMessage = useCallback(
    async (text: string) => {
      const trimmed = text.trim();
      if (!trimmed || !sessionId || isSending) return;

      const previous = transcript;
      setTranscript([...previous, { role: "user", text: trimmed }]);
      setIsSending(true);

      try {
        const result = await api.sendMessage(sessionId, trimmed);
        setTranscript(result.transcript);
      } catch (err) {
        // Only a failure during dispatch (500) leaves the message recorded server-side
        if (!isApiError(err) || err.status !== 500) {
          setTranscript(previous);
        }
        if (isApiError(err) && err.status === 404) {
          setSessionId(null);
        }
        report(err);
      } finally {
        setIsSending(false);
      }
    },
    [api, sessionId, isSending, transcript, report],
  );

  const clearChat = useCallback(async () => {
    if (!sessionId) {
      setTranscript([]);
      return;
    }
    try {
      const view = await api.clearSession(sessionId);
      setTranscript(view.transcript);
    } catch (err) {
      if (isApiError(err) && err.status === 404) {
        setSessionId(null);
      }
      report(err);
    }
  }, [api, sessionId, report]);

  return { sessionId, name, transcript, isSending, startSession, sendMessage, clearChat };
}
