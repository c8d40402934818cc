import type { CompactMessage, CompactState, ContextSummary, TranscriptEntry } from "./types";

// Assistant entries longer than this are truncated before they are summarized
const DEFAULT_ENTRY_SIZE_LIMIT = 4 * 1024;

// =============================================================================
// Long Entry Summarizer
// =============================================================================

export interface EntrySummarizer {
  summarizeLongEntries(messages: readonly CompactMessage[], limit?: number): CompactMessage[];
}

export class TruncatingEntrySummarizer implements EntrySummarizer {
  private readonly defaultLimit: number;

  constructor(defaultLimit: number = DEFAULT_ENTRY_SIZE_LIMIT) {
    this.defaultLimit = defaultLimit;
  }

  summarizeLongEntries(messages: readonly CompactMessage[], limit?: number): CompactMessage[] {
    const effectiveLimit = limit ?? this.defaultLimit;

    return messages.map((message) => {
      // Only assistant replies grow long (therapist answers, call confirmations)
      if (message.role !== "assistant" || message.content.length <= effectiveLimit) {
        return message;
      }

      const previewLength = Math.floor(Math.min(effectiveLimit * 0.8, 1000));
      return {
        ...message,
        content: `${message.content.slice(0, previewLength)}...\n\n[Reply truncated from ${message.content.length} characters]`,
      };
    });
  }
}

/** Flatten transcript entries to compaction messages */
export function toCompactMessages(transcript: readonly TranscriptEntry[]): CompactMessage[] {
  return transcript.map((entry) => ({ role: entry.role, content: entry.text }));
}

// =============================================================================
// Compaction
// =============================================================================

/**
 * Conditionally compact a message history.
 *
 * When message count exceeds `maxMessages`:
 * 1. Truncate long assistant entries
 * 2. Generate a text summary of older messages
 * 3. Prepend summary as a system message
 * 4. Keep only the last `maxMessages` messages
 *
 * When count is under the threshold, returns messages unchanged.
 */
export function maybeCompact(messages: readonly CompactMessage[], maxMessages: number, summarizer: EntrySummarizer = new TruncatingEntrySummarizer()): CompactState {
  if (messages.length <= maxMessages) {
    return { messages: [...messages] };
  }

  const processed = summarizer.summarizeLongEntries(messages);

  const olderMessages = processed.slice(0, processed.length - maxMessages);
  const recentMessages = maxMessages > 0 ? processed.slice(-maxMessages) : [];

  const summaryText = olderMessages.map((m) => `${m.role}: ${m.content}`).join("\n");

  const summary: ContextSummary = { text: summaryText };

  const compactedMessages: CompactMessage[] = [
    {
      role: "system",
      content: `[Context from earlier in the conversation]\n${summaryText}`,
    },
    ...recentMessages,
  ];

  return {
    messages: compactedMessages,
    summary,
  };
}
