// ============================================================================
// Sessions
// ============================================================================

export type TranscriptRole = "user" | "assistant";

/** One line of the chat transcript */
export interface TranscriptEntry {
  role: TranscriptRole;
  text: string;
  /** Name of the tool the agent called to produce this reply, if any */
  toolCalled?: string;
}

/** A single user's interactive run. Held in memory only. */
export interface Session {
  id: string;
  /** Display name, "there" when the user left it blank */
  name: string;
  /** Phone number used for emergencies, empty when not provided */
  phone: string;
  /** Entries in insertion order */
  transcript: TranscriptEntry[];
  createdAt: Date;
}

/** The part of a session injected into every dispatch */
export interface SessionContext {
  name: string;
  phone: string;
}

/** Session shape returned over HTTP */
export interface SessionView {
  sessionId: string;
  name: string;
  phone: string;
  transcript: TranscriptEntry[];
}

// ============================================================================
// Dispatch
// ============================================================================

/** Outcome of one user turn through the agent */
export interface DispatchResult {
  /** Final reply text */
  text: string;
  /** First tool the model called during the turn, or null */
  toolCalled: string | null;
}

/** Response of POST /api/sessions/:id/messages */
export interface SendMessageResult {
  reply: string;
  toolCalled: string | null;
  transcript: TranscriptEntry[];
}

// ============================================================================
// Chat Config
// ============================================================================

export interface TelephonyConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  /** TwiML document Twilio fetches when the call connects */
  voiceUrl: string;
}

/** Chat configuration resolved from the environment */
export interface ChatConfig {
  /** Model spec in provider:model format (e.g. "groq:openai/gpt-oss-20b") */
  modelName: string;
  /** API key for the model's provider, undefined when not set */
  apiKey?: string;
  /** Custom base URL for the provider */
  baseUrl?: string;
  /** Temperature for LLM generation (0–2) */
  temperature: number;
  /** Nucleus sampling */
  topP: number;
  /** Maximum number of agent steps per message */
  maxSteps: number;
  /** Transcript entries sent verbatim before older ones are folded into a summary */
  historyMaxMessages: number;
  /** Name the assistant introduces itself with */
  agentName: string;
  /** Twilio settings, undefined when any credential is missing */
  telephony?: TelephonyConfig;
}

export const DEFAULT_TWILIO_VOICE_URL = "http://demo.twilio.com/docs/voice.xml";

export const DEFAULT_CHAT_CONFIG: ChatConfig = {
  modelName: "groq:openai/gpt-oss-20b",
  temperature: 0.7,
  topP: 0.9,
  maxSteps: 5,
  historyMaxMessages: 20,
  agentName: "Friday",
};

// ============================================================================
// Compaction
// ============================================================================

/** Simplified message for compaction (flattened from the transcript) */
export interface CompactMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

/** Optional context summary from compaction */
export interface ContextSummary {
  /** Text summary of compacted older messages */
  text: string;
}

/** State after compaction processing */
export interface CompactState {
  /** Messages to send to the LLM (possibly trimmed) */
  messages: CompactMessage[];
  /** Summary of older messages (if compaction triggered) */
  summary?: ContextSummary;
}
