export { createChatApp, getChatApp } from "./app";
export { ChatService, createChatService, EMPTY_REPLY_TEXT } from "./chat-service";
export type { ChatServiceDeps } from "./chat-service";
export { loadChatConfig, createConfiguredModel } from "./chat-config";
export { SessionStore, buildGreeting, contextOf, toSessionView, DEFAULT_DISPLAY_NAME } from "./session-store";
export { AgentDispatcher, summarizeRun } from "./dispatcher";
export type { ToolDispatcher, AgentDispatcherOptions, AgentRun } from "./dispatcher";
export { TwilioEmergencyNotifier, EMERGENCY_FALLBACK_MESSAGE, buildCallConfirmation } from "./emergency-notifier";
export type { EmergencyNotifier, CallClient, CallClientFactory } from "./emergency-notifier";
export { LlmTherapist, THERAPIST_FALLBACK_MESSAGE, THERAPIST_UNCONFIGURED_MESSAGE } from "./therapist";
export type { Therapist, TherapistOptions } from "./therapist";
export { buildSessionTools } from "./tools";
export type { ToolDependencies, SessionTools } from "./tools";
export { maybeCompact, toCompactMessages, TruncatingEntrySummarizer } from "./compaction";
export type { EntrySummarizer } from "./compaction";
export { getChatModel, getProviderFromSpec } from "./model-registry";
export type { GetChatModelOptions } from "./model-registry";
export { ConfigurationError, SessionNotFoundError } from "./errors";
export { buildSystemPrompt, buildSessionContext, EMERGENCY_TOOL_NAME, SPECIALIST_TOOL_NAME } from "./prompts";
export type { ChatConfig, TelephonyConfig, Session, SessionContext, SessionView, TranscriptEntry, TranscriptRole, DispatchResult, SendMessageResult, CompactMessage, CompactState, ContextSummary } from "./types";
export { DEFAULT_CHAT_CONFIG, DEFAULT_TWILIO_VOICE_URL } from "./types";
