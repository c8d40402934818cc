import type { ChatConfig, SendMessageResult, SessionView } from "./types";
import { SessionStore, contextOf, toSessionView } from "./session-store";
import { AgentDispatcher, type ToolDispatcher } from "./dispatcher";
import { TwilioEmergencyNotifier, type EmergencyNotifier } from "./emergency-notifier";
import { LlmTherapist } from "./therapist";
import { createConfiguredModel } from "./chat-config";
import { ConfigurationError } from "./errors";

/** Stored when the model returns no text at all */
export const EMPTY_REPLY_TEXT = "(No response)";

export interface ChatServiceDeps {
  store: SessionStore;
  /** Null when the LLM is not configured */
  dispatcher: ToolDispatcher | null;
  notifier: EmergencyNotifier;
  /** Why the dispatcher could not be built */
  configurationError?: string;
}

/**
 * Session lifecycle plus the per-message flow:
 * append the user entry, dispatch, append the reply.
 */
export class ChatService {
  constructor(private readonly deps: ChatServiceDeps) {}

  get llmConfigured(): boolean {
    return this.deps.dispatcher !== null;
  }

  get telephonyConfigured(): boolean {
    return this.deps.notifier.isConfigured;
  }

  startSession(name: string, phone: string): SessionView {
    const session = this.deps.store.start(name, phone);
    console.log(`[chat] Session started: ${session.id} (${this.deps.store.size} active)`);
    return toSessionView(session);
  }

  getSession(id: string): SessionView {
    return toSessionView(this.deps.store.get(id));
  }

  clearSession(id: string): SessionView {
    return toSessionView(this.deps.store.clear(id));
  }

  endSession(id: string): boolean {
    const ended = this.deps.store.end(id);
    if (ended) {
      console.log(`[chat] Session ended: ${id} (${this.deps.store.size} active)`);
    }
    return ended;
  }

  /**
   * Run one user turn.
   *
   * @throws SessionNotFoundError for unknown sessions
   * @throws ConfigurationError when no LLM is configured (nothing is appended)
   */
  async sendMessage(id: string, message: string): Promise<SendMessageResult> {
    const session = this.deps.store.get(id);
    const dispatcher = this.deps.dispatcher;
    if (!dispatcher) {
      throw new ConfigurationError(this.deps.configurationError ?? "The language model is not configured");
    }

    const history = [...session.transcript];
    this.deps.store.append(id, "user", message);

    const result = await dispatcher.selectAndInvoke(message, contextOf(session), history);
    const reply = result.text || EMPTY_REPLY_TEXT;
    this.deps.store.append(id, "assistant", reply, result.toolCalled ?? undefined);

    if (result.toolCalled) {
      console.log(`[chat] Tool used in ${id}: ${result.toolCalled}`);
    }

    return {
      reply,
      toolCalled: result.toolCalled,
      transcript: this.getSession(id).transcript,
    };
  }
}

/**
 * Wire a ChatService from configuration.
 *
 * A missing LLM credential leaves the dispatcher unbuilt and is reported on
 * every message; missing telephony only disables calling.
 */
export function createChatService(config: ChatConfig): ChatService {
  const notifier = new TwilioEmergencyNotifier(config.telephony);
  const store = new SessionStore(config.agentName);

  try {
    const model = createConfiguredModel(config);
    const therapist = new LlmTherapist(model, { temperature: config.temperature, topP: config.topP });
    const dispatcher = new AgentDispatcher(
      model,
      { therapist, notifier },
      {
        agentName: config.agentName,
        temperature: config.temperature,
        topP: config.topP,
        maxSteps: config.maxSteps,
        historyMaxMessages: config.historyMaxMessages,
      },
    );
    return new ChatService({ store, dispatcher, notifier });
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    console.error(`[chat] Agent not created: ${error.message}`);
    return new ChatService({ store, dispatcher: null, notifier, configurationError: error.message });
  }
}
