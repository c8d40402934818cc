import { generateText, stepCountIs, type LanguageModel, type ModelMessage } from "ai";
import type { DispatchResult, SessionContext, TranscriptEntry } from "./types";
import { buildSessionTools, type ToolDependencies } from "./tools";
import { buildSessionContext, buildSystemPrompt } from "./prompts";
import { maybeCompact, toCompactMessages } from "./compaction";

/**
 * Routes a user message to a direct reply or to one of the tools.
 * Which one is the model's decision.
 */
export interface ToolDispatcher {
  selectAndInvoke(message: string, context: SessionContext, history?: readonly TranscriptEntry[]): Promise<DispatchResult>;
}

export interface AgentDispatcherOptions {
  agentName: string;
  temperature: number;
  topP: number;
  maxSteps: number;
  historyMaxMessages: number;
}

/** The part of a generateText result the dispatcher reads */
export interface AgentRun {
  text: string;
  steps: ReadonlyArray<{
    toolCalls: ReadonlyArray<{ toolName: string }>;
    toolResults: ReadonlyArray<{ toolName: string; output: unknown }>;
  }>;
}

/**
 * Reduce an agent run to the reply text and the first tool called.
 *
 * When the model ends on a tool result without writing any text, the
 * last string tool output becomes the reply.
 */
export function summarizeRun(run: AgentRun): DispatchResult {
  let toolCalled: string | null = null;
  let lastToolOutput = "";

  for (const step of run.steps) {
    if (toolCalled === null && step.toolCalls.length > 0) {
      toolCalled = step.toolCalls[0].toolName;
    }
    for (const result of step.toolResults) {
      if (typeof result.output === "string" && result.output.trim() !== "") {
        lastToolOutput = result.output;
      }
    }
  }

  const text = run.text.trim();
  return { text: text || lastToolOutput.trim(), toolCalled };
}

/**
 * ToolDispatcher backed by the AI SDK's multi-step tool calling.
 */
export class AgentDispatcher implements ToolDispatcher {
  constructor(
    private readonly model: LanguageModel,
    private readonly deps: ToolDependencies,
    private readonly options: AgentDispatcherOptions,
  ) {}

  buildMessages(message: string, context: SessionContext, history: readonly TranscriptEntry[] = []): ModelMessage[] {
    const compacted = maybeCompact(toCompactMessages(history), this.options.historyMaxMessages);
    if (compacted.summary) {
      console.log(`[agent] History compacted: kept last ${this.options.historyMaxMessages} entries, summary ${compacted.summary.text.length} chars`);
    }
    const historyMessages: ModelMessage[] = compacted.messages
      .filter((msg) => msg.content.trim() !== "")
      .map((msg) => ({ role: msg.role, content: msg.content }));

    return [
      { role: "system", content: buildSystemPrompt(this.options.agentName) },
      { role: "system", content: buildSessionContext(context, this.options.agentName) },
      ...historyMessages,
      { role: "user", content: message },
    ];
  }

  async selectAndInvoke(message: string, context: SessionContext, history: readonly TranscriptEntry[] = []): Promise<DispatchResult> {
    const result = await generateText({
      model: this.model,
      messages: this.buildMessages(message, context, history),
      tools: buildSessionTools(context, this.deps),
      stopWhen: stepCountIs(this.options.maxSteps),
      temperature: this.options.temperature,
      topP: this.options.topP,
      onStepFinish: ({ finishReason, toolCalls }) => {
        console.log(`[agent] Step finished: reason=${finishReason}, toolCalls=${toolCalls.length}`);
      },
    });

    return summarizeRun(result);
  }
}
