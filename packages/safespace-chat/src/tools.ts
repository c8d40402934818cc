import { tool, type ToolSet } from "ai";
import { z } from "zod";
import type { SessionContext } from "./types";
import type { EmergencyNotifier } from "./emergency-notifier";
import type { Therapist } from "./therapist";
import { EMERGENCY_TOOL_NAME, SPECIALIST_TOOL_NAME } from "./prompts";

export interface ToolDependencies {
  therapist: Therapist;
  notifier: EmergencyNotifier;
}

/**
 * Build the agent's tools for one turn of one session.
 *
 * The emergency tool dials the session's phone number whenever the session
 * has one; the number the model passes is only used when it does not.
 */
export function buildSessionTools(context: SessionContext, deps: ToolDependencies) {
  return {
    [SPECIALIST_TOOL_NAME]: tool({
      description:
        "Generate a therapeutic response with a therapist persona. " +
        "Use this ONLY for emotional, mental health, or personal well-being related queries. " +
        "Respond with empathy, evidence-based guidance, and a supportive tone.",
      inputSchema: z.object({
        prompt: z.string().describe("The user's concern, in their own words"),
      }),
      execute: async ({ prompt }) => deps.therapist.respond(prompt),
    }),
    [EMERGENCY_TOOL_NAME]: tool({
      description:
        "Place an emergency call to the user's phone number. " +
        "Use this ONLY if the user expresses suicidal thoughts, self-harm, immediate danger, or a mental health crisis.",
      inputSchema: z.object({
        phone: z.string().describe("The user's phone number from the session context"),
      }),
      execute: async ({ phone }) => {
        const target = context.phone || phone;
        console.log(`[agent] ${EMERGENCY_TOOL_NAME} invoked (session phone ${context.phone ? "set" : "missing"})`);
        return deps.notifier.callEmergencyServices(target);
      },
    }),
  } satisfies ToolSet;
}

export type SessionTools = ReturnType<typeof buildSessionTools>;
