import { Hono } from "hono";
import { z } from "zod";
import { createChatService, type ChatService } from "./chat-service";
import { loadChatConfig } from "./chat-config";
import { ConfigurationError, SessionNotFoundError } from "./errors";

const startSessionSchema = z.object({
  name: z.string().max(200).default(""),
  phone: z.string().max(32).default(""),
});

const sendMessageSchema = z.object({
  message: z.string().trim().min(1, "message is required").max(8000),
});

const INVALID_JSON = Symbol("invalid-json");

/** Read a JSON body; a missing or malformed body reads as INVALID_JSON */
async function readJson(req: { json(): Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return INVALID_JSON;
  }
}

/** Validate a request body, returning the data or the first problem found */
async function parseBody<T>(req: { json(): Promise<unknown> }, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<{ data: T } | { message: string }> {
  const body = await readJson(req);
  if (body === INVALID_JSON) {
    return { message: "request body must be valid JSON" };
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { message: parsed.error.issues[0]?.message ?? "invalid request" };
  }
  return { data: parsed.data };
}

/**
 * Build the Hono app that serves sessions and chat turns.
 *
 * Mounted at `/api` basePath.
 */
export function createChatApp(service: ChatService) {
  const app = new Hono().basePath("/api");

  app.onError((error, c) => {
    if (error instanceof SessionNotFoundError) {
      return c.json({ error: "not_found", message: error.message }, 404);
    }
    if (error instanceof ConfigurationError) {
      return c.json({ error: "configuration_error", message: error.message }, 503);
    }
    console.error("Chat error:", error instanceof Error ? error.stack : error);
    return c.json({ error: "internal_error", message: "Internal server error" }, 500);
  });

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      llmConfigured: service.llmConfigured,
      telephonyConfigured: service.telephonyConfigured,
    }),
  );

  app.post("/sessions", async (c) => {
    const parsed = await parseBody(c.req, startSessionSchema);
    if ("message" in parsed) {
      return c.json({ error: "validation_error", message: parsed.message }, 400);
    }
    return c.json(service.startSession(parsed.data.name, parsed.data.phone), 201);
  });

  app.get("/sessions/:id", (c) => c.json(service.getSession(c.req.param("id"))));

  app.post("/sessions/:id/messages", async (c) => {
    const parsed = await parseBody(c.req, sendMessageSchema);
    if ("message" in parsed) {
      return c.json({ error: "validation_error", message: parsed.message }, 400);
    }
    const result = await service.sendMessage(c.req.param("id"), parsed.data.message);
    return c.json(result);
  });

  app.delete("/sessions/:id/messages", (c) => c.json(service.clearSession(c.req.param("id"))));

  app.delete("/sessions/:id", (c) => {
    const id = c.req.param("id");
    if (!service.endSession(id)) {
      throw new SessionNotFoundError(id);
    }
    return c.body(null, 204);
  });

  return app;
}

let defaultApp: ReturnType<typeof createChatApp> | null = null;

/**
 * Process-wide app built from `process.env` on first use, so every request
 * sees the same in-memory sessions.
 */
export function getChatApp() {
  if (!defaultApp) {
    defaultApp = createChatApp(createChatService(loadChatConfig()));
  }
  return defaultApp;
}
