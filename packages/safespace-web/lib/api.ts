/**
 * Client for the SafeSpace chat API.
 *
 * The API is served by the same Next.js server under `/api`, so URLs are
 * relative unless NEXT_PUBLIC_API_URL points elsewhere.
 */

import type { SendMessageResult, SessionView } from "@safespace/chat";
import { ApiError, readErrorBody } from "./errors";

export interface HealthResponse {
  status: "ok";
  llmConfigured: boolean;
  telephonyConfigured: boolean;
}

function getApiBaseUrl(): string {
  if (typeof process !== "undefined" && process.env?.NEXT_PUBLIC_API_URL) {
    return process.env.NEXT_PUBLIC_API_URL;
  }
  return "";
}

/**
 * Build a full API URL from a path.
 *
 * All API routes are mounted under `/api`, so this prepends `/api` to the
 * given path.
 */
export function apiUrl(path: string): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${getApiBaseUrl()}/api${normalizedPath}`;
}

async function send(method: string, path: string, body?: unknown): Promise<Response> {
  const response = await fetch(apiUrl(path), {
    method,
    headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

  if (!response.ok) {
    throw new ApiError(response.status, await readErrorBody(response));
  }
  return response;
}

async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
  const response = await send(method, path, body);
  return response.json();
}

function sessionPath(sessionId: string): string {
  return `/sessions/${encodeURIComponent(sessionId)}`;
}

export const chatApi = {
  health: () => request<HealthResponse>("GET", "/health"),
  startSession: (name: string, phone: string) => request<SessionView>("POST", "/sessions", { name, phone }),
  sendMessage: (sessionId: string, message: string) => request<SendMessageResult>("POST", `${sessionPath(sessionId)}/messages`, { message }),
  clearSession: (sessionId: string) => request<SessionView>("DELETE", `${sessionPath(sessionId)}/messages`),
  endSession: async (sessionId: string): Promise<void> => {
    await send("DELETE", sessionPath(sessionId));
  },
};

export type ChatApi = typeof chatApi;
