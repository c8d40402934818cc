import type { Session, SessionContext, SessionView, TranscriptEntry, TranscriptRole } from "./types";
import { SessionNotFoundError } from "./errors";

/** Name used when the user leaves the name field blank */
export const DEFAULT_DISPLAY_NAME = "there";

/**
 * Greeting appended as the first assistant entry of every session.
 */
export function buildGreeting(name: string, agentName: string): string {
  return `Hello ${name}, I'm ${agentName}. We can chat here. If you ever indicate an emergency, I may attempt to call the provided number for help.`;
}

/**
 * In-memory session store.
 *
 * Sessions live for the lifetime of the process; nothing is persisted.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly agentName: string,
    private readonly generateId: () => string = () => crypto.randomUUID(),
  ) {}

  /** Start a new session and greet the user. */
  start(name: string, phone: string): Session {
    const session: Session = {
      id: this.generateId(),
      name: name.trim() || DEFAULT_DISPLAY_NAME,
      phone: phone.trim(),
      transcript: [],
      createdAt: new Date(),
    };
    session.transcript.push({ role: "assistant", text: buildGreeting(session.name, this.agentName) });
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  append(id: string, role: TranscriptRole, text: string, toolCalled?: string): TranscriptEntry {
    const session = this.get(id);
    const entry: TranscriptEntry = toolCalled ? { role, text, toolCalled } : { role, text };
    session.transcript.push(entry);
    return entry;
  }

  /** Drop every transcript entry; name and phone stay. */
  clear(id: string): Session {
    const session = this.get(id);
    session.transcript = [];
    return session;
  }

  /** Discard the session. Returns false if it did not exist. */
  end(id: string): boolean {
    return this.sessions.delete(id);
  }

  /** Number of live sessions */
  get size(): number {
    return this.sessions.size;
  }
}

export function contextOf(session: Session): SessionContext {
  return { name: session.name, phone: session.phone };
}

export function toSessionView(session: Session): SessionView {
  return {
    sessionId: session.id,
    name: session.name,
    phone: session.phone,
    transcript: session.transcript.map((entry) => ({ ...entry })),
  };
}
