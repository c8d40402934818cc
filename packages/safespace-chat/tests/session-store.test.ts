import { describe, it, expect } from "vitest";
import { SessionStore, buildGreeting, contextOf, toSessionView } from "../src/session-store.js";
import { SessionNotFoundError } from "../src/errors.js";

function createStore() {
  let counter = 0;
  return new SessionStore("Friday", () => `session-${++counter}`);
}

describe("SessionStore", () => {
  it("should start a session with a greeting as the first entry", () => {
    const store = createStore();
    const session = store.start("Alex", "+15551234567");

    expect(session.id).toBe("session-1");
    expect(session.name).toBe("Alex");
    expect(session.phone).toBe("+15551234567");
    expect(session.transcript).toEqual([
      {
        role: "assistant",
        text: "Hello Alex, I'm Friday. We can chat here. If you ever indicate an emergency, I may attempt to call the provided number for help.",
      },
    ]);
  });

  it("should trim name and phone and default a blank name", () => {
    const store = createStore();
    const session = store.start("   ", "  +15550001111 ");

    expect(session.name).toBe("there");
    expect(session.phone).toBe("+15550001111");
    expect(session.transcript[0].text).toBe(buildGreeting("there", "Friday"));
  });

  it("should preserve insertion order across turns", () => {
    const store = createStore();
    const { id } = store.start("Alex", "");

    store.append(id, "user", "first");
    store.append(id, "assistant", "reply one");
    store.append(id, "user", "second");
    store.append(id, "assistant", "reply two", "ask_mental_health_specialist");

    expect(store.get(id).transcript.map((e) => `${e.role}:${e.text}`)).toEqual(["assistant:" + buildGreeting("Alex", "Friday"), "user:first", "assistant:reply one", "user:second", "assistant:reply two"]);
    expect(store.get(id).transcript[4].toolCalled).toBe("ask_mental_health_specialist");
  });

  it("should not record toolCalled when no tool was used", () => {
    const store = createStore();
    const { id } = store.start("Alex", "");

    const entry = store.append(id, "assistant", "plain answer");
    expect(entry).toEqual({ role: "assistant", text: "plain answer" });
  });

  it("should clear the transcript but keep name and phone", () => {
    const store = createStore();
    const { id } = store.start("Alex", "+15551234567");
    store.append(id, "user", "hello");

    const cleared = store.clear(id);
    expect(cleared.transcript).toEqual([]);
    expect(cleared.name).toBe("Alex");
    expect(cleared.phone).toBe("+15551234567");

    store.append(id, "user", "after clear");
    expect(store.get(id).transcript).toEqual([{ role: "user", text: "after clear" }]);
  });

  it("should end sessions", () => {
    const store = createStore();
    const { id } = store.start("Alex", "");

    expect(store.end(id)).toBe(true);
    expect(() => store.get(id)).toThrow(SessionNotFoundError);
    expect(store.end(id)).toBe(false);
    expect(store.size).toBe(0);
  });

  it("should throw SessionNotFoundError for unknown ids", () => {
    const store = createStore();
    expect(() => store.get("missing")).toThrow(SessionNotFoundError);
    expect(() => store.append("missing", "user", "hi")).toThrow("Session not found: missing");
    expect(() => store.clear("missing")).toThrow(SessionNotFoundError);
  });

  it("should generate distinct UUIDs by default", () => {
    const store = new SessionStore("Friday");
    const a = store.start("A", "");
    const b = store.start("B", "");
    expect(a.id).not.toBe(b.id);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("contextOf / toSessionView", () => {
  it("should expose name and phone as the session context", () => {
    const store = createStore();
    const session = store.start("Alex", "+15551234567");
    expect(contextOf(session)).toEqual({ name: "Alex", phone: "+15551234567" });
  });

  it("should copy transcript entries into the view", () => {
    const store = createStore();
    const session = store.start("Alex", "");
    const view = toSessionView(session);

    view.transcript[0].text = "changed";
    expect(session.transcript[0].text).toBe(buildGreeting("Alex", "Friday"));
    expect(view.sessionId).toBe("session-1");
  });
});
