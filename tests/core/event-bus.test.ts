import { type AdaptestEventMap, EventBus } from "@adaptest/core/event-bus";
import { beforeEach, describe, expect, test } from "vitest";

function recorded(
  overrides: Partial<AdaptestEventMap["session.response.recorded"]> = {},
): AdaptestEventMap["session.response.recorded"] {
  return {
    session_id: "session-1",
    item_id: "item-1",
    is_correct: true,
    theta: 0.4,
    se: 0.8,
    method: "MLE",
    n_items: 1,
    ...overrides,
  };
}

describe("EventBus", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  test("on() + emit() calls handler with correct data", () => {
    const received: AdaptestEventMap["session.started"][] = [];
    bus.on("session.started", (data) => {
      received.push(data);
    });

    bus.emit("session.started", {
      session_id: "session-1",
      learner_id: "ada",
      topic: "Algebra",
      pool_size: 12,
    });

    expect(received).toEqual([
      { session_id: "session-1", learner_id: "ada", topic: "Algebra", pool_size: 12 },
    ]);
  });

  test("off() removes handler so it is no longer called", () => {
    let callCount = 0;
    const handler = () => {
      callCount++;
    };

    bus.on("session.response.recorded", handler);
    bus.emit("session.response.recorded", recorded());
    expect(callCount).toBe(1);

    bus.off("session.response.recorded", handler);
    bus.emit("session.response.recorded", recorded());
    expect(callCount).toBe(1);
  });

  test("once() handler is called only once", () => {
    const seen: number[] = [];
    bus.once("session.saved", (data) => {
      seen.push(data.revision);
    });

    bus.emit("session.saved", { session_id: "s", revision: 1 });
    bus.emit("session.saved", { session_id: "s", revision: 2 });

    expect(seen).toEqual([1]);
    expect(bus.listenerCount("session.saved")).toBe(0);
  });

  test("multiple handlers on same event are called in registration order", () => {
    const calls: string[] = [];

    bus.on("session.resumed", () => calls.push("handler-1"));
    bus.on("session.resumed", () => calls.push("handler-2"));
    bus.on("session.resumed", () => calls.push("handler-3"));

    bus.emit("session.resumed", { session_id: "s", revision: 3 });

    expect(calls).toEqual(["handler-1", "handler-2", "handler-3"]);
  });

  test("onAny() wildcard receives all events", () => {
    const received: string[] = [];
    bus.onAny((event) => {
      received.push(event);
    });

    bus.emit("session.saved", { session_id: "s", revision: 1 });
    bus.emit("session.response.recorded", recorded());

    expect(received).toEqual(["session.saved", "session.response.recorded"]);
  });

  test("removeAll(event) clears handlers for a specific event", () => {
    let savedCalls = 0;
    let resumedCalls = 0;

    bus.on("session.saved", () => savedCalls++);
    bus.on("session.resumed", () => resumedCalls++);

    bus.removeAll("session.saved");

    bus.emit("session.saved", { session_id: "s", revision: 1 });
    bus.emit("session.resumed", { session_id: "s", revision: 1 });

    expect(savedCalls).toBe(0);
    expect(resumedCalls).toBe(1);
  });

  test("removeAll() without arg clears everything including wildcard handlers", () => {
    let specificCalls = 0;
    let wildcardCalls = 0;

    bus.on("session.saved", () => specificCalls++);
    bus.onAny(() => wildcardCalls++);

    bus.removeAll();
    bus.emit("session.saved", { session_id: "s", revision: 1 });

    expect(specificCalls).toBe(0);
    expect(wildcardCalls).toBe(0);
  });

  test("listenerCount returns correct number", () => {
    expect(bus.listenerCount("session.completed")).toBe(0);

    const h1 = () => {};
    const h2 = () => {};
    bus.on("session.completed", h1);
    bus.on("session.completed", h2);
    expect(bus.listenerCount("session.completed")).toBe(2);

    bus.off("session.completed", h1);
    expect(bus.listenerCount("session.completed")).toBe(1);
  });

  test("a handler removed during emit does not break the loop", () => {
    const calls: string[] = [];
    const first = () => {
      calls.push("first");
      bus.off("session.saved", second);
    };
    const second = () => {
      calls.push("second");
    };
    bus.on("session.saved", first);
    bus.on("session.saved", second);

    bus.emit("session.saved", { session_id: "s", revision: 1 });

    expect(calls).toEqual(["first", "second"]);
    bus.emit("session.saved", { session_id: "s", revision: 2 });
    expect(calls).toEqual(["first", "second", "first"]);
  });

  test("emit without handlers does not throw", () => {
    expect(() => {
      bus.emit("session.estimator.fallback", {
        session_id: "s",
        reason: "degenerate-pattern",
        theta: -1.2,
      });
    }).not.toThrow();
  });

  test("offAny removes wildcard handler", () => {
    let callCount = 0;
    const handler = () => {
      callCount++;
    };

    bus.onAny(handler);
    bus.emit("session.saved", { session_id: "s", revision: 1 });
    bus.offAny(handler);
    bus.emit("session.saved", { session_id: "s", revision: 2 });

    expect(callCount).toBe(1);
  });
});
