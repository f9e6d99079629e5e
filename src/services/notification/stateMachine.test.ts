import { describe, expect, it } from "vitest";

import { READABLE_STATUSES, canTransition } from "./stateMachine";

describe("notification state machine", () => {
  it("should allow the forward delivery path", () => {
    expect(canTransition("pending", "sent")).toBe(true);
    expect(canTransition("sent", "delivered")).toBe(true);
    expect(canTransition("pending", "delivered")).toBe(true);
    expect(canTransition("delivered", "read")).toBe(true);
    expect(canTransition("sent", "failed")).toBe(true);
  });

  it("should reject backwards and terminal transitions", () => {
    expect(canTransition("delivered", "sent")).toBe(false);
    expect(canTransition("read", "delivered")).toBe(false);
    expect(canTransition("failed", "sent")).toBe(false);
    expect(canTransition("pending", "read")).toBe(false);
    expect(canTransition("delivered", "failed")).toBe(false);
  });

  it("should only count sent and delivered records as readable", () => {
    expect([...READABLE_STATUSES]).toEqual(["sent", "delivered"]);
  });
});
