import { afterEach, describe, expect, it, vi } from "vitest";
import { SessionStore } from "../sessions";

describe("SessionStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts idle", async () => {
    const sessions = SessionStore.inMemory();
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("keeps state per user", async () => {
    const sessions = SessionStore.inMemory();
    await sessions.set(1, { step: "expenseAmount", category: "Еда" });

    expect(await sessions.get(1)).toEqual({
      step: "expenseAmount",
      category: "Еда",
    });
    expect(await sessions.get(2)).toEqual({ step: "idle" });
  });

  it("forgets the state once idle", async () => {
    const sessions = SessionStore.inMemory();
    await sessions.set(1, { step: "statsMonth" });
    await sessions.set(1, { step: "idle" });

    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("drops abandoned dialogs after the ttl", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2025, 10, 20, 12));
    const sessions = SessionStore.inMemory(30);
    await sessions.set(1, { step: "incomeAmount" });

    vi.setSystemTime(new Date(2025, 10, 20, 12, 29));
    expect(await sessions.get(1)).toEqual({ step: "incomeAmount" });

    vi.setSystemTime(new Date(2025, 10, 20, 12, 31));
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });
});
