import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccessGate, MAX_PENDING_REQUESTS } from "../handlers/access";
import { MemoryAllowList, RecordingPort } from "./utils/fakes";

const OWNER_ID = 99;

function setup() {
  const allowList = new MemoryAllowList();
  const gate = new AccessGate(OWNER_ID, allowList);
  const port = new RecordingPort();
  return { allowList, gate, port };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("AccessGate requests", () => {
  it("grants with the names from the last request", async () => {
    const { allowList, gate, port } = setup();

    gate.requestAccess({ userId: 2, username: "bob", firstName: "Bob" }, port);
    await gate.settled();
    await gate.grant(2);

    expect(allowList.users.get(2)).toMatchObject({
      userId: 2,
      username: "bob",
      firstName: "Bob",
    });
  });

  it("forgets a request once the user is revoked", async () => {
    const { allowList, gate, port } = setup();

    gate.requestAccess({ userId: 2, username: "bob", firstName: "Bob" }, port);
    await gate.settled();
    await gate.revoke(2);
    await gate.grant(2);

    expect(allowList.users.get(2)).toMatchObject({
      userId: 2,
      username: null,
      firstName: null,
    });
  });

  it("keeps only the most recent requests", async () => {
    const { allowList, gate, port } = setup();

    for (let userId = 1; userId <= MAX_PENDING_REQUESTS + 1; userId++) {
      gate.requestAccess({ userId, username: `user${userId}` }, port);
    }
    await gate.settled();
    await gate.grant(1);
    await gate.grant(2);

    expect(allowList.users.get(1)).toMatchObject({ username: null });
    expect(allowList.users.get(2)).toMatchObject({ username: "user2" });
    expect(port.notifications).toHaveLength(MAX_PENDING_REQUESTS + 1);
  });

  it("moves a repeated request to the back", async () => {
    const { allowList, gate, port } = setup();

    gate.requestAccess({ userId: 1, username: "first" }, port);
    for (let userId = 2; userId <= MAX_PENDING_REQUESTS; userId++) {
      gate.requestAccess({ userId }, port);
    }
    gate.requestAccess({ userId: 1, username: "again" }, port);
    gate.requestAccess({ userId: 500 }, port);
    await gate.settled();
    await gate.grant(1);

    expect(allowList.users.get(1)).toMatchObject({ username: "again" });
  });
});
