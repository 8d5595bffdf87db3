import {
  chatMessageToJSON,
  createChatMessage,
  isChatSubmission,
  withService,
} from "../core/ChatMessage";

describe("ChatMessage", () => {
  const now = new Date("2024-05-01T10:00:00.000Z");

  test("createChatMessage copies the submission and stamps the service", () => {
    const message = createChatMessage({ content: "hi", sender: "alice" }, "ping", now);

    expect(message).toEqual({
      content: "hi",
      sender: "alice",
      service: "ping",
      timestamp: new Date("2024-05-01T10:00:00.000Z"),
    });
    expect(Object.isFrozen(message)).toBe(true);
  });

  test("the timestamp does not follow later changes to the clock value", () => {
    const clock = new Date(now.getTime());
    const message = createChatMessage({ content: "hi", sender: "alice" }, "ping", clock);
    clock.setFullYear(2030);

    expect(message.timestamp.toISOString()).toBe("2024-05-01T10:00:00.000Z");
  });

  test("withService returns a new message with only the service changed", () => {
    const original = createChatMessage({ content: "hi", sender: "alice" }, "", now);
    const stamped = withService(original, "pong");

    expect(stamped).not.toBe(original);
    expect(original.service).toBe("");
    expect(stamped.service).toBe("pong");
    expect(stamped.content).toBe("hi");
    expect(stamped.sender).toBe("alice");
    expect(stamped.timestamp).toBe(original.timestamp);
    expect(Object.isFrozen(stamped)).toBe(true);
  });

  test("withService returns the same message when the service is unchanged", () => {
    const original = createChatMessage({ content: "hi", sender: "alice" }, "ping", now);
    expect(withService(original, "ping")).toBe(original);
  });

  test("chatMessageToJSON renders the timestamp as ISO-8601", () => {
    const message = createChatMessage({ content: "hi", sender: "alice" }, "ping", now);
    expect(chatMessageToJSON(message)).toEqual({
      content: "hi",
      sender: "alice",
      service: "ping",
      timestamp: "2024-05-01T10:00:00.000Z",
    });
  });

  test.each([
    [{ content: "hi", sender: "alice" }, true],
    [{ content: "hi", sender: "alice", extra: 1 }, true],
    [{ content: "  ", sender: "alice" }, false],
    [{ content: "hi", sender: "" }, false],
    [{ content: "hi" }, false],
    [{ content: 42, sender: "alice" }, false],
    [null, false],
    ["hi", false],
  ])("isChatSubmission(%j) is %s", (value, expected) => {
    expect(isChatSubmission(value)).toBe(expected);
  });
});
