import { ChatMessageJSON, IChatMessage, IChatSubmission } from "../interfaces";

export function createChatMessage(
  submission: IChatSubmission,
  service: string,
  now: Date = new Date()
): IChatMessage {
  return Object.freeze({
    content: submission.content,
    sender: submission.sender,
    service,
    timestamp: new Date(now.getTime()),
  });
}

/**
 * Re-stamps the provenance tag. Content, sender and timestamp carry over.
 */
export function withService(message: IChatMessage, service: string): IChatMessage {
  if (message.service === service) return message;
  return Object.freeze({
    content: message.content,
    sender: message.sender,
    service,
    timestamp: message.timestamp,
  });
}

export function chatMessageToJSON(message: IChatMessage): ChatMessageJSON {
  return {
    content: message.content,
    sender: message.sender,
    service: message.service,
    timestamp: message.timestamp.toISOString(),
  };
}

export function isChatSubmission(value: unknown): value is IChatSubmission {
  if (typeof value !== "object" || value === null) return false;
  if (!("content" in value) || !("sender" in value)) return false;
  return (
    typeof value.content === "string" &&
    typeof value.sender === "string" &&
    value.content.trim().length > 0 &&
    value.sender.trim().length > 0
  );
}
