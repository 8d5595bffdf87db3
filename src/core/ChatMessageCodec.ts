import { IChatMessage, WireMessage } from "../interfaces";
import { chatMessageToJSON, createChatMessage } from "./ChatMessage";
import { DecodeError } from "./errors";

export const TYPE_PROPERTY = "_type";
export const CHAT_MESSAGE_TYPE = "ChatMessage";

const MAX_RAW_BODY_IN_ERROR = 500;

/**
 * Wire format shared by every relay instance: the JSON object
 * `{ content, sender, service, timestamp }` as a text body, tagged with
 * `_type: "ChatMessage"` in the message properties.
 *
 * Decoding never trusts the sender's local types. The tag is checked when
 * present and every field is validated; `timestamp` is normalized to an
 * ISO-8601 UTC string on the next encode.
 */
export class ChatMessageCodec {
  encode(message: IChatMessage): WireMessage<string> {
    return {
      properties: { [TYPE_PROPERTY]: CHAT_MESSAGE_TYPE },
      body: JSON.stringify(chatMessageToJSON(message)),
    };
  }

  decode(wire: WireMessage): IChatMessage {
    const tag = wire.properties[TYPE_PROPERTY];
    if (tag !== undefined && tag !== CHAT_MESSAGE_TYPE) {
      throw new DecodeError(
        `Unexpected message type "${String(tag)}"`,
        this.describeBody(wire.body)
      );
    }

    const text = this.bodyToText(wire.body);
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(
        "Malformed JSON payload",
        truncate(text),
        error instanceof Error ? error : undefined
      );
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new DecodeError("Payload is not a JSON object", truncate(text));
    }

    const content = "content" in parsed ? parsed.content : undefined;
    if (typeof content !== "string") {
      throw new DecodeError('Field "content" must be a string', truncate(text));
    }
    const sender = "sender" in parsed ? parsed.sender : undefined;
    if (typeof sender !== "string") {
      throw new DecodeError('Field "sender" must be a string', truncate(text));
    }

    const rawService = "service" in parsed ? parsed.service : undefined;
    let service = "";
    if (typeof rawService === "string") {
      service = rawService;
    } else if (rawService !== undefined && rawService !== null) {
      throw new DecodeError('Field "service" must be a string', truncate(text));
    }

    const timestamp =
      "timestamp" in parsed ? parseTimestamp(parsed.timestamp) : null;
    if (!timestamp) {
      throw new DecodeError(
        'Field "timestamp" must be an ISO-8601 date or epoch milliseconds',
        truncate(text)
      );
    }

    return createChatMessage({ content, sender }, service, timestamp);
  }

  private bodyToText(body: unknown): string {
    if (typeof body === "string") return body;
    if (Buffer.isBuffer(body)) return body.toString("utf8");
    throw new DecodeError("Unsupported message body", this.describeBody(body));
  }

  private describeBody(body: unknown): string {
    if (typeof body === "string") return truncate(body);
    if (Buffer.isBuffer(body)) return truncate(body.toString("utf8"));
    return `[${body === null ? "null" : typeof body}]`;
  }
}

function parseTimestamp(value: unknown): Date | null {
  let date: Date;
  if (typeof value === "string" && value.trim().length > 0) {
    date = new Date(value);
  } else if (typeof value === "number" && Number.isFinite(value)) {
    date = new Date(value);
  } else {
    return null;
  }
  return Number.isNaN(date.getTime()) ? null : date;
}

function truncate(text: string): string {
  return text.length > MAX_RAW_BODY_IN_ERROR
    ? text.substring(0, MAX_RAW_BODY_IN_ERROR) + "..."
    : text;
}
