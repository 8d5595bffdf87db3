/**
 * A chat line relayed between the two services. Frozen once built; only the
 * `service` tag is ever replaced, and that produces a new object.
 */
export interface IChatMessage {
  readonly content: string;
  readonly sender: string;
  /** Identity of the relay that stamped the message. */
  readonly service: string;
  readonly timestamp: Date;
}

/**
 * What a WebSocket client submits; the relay fills in the rest.
 */
export interface IChatSubmission {
  content: string;
  sender: string;
}

/**
 * JSON shape of a chat message on the wire and on the WebSocket topic.
 */
export interface ChatMessageJSON {
  content: string;
  sender: string;
  service: string;
  timestamp: string;
}
