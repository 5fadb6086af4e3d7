/**
 * Error types for the WebSocket subscription client.
 */

export type WebSocketErrorVariant =
  | "ConnectionFailed"
  | "MessageParseError"
  | "Protocol"
  | "Validation"
  | "ListenerTimeout";

/**
 * Failure on the subscription socket. Reported through `onError`;
 * none of them closes the socket.
 */
export class WebSocketError extends Error {
  readonly variant: WebSocketErrorVariant;
  /** Topic the error concerns, when there is one */
  readonly topic?: string;

  constructor(variant: WebSocketErrorVariant, message: string, topic?: string) {
    super(message);
    this.name = "WebSocketError";
    this.variant = variant;
    this.topic = topic;
  }

  /** Failed to establish or keep the connection */
  static connectionFailed(message: string): WebSocketError {
    return new WebSocketError("ConnectionFailed", `Connection failed: ${message}`);
  }

  /** Inbound frame is not valid JSON or has no topic */
  static messageParseError(message: string): WebSocketError {
    return new WebSocketError("MessageParseError", `Unhandled WebSocket message: ${message}`);
  }

  static protocol(message: string): WebSocketError {
    return new WebSocketError("Protocol", `Protocol error: ${message}`);
  }

  /** Payload did not match the listener's schema */
  static validation(topic: string, message: string): WebSocketError {
    return new WebSocketError("Validation", `Invalid payload for ${topic}: ${message}`, topic);
  }

  static listenerTimeout(topic: string, timeoutMs: number): WebSocketError {
    return new WebSocketError(
      "ListenerTimeout",
      `Listener for ${topic} did not finish within ${timeoutMs}ms`,
      topic
    );
  }
}
