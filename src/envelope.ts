import type { RawMessage } from "./types/messages";

function isRawMessage(value: unknown): value is RawMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "topic" in value &&
    typeof value.topic === "string" &&
    "payload" in value &&
    typeof value.payload === "string"
  );
}

export function wrapPayload(topic: string, payload: unknown, timestamp = Date.now()): RawMessage {
  return { topic, payload: JSON.stringify(payload), timestamp };
}

/**
 * Payload carried by a queue message. Bodies that are not a collector envelope
 * are handed on as-is; the processor decides whether they are usable.
 */
export function extractPayload(content: Buffer | string): string {
  const text = content.toString();
  try {
    const message: unknown = JSON.parse(text);
    return isRawMessage(message) ? message.payload : text;
  } catch {
    return text;
  }
}
