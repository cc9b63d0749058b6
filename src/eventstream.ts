// Home Assistant's MQTT event stream publishes whole events:
//   { "event_type": "state_changed", "event_data": { "entity_id": ..., "old_state": {...}, "new_state": {...} } }
// Only the new state is ingested.

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The state object to forward for a stream message, or null to drop it. */
export function toStatePayload(message: unknown): JsonRecord | null {
  if (!isRecord(message)) return null;

  if ("event_type" in message) {
    if (message.event_type !== "state_changed") return null;
    const data = isRecord(message.event_data) ? message.event_data : message.data;
    if (!isRecord(data)) return null;
    // new_state is null when the entity was removed
    return isRecord(data.new_state) ? data.new_state : null;
  }

  return "entity_id" in message ? message : null;
}
