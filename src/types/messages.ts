
export interface RawMessage {
  topic: string;
  payload: string; // entity state as JSON (JSON.stringify(...))
  timestamp: number; // unix timestamp
}

/** Home Assistant entity state as published for a single entity. */
export interface StateEvent {
  entity_id: string;
  state: string;
  attributes: Record<string, unknown>;
  last_changed: string;
}
