import type { ReputationEvent, ReputationEventListener } from "./types";

export type EventOfType<T extends ReputationEvent["type"]> = Extract<
  ReputationEvent,
  { type: T }
>;

/// Append-only in-memory audit trail
export class EventLog implements ReputationEventListener {
  private readonly events: ReputationEvent[] = [];

  onEvent(event: ReputationEvent): void {
    this.events.push(event);
  }

  get length(): number {
    return this.events.length;
  }

  all(): ReputationEvent[] {
    return [...this.events];
  }

  /// Events appended after the first `offset` entries
  since(offset: number): ReputationEvent[] {
    return this.events.slice(offset);
  }

  ofType<T extends ReputationEvent["type"]>(type: T): EventOfType<T>[] {
    return this.events.filter(
      (event): event is EventOfType<T> => event.type === type
    );
  }
}
