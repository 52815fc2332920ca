import type { SettlementEvent, SettlementEventType } from "../../domain/types.js";
import type { EventBusPort, SettlementEventHandler } from "../../ports/event-bus.js";

interface InMemoryEventBusOptions {
  /** How many recent events `getPublishedEvents` can return; 0 keeps none. */
  retainLast?: number;
}

export class InMemoryEventBus implements EventBusPort {
  private readonly recent: SettlementEvent[] = [];
  private readonly subscribers: SettlementEventHandler[] = [];
  private readonly retainLast: number;

  constructor(options: InMemoryEventBusOptions = {}) {
    this.retainLast = Math.max(0, options.retainLast ?? 0);
  }

  async publish(event: SettlementEvent): Promise<void> {
    if (this.retainLast > 0) {
      this.recent.push(event);
      if (this.recent.length > this.retainLast) {
        this.recent.splice(0, this.recent.length - this.retainLast);
      }
    }
    for (const subscriber of this.subscribers) {
      await subscriber(event);
    }
  }

  subscribe(handler: SettlementEventHandler): void {
    this.subscribers.push(handler);
  }

  getPublishedEvents(type?: SettlementEventType): SettlementEvent[] {
    return type ? this.recent.filter((event) => event.type === type) : [...this.recent];
  }
}
