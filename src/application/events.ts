import { randomUUID } from "node:crypto";
import type { SettlementEvent, SettlementEventType } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { EventBusPort } from "../ports/event-bus.js";

export function buildEvent(
  clock: ClockPort,
  type: SettlementEventType,
  tenantId: string,
  data: Record<string, unknown>,
): SettlementEvent {
  return {
    id: `evt_${randomUUID()}`,
    type,
    tenant_id: tenantId,
    occurred_at: clock.nowIso(),
    data,
  };
}

export async function publishAll(eventBus: EventBusPort, events: SettlementEvent[]): Promise<void> {
  for (const event of events) {
    await eventBus.publish(event);
  }
}
