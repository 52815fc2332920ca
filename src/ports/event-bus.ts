import type { SettlementEvent } from "../domain/types.js";

export type SettlementEventHandler = (event: SettlementEvent) => Promise<void>;

export interface EventBusPort {
  publish(event: SettlementEvent): Promise<void>;
  subscribe(handler: SettlementEventHandler): void;
  close?(): Promise<void>;
}
