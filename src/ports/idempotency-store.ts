export type IdempotencyState = "in_flight" | "completed";

export interface IdempotencyRecord<TBody> {
  fingerprint: string;
  state: IdempotencyState;
  body: TBody | null;
  createdAt: string;
  completedAt: string | null;
}

export interface IdempotencyStorePort {
  get<TBody>(scope: string, key: string): Promise<IdempotencyRecord<TBody> | null>;
  put<TBody>(scope: string, key: string, record: IdempotencyRecord<TBody>): Promise<void>;
  delete(scope: string, key: string): Promise<void>;
  withKeyLock<TOutput>(scope: string, key: string, operation: () => Promise<TOutput>): Promise<TOutput>;
}
