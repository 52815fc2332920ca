import { AppError } from "../../infra/app-error.js";

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function mapNullableTimestamp(value: unknown): string | null {
  return value === null || value === undefined ? null : mapTimestamp(value);
}

export function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

/** Accumulates `column op $n` conditions with their positional values. */
export class WhereClause {
  private readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  add(column: string, operator: "=" | ">=" | "<=", value: unknown, cast = ""): this {
    if (value === undefined) {
      return this;
    }
    this.values.push(value);
    this.conditions.push(`${column} ${operator} $${this.values.length}${cast}`);
    return this;
  }

  toSql(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(" AND ")}` : "";
  }
}
