import { AppError } from "../infra/app-error.js";

export interface CursorPageInput {
  cursor?: string;
  limit: number;
}

export interface CursorPage<TItem> {
  data: TItem[];
  hasMore: boolean;
  nextCursor?: string;
}

export function paginateByCursor<TItem extends { id: string }>(
  items: TItem[],
  input: CursorPageInput,
): CursorPage<TItem> {
  const limit = Math.max(1, input.limit);
  let startIndex = 0;
  if (input.cursor) {
    const cursorIndex = items.findIndex((item) => item.id === input.cursor);
    if (cursorIndex < 0) {
      throw new AppError(422, "invalid_cursor", "cursor not found for current collection.");
    }
    startIndex = cursorIndex + 1;
  }

  const page = items.slice(startIndex, startIndex + limit);
  const hasMore = startIndex + page.length < items.length;
  const nextCursor = hasMore ? page.at(-1)?.id : undefined;

  return {
    data: page,
    hasMore,
    ...(nextCursor ? { nextCursor } : {}),
  };
}

export function isWithinRange(value: string, from?: string, to?: string): boolean {
  const valueMs = Date.parse(value);
  if (!Number.isFinite(valueMs)) {
    return true;
  }
  if (from) {
    const fromMs = Date.parse(from);
    if (Number.isFinite(fromMs) && valueMs < fromMs) {
      return false;
    }
  }
  if (to) {
    const toMs = Date.parse(to);
    if (Number.isFinite(toMs) && valueMs > toMs) {
      return false;
    }
  }
  return true;
}
