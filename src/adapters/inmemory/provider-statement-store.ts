import type {
  ProviderStatementLine,
  ProviderStatementPort,
  ProviderStatementQuery,
} from "../../ports/provider-statement.js";

export class InMemoryProviderStatementStore implements ProviderStatementPort {
  private readonly lines = new Map<string, ProviderStatementLine>();

  async saveLine(line: ProviderStatementLine): Promise<void> {
    this.lines.set(`${line.tenant_id}:${line.provider}:${line.date}`, structuredClone(line));
  }

  async listLines(query: ProviderStatementQuery): Promise<ProviderStatementLine[]> {
    return [...this.lines.values()]
      .filter(
        (line) =>
          line.tenant_id === query.tenantId
          && line.provider === query.provider
          && line.date >= query.dateFrom
          && line.date <= query.dateTo,
      )
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((line) => structuredClone(line));
  }
}
