import type { CatalogStore, MessageRecord } from "@loctext/contracts";
import { ConsoleDiagnosticsSink, type DiagnosticsSink } from "@loctext/shared";

/** Catalog store keeping records in memory; `write()` publishes a snapshot. */
export class InMemoryCatalogStore implements CatalogStore {
  private readonly pending = new Map<string, MessageRecord>();
  private snapshot: MessageRecord[] = [];
  private writes = 0;

  constructor(private readonly diagnostics: DiagnosticsSink = new ConsoleDiagnosticsSink()) {}

  store(domain: string, file: string, line: number, msgid: string, plural?: string): void {
    const key = `${domain}\u0000${msgid}\u0000${plural === undefined ? "s" : "p"}`;
    const existing = this.pending.get(key);
    if (existing) {
      existing.locations.push({ file, line });
      return;
    }
    this.pending.set(key, {
      domain,
      msgid,
      ...(plural !== undefined ? { plural } : {}),
      locations: [{ file, line }],
    });
  }

  async write(): Promise<void> {
    this.snapshot = [...this.pending.values()].map((record) => ({
      ...record,
      locations: [...record.locations],
    }));
    this.pending.clear();
    this.writes += 1;
  }

  showStats(): void {
    this.diagnostics.info("catalog_stats", {
      records: this.snapshot.length,
      pending: this.pending.size,
      writes: this.writes,
    });
  }

  written(): readonly MessageRecord[] {
    return this.snapshot;
  }

  get writeCount(): number {
    return this.writes;
  }
}
