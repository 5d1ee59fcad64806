import type {
  CallSite,
  CatalogStore,
  MessageRecord,
  TemplateSource,
} from "@loctext/contracts";
import {
  CatalogWriteError,
  ConsoleDiagnosticsSink,
  type DiagnosticsSink,
  type HtmlEscapeWarning,
} from "@loctext/shared";

import { parseExtractPattern, scanTemplate, type ScanPattern } from "./scanner.js";

export type CustomScanner = (
  source: TemplateSource,
) => { callSites: CallSite[]; warnings?: HtmlEscapeWarning[] };

export interface ExtractorOptions {
  domain: string;
  /** `TT1-<function>`, `TT2-<function>` or a scanner of your own. */
  pattern: string | CustomScanner;
  store: CatalogStore;
  diagnostics?: DiagnosticsSink;
}

export interface ExtractStats {
  domain: string;
  files: number;
  msgids: number;
  references: number;
}

function recordKey(msgid: string, plural: string | undefined): string {
  return `${plural === undefined ? "s" : "p"}\u0000${msgid}`;
}

/**
 * Collects the msgids of one domain over many files. Nothing reaches the
 * catalog store before `write()`, so a file that fails to scan leaves the
 * store untouched.
 */
export class Extractor {
  readonly domain: string;
  private readonly scanner: CustomScanner;
  private readonly store: CatalogStore;
  private readonly diagnostics: DiagnosticsSink;
  private readonly byKey = new Map<string, MessageRecord>();
  private readonly foundPerFile = new Map<string, number>();

  constructor(options: ExtractorOptions) {
    this.domain = options.domain;
    this.store = options.store;
    this.diagnostics = options.diagnostics ?? new ConsoleDiagnosticsSink();
    this.scanner =
      typeof options.pattern === "string"
        ? scannerFor(parseExtractPattern(options.pattern))
        : options.pattern;
  }

  /** Scans one file; a rescan replaces what the file contributed before. */
  process(source: TemplateSource): number {
    this.diagnostics.info("extract_file", { domain: this.domain, file: source.file });

    const { callSites, warnings = [] } = this.scanner(source);

    this.forgetFile(source.file);
    for (const site of callSites) this.add(site);
    for (const warning of warnings) this.diagnostics.warning(warning);

    this.foundPerFile.set(source.file, callSites.length);
    return callSites.length;
  }

  records(): MessageRecord[] {
    return [...this.byKey.values()].map((record) => ({
      ...record,
      locations: record.locations.map((location) => ({ ...location })),
    }));
  }

  stats(): ExtractStats {
    let references = 0;
    for (const record of this.byKey.values()) references += record.locations.length;
    return {
      domain: this.domain,
      files: this.foundPerFile.size,
      msgids: this.byKey.size,
      references,
    };
  }

  showStats(): ExtractStats {
    const stats = this.stats();
    this.diagnostics.info("extract_stats", { ...stats });
    this.store.showStats();
    return stats;
  }

  async write(): Promise<void> {
    try {
      for (const record of this.byKey.values()) {
        for (const location of record.locations) {
          this.store.store(
            record.domain,
            location.file,
            location.line,
            record.msgid,
            record.plural,
          );
        }
      }
      await this.store.write();
    } catch (error) {
      throw new CatalogWriteError(this.domain, error);
    }
  }

  private add(site: CallSite): void {
    const key = recordKey(site.rawMsgid, site.rawPlural);
    const existing = this.byKey.get(key);
    const location = { file: site.file, line: site.line };

    if (!existing) {
      this.byKey.set(key, {
        domain: this.domain,
        msgid: site.rawMsgid,
        ...(site.rawPlural !== undefined ? { plural: site.rawPlural } : {}),
        locations: [location],
      });
      return;
    }

    const known = existing.locations.some(
      (item) => item.file === location.file && item.line === location.line,
    );
    if (!known) existing.locations.push(location);
  }

  private forgetFile(file: string): void {
    for (const [key, record] of this.byKey) {
      record.locations = record.locations.filter((location) => location.file !== file);
      if (record.locations.length === 0) this.byKey.delete(key);
    }
  }
}

function scannerFor(pattern: ScanPattern): CustomScanner {
  return (source) => scanTemplate({ ...source, ...pattern });
}
