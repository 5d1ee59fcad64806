import {
  extractRunSettingsSchema,
  templaterSettingsSchema,
  textdomainSettingsSchema,
  type CatalogStore,
  type ExtractRunSettingsInput,
  type RenderEnvironment,
  type TemplateSource,
  type TemplaterSettingsInput,
  type TextdomainSettingsInput,
  type Translator,
} from "@loctext/contracts";
import { Extractor, type ExtractStats } from "@loctext/extract";
import {
  MessageFormatter,
  type CustomModifiers,
  type FormatFn,
  type TranslationFilterFactory,
  type TranslationFunction,
} from "@loctext/formatter";
import {
  CatalogWriteError,
  ConfigurationError,
  ConsoleDiagnosticsSink,
  ExtractionFailedError,
  parseOrThrowConfig,
  resolveRuntimeConfig,
  t,
  toErrorReport,
  type DiagnosticsSink,
  type LoctextRuntimeConfig,
} from "@loctext/shared";

import { createBrFilter, createColsFilter, type OutputFilter } from "./filters.js";
import {
  createTemplateTextdomain,
  type Textdomain,
  type TextdomainFactory,
} from "./textdomain.js";

export interface TemplaterOptions extends TemplaterSettingsInput {
  modifiers?: CustomModifiers;
  translator?: Translator;
  diagnostics?: DiagnosticsSink;
  formatWith?: FormatFn;
  textdomainFactory?: TextdomainFactory;
  /** Source of the LOCTEXT_* defaults; `process.env` when omitted. */
  env?: NodeJS.ProcessEnv;
}

export interface ExtractOptions extends ExtractRunSettingsInput {
  storeFor(domain: string): CatalogStore;
}

export interface TemplateFilters {
  cols: (...blocks: string[]) => OutputFilter;
  br: () => OutputFilter;
}

function toList(value: string | string[] | undefined, delimiter: string): string[] {
  if (value === undefined) return [];
  const items = Array.isArray(value) ? value : value.split(delimiter);
  return items.filter((item) => item.length > 0);
}

/**
 * Owns the textdomains of one template setup and hands out their
 * translation functions and filters per render.
 */
export class Templater {
  readonly config: LoctextRuntimeConfig;
  readonly includePath: readonly string[];
  readonly templateVersion: 1 | 2;
  readonly formatter: MessageFormatter;
  private readonly delimiter: string;
  private readonly diagnostics: DiagnosticsSink;
  private readonly textdomainFactory: TextdomainFactory;
  private readonly byName = new Map<string, Textdomain>();
  private readonly byFunction = new Map<string, Textdomain>();

  constructor(options: TemplaterOptions = {}) {
    const {
      modifiers,
      translator,
      diagnostics,
      formatWith,
      textdomainFactory,
      env,
      ...rawSettings
    } = options;
    const settings = parseOrThrowConfig(
      templaterSettingsSchema,
      rawSettings,
      "Invalid templater settings",
    );
    const defaults = resolveRuntimeConfig(env);
    const translateTo = settings.translateTo ?? defaults.translateTo;

    this.config = {
      templateSyntax: settings.templateSyntax ?? defaults.templateSyntax,
      ...(translateTo !== undefined ? { translateTo } : {}),
      timeZone: settings.timeZone ?? defaults.timeZone,
      templateCacheSize: settings.templateCacheSize ?? defaults.templateCacheSize,
    };
    this.delimiter = settings.delimiter;
    this.includePath = toList(settings.includePath, settings.delimiter);
    this.templateVersion = settings.templateVersion;
    this.diagnostics = diagnostics ?? new ConsoleDiagnosticsSink();
    this.textdomainFactory = textdomainFactory ?? createTemplateTextdomain;

    this.formatter = new MessageFormatter({
      templateSyntax: this.config.templateSyntax,
      timeZone: this.config.timeZone,
      templateCacheSize: this.config.templateCacheSize,
      diagnostics: this.diagnostics,
      ...(modifiers !== undefined ? { modifiers } : {}),
      ...(translator !== undefined ? { translator } : {}),
      ...(formatWith !== undefined ? { formatWith } : {}),
    });
  }

  addTextdomain(input: TextdomainSettingsInput): Textdomain {
    const settings = parseOrThrowConfig(
      textdomainSettingsSchema,
      input,
      "Invalid textdomain settings",
    );

    if (this.byName.has(settings.name)) {
      throw new ConfigurationError(`textdomain '${settings.name}' is already defined`, {
        name: settings.name,
      });
    }

    const owner = this.byFunction.get(settings.translationFunction);
    if (owner) {
      throw new ConfigurationError(
        `${t("config.duplicate_function")}: '${settings.translationFunction}' by textdomain '${owner.name}'`,
        { function: settings.translationFunction, textdomain: owner.name },
      );
    }

    const onlyInDirectory = toList(settings.onlyInDirectory, this.delimiter);
    for (const dir of onlyInDirectory) {
      if (!this.includePath.includes(dir)) {
        throw new ConfigurationError(`${t("config.directory_not_included")}: '${dir}'`, {
          directory: dir,
          includePath: this.includePath,
        });
      }
    }

    const lang = settings.lang ?? this.config.translateTo;
    const domain = this.textdomainFactory(
      { ...settings, ...(lang !== undefined ? { lang } : {}) },
      { formatter: this.formatter, onlyInDirectory },
    );

    this.byName.set(domain.name, domain);
    this.byFunction.set(domain.function, domain);
    return domain;
  }

  domains(): Textdomain[] {
    return [...this.byName.values()];
  }

  domain(name: string): Textdomain | undefined {
    return this.byName.get(name);
  }

  /** One translation function per textdomain, keyed by its template name. */
  translationFunctions(env: RenderEnvironment = {}): Record<string, TranslationFunction> {
    return Object.fromEntries(
      this.domains().map((domain) => [domain.function, domain.translationFunction(env)]),
    );
  }

  translationFilters(env: RenderEnvironment = {}): Record<string, TranslationFilterFactory> {
    return Object.fromEntries(
      this.domains().map((domain) => [domain.function, domain.translationFilter(env)]),
    );
  }

  filters(): TemplateFilters {
    return { cols: createColsFilter, br: createBrFilter };
  }

  /**
   * Scans the sources of every textdomain, then writes each domain's
   * catalog. Scan errors abort before anything is written; write errors are
   * collected and reported together once all domains had their turn.
   */
  async extract(
    sources: readonly TemplateSource[],
    options: ExtractOptions,
  ): Promise<ExtractStats[]> {
    const { storeFor, ...rawRun } = options;
    const run = parseOrThrowConfig(extractRunSettingsSchema, rawRun, "Invalid extract settings");

    const extractors = this.domains().map((domain) => {
      const extractor = new Extractor({
        domain: domain.name,
        pattern: `TT${this.templateVersion}-${domain.function}`,
        store: storeFor(domain.name),
        diagnostics: this.diagnostics,
      });

      for (const source of sources) {
        if (domain.expectedIn(source.file)) extractor.process(source);
      }
      return extractor;
    });

    const failures: CatalogWriteError[] = [];
    if (run.writeTables) {
      for (const extractor of extractors) {
        try {
          await extractor.write();
        } catch (error) {
          if (!(error instanceof CatalogWriteError)) throw error;
          this.diagnostics.error("catalog_write_failed", {
            ...toErrorReport(error),
            reason: error.cause instanceof Error ? error.cause.message : String(error.cause),
          });
          failures.push(error);
        }
      }
    }

    const stats = extractors.map((extractor) =>
      run.showStats ? extractor.showStats() : extractor.stats(),
    );

    if (failures.length > 0) {
      throw new ExtractionFailedError(failures);
    }
    return stats;
  }
}
