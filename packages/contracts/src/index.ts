// Extraction

export type CallShape = "function" | "inline-filter" | "block-filter";

export interface CallSite {
  readonly file: string;
  readonly line: number;
  readonly shape: CallShape;
  readonly rawMsgid: string;
  readonly rawPlural?: string;
}

export interface SourceLocation {
  file: string;
  line: number;
}

export interface MessageRecord {
  domain: string;
  msgid: string;
  plural?: string;
  locations: SourceLocation[];
}

export interface TemplateSource {
  file: string;
  text: string;
}

/** Receives the accumulated records of one domain once all files are scanned. */
export interface CatalogStore {
  store(
    domain: string,
    file: string,
    line: number,
    msgid: string,
    plural?: string,
  ): void;
  write(): Promise<void>;
  showStats(): void;
}

// Placeholder templates

export interface LiteralSegment {
  kind: "literal";
  text: string;
}

export type ModifierSpec =
  | { kind: "printf"; spec: string }
  | { kind: "named"; name: string; args: readonly string[]; source: string };

export type PlaceholderDefault =
  | { kind: "quoted"; text: string }
  | { kind: "bare"; text: string };

export interface Placeholder {
  kind: "placeholder";
  key: string;
  path: readonly string[];
  modifiers: readonly ModifierSpec[];
  default?: PlaceholderDefault;
  source: string;
}

export type TemplateSegment = LiteralSegment | Placeholder;

export interface PlaceholderTemplate {
  format: string;
  segments: readonly TemplateSegment[];
}

// Run time

export type NamedParams = Readonly<Record<string, unknown>>;

export interface AmbientScope {
  /** Label of the render target, used in diagnostics. */
  readonly name?: string;
  get(path: string): unknown;
}

export interface RuntimeCall {
  domain: string;
  msgid: string;
  plural?: string;
  count?: number;
  params: NamedParams;
  scope?: AmbientScope;
  lang?: string;
  html: boolean;
  context?: Readonly<Record<string, string>>;
}

export interface TranslationRequest {
  domain: string;
  msgid: string;
  plural?: string;
  count?: number;
  lang?: string;
  context?: Readonly<Record<string, string>>;
}

/**
 * Returns the format string selected for the language and count, or
 * undefined when no translation is known.
 */
export interface Translator {
  translate(request: TranslationRequest): string | undefined;
}

export interface RenderEnvironment {
  scope?: AmbientScope;
  lang?: string;
}

export * from "./schemas/index.js";
