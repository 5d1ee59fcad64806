import type { RuntimeCall, Translator } from "@loctext/contracts";
import {
  ConsoleDiagnosticsSink,
  escapeHtml,
  type DiagnosticsSink,
  type TemplateSyntax,
} from "@loctext/shared";

import {
  ModifierEngine,
  stringifyValue,
  type CustomModifiers,
} from "./modifiers/index.js";
import { PlaceholderTemplateCache } from "./placeholder-template.js";
import { resolvePlaceholder } from "./resolver.js";

/** Values of placeholders whose key ends in this suffix are never escaped. */
export const PRE_ESCAPED_SUFFIX = "_html";

export type FormatFn = (format: string, call: RuntimeCall) => string;

export interface MessageFormatterOptions {
  templateSyntax?: TemplateSyntax;
  timeZone?: string;
  templateCacheSize?: number;
  modifiers?: CustomModifiers;
  translator?: Translator;
  diagnostics?: DiagnosticsSink;
  /** Replaces placeholder expansion entirely. */
  formatWith?: FormatFn;
}

export function selectByDefaultPluralRule(
  msgid: string,
  plural: string | undefined,
  count: number | undefined,
): string {
  if (plural === undefined) return msgid;
  return count === 1 ? msgid : plural;
}

export class MessageFormatter {
  readonly html: boolean;
  private readonly templates: PlaceholderTemplateCache;
  private readonly modifiers: ModifierEngine;
  private readonly diagnostics: DiagnosticsSink;
  private readonly translator: Translator | undefined;
  private readonly formatWith: FormatFn | undefined;

  constructor(options: MessageFormatterOptions = {}) {
    this.html = (options.templateSyntax ?? "HTML") === "HTML";
    this.diagnostics = options.diagnostics ?? new ConsoleDiagnosticsSink();
    this.templates = new PlaceholderTemplateCache(options.templateCacheSize);
    this.modifiers = new ModifierEngine({
      diagnostics: this.diagnostics,
      ...(options.modifiers !== undefined ? { custom: options.modifiers } : {}),
      ...(options.timeZone !== undefined ? { timeZone: options.timeZone } : {}),
    });
    this.translator = options.translator;
    this.formatWith = options.formatWith;
  }

  /** The translated format string for the call, or the untranslated one. */
  selectTemplate(call: RuntimeCall): string {
    const translated = this.translator?.translate({
      domain: call.domain,
      msgid: call.msgid,
      ...(call.plural !== undefined ? { plural: call.plural } : {}),
      ...(call.count !== undefined ? { count: call.count } : {}),
      ...(call.lang !== undefined ? { lang: call.lang } : {}),
      ...(call.context !== undefined ? { context: call.context } : {}),
    });

    return translated ?? selectByDefaultPluralRule(call.msgid, call.plural, call.count);
  }

  format(call: RuntimeCall): string {
    return this.formatMessage(this.selectTemplate(call), call);
  }

  formatMessage(format: string, call: RuntimeCall): string {
    if (this.formatWith) return this.formatWith(format, call);

    const template = this.templates.get(format);
    let output = "";

    for (const segment of template.segments) {
      if (segment.kind === "literal") {
        output += segment.text;
        continue;
      }

      const resolved = resolvePlaceholder(segment, call, {
        format,
        diagnostics: this.diagnostics,
      });
      // A quoted default is display text; only bare defaults pass the modifiers.
      const value =
        resolved.fromDefault === "quoted"
          ? resolved.value
          : this.modifiers.apply(resolved.value, segment.modifiers, format);
      const text = stringifyValue(value);

      output +=
        call.html && !segment.key.endsWith(PRE_ESCAPED_SUFFIX)
          ? escapeHtml(text)
          : text;
    }

    return output;
  }
}
