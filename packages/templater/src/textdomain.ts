import type { RenderEnvironment, TextdomainSettings } from "@loctext/contracts";
import {
  createTranslationFilterFactory,
  createTranslationFunction,
  type CallBinding,
  type MessageFormatter,
  type TranslationFilterFactory,
  type TranslationFunction,
} from "@loctext/formatter";

/**
 * What a templater needs from a textdomain. Any object with this shape can
 * be registered through a custom factory.
 */
export interface Textdomain {
  readonly name: string;
  /** Name of the translation function and filter in templates. */
  readonly function: string;
  readonly lexicon?: string;
  readonly lang?: string;
  expectedIn(file: string): boolean;
  translationFunction(env: RenderEnvironment): TranslationFunction;
  translationFilter(env: RenderEnvironment): TranslationFilterFactory;
}

/** Shared templater state a textdomain may read; it does not own it. */
export interface TextdomainContext {
  formatter: MessageFormatter;
  onlyInDirectory: readonly string[];
}

export type TextdomainFactory = (
  settings: TextdomainSettings,
  context: TextdomainContext,
) => Textdomain;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class TemplateTextdomain implements Textdomain {
  readonly name: string;
  readonly function: string;
  readonly lexicon?: string;
  readonly lang?: string;
  private readonly formatter: MessageFormatter;
  private readonly onlyIn: RegExp | null;

  constructor(settings: TextdomainSettings, context: TextdomainContext) {
    this.name = settings.name;
    this.function = settings.translationFunction;
    if (settings.lexicon !== undefined) this.lexicon = settings.lexicon;
    if (settings.lang !== undefined) this.lang = settings.lang;
    this.formatter = context.formatter;

    const dirs = context.onlyInDirectory.map(escapeRegExp);
    this.onlyIn = dirs.length > 0 ? new RegExp(`^(?:${dirs.join("|")})(?:$|/)`) : null;
  }

  expectedIn(file: string): boolean {
    return this.onlyIn ? this.onlyIn.test(file) : true;
  }

  translationFunction(env: RenderEnvironment): TranslationFunction {
    return createTranslationFunction(this.formatter, this.bind(env));
  }

  translationFilter(env: RenderEnvironment): TranslationFilterFactory {
    return createTranslationFilterFactory(this.formatter, this.bind(env));
  }

  private bind(env: RenderEnvironment): CallBinding {
    return {
      domain: this.name,
      html: this.formatter.html,
      env,
      ...(this.lang !== undefined ? { defaultLang: this.lang } : {}),
    };
  }
}

export const createTemplateTextdomain: TextdomainFactory = (settings, context) =>
  new TemplateTextdomain(settings, context);
