import type {
  ModifierSpec,
  Placeholder,
  PlaceholderDefault,
  PlaceholderTemplate,
  TemplateSegment,
} from "@loctext/contracts";
import { LRUCache } from "@loctext/shared";

const PATH_REGEX = /^[A-Za-z_]\w*(?:\.\w+)*/;
const PRINTF_REGEX = /^%[^\s/]*/;
const NAMED_MODIFIER_REGEX = /^([A-Za-z_]\w*)(?:\(([^)]*)\))?/;
const BARE_DEFAULT_REGEX = /^\S*/;

interface Parsed<T> {
  value: T;
  rest: string;
}

function parseDefault(text: string): Parsed<PlaceholderDefault> | null {
  const body = text.trimStart();
  const quote = body[0];

  if (quote === '"' || quote === "'") {
    const end = body.indexOf(quote, 1);
    if (end < 0) return null;
    return {
      value: { kind: "quoted", text: body.slice(1, end) },
      rest: body.slice(end + 1),
    };
  }

  const word = BARE_DEFAULT_REGEX.exec(body)?.[0] ?? "";
  return { value: { kind: "bare", text: word }, rest: body.slice(word.length) };
}

function parseModifier(text: string): Parsed<ModifierSpec> | null {
  const printf = PRINTF_REGEX.exec(text);
  if (printf) {
    return {
      value: { kind: "printf", spec: printf[0] },
      rest: text.slice(printf[0].length),
    };
  }

  const named = NAMED_MODIFIER_REGEX.exec(text);
  if (!named) return null;

  const [source, name = "", rawArgs] = named;
  const args =
    rawArgs === undefined
      ? []
      : rawArgs
          .split(",")
          .map((arg) => arg.trim())
          .filter((arg) => arg.length > 0);

  return {
    value: { kind: "named", name, args, source },
    rest: text.slice(source.length),
  };
}

/**
 * Reads the inside of one `{...}`: a dotted path, then modifiers and an
 * optional `//default` in any order. Returns null when the text is not a
 * placeholder, so the caller can keep it as literal text.
 */
function parsePlaceholder(body: string, source: string): Placeholder | null {
  const text = body.trim();
  const path = PATH_REGEX.exec(text);
  if (!path) return null;

  const key = path[0];
  let rest = text.slice(key.length);
  if (rest.length > 0 && !/^[\s%/]/.test(rest)) return null;

  const modifiers: ModifierSpec[] = [];
  let defaultValue: PlaceholderDefault | undefined;

  for (rest = rest.trimStart(); rest.length > 0; rest = rest.trimStart()) {
    if (rest.startsWith("//")) {
      if (defaultValue) return null;
      const parsed = parseDefault(rest.slice(2));
      if (!parsed) return null;
      defaultValue = parsed.value;
      rest = parsed.rest;
      continue;
    }

    const parsed = parseModifier(rest);
    if (!parsed) return null;
    modifiers.push(parsed.value);
    rest = parsed.rest;
  }

  return {
    kind: "placeholder",
    key,
    path: key.split("."),
    modifiers,
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    source,
  };
}

/**
 * Splits a format string into literal text and `{...}` placeholders. Never
 * fails: braces that do not form a placeholder stay in the literal text.
 */
export function parsePlaceholderTemplate(format: string): PlaceholderTemplate {
  const segments: TemplateSegment[] = [];
  let literal = "";
  let index = 0;

  const flushLiteral = (): void => {
    if (literal.length > 0) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (index < format.length) {
    const open = format.indexOf("{", index);
    if (open < 0) {
      literal += format.slice(index);
      break;
    }

    literal += format.slice(index, open);

    const close = format.indexOf("}", open + 1);
    if (close < 0) {
      literal += format.slice(open);
      break;
    }

    const nested = format.indexOf("{", open + 1);
    if (nested >= 0 && nested < close) {
      literal += "{";
      index = open + 1;
      continue;
    }

    const source = format.slice(open, close + 1);
    const placeholder = parsePlaceholder(format.slice(open + 1, close), source);
    if (placeholder) {
      flushLiteral();
      segments.push(placeholder);
    } else {
      literal += source;
    }
    index = close + 1;
  }

  flushLiteral();
  return { format, segments };
}

export class PlaceholderTemplateCache {
  private readonly cache: LRUCache<string, PlaceholderTemplate>;

  constructor(capacity = 500) {
    this.cache = new LRUCache(capacity);
  }

  get(format: string): PlaceholderTemplate {
    const cached = this.cache.get(format);
    if (cached) return cached;

    const parsed = parsePlaceholderTemplate(format);
    this.cache.set(format, parsed);
    return parsed;
  }

  get size(): number {
    return this.cache.size;
  }
}
