import type {
  AmbientScope,
  NamedParams,
  Placeholder,
  PlaceholderDefault,
  RuntimeCall,
} from "@loctext/contracts";
import type { DiagnosticsSink } from "@loctext/shared";

interface Lookup {
  found: boolean;
  value?: unknown;
}

const NOT_FOUND: Lookup = { found: false };

function hasOwn(source: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(source, key);
}

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

function step(source: unknown, key: string): Lookup {
  if (source instanceof Map) {
    return source.has(key) ? { found: true, value: source.get(key) } : NOT_FOUND;
  }
  if (typeof source === "object" && source !== null && hasOwn(source, key)) {
    return { found: true, value: Reflect.get(source, key) };
  }
  return NOT_FOUND;
}

export function lookupPath(source: unknown, path: readonly string[]): Lookup {
  let current: Lookup = { found: true, value: source };
  for (const key of path) {
    current = step(current.value, key);
    if (!current.found) return NOT_FOUND;
  }
  return current;
}

function lookupParams(params: NamedParams, placeholder: Placeholder): Lookup {
  if (hasOwn(params, placeholder.key)) {
    return { found: true, value: params[placeholder.key] };
  }
  if (placeholder.path.length > 1) {
    return lookupPath(params, placeholder.path);
  }
  return NOT_FOUND;
}

export interface ResolveOptions {
  format: string;
  diagnostics: DiagnosticsSink;
}

export interface ResolvedValue {
  value: unknown;
  /** Set when the placeholder default stood in for an empty value. */
  fromDefault?: PlaceholderDefault["kind"];
}

/**
 * Named parameters first, then the ambient scope, then the placeholder
 * default. A value found nowhere becomes an empty string plus a
 * `missing_key` warning.
 */
export function resolvePlaceholder(
  placeholder: Placeholder,
  call: RuntimeCall,
  options: ResolveOptions,
): ResolvedValue {
  let lookup = lookupParams(call.params, placeholder);

  if (!lookup.found && call.scope) {
    const value = call.scope.get(placeholder.key);
    if (!isEmpty(value)) lookup = { found: true, value };
  }

  if (isEmpty(lookup.value) && placeholder.default) {
    return { value: placeholder.default.text, fromDefault: placeholder.default.kind };
  }

  if (!lookup.found) {
    options.diagnostics.warning({
      type: "missing_key",
      key: placeholder.key,
      format: options.format,
      target: call.scope?.name ?? "unknown",
    });
    return { value: "" };
  }

  return { value: lookup.value };
}

export function resolvePlaceholderValue(
  placeholder: Placeholder,
  call: RuntimeCall,
  options: ResolveOptions,
): unknown {
  return resolvePlaceholder(placeholder, call, options).value;
}

/** Ambient scope over a plain object tree; dotted paths walk nested values. */
export function createObjectScope(
  variables: Readonly<Record<string, unknown>>,
  name?: string,
): AmbientScope {
  return {
    ...(name !== undefined ? { name } : {}),
    get(path: string): unknown {
      const lookup = lookupPath(variables, path.split("."));
      return lookup.found ? lookup.value : undefined;
    },
  };
}
