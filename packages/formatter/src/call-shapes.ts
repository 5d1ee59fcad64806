import type { NamedParams, RenderEnvironment, RuntimeCall } from "@loctext/contracts";
import {
  MissingCountError,
  SuperfluousParametersError,
  UnexpectedCountError,
  splitMsgid,
} from "@loctext/shared";

import type { MessageFormatter } from "./message-formatter.js";

const COUNT_KEY = "_count";
const CONTEXT_KEY = "_context";

/** What a translation function or filter knows about its domain and render. */
export interface CallBinding {
  domain: string;
  html: boolean;
  env: RenderEnvironment;
  defaultLang?: string;
}

export type TranslationFunction = (msgid: string, ...args: unknown[]) => string;

export function isNamedParams(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function hasOwn(source: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(source, key);
}

/** Arrays count as their length; anything not numeric is no count at all. */
export function toCount(value: unknown): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (Array.isArray(value)) return value.length;
  const count = typeof value === "number" ? value : Number(value);
  return Number.isFinite(count) ? count : undefined;
}

function toContext(value: unknown): Record<string, string> | undefined {
  if (!isNamedParams(value)) return undefined;
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, String(entry)]),
  );
}

function buildRuntimeCall(
  binding: CallBinding,
  rawMsgid: string,
  positionals: readonly unknown[],
  named: NamedParams,
): RuntimeCall {
  const { msgid, plural } = splitMsgid(rawMsgid);
  let rest = positionals;
  let count: number | undefined;

  if (plural !== undefined) {
    if (hasOwn(named, COUNT_KEY)) {
      count = toCount(named[COUNT_KEY]);
    } else if (rest.length > 0) {
      count = toCount(rest[0]);
      rest = rest.slice(1);
    }
    if (count === undefined) throw new MissingCountError(rawMsgid);
  } else if (hasOwn(named, COUNT_KEY)) {
    throw new UnexpectedCountError(rawMsgid);
  }

  if (rest.length > 0) {
    throw new SuperfluousParametersError(rawMsgid, rest.length);
  }

  const lang = binding.env.lang ?? binding.defaultLang;
  const context = toContext(named[CONTEXT_KEY]);

  return {
    domain: binding.domain,
    msgid,
    ...(plural !== undefined ? { plural } : {}),
    ...(count !== undefined ? { count } : {}),
    params: count !== undefined ? { ...named, [COUNT_KEY]: count } : named,
    ...(binding.env.scope !== undefined ? { scope: binding.env.scope } : {}),
    ...(lang !== undefined ? { lang } : {}),
    html: binding.html,
    ...(context !== undefined ? { context } : {}),
  };
}

/**
 * Function shape: `(msgid, positionals..., named?)`. The count of a plural
 * msgid comes from `_count` or from the first positional.
 */
export function prepareFunctionCall(
  binding: CallBinding,
  rawMsgid: string,
  args: readonly unknown[],
): RuntimeCall {
  const last = args[args.length - 1];
  if (isNamedParams(last)) {
    return buildRuntimeCall(binding, rawMsgid, args.slice(0, -1), last);
  }
  return buildRuntimeCall(binding, rawMsgid, args, {});
}

/** Filter shape: named parameters only, bound before the body is known. */
export function prepareFilterCall(
  binding: CallBinding,
  rawMsgid: string,
  params: NamedParams,
): RuntimeCall {
  return buildRuntimeCall(binding, rawMsgid, [], params);
}

export function createTranslationFunction(
  formatter: MessageFormatter,
  binding: CallBinding,
): TranslationFunction {
  return (msgid, ...args) => formatter.format(prepareFunctionCall(binding, msgid, args));
}

export class BoundTranslationFilter {
  constructor(
    private readonly formatter: MessageFormatter,
    private readonly binding: CallBinding,
    private readonly params: NamedParams = {},
  ) {}

  apply(msgid: string): string {
    return this.formatter.format(prepareFilterCall(this.binding, msgid, this.params));
  }
}

export type TranslationFilterFactory = (params?: NamedParams) => BoundTranslationFilter;

export function createTranslationFilterFactory(
  formatter: MessageFormatter,
  binding: CallBinding,
): TranslationFilterFactory {
  return (params = {}) => new BoundTranslationFilter(formatter, binding, params);
}
