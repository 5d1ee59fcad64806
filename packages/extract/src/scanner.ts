import type { CallShape, CallSite } from "@loctext/contracts";
import {
  ScanSyntaxError,
  UnknownPatternError,
  containsHtmlEscape,
  countNewlines,
  splitMsgid,
  type HtmlEscapeWarning,
} from "@loctext/shared";

export type DialectVersion = 1 | 2;

export interface ScanPattern {
  version: DialectVersion;
  functionName: string;
}

export interface ScanInput extends ScanPattern {
  file: string;
  text: string;
}

export interface ScanResult {
  callSites: CallSite[];
  warnings: HtmlEscapeWarning[];
  /** Lines consumed, i.e. the line the scan ended on. */
  lines: number;
}

const PATTERN_REGEX = /^TT([12])-(\w+)$/;

// Version 1 accepts both `[% ... %]` and `%% ... %%`.
const TAG_SPLITTERS: Record<DialectVersion, RegExp> = {
  1: /[[%]%([\s\S]*?)%[%\]]/,
  2: /\[%([\s\S]*?)%\]/,
};

const END_TAG_REGEX = /^\s*END\s*$/;

export function parseExtractPattern(pattern: string): ScanPattern {
  const match = PATTERN_REGEX.exec(pattern);
  if (!match) throw new UnknownPatternError(pattern);
  return {
    version: match[1] === "1" ? 1 : 2,
    functionName: match[2] ?? "",
  };
}

interface ShapeMatchers {
  blockFilter: RegExp;
  inlineFilter: RegExp;
  functionCall: RegExp;
}

function compileMatchers(functionName: string): ShapeMatchers {
  return {
    blockFilter: new RegExp(`^\\s*(?:\\|\\s*|FILTER\\s+)${functionName}\\b`),
    inlineFilter: new RegExp(
      `^(\\s*)(["'])([^\\r\\n]+?)\\2\\s*\\|\\s*${functionName}\\b`,
    ),
    functionCall: new RegExp(
      `\\b${functionName}\\s*\\(\\s*(["'])([^\\r\\n]+?)\\1`,
      "g",
    ),
  };
}

/**
 * Finds translation call sites in template text: `[% | loc %]...[% END %]`
 * blocks, `[% 'msgid' | loc %]` filters and `loc('msgid', ...)` calls,
 * in source order. Lines are 1-based and point at the msgid.
 */
export function scanTemplate(input: ScanInput): ScanResult {
  const { file, text, version, functionName } = input;
  const matchers = compileMatchers(functionName);
  const frags = text.split(TAG_SPLITTERS[version]);

  const callSites: CallSite[] = [];
  const warnings: HtmlEscapeWarning[] = [];
  let line = 1;

  const record = (shape: CallShape, raw: string, at: number): void => {
    const { msgid, plural } = splitMsgid(raw);
    if (containsHtmlEscape(msgid) || (plural !== undefined && containsHtmlEscape(plural))) {
      warnings.push({ type: "html_escape_in_msgid", msgid: raw, file, line: at });
    }
    callSites.push({
      file,
      line: at,
      shape,
      rawMsgid: msgid,
      ...(plural !== undefined ? { rawPlural: plural } : {}),
    });
  };

  // frags alternate: text, tag content, text, tag content, ..., text
  for (let index = 0; index + 1 < frags.length; index += 2) {
    const skipped = frags[index] ?? "";
    const tag = frags[index + 1] ?? "";
    line += countNewlines(skipped);

    if (matchers.blockFilter.test(tag)) {
      const body = frags[index + 2];
      const end = frags[index + 3];
      if (body === undefined || end === undefined || !END_TAG_REGEX.test(end)) {
        throw new ScanSyntaxError(file, line);
      }
      record("block-filter", body, line + countNewlines(tag));
      line += countNewlines(tag);
      continue;
    }

    const inline = matchers.inlineFilter.exec(tag);
    if (inline) {
      record("inline-filter", inline[3] ?? "", line + countNewlines(inline[1] ?? ""));
      line += countNewlines(tag);
      continue;
    }

    for (const call of tag.matchAll(matchers.functionCall)) {
      const msgidStart = (call.index ?? 0) + call[0].length - (call[2] ?? "").length - 1;
      record("function", call[2] ?? "", line + countNewlines(tag.slice(0, msgidStart)));
    }
    line += countNewlines(tag);
  }

  const tail = frags[frags.length - 1] ?? "";
  return { callSites, warnings, lines: line + countNewlines(tail) };
}
