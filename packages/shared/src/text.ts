const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

const NAMED_ENTITY_REGEX = /&\w+;/;

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** Only named entities (`&amp;`) count; numeric references are not flagged. */
export function containsHtmlEscape(value: string): boolean {
  return NAMED_ENTITY_REGEX.test(value);
}

export interface SplitMsgid {
  msgid: string;
  plural?: string;
}

const UNESCAPED_PIPE_REGEX = /(?<!\\)\|/;

function unescapePipes(text: string): string {
  return text.replace(/\\\|/g, "|");
}

/** Splits `"singular|plural"` on the first pipe; `\|` is a literal pipe. */
export function splitMsgid(raw: string): SplitMsgid {
  const match = UNESCAPED_PIPE_REGEX.exec(raw);
  if (!match) return { msgid: unescapePipes(raw) };
  return {
    msgid: unescapePipes(raw.slice(0, match.index)),
    plural: unescapePipes(raw.slice(match.index + 1)),
  };
}

export function countNewlines(text: string): number {
  let count = 0;
  for (let index = text.indexOf("\n"); index >= 0; index = text.indexOf("\n", index + 1)) {
    count += 1;
  }
  return count;
}
