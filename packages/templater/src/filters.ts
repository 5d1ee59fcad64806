export type OutputFilter = (text: string) => string;

const COLUMN_PATTERN_REGEX = /\$[1-9]/;

/**
 * Tab separated fields into containers: `cols("th", "td")` wraps the first
 * field in `<th>` and the rest in `<td>`. A single argument holding `$1`,
 * `$2`, ... is a pattern the fields are substituted into instead.
 */
export function createColsFilter(...blocks: string[]): OutputFilter {
  const [pattern] = blocks;
  if (blocks.length === 1 && pattern !== undefined && COLUMN_PATTERN_REGEX.test(pattern)) {
    return (text) => {
      const cols = text.split("\t");
      return pattern.replace(/\$([0-9]+)/g, (_match, index: string) => {
        return cols[Number(index) - 1] ?? "";
      });
    };
  }

  const wrap = blocks.length > 0 ? blocks : ["td"];
  return (text) =>
    text
      .split("\t")
      .map((col, index) => {
        const tag = wrap[Math.min(index, wrap.length - 1)];
        return `<${tag}>${col}</${tag}>`;
      })
      .join("");
}

/** Drops blank lines and ends every remaining line with `<br>`. */
export function createBrFilter(): OutputFilter {
  return (text) => {
    if (!text) return "";
    return text
      .replace(/^\s*\n/, "")
      .replace(/\n\s*\n/g, "\n")
      .replace(/\n\s*$/, "\n")
      .replace(/\s*\n/g, "<br>\n");
  };
}
