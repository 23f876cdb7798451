/**
 * Returns the first balanced `[...]` or `{...}` block in `text`, or null when
 * there is none. Brackets inside JSON strings are skipped, so model replies
 * like `Sure! [true, "a ] b"]` still come out whole.
 */
export function findFirstJsonBlock(text: string): string | null {
  const stack: string[] = [];
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === "\"") inString = false;
      continue;
    }

    if (ch === "\"" && stack.length > 0) {
      inString = true;
    } else if (ch === "[" || ch === "{") {
      if (stack.length === 0) start = i;
      stack.push(ch);
    } else if (ch === "]" || ch === "}") {
      if (stack.length === 0) continue; // stray closer in prose
      const open = stack[stack.length - 1];
      if ((ch === "]" && open !== "[") || (ch === "}" && open !== "{")) return null;
      stack.pop();
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/** Parses the first JSON block of a model reply; null when absent or invalid. */
export function parseFirstJsonBlock(text: string): unknown {
  const block = findFirstJsonBlock(text);
  if (block === null) return null;
  try {
    return JSON.parse(block);
  } catch {
    return null;
  }
}
