/**
 * Splits a command line into argv using POSIX-style single/double quotes and
 * backslash escapes. Nothing is expanded: no globs, variables or operators.
 */
export function splitCommandLine(raw: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let hasToken = false;
  let quote: "'" | '"' | null = null;

  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index] ?? "";
    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === "\\" && (raw[index + 1] === '"' || raw[index + 1] === "\\")) {
        current += raw[index + 1];
        index += 1;
      } else {
        current += char;
      }
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      hasToken = true;
      continue;
    }
    if (char === "\\" && index + 1 < raw.length) {
      current += raw[index + 1];
      hasToken = true;
      index += 1;
      continue;
    }
    if (/\s/.test(char)) {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
      continue;
    }
    current += char;
    hasToken = true;
  }

  if (quote) {
    throw new Error(`unterminated ${quote === "'" ? "single" : "double"} quote`);
  }
  if (hasToken) {
    tokens.push(current);
  }
  return tokens;
}
