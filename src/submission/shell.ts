export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function joinCommand(parts: Array<string | number>): string {
  return parts
    .map((p) => String(p).trim())
    .filter((p) => p.length > 0)
    .join(" ");
}

export function whitespaceTokens(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

export function parseJobIdToken(token: string | undefined): number | null {
  if (token === undefined || !/^\d+$/.test(token)) return null;
  const n = Number.parseInt(token, 10);
  return Number.isSafeInteger(n) ? n : null;
}
