const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function toTokenSet(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const word of text.toLowerCase().split(/\s+/)) {
    const token = word.replace(EDGE_PUNCTUATION, "");
    if (token) {
      tokens.add(token);
    }
  }
  return tokens;
}

export function countOverlap(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  const [small, large] = left.size <= right.size ? [left, right] : [right, left];
  let overlap = 0;
  for (const token of small) {
    if (large.has(token)) {
      overlap += 1;
    }
  }
  return overlap;
}

export function toCappedLines(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let used = 0;

  for (const rawLine of normalizeText(text).split("\n")) {
    const line = collapseWhitespace(rawLine);
    if (!line) {
      continue;
    }
    const separator = lines.length > 0 ? 1 : 0;
    const room = maxChars - used - separator;
    if (room <= 0) {
      break;
    }
    const kept = line.slice(0, room);
    lines.push(kept);
    used += separator + kept.length;
    if (kept.length < line.length) {
      break;
    }
  }

  return lines;
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars).trimEnd();
}
