import { PersonaJob } from "../domain/types.js";

export interface IndexedScore {
  score: number;
  note: string | null;
}

const LABELED_LINE = /^[\s*#>-]*(PERSONA|JOB)(?:\s+TO\s+BE\s+DONE)?\s*[:=-]\s*(.+)$/i;
const INDEXED_LINE = /^[\s*#>-]*(?:item\s+|section\s*)?(\d{1,3})\s*[:.)\]]\s*(.*)$/i;
const SCORE_PAIR = /(?<!\d)(\d{1,3})\s*[:=]\s*(\d{1,3})(?!\d)/g;
const NOTE_NOISE = /^(?:\s*\/\s*\d{1,3})?[\s\-–:,;|.]*/;

export function parsePersonaJob(
  text: string,
): { persona: string | null; job: string | null } | null {
  let persona: string | null = null;
  let job: string | null = null;

  for (const line of text.split("\n")) {
    const match = LABELED_LINE.exec(line);
    if (!match) {
      continue;
    }
    const value = cleanLabelValue(match[2]);
    if (!value) {
      continue;
    }
    if (match[1].toUpperCase() === "PERSONA" && persona === null) {
      persona = value;
    } else if (match[1].toUpperCase() === "JOB" && job === null) {
      job = value;
    }
  }

  if (persona === null && job === null) {
    return null;
  }
  return { persona, job };
}

export function completePersonaJob(
  parsed: { persona: string | null; job: string | null } | null,
  fallback: PersonaJob,
): PersonaJob {
  return {
    persona: parsed?.persona ?? fallback.persona,
    job: parsed?.job ?? fallback.job,
  };
}

export function parseIndexedLines(text: string, expected: number): Map<number, string> {
  const found = new Map<number, string>();
  for (const line of text.split("\n")) {
    const match = INDEXED_LINE.exec(line);
    if (!match) {
      continue;
    }
    const index = Number(match[1]);
    if (index < 1 || index > expected || found.has(index)) {
      continue;
    }
    found.set(index, match[2].trim());
  }
  return found;
}

/**
 * One entry per expected index: the score from the first `<index>: <digits>`
 * pair for that index (clamped to the range), or null where there is none.
 * Several pairs may share a line ("1: 8 2: 6 3: 9"); text between a pair and
 * the next one is kept as the item's note.
 */
export function parseIndexedScores(
  text: string,
  expected: number,
  range: { min: number; max: number },
): Array<IndexedScore | null> {
  const found = new Map<number, IndexedScore>();

  for (const line of text.split("\n")) {
    const pairs = [...line.matchAll(SCORE_PAIR)];
    pairs.forEach((pair, position) => {
      const index = Number(pair[1]);
      if (index < 1 || index > expected || found.has(index)) {
        return;
      }
      const start = (pair.index ?? 0) + pair[0].length;
      const end = pairs[position + 1]?.index ?? line.length;
      const note = line.slice(start, end).replace(NOTE_NOISE, "").trim();
      found.set(index, {
        score: Math.min(range.max, Math.max(range.min, Number(pair[2]))),
        note: note || null,
      });
    });
  }

  const scores: Array<IndexedScore | null> = [];
  for (let index = 1; index <= expected; index += 1) {
    scores.push(found.get(index) ?? null);
  }
  return scores;
}

export function parseTermList(text: string, limit: number): string[] | null {
  const terms: string[] = [];
  const seen = new Set<string>();

  for (const raw of text.split(/[,;\n]/)) {
    const term = raw
      .replace(/^[\s*\d.)-]+/, "")
      .replace(/["'`]/g, "")
      .replace(/\s+/g, " ")
      .trim()
      .toLowerCase();
    if (!term || term.length > 40 || seen.has(term)) {
      continue;
    }
    seen.add(term);
    terms.push(term);
    if (terms.length >= limit) {
      break;
    }
  }

  return terms.length > 0 ? terms : null;
}

function cleanLabelValue(value: string): string {
  return value
    .replace(/^[\s["'*]+/, "")
    .replace(/[\s\]"'.*]+$/, "")
    .trim();
}
