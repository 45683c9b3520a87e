import { Section } from "../domain/types.js";

export interface InferencePromptInput {
  documentTitles: string[];
  sections: ReadonlyArray<Pick<Section, "sectionTitle" | "content">>;
}

const INFERENCE_TITLE_SAMPLE = 8;
const INFERENCE_CONTENT_SECTIONS = 3;
const INFERENCE_CONTENT_PER_SECTION = 150;
const INFERENCE_CONTENT_TOTAL = 500;
const BATCH_TITLE_MAX_CHARS = 80;

export function buildPersonaJobPrompt(input: InferencePromptInput): string {
  const titles = input.sections
    .slice(0, INFERENCE_TITLE_SAMPLE)
    .map((section) => section.sectionTitle);
  const sample = input.sections
    .slice(0, INFERENCE_CONTENT_SECTIONS)
    .map((section) => section.content.slice(0, INFERENCE_CONTENT_PER_SECTION))
    .join(" ")
    .slice(0, INFERENCE_CONTENT_TOTAL);

  return [
    "Analyze these documents and determine the PERSONA and JOB.",
    "",
    `Documents: ${input.documentTitles.join(", ") || "Unknown"}`,
    `Sections: ${titles.join(", ")}`,
    `Sample: ${sample}`,
    "",
    "Answer with exactly two lines:",
    "PERSONA: <professional role, e.g. PhD Researcher>",
    "JOB: <specific task, e.g. Literature review>",
  ].join("\n");
}

export function buildDomainVocabularyPrompt(persona: string, job: string, limit: number): string {
  return [
    `List up to ${limit} single-word terms that matter most to a ${persona} who needs to: ${job}.`,
    "Answer with one comma-separated line and nothing else.",
    "Terms:",
  ].join("\n");
}

export function buildBatchScoringPrompt(
  titles: readonly string[],
  persona: string,
  job: string,
  range: { min: number; max: number },
): string {
  const items = titles.map(
    (title, index) => `${index + 1}. ${title.slice(0, BATCH_TITLE_MAX_CHARS)}`,
  );

  return [
    `Rate how relevant each section is for a ${persona} who needs to: ${job}.`,
    "Sections:",
    ...items,
    "",
    `Rate each from ${range.min} to ${range.max}. Answer one line per section as <number>: <score>.`,
  ].join("\n");
}

export function buildExcerptRefinementPrompt(
  excerpts: readonly string[],
  persona: string,
  job: string,
): string {
  const items = excerpts.map((excerpt, index) => `${index + 1}: ${excerpt}`);

  return [
    `Rewrite each passage in one or two plain sentences for a ${persona} who needs to: ${job}.`,
    "Keep the facts, drop everything else.",
    ...items,
    "",
    "Answer one line per passage as <number>: <rewritten passage>.",
  ].join("\n");
}
