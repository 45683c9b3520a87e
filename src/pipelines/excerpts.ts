import { RankingConfig } from "../config/ranking.js";
import { PersonaJob, ScoredSection, Subsection } from "../domain/types.js";
import { BudgetedModelOracle } from "../infra/ai/modelOracle.js";
import { collapseWhitespace, truncate } from "../utils/text.js";
import { buildExcerptRefinementPrompt } from "./prompts.js";
import { parseIndexedLines } from "./responseParsing.js";

export type ExcerptOptions = Pick<
  RankingConfig,
  "excerptMinLength" | "excerptMaxLength" | "refineExcerpts"
>;

export const LINE_SEPARATOR = " / ";

const REFINEMENT_MAX_TOKENS = 200;
const REFINEMENT_TEMPERATURE = 0.2;
const MIN_REFINED_LENGTH = 20;

export function deriveExcerpt(
  section: Pick<ScoredSection, "lines">,
  options: Pick<ExcerptOptions, "excerptMinLength" | "excerptMaxLength">,
): string {
  const substantial = section.lines.find((line) => line.length > options.excerptMinLength);
  if (substantial) {
    return truncate(substantial, options.excerptMaxLength);
  }
  return truncate(section.lines.join("\n"), options.excerptMaxLength)
    .split("\n")
    .join(LINE_SEPARATOR);
}

export async function buildSubsections(
  sources: readonly ScoredSection[],
  personaJob: PersonaJob,
  oracle: BudgetedModelOracle,
  options: ExcerptOptions,
): Promise<Subsection[]> {
  const excerpts = sources.map((section) => deriveExcerpt(section, options));
  let refined = new Map<number, string>();

  if (options.refineExcerpts && excerpts.length > 0 && oracle.isAvailable) {
    const result = await oracle.complete<Map<number, string>>({
      purpose: "excerpt_refinement",
      prompt: buildExcerptRefinementPrompt(excerpts, personaJob.persona, personaJob.job),
      maxTokens: REFINEMENT_MAX_TOKENS,
      temperature: REFINEMENT_TEMPERATURE,
      parse: (text) => {
        const lines = parseIndexedLines(text, excerpts.length);
        return lines.size > 0 ? lines : null;
      },
      fallback: new Map(),
    });
    if (result.ok) {
      refined = result.value;
    }
  }

  return sources.map((section, index) => {
    const rewritten = collapseWhitespace(refined.get(index + 1) ?? "");
    const text =
      rewritten.length >= MIN_REFINED_LENGTH
        ? truncate(rewritten, options.excerptMaxLength)
        : excerpts[index];

    return {
      document: section.document,
      pageNumber: section.pageNumber,
      refinedText: text,
      importanceRank: section.relevanceScore,
    };
  });
}
