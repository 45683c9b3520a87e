import { PersonaJob, Section } from "../domain/types.js";
import { BudgetedModelOracle, OracleResult } from "../infra/ai/modelOracle.js";
import { buildPersonaJobPrompt } from "./prompts.js";
import { completePersonaJob, parsePersonaJob } from "./responseParsing.js";

export const FALLBACK_PERSONA_JOB: Readonly<PersonaJob> = Object.freeze({
  persona: "Researcher",
  job: "Document analysis",
});

const INFERENCE_MAX_TOKENS = 100;
const INFERENCE_TEMPERATURE = 0.3;

export async function inferPersonaJob(
  oracle: BudgetedModelOracle,
  documentTitles: string[],
  sections: ReadonlyArray<Pick<Section, "sectionTitle" | "content">>,
): Promise<OracleResult<PersonaJob>> {
  return oracle.complete<PersonaJob>({
    purpose: "persona_job",
    prompt: buildPersonaJobPrompt({ documentTitles, sections }),
    maxTokens: INFERENCE_MAX_TOKENS,
    temperature: INFERENCE_TEMPERATURE,
    parse: (text) => {
      const parsed = parsePersonaJob(text);
      return parsed ? completePersonaJob(parsed, FALLBACK_PERSONA_JOB) : null;
    },
    fallback: { ...FALLBACK_PERSONA_JOB },
  });
}
