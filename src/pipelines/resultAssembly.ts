import { z } from "zod";
import { PersonaJob, RunResult, ScoredSection, Subsection } from "../domain/types.js";

export interface AssemblyInput {
  inputDocuments: string[];
  personaJob: PersonaJob;
  extracted: readonly ScoredSection[];
  subsections: readonly Subsection[];
  processingTimestamp: string | number;
  totalSectionsAnalyzed?: number;
  processingTimeSeconds?: number;
}

export const runResultSchema = z.object({
  metadata: z.object({
    input_documents: z.array(z.string()),
    persona: z.string(),
    job_to_be_done: z.string(),
    processing_timestamp: z.union([z.string(), z.number().int()]),
    total_sections_analyzed: z.number().int().nonnegative().optional(),
    processing_time_seconds: z.number().nonnegative().optional(),
  }),
  extracted_sections: z.array(
    z.object({
      document: z.string(),
      section_title: z.string(),
      page_number: z.number().int().positive(),
      importance_rank: z.number().int().positive(),
    }),
  ),
  subsection_analysis: z.array(
    z.object({
      document: z.string(),
      page_number: z.number().int().positive(),
      refined_text: z.string(),
    }),
  ),
});

export function assembleRunResult(input: AssemblyInput): RunResult {
  const result: RunResult = {
    metadata: {
      input_documents: [...input.inputDocuments],
      persona: input.personaJob.persona,
      job_to_be_done: input.personaJob.job,
      processing_timestamp: input.processingTimestamp,
      ...(input.totalSectionsAnalyzed === undefined
        ? {}
        : { total_sections_analyzed: input.totalSectionsAnalyzed }),
      ...(input.processingTimeSeconds === undefined
        ? {}
        : { processing_time_seconds: input.processingTimeSeconds }),
    },
    extracted_sections: input.extracted.map((section, index) => ({
      document: section.document,
      section_title: section.sectionTitle,
      page_number: section.pageNumber,
      importance_rank: index + 1,
    })),
    subsection_analysis: input.subsections.map((subsection) => ({
      document: subsection.document,
      page_number: subsection.pageNumber,
      refined_text: subsection.refinedText,
    })),
  };

  return deepFreeze(result);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
