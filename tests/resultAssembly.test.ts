import { describe, expect, it } from "vitest";
import { assembleRunResult, runResultSchema } from "../src/pipelines/resultAssembly.js";
import { makeScoredSection } from "./helpers/fakes.js";

const PERSONA_JOB = { persona: "HR Manager", job: "Create onboarding forms" };

describe("assembleRunResult", () => {
  it("numbers ranks from one in the given order", () => {
    const result = assembleRunResult({
      inputDocuments: ["a.pdf", "b.pdf"],
      personaJob: PERSONA_JOB,
      extracted: [
        makeScoredSection({ ordinal: 4, relevanceScore: 9, document: "b.pdf", sectionTitle: "Fillable Forms" }),
        makeScoredSection({ ordinal: 0, relevanceScore: 6, document: "a.pdf", sectionTitle: "Signatures" }),
      ],
      subsections: [{ document: "b.pdf", pageNumber: 5, refinedText: "Create a form.", importanceRank: 9 }],
      processingTimestamp: 1700000000,
      totalSectionsAnalyzed: 12,
      processingTimeSeconds: 0.42,
    });

    expect(result).toEqual({
      metadata: {
        input_documents: ["a.pdf", "b.pdf"],
        persona: "HR Manager",
        job_to_be_done: "Create onboarding forms",
        processing_timestamp: 1700000000,
        total_sections_analyzed: 12,
        processing_time_seconds: 0.42,
      },
      extracted_sections: [
        { document: "b.pdf", section_title: "Fillable Forms", page_number: 5, importance_rank: 1 },
        { document: "a.pdf", section_title: "Signatures", page_number: 1, importance_rank: 2 },
      ],
      subsection_analysis: [{ document: "b.pdf", page_number: 5, refined_text: "Create a form." }],
    });
    expect(() => runResultSchema.parse(result)).not.toThrow();
  });

  it("omits optional metadata that was not given", () => {
    const result = assembleRunResult({
      inputDocuments: [],
      personaJob: PERSONA_JOB,
      extracted: [],
      subsections: [],
      processingTimestamp: "2024-01-01T00:00:00Z",
    });

    expect("total_sections_analyzed" in result.metadata).toBe(false);
    expect("processing_time_seconds" in result.metadata).toBe(false);
    expect(result.extracted_sections).toEqual([]);
    expect(runResultSchema.safeParse(result).success).toBe(true);
  });

  it("returns a frozen result", () => {
    const result = assembleRunResult({
      inputDocuments: ["a.pdf"],
      personaJob: PERSONA_JOB,
      extracted: [makeScoredSection({ ordinal: 0 })],
      subsections: [],
      processingTimestamp: 1,
    });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.extracted_sections[0])).toBe(true);
    expect(Object.isFrozen(result.metadata.input_documents)).toBe(true);
  });
});
