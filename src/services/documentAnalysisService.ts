import { RankingConfig } from "../config/ranking.js";
import { DocumentSource } from "../domain/documentSource.js";
import { DocumentOutline, DocumentRef, PersonaJob, RunResult, Section } from "../domain/types.js";
import { BudgetedModelOracle, CallGate } from "../infra/ai/modelOracle.js";
import { TextGenerator } from "../infra/ai/types.js";
import { outlineKey, prepareRunInput } from "../infra/io/inputLoader.js";
import { createComponentLogger } from "../infra/logging/logger.js";
import { FALLBACK_PERSONA_JOB, inferPersonaJob } from "../pipelines/personaInference.js";
import { buildKeywordSignals, fetchDomainVocabulary } from "../pipelines/keywordSignals.js";
import { RankingEngine } from "../pipelines/ranking.js";
import { assembleRunResult } from "../pipelines/resultAssembly.js";
import { extractAllSections } from "../pipelines/sectionExtraction.js";
import { PipelineStage, PipelineStageTracker } from "../pipelines/stages.js";

export interface AnalyzeDirectoryOptions {
  inputDir: string;
  runConfigPath?: string | null;
  persona?: string | null;
  job?: string | null;
}

export interface AnalyzeDocumentsInput {
  documents: DocumentRef[];
  outlines?: ReadonlyMap<string, DocumentOutline>;
  persona?: string | null;
  job?: string | null;
}

export interface AnalysisReport {
  result: RunResult;
  stages: readonly PipelineStage[];
  modelCalls: number;
  // No model output reached the persona, the keywords or the scores.
  keywordOnly: boolean;
}

const log = createComponentLogger("analysis-service");

export class DocumentAnalysisService {
  // One model instance serves every run of this service.
  private readonly gate = new CallGate();

  constructor(
    private readonly documentSource: DocumentSource,
    private readonly generator: TextGenerator | null,
    private readonly config: RankingConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  async analyzeDirectory(options: AnalyzeDirectoryOptions): Promise<AnalysisReport> {
    const startedAt = this.clock();
    const input = await prepareRunInput({
      inputDir: options.inputDir,
      runConfigPath: options.runConfigPath,
    });

    const outlines = new Map<string, DocumentOutline>();
    for (const document of input.documents) {
      const outline = input.outlines.get(outlineKey(document.id));
      if (outline) {
        outlines.set(document.id, outline);
      }
    }

    return this.run(
      {
        documents: input.documents,
        outlines,
        persona: options.persona ?? input.runConfig.persona,
        job: options.job ?? input.runConfig.job,
      },
      startedAt,
    );
  }

  analyzeDocuments(input: AnalyzeDocumentsInput): Promise<AnalysisReport> {
    return this.run(input, this.clock());
  }

  private async run(input: AnalyzeDocumentsInput, startedAt: number): Promise<AnalysisReport> {
    const tracker = new PipelineStageTracker();
    const oracle = new BudgetedModelOracle(this.generator, {
      maxCalls: this.config.maxModelCalls,
      maxTokensCeiling: this.config.maxTokensCeiling,
      gate: this.gate,
    });
    const engine = new RankingEngine(this.config, oracle);
    const outlines = input.outlines ?? new Map<string, DocumentOutline>();

    const sections = await extractAllSections(
      input.documents,
      this.documentSource,
      outlines,
      this.config,
    );
    tracker.advance("extracted");
    log.info({ documents: input.documents.length, sections: sections.length }, "Sections extracted");

    const personaJob = await this.resolvePersonaJob(input, outlines, sections, oracle);

    let vocabularyFromModel = false;
    let signals = buildKeywordSignals(personaJob.value.persona, personaJob.value.job);
    if (sections.length > 0) {
      const vocabulary = await fetchDomainVocabulary(
        oracle,
        personaJob.value.persona,
        personaJob.value.job,
      );
      vocabularyFromModel = vocabulary.ok;
      signals = buildKeywordSignals(personaJob.value.persona, personaJob.value.job, vocabulary.value);
    }

    const keywordRanked = engine.rank(engine.scoreAll(sections, signals));
    tracker.advance("keyword_scored");

    const refinement = await engine.refine(keywordRanked, personaJob.value);
    if (refinement.refined) {
      tracker.advance("model_refined");
    }

    const ranked = engine.rank(refinement.sections);
    tracker.advance("ranked");

    const extracted = engine.selectExtracted(ranked);
    const excerptSources = engine.selectExcerptSources(ranked);
    tracker.advance("truncated");

    const subsections = await engine.buildSubsections(excerptSources, personaJob.value);
    const finishedAt = this.clock();

    const result = assembleRunResult({
      inputDocuments: input.documents.map((document) => document.id),
      personaJob: personaJob.value,
      extracted,
      subsections,
      processingTimestamp: Math.floor(finishedAt / 1000),
      totalSectionsAnalyzed: sections.length,
      processingTimeSeconds: Math.round(Math.max(0, finishedAt - startedAt) / 10) / 100,
    });
    tracker.advance("assembled");

    log.info(
      {
        persona: personaJob.value.persona,
        extracted: result.extracted_sections.length,
        subsections: result.subsection_analysis.length,
        modelCalls: oracle.callCount,
        promoted: refinement.promoted,
      },
      "Analysis complete",
    );

    return {
      result,
      stages: tracker.history,
      modelCalls: oracle.callCount,
      keywordOnly: !(personaJob.fromModel || vocabularyFromModel || refinement.refined),
    };
  }

  private async resolvePersonaJob(
    input: AnalyzeDocumentsInput,
    outlines: ReadonlyMap<string, DocumentOutline>,
    sections: readonly Section[],
    oracle: BudgetedModelOracle,
  ): Promise<{ value: PersonaJob; fromModel: boolean }> {
    const persona = input.persona?.trim() || null;
    const job = input.job?.trim() || null;
    if (persona && job) {
      return { value: { persona, job }, fromModel: false };
    }

    if (sections.length === 0) {
      return {
        value: { persona: persona ?? FALLBACK_PERSONA_JOB.persona, job: job ?? FALLBACK_PERSONA_JOB.job },
        fromModel: false,
      };
    }

    const documentTitles = input.documents.map(
      (document) => outlines.get(document.id)?.title ?? document.id,
    );
    const inferred = await inferPersonaJob(oracle, documentTitles, sections);
    if (!inferred.ok) {
      log.warn({ reason: inferred.reason }, "Persona inference fell back to the generic pair");
    }

    return {
      value: { persona: persona ?? inferred.value.persona, job: job ?? inferred.value.job },
      fromModel: inferred.ok,
    };
  }
}
