import { RankingConfig } from "../config/ranking.js";
import { PersonaJob, ScoredSection, Section, Subsection } from "../domain/types.js";
import { BudgetedModelOracle } from "../infra/ai/modelOracle.js";
import { createComponentLogger } from "../infra/logging/logger.js";
import { buildSubsections } from "./excerpts.js";
import { KeywordSignals, clampScore, scoreSection } from "./keywordSignals.js";
import { buildBatchScoringPrompt } from "./prompts.js";
import { IndexedScore, parseIndexedScores } from "./responseParsing.js";

export interface RefinementOutcome {
  sections: ScoredSection[];
  refined: boolean;
  promoted: number;
}

const BATCH_SCORING_TEMPERATURE = 0.1;
const BATCH_TOKENS_PER_ITEM = 8;
const BATCH_TOKENS_MIN = 100;

const log = createComponentLogger("ranking-engine");

// Ties keep extraction order, whatever order the input arrives in.
export function compareByRelevance(left: ScoredSection, right: ScoredSection): number {
  return right.relevanceScore - left.relevanceScore || left.ordinal - right.ordinal;
}

export class RankingEngine {
  constructor(
    private readonly config: RankingConfig,
    private readonly oracle: BudgetedModelOracle,
  ) {}

  get promotionWindow(): number {
    return Math.max(0, Math.min(this.config.promotionLimit, this.config.batchScoringLimit));
  }

  scoreAll(sections: readonly Section[], signals: KeywordSignals): ScoredSection[] {
    return sections.map((section) => {
      const score = scoreSection(section, signals, this.config);
      return { ...section, relevanceScore: score, keywordScore: score };
    });
  }

  rank(sections: readonly ScoredSection[]): ScoredSection[] {
    return [...sections].sort(compareByRelevance);
  }

  /**
   * Sends the titles in the promotion window to the model in one batch and
   * blends the returned scores with the keyword scores. Items the model left
   * out are blended with the neutral score. If the call fails or the reply
   * carries no usable score, every section keeps its keyword score. Sections outside the window are returned
   * untouched.
   */
  async refine(ranked: readonly ScoredSection[], personaJob: PersonaJob): Promise<RefinementOutcome> {
    const window = ranked.slice(0, this.promotionWindow);
    if (window.length === 0 || !this.oracle.isAvailable) {
      return { sections: [...ranked], refined: false, promoted: 0 };
    }

    const range = { min: this.config.scoreMin, max: this.config.scoreMax };
    const result = await this.oracle.complete<Array<IndexedScore | null>>({
      purpose: "batch_scoring",
      prompt: buildBatchScoringPrompt(
        window.map((section) => section.sectionTitle),
        personaJob.persona,
        personaJob.job,
        range,
      ),
      maxTokens: Math.max(BATCH_TOKENS_MIN, BATCH_TOKENS_PER_ITEM * window.length),
      temperature: BATCH_SCORING_TEMPERATURE,
      parse: (text) => {
        const scores = parseIndexedScores(text, window.length, range);
        return scores.some((item) => item !== null) ? scores : null;
      },
      fallback: [],
    });

    if (!result.ok) {
      log.info({ reason: result.reason }, "Batch scoring unavailable, keeping keyword scores");
      return { sections: [...ranked], refined: false, promoted: 0 };
    }

    const missing = result.value.filter((item) => item === null).length;
    if (missing > 0) {
      log.info({ missing, promoted: window.length }, "Model skipped items, neutral score used");
    }

    const promoted = window.map((section, index) =>
      this.blend(section, result.value[index] ?? null),
    );
    return {
      sections: [...promoted, ...ranked.slice(window.length)],
      refined: true,
      promoted: window.length,
    };
  }

  selectExtracted(ranked: readonly ScoredSection[]): ScoredSection[] {
    return ranked.slice(0, this.config.extractedSectionsCap);
  }

  selectExcerptSources(ranked: readonly ScoredSection[]): ScoredSection[] {
    const cap = this.config.subsectionCap;
    const pool = ranked.filter((section) => section.content.length > 0);

    const chosen = pool
      .filter((section) => section.relevanceScore >= this.config.subsectionMinScore)
      .slice(0, cap);

    if (chosen.length < cap) {
      const taken = new Set(chosen);
      for (const section of pool) {
        if (chosen.length >= cap) {
          break;
        }
        if (!taken.has(section)) {
          chosen.push(section);
        }
      }
      chosen.sort(compareByRelevance);
    }

    return chosen;
  }

  buildSubsections(sources: readonly ScoredSection[], personaJob: PersonaJob): Promise<Subsection[]> {
    return buildSubsections(sources, personaJob, this.oracle, this.config);
  }

  private blend(section: ScoredSection, item: IndexedScore | null): ScoredSection {
    const modelScore = item?.score ?? this.config.neutralScore;
    const relevanceScore = clampScore(
      this.config.keywordBlendWeight * section.keywordScore +
        this.config.modelBlendWeight * modelScore,
      this.config,
    );
    const analysis = item
      ? `Model score ${item.score}/${this.config.scoreMax}${item.note ? `: ${item.note}` : ""}`
      : `No model score returned; neutral ${this.config.neutralScore} used`;

    return { ...section, relevanceScore, modelAnalysis: analysis };
  }
}
