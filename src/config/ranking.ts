import { z } from "zod";

export interface RankingConfig {
  readonly contentCharLimit: number;
  readonly maxOutlineDepth: number;
  readonly includeSubLevels: boolean;
  readonly titleScanLines: number;
  readonly minTitleLength: number;
  readonly maxTitleLength: number;
  readonly extractionConcurrency: number;

  readonly scoreMin: number;
  readonly scoreMax: number;
  readonly neutralScore: number;
  readonly baseScore: number;
  readonly titleWeight: number;
  readonly contentWeight: number;
  readonly domainWeight: number;
  readonly levelBonus: readonly number[];
  readonly keywordContentPrefix: number;

  readonly promotionLimit: number;
  readonly batchScoringLimit: number;
  readonly keywordBlendWeight: number;
  readonly modelBlendWeight: number;

  readonly extractedSectionsCap: number;
  readonly subsectionCap: number;
  readonly subsectionMinScore: number;
  readonly excerptMinLength: number;
  readonly excerptMaxLength: number;
  readonly refineExcerpts: boolean;

  readonly maxModelCalls: number;
  readonly maxTokensCeiling: number;
}

export const DEFAULT_RANKING_CONFIG: RankingConfig = Object.freeze({
  contentCharLimit: 1500,
  maxOutlineDepth: 3,
  includeSubLevels: false,
  titleScanLines: 5,
  minTitleLength: 10,
  maxTitleLength: 100,
  extractionConcurrency: 2,

  scoreMin: 1,
  scoreMax: 10,
  neutralScore: 5,
  baseScore: 3,
  titleWeight: 3,
  contentWeight: 1,
  domainWeight: 1,
  levelBonus: Object.freeze([2, 1, 0]),
  keywordContentPrefix: 500,

  promotionLimit: 10,
  batchScoringLimit: 20,
  keywordBlendWeight: 0.5,
  modelBlendWeight: 0.5,

  extractedSectionsCap: 10,
  subsectionCap: 3,
  subsectionMinScore: 7,
  excerptMinLength: 50,
  excerptMaxLength: 250,
  refineExcerpts: true,

  maxModelCalls: 4,
  maxTokensCeiling: 256,
});

const positiveInt = z.number().int().positive();

const rankingOverridesSchema = z
  .object({
    contentCharLimit: positiveInt,
    maxOutlineDepth: positiveInt,
    includeSubLevels: z.boolean(),
    titleScanLines: positiveInt,
    minTitleLength: z.number().int().nonnegative(),
    maxTitleLength: positiveInt,
    extractionConcurrency: positiveInt,
    scoreMin: z.number().int(),
    scoreMax: z.number().int(),
    neutralScore: z.number().int(),
    baseScore: z.number().int(),
    titleWeight: z.number().nonnegative(),
    contentWeight: z.number().nonnegative(),
    domainWeight: z.number().nonnegative(),
    levelBonus: z.array(z.number().nonnegative()),
    keywordContentPrefix: positiveInt,
    promotionLimit: z.number().int().nonnegative(),
    batchScoringLimit: positiveInt,
    keywordBlendWeight: z.number().min(0).max(1),
    modelBlendWeight: z.number().min(0).max(1),
    extractedSectionsCap: z.number().int().nonnegative(),
    subsectionCap: z.number().int().nonnegative(),
    subsectionMinScore: z.number().int(),
    excerptMinLength: z.number().int().nonnegative(),
    excerptMaxLength: positiveInt,
    refineExcerpts: z.boolean(),
    maxModelCalls: z.number().int().nonnegative(),
    maxTokensCeiling: positiveInt,
  })
  .partial();

export type RankingOverrides = z.input<typeof rankingOverridesSchema>;

export function createRankingConfig(overrides: RankingOverrides = {}): RankingConfig {
  const parsed = rankingOverridesSchema.parse(overrides);
  const merged = { ...DEFAULT_RANKING_CONFIG, ...parsed };

  if (merged.scoreMin < 1 || merged.scoreMax < merged.scoreMin) {
    throw new Error(
      `Invalid score range [${merged.scoreMin}, ${merged.scoreMax}]: the floor must be at least 1.`,
    );
  }
  if (merged.neutralScore < merged.scoreMin || merged.neutralScore > merged.scoreMax) {
    throw new Error("neutralScore must lie inside the score range.");
  }
  if (merged.minTitleLength >= merged.maxTitleLength) {
    throw new Error("minTitleLength must be smaller than maxTitleLength.");
  }

  return Object.freeze({
    ...merged,
    levelBonus: Object.freeze([...merged.levelBonus]),
  });
}
