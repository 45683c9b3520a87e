import { RankingConfig } from "../config/ranking.js";
import { Section } from "../domain/types.js";
import { BudgetedModelOracle, OracleResult } from "../infra/ai/modelOracle.js";
import { countOverlap, toTokenSet } from "../utils/text.js";
import { buildDomainVocabularyPrompt } from "./prompts.js";
import { parseTermList } from "./responseParsing.js";

export interface KeywordSignals {
  readonly personaTokens: ReadonlySet<string>;
  readonly jobTokens: ReadonlySet<string>;
  readonly targetTokens: ReadonlySet<string>;
  readonly domainTokens: ReadonlySet<string>;
}

export type KeywordScoringOptions = Pick<
  RankingConfig,
  | "scoreMin"
  | "scoreMax"
  | "baseScore"
  | "titleWeight"
  | "contentWeight"
  | "domainWeight"
  | "levelBonus"
  | "keywordContentPrefix"
>;

export const FALLBACK_DOMAIN_VOCABULARY: readonly string[] = Object.freeze([
  "overview",
  "introduction",
  "summary",
  "guide",
  "key",
  "important",
  "analysis",
  "results",
  "method",
  "methods",
  "conclusion",
  "recommendations",
]);

const VOCABULARY_TERM_LIMIT = 15;
const VOCABULARY_MAX_TOKENS = 60;
const VOCABULARY_TEMPERATURE = 0.2;

export async function fetchDomainVocabulary(
  oracle: BudgetedModelOracle,
  persona: string,
  job: string,
): Promise<OracleResult<readonly string[]>> {
  return oracle.complete<readonly string[]>({
    purpose: "domain_vocabulary",
    prompt: buildDomainVocabularyPrompt(persona, job, VOCABULARY_TERM_LIMIT),
    maxTokens: VOCABULARY_MAX_TOKENS,
    temperature: VOCABULARY_TEMPERATURE,
    stop: ["\n\n"],
    parse: (text) => parseTermList(text, VOCABULARY_TERM_LIMIT),
    fallback: FALLBACK_DOMAIN_VOCABULARY,
  });
}

export function buildKeywordSignals(
  persona: string,
  job: string,
  domainTerms: readonly string[] = [],
): KeywordSignals {
  const personaTokens = toTokenSet(persona);
  const jobTokens = toTokenSet(job);
  const domainTokens = new Set<string>();
  for (const term of domainTerms) {
    for (const token of toTokenSet(term)) {
      domainTokens.add(token);
    }
  }

  return {
    personaTokens,
    jobTokens,
    targetTokens: new Set([...personaTokens, ...jobTokens]),
    domainTokens,
  };
}

export function levelBonusFor(level: number, table: readonly number[]): number {
  const index = Math.trunc(level) - 1;
  if (index < 0) {
    return table[0] ?? 0;
  }
  return table[index] ?? 0;
}

export function clampScore(value: number, options: Pick<RankingConfig, "scoreMin" | "scoreMax">): number {
  return Math.min(options.scoreMax, Math.max(options.scoreMin, Math.round(value)));
}

export function scoreSection(
  section: Pick<Section, "sectionTitle" | "content" | "level">,
  signals: KeywordSignals,
  options: KeywordScoringOptions,
): number {
  const titleTokens = toTokenSet(section.sectionTitle);
  const contentTokens = toTokenSet(section.content.slice(0, options.keywordContentPrefix));

  const titleMatches = countOverlap(titleTokens, signals.targetTokens);
  const contentMatches = countOverlap(contentTokens, signals.targetTokens);

  let domainMatches = 0;
  if (signals.domainTokens.size > 0) {
    const sectionTokens = new Set([...titleTokens, ...contentTokens]);
    domainMatches = countOverlap(sectionTokens, signals.domainTokens);
  }

  const raw =
    options.baseScore +
    options.titleWeight * titleMatches +
    options.contentWeight * contentMatches +
    options.domainWeight * domainMatches +
    levelBonusFor(section.level, options.levelBonus);

  return clampScore(raw, options);
}
