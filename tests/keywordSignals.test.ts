import { describe, expect, it } from "vitest";
import { DEFAULT_RANKING_CONFIG, createRankingConfig } from "../src/config/ranking.js";
import { BudgetedModelOracle } from "../src/infra/ai/modelOracle.js";
import {
  FALLBACK_DOMAIN_VOCABULARY,
  buildKeywordSignals,
  fetchDomainVocabulary,
  levelBonusFor,
  scoreSection,
} from "../src/pipelines/keywordSignals.js";
import { ScriptedGenerator } from "./helpers/fakes.js";

const BODY = "lorem ipsum dolor sit amet";

describe("scoreSection", () => {
  const signals = buildKeywordSignals("Data Scientist", "build a churn model");

  it("scores a title that names the job above an unrelated one", () => {
    const relevant = scoreSection(
      { sectionTitle: "Feature Engineering for Churn", content: BODY, level: 2 },
      signals,
      DEFAULT_RANKING_CONFIG,
    );
    const unrelated = scoreSection(
      { sectionTitle: "Company History", content: BODY, level: 2 },
      signals,
      DEFAULT_RANKING_CONFIG,
    );

    expect(relevant).toBe(7);
    expect(unrelated).toBe(4);
  });

  it("is deterministic", () => {
    const section = { sectionTitle: "Churn Model Results", content: "model churn data", level: 1 };
    expect(scoreSection(section, signals, DEFAULT_RANKING_CONFIG)).toBe(
      scoreSection(section, signals, DEFAULT_RANKING_CONFIG),
    );
  });

  it("clamps to the score range", () => {
    const many = buildKeywordSignals("alpha beta gamma delta", "");
    expect(
      scoreSection({ sectionTitle: "Alpha Beta Gamma Delta", content: "", level: 1 }, many, DEFAULT_RANKING_CONFIG),
    ).toBe(10);

    const lowBase = createRankingConfig({ baseScore: 0 });
    expect(scoreSection({ sectionTitle: "Nothing", content: "", level: 3 }, many, lowBase)).toBe(1);
  });

  it("only reads the configured content prefix", () => {
    const section = { sectionTitle: "Appendix", content: "padding text churn", level: 3 };
    expect(scoreSection(section, signals, DEFAULT_RANKING_CONFIG)).toBe(4);
    expect(scoreSection(section, signals, createRankingConfig({ keywordContentPrefix: 10 }))).toBe(3);
  });

  it("adds domain vocabulary matches", () => {
    const withDomain = buildKeywordSignals("Analyst", "review", ["itinerary", "budget planning"]);
    expect([...withDomain.domainTokens]).toEqual(["itinerary", "budget", "planning"]);
    expect(
      scoreSection({ sectionTitle: "Budget Overview", content: "", level: 3 }, withDomain, DEFAULT_RANKING_CONFIG),
    ).toBe(4);
  });
});

describe("levelBonusFor", () => {
  it("reads the table by level and treats unknown depths as zero", () => {
    expect(levelBonusFor(1, [2, 1, 0])).toBe(2);
    expect(levelBonusFor(2, [2, 1, 0])).toBe(1);
    expect(levelBonusFor(4, [2, 1, 0])).toBe(0);
    expect(levelBonusFor(0, [2, 1, 0])).toBe(2);
  });
});

describe("fetchDomainVocabulary", () => {
  it("parses the model's term list", async () => {
    const generator = new ScriptedGenerator(() => "itinerary, budget, Hotels\n");
    const oracle = new BudgetedModelOracle(generator, { maxCalls: 4, maxTokensCeiling: 256 });

    const result = await fetchDomainVocabulary(oracle, "Travel Planner", "Plan a trip");
    expect(result).toEqual({
      ok: true,
      value: ["itinerary", "budget", "hotels"],
      raw: "itinerary, budget, Hotels\n",
    });
    expect(generator.requests[0].stop).toEqual(["\n\n"]);
  });

  it("falls back to the static vocabulary without a model", async () => {
    const oracle = new BudgetedModelOracle(null, { maxCalls: 4, maxTokensCeiling: 256 });
    const result = await fetchDomainVocabulary(oracle, "Travel Planner", "Plan a trip");
    expect(result.ok).toBe(false);
    expect(result.value).toBe(FALLBACK_DOMAIN_VOCABULARY);
  });
});
