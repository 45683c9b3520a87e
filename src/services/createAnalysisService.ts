import { AppConfig } from "../config/env.js";
import { createRankingConfig } from "../config/ranking.js";
import { createTextGenerator } from "../infra/ai/createTextGenerator.js";
import { setLogLevel } from "../infra/logging/logger.js";
import { createDocumentSource } from "../infra/parsers/documentLoader.js";
import { DocumentAnalysisService } from "./documentAnalysisService.js";

export async function createAnalysisService(config: AppConfig): Promise<DocumentAnalysisService> {
  setLogLevel(config.logLevel);

  const rankingConfig = createRankingConfig({
    maxModelCalls: config.maxModelCalls,
    extractedSectionsCap: config.extractedSectionsCap,
    subsectionCap: config.subsectionCap,
  });
  const generator = await createTextGenerator(config);

  return new DocumentAnalysisService(createDocumentSource(), generator, rankingConfig);
}
