#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config/env.js";
import { ConfigurationMissingError } from "./domain/errors.js";
import { writeRunResult } from "./infra/io/resultWriter.js";
import logger from "./infra/logging/logger.js";
import { createAnalysisService } from "./services/createAnalysisService.js";

async function main() {
  const config = loadConfig();
  const service = await createAnalysisService(config);

  const report = await service.analyzeDirectory({
    inputDir: config.inputDir,
    runConfigPath: config.runConfigFile,
  });
  const outputPath = await writeRunResult(report.result, config.outputDir, config.outputFile);

  const { metadata } = report.result;
  logger.info(
    {
      output: outputPath,
      persona: metadata.persona,
      job: metadata.job_to_be_done,
      sections: report.result.extracted_sections.length,
      modelCalls: report.modelCalls,
      keywordOnly: report.keywordOnly,
      seconds: metadata.processing_time_seconds,
    },
    "Analysis written",
  );
}

main().catch((error) => {
  if (error instanceof ConfigurationMissingError) {
    logger.fatal({ path: error.missingPath }, error.message);
  } else {
    logger.fatal({ err: error }, "Analysis failed");
  }
  process.exitCode = 1;
});
