import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppConfig } from "../config/env.js";
import { ConfigurationMissingError } from "../domain/errors.js";
import { writeRunResult } from "../infra/io/resultWriter.js";
import { DocumentAnalysisService } from "../services/documentAnalysisService.js";

export function registerAnalyzeDocumentsTool(
  server: McpServer,
  service: DocumentAnalysisService,
  config: AppConfig,
) {
  server.registerTool(
    "analyze_documents",
    {
      title: "Analyze Documents",
      description:
        "Ranks the sections of the documents in a directory for a persona and job, and returns the top sections with short excerpts.",
      inputSchema: {
        input_dir: z.string().min(1).optional().describe("Directory holding documents and outlines"),
        persona: z.string().min(1).optional().describe("Role to rank for; inferred when omitted"),
        job: z.string().min(1).optional().describe("Task to rank for; inferred when omitted"),
        run_config_path: z
          .string()
          .optional()
          .describe("Run configuration JSON, relative to input_dir"),
        write_output: z.boolean().optional().describe("Also write the result file"),
      },
    },
    async ({ input_dir, persona, job, run_config_path, write_output }) => {
      try {
        const report = await service.analyzeDirectory({
          inputDir: input_dir ?? config.inputDir,
          runConfigPath: run_config_path ?? config.runConfigFile,
          persona,
          job,
        });
        const outputPath = write_output
          ? await writeRunResult(report.result, config.outputDir, config.outputFile)
          : null;

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  ...report.result,
                  model_calls: report.modelCalls,
                  keyword_only: report.keywordOnly,
                  output_path: outputPath,
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (error) {
        if (error instanceof ConfigurationMissingError) {
          return {
            isError: true,
            content: [{ type: "text", text: error.message }],
          };
        }
        throw error;
      }
    },
  );
}
