import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { AppConfig, loadConfig } from "./config/env.js";
import logger from "./infra/logging/logger.js";
import { DocumentAnalysisService } from "./services/documentAnalysisService.js";
import { createAnalysisService } from "./services/createAnalysisService.js";
import { registerAnalyzeDocumentsTool } from "./tools/analyzeDocuments.js";

async function main() {
  const config = loadConfig();
  const service = await createAnalysisService(config);
  const server = createAppServer(service, config);

  await server.connect(new StdioServerTransport());
  logger.info({ transport: config.transport }, "MCP server ready");

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function createAppServer(service: DocumentAnalysisService, config: AppConfig): McpServer {
  const server = new McpServer({
    name: "persona-section-ranker",
    version: "0.1.0",
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `persona-section-ranker is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerAnalyzeDocumentsTool(server, service, config);

  return server;
}

main().catch((error) => {
  logger.fatal({ err: error }, "Failed to start MCP server");
  process.exit(1);
});
