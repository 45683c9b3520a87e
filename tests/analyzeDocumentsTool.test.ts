import { promises as fs } from "node:fs";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { DEFAULT_RANKING_CONFIG } from "../src/config/ranking.js";
import { ExtensionDocumentSource } from "../src/infra/parsers/documentLoader.js";
import { DocumentAnalysisService } from "../src/services/documentAnalysisService.js";
import { registerAnalyzeDocumentsTool } from "../src/tools/analyzeDocuments.js";

const TMP_DIR = path.resolve(".tmp-tests", "tool");

async function connectClient(): Promise<Client> {
  const server = new McpServer({ name: "test-server", version: "0.0.0" });
  registerAnalyzeDocumentsTool(
    server,
    new DocumentAnalysisService(new ExtensionDocumentSource(), null, DEFAULT_RANKING_CONFIG),
    loadConfig({ OUTPUT_DIR: path.join(TMP_DIR, "out"), MODEL_PROVIDER: "none" }),
  );

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return client;
}

async function callAnalyze(client: Client, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(
    await client.callTool({ name: "analyze_documents", arguments: args }),
  );
  const [first] = result.content;
  return { isError: result.isError ?? false, text: first?.type === "text" ? first.text : "" };
}

describe("analyze_documents tool", () => {
  beforeEach(async () => {
    await fs.mkdir(TMP_DIR, { recursive: true });
    await fs.writeFile(
      path.join(TMP_DIR, "guide.md"),
      "# Company History\nFounded long ago.\f# Feature Engineering for Churn\nWe build churn features from usage logs.",
      "utf-8",
    );
  });

  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("returns the ranked result and writes it when asked", async () => {
    const client = await connectClient();

    const { isError, text } = await callAnalyze(client, {
      input_dir: TMP_DIR,
      persona: "Data Scientist",
      job: "build a churn model",
      write_output: true,
    });
    const payload: unknown = JSON.parse(text);

    expect(isError).toBe(false);
    expect(payload).toMatchObject({
      metadata: { input_documents: ["guide.md"], persona: "Data Scientist" },
      extracted_sections: [
        { section_title: "Feature Engineering for Churn", page_number: 2, importance_rank: 1 },
        { section_title: "Company History", page_number: 1, importance_rank: 2 },
      ],
      model_calls: 0,
      keyword_only: true,
      output_path: path.join(TMP_DIR, "out", "analysis_output.json"),
    });
    await expect(fs.stat(path.join(TMP_DIR, "out", "analysis_output.json"))).resolves.toBeTruthy();

    await client.close();
  });

  it("reports missing input as a tool error", async () => {
    const client = await connectClient();

    const { isError, text } = await callAnalyze(client, { input_dir: path.join(TMP_DIR, "missing") });

    expect(isError).toBe(true);
    expect(text).toBe(`Input directory not found: ${path.join(TMP_DIR, "missing")}`);

    await client.close();
  });
});
