import { z } from "zod";

const envSchema = z.object({
  INPUT_DIR: z.string().default("input"),
  OUTPUT_DIR: z.string().default("output"),
  OUTPUT_FILE: z.string().default("analysis_output.json"),
  RUN_CONFIG_FILE: z.string().optional(),
  MODEL_PROVIDER: z.enum(["none", "ollama"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().default("gemma3:1b"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_MODEL_CALLS: z.coerce.number().int().nonnegative().default(4),
  EXTRACTED_SECTIONS_CAP: z.coerce.number().int().nonnegative().default(10),
  SUBSECTION_CAP: z.coerce.number().int().nonnegative().default(3),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  MCP_TRANSPORT: z.enum(["stdio"]).default("stdio"),
});

export interface AppConfig {
  inputDir: string;
  outputDir: string;
  outputFile: string;
  runConfigFile: string | null;
  modelProvider: "none" | "ollama";
  ollamaBaseUrl: string;
  ollamaModel: string;
  modelTimeoutMs: number;
  maxModelCalls: number;
  extractedSectionsCap: number;
  subsectionCap: number;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  transport: "stdio";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    inputDir: parsed.INPUT_DIR,
    outputDir: parsed.OUTPUT_DIR,
    outputFile: parsed.OUTPUT_FILE,
    runConfigFile: parsed.RUN_CONFIG_FILE?.trim() || null,
    modelProvider: parsed.MODEL_PROVIDER,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaModel: parsed.OLLAMA_MODEL,
    modelTimeoutMs: parsed.MODEL_TIMEOUT_MS,
    maxModelCalls: parsed.MAX_MODEL_CALLS,
    extractedSectionsCap: parsed.EXTRACTED_SECTIONS_CAP,
    subsectionCap: parsed.SUBSECTION_CAP,
    logLevel: parsed.LOG_LEVEL,
    transport: parsed.MCP_TRANSPORT,
  };
}
