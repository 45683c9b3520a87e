import { AppConfig } from "../../config/env.js";
import { createComponentLogger } from "../logging/logger.js";
import { OllamaClient } from "./ollamaClient.js";
import { TextGenerator } from "./types.js";

const log = createComponentLogger("text-generator");

export async function createTextGenerator(
  config: Pick<AppConfig, "modelProvider" | "ollamaBaseUrl" | "ollamaModel" | "modelTimeoutMs">,
): Promise<TextGenerator | null> {
  if (config.modelProvider === "none") {
    log.info("Model provider disabled, running keyword-only");
    return null;
  }

  const client = new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    model: config.ollamaModel,
    timeoutMs: config.modelTimeoutMs,
  });

  try {
    if (await client.isModelAvailable()) {
      log.info({ model: config.ollamaModel }, "Model available");
      return client;
    }
    log.warn({ model: config.ollamaModel }, "Model is not pulled on the Ollama server, running keyword-only");
  } catch (error) {
    log.warn({ err: error, baseUrl: config.ollamaBaseUrl }, "Ollama unreachable, running keyword-only");
  }
  return null;
}
