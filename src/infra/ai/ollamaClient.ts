import { GenerateRequest, TextGenerator } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

interface OllamaGenerateResponse {
  response?: string;
  done?: boolean;
}

interface OllamaTagsResponse {
  models?: Array<{ name?: string; model?: string }>;
}

export class OllamaClient implements TextGenerator {
  constructor(private readonly options: OllamaClientOptions) {}

  get modelName(): string {
    return this.options.model;
  }

  async isModelAvailable(): Promise<boolean> {
    const response = await fetch(`${this.options.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(Math.min(this.options.timeoutMs, 5_000)),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama tags failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaTagsResponse;
    const wanted = withDefaultTag(this.options.model);
    return (data.models ?? []).some(
      (entry) => withDefaultTag(entry.name ?? entry.model ?? "") === wanted,
    );
  }

  async generate(request: GenerateRequest): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.model,
        prompt: request.prompt,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: request.temperature,
          num_predict: request.maxTokens,
          ...(request.stop && request.stop.length > 0 ? { stop: request.stop } : {}),
        },
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama generate failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaGenerateResponse;
    return data.response?.trim() ?? "";
  }
}

function withDefaultTag(model: string): string {
  return model.includes(":") ? model : `${model}:latest`;
}
