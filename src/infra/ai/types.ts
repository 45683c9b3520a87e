export interface GenerateRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  stop?: string[];
}

export interface TextGenerator {
  readonly modelName: string;
  generate(request: GenerateRequest): Promise<string>;
}
