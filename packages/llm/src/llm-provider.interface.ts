export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LlmCompletion {
  text: string;
  model: string;
}

export interface ILlmProvider {
  readonly name: string;
  readonly model: string;

  /** Single-turn completion of a fully rendered prompt. */
  generate(prompt: string, options?: GenerateOptions): Promise<LlmCompletion>;
  /** Model ids the provider can serve, sorted. */
  listModels(): Promise<string[]>;
}
