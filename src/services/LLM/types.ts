export interface GenerationSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionRequest extends GenerationSettings {
  systemPrompt: string;
  userMessage: string;
  signal?: AbortSignal;
}

/**
 * A hosted chat-completions endpoint. One call, one answer.
 */
export interface ChatProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface LLMProvider {
  generateResponse(
    systemPrompt: string,
    userMessage: string,
    settings: GenerationSettings
  ): Promise<string>;
}

export interface LLMStats {
  requests: number;
  providerCalls: number;
  retries: number;
  failures: number;
}
