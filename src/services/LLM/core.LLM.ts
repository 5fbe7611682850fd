import OpenAI from "openai";
import { Config } from "../../config";
import type { ProviderEndpointConfig, RetryConfig } from "../../config/types";
import { sentryMonitoringService } from "../monitoring";
import { loggingService } from "../logging";
import { classifyProviderError, isRetryableProviderError } from "../../utils/providerErrors";
import { InferenceUnavailableError } from "../../utils/PipelineError";
import { RetryExhaustedError, withRetry } from "../../utils/retry";
import { withTimeout } from "../../utils/withTimeout";
import type {
  ChatProvider,
  CompletionRequest,
  GenerationSettings,
  LLMProvider,
  LLMStats,
} from "./types";

/**
 * Chat completions over any OpenAI-compatible endpoint (Groq by default).
 */
export class OpenAIChatProvider implements ChatProvider {
  readonly name = "openai-compatible";
  private client: OpenAI;

  constructor(config: ProviderEndpointConfig = Config.ai.getLLMConfig()) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  async complete({
    systemPrompt,
    userMessage,
    model,
    temperature,
    maxTokens,
    signal,
  }: CompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userMessage },
        ],
      },
      { signal }
    );

    return completion.choices[0]?.message?.content ?? "";
  }
}

export interface LLMServiceOptions {
  timeoutSeconds: number;
  retry: RetryConfig;
  sleep?: (ms: number) => Promise<void>;
}

export class LLMService implements LLMProvider {
  private logger = loggingService.createComponentLogger("LLMService");
  private stats: LLMStats = {
    requests: 0,
    providerCalls: 0,
    retries: 0,
    failures: 0,
  };

  constructor(
    private provider: ChatProvider,
    private options: LLMServiceOptions
  ) {}

  /**
   * One answer for one prompt. Transient failures are retried under the
   * configured budget; anything else surfaces as InferenceUnavailable.
   */
  async generateResponse(
    systemPrompt: string,
    userMessage: string,
    settings: GenerationSettings
  ): Promise<string> {
    this.stats.requests++;
    const { timeoutSeconds, retry, sleep } = this.options;

    return await sentryMonitoringService.track(
      "llm_generation",
      "llm",
      {
        model: settings.model,
        provider: this.provider.name,
        system_prompt_length: systemPrompt.length,
        user_message_length: userMessage.length,
        max_tokens: settings.maxTokens,
      },
      async () => {
        const startTime = Date.now();
        this.logger.debug("Starting LLM response generation", {
          model: settings.model,
          systemPromptLength: systemPrompt.length,
          userMessageLength: userMessage.length,
        });

        try {
          const text = await withRetry(
            async () => {
              this.stats.providerCalls++;
              return await withTimeout(
                (signal) =>
                  this.provider.complete({
                    systemPrompt,
                    userMessage,
                    ...settings,
                    signal,
                  }),
                timeoutSeconds * 1000,
                `LLM completion (${settings.model})`
              );
            },
            {
              ...retry,
              sleep,
              shouldRetry: (error) => isRetryableProviderError(error),
              onRetry: (error, attempt, delayMs) => {
                this.stats.retries++;
                this.logger.warn(
                  `LLM call failed (attempt ${attempt}/${retry.attempts}), retrying in ${delayMs}ms`,
                  { error: error instanceof Error ? error.message : String(error) }
                );
              },
            }
          );

          this.logger.info(
            `✅ Response generated with ${settings.model} in ${Date.now() - startTime}ms`,
            { answerLength: text.length }
          );
          return text;
        } catch (error) {
          this.stats.failures++;
          const cause = error instanceof RetryExhaustedError ? error.cause : error;
          const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
          const hint = classifyProviderError(cause);

          this.logger.error("LLM response generation failed", {
            model: settings.model,
            hint,
            attempts,
            error: cause instanceof Error ? cause.message : String(cause),
          });
          throw new InferenceUnavailableError(hint, attempts, cause);
        }
      },
      { temperature: settings.temperature }
    );
  }

  getStats(): LLMStats {
    return { ...this.stats };
  }
}
