import { describe, expect, it, vi } from "vitest";
import { InferenceUnavailableError } from "../../utils/PipelineError";
import { LLMService } from "./core.LLM";
import type { ChatProvider, CompletionRequest } from "./types";

const settings = { model: "test-model", temperature: 0.1, maxTokens: 100 };

class ScriptedChatProvider implements ChatProvider {
  readonly name = "scripted";
  requests: CompletionRequest[] = [];

  constructor(private script: (Error | string)[]) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.script.shift() ?? "";
    if (next instanceof Error) throw next;
    return next;
  }
}

const createService = (provider: ChatProvider, attempts = 3) => {
  const sleep = vi.fn(async (_ms: number) => {});
  const service = new LLMService(provider, {
    timeoutSeconds: 5,
    retry: { attempts, baseDelayMs: 500, maxDelayMs: 8000 },
    sleep,
  });
  return { service, sleep };
};

describe("LLMService", () => {
  it("should pass the prompt and generation settings to the provider", async () => {
    const provider = new ScriptedChatProvider(["Paris."]);
    const { service } = createService(provider);

    const answer = await service.generateResponse("system", "question", settings);

    expect(answer).toBe("Paris.");
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]).toMatchObject({
      systemPrompt: "system",
      userMessage: "question",
      model: "test-model",
      temperature: 0.1,
      maxTokens: 100,
    });
    expect(provider.requests[0]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should retry a rate-limited call", async () => {
    const provider = new ScriptedChatProvider([new Error("429 rate limit reached"), "Paris."]);
    const { service, sleep } = createService(provider);

    expect(await service.generateResponse("system", "question", settings)).toBe("Paris.");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500]);
    expect(service.getStats()).toEqual({ requests: 1, providerCalls: 2, retries: 1, failures: 0 });
  });

  it("should surface a retired model without retrying", async () => {
    const provider = new ScriptedChatProvider([
      new Error("The model `old-model` has been decommissioned (model_decommissioned)"),
    ]);
    const { service, sleep } = createService(provider);

    const error = await service.generateResponse("system", "question", settings).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    if (!(error instanceof InferenceUnavailableError)) return;
    expect(error.hint).toBe("model_unavailable");
    expect(error.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should give up once every attempt has failed", async () => {
    const provider = new ScriptedChatProvider([
      new Error("fetch failed"),
      new Error("fetch failed"),
    ]);
    const { service } = createService(provider, 2);

    const error = await service.generateResponse("system", "question", settings).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    if (!(error instanceof InferenceUnavailableError)) return;
    expect(error.hint).toBe("network");
    expect(error.attempts).toBe(2);
    expect(service.getStats().failures).toBe(1);
  });
});
