import type { Chunk, SourceReference } from "../../types/document.types";
import { DOCUMENT_QA_SYSTEM_PROMPT } from "../../prompts/qa.prompt";
import { EmptyContextError } from "../../utils/PipelineError";
import type { LLMProvider } from "../LLM/types";
import { loggingService } from "../logging";
import { sentryMonitoringService } from "../monitoring";
import { assemblePrompt } from "./prompt.qa";
import type { Answer, AnswerRequest, PromptBudget } from "./types";

const SNIPPET_LENGTH = 200;

export function sourceLabel(chunk: Pick<Chunk, "fileName" | "pageNumber">): string {
    return `${chunk.fileName} p.${chunk.pageNumber}`;
}

export function distinctSourceLabels(sources: readonly SourceReference[]): string[] {
    return [...new Set(sources.map((source) => source.label))];
}

export class QAService {
    private logger = loggingService.createComponentLogger("QAService");

    constructor(
        private llm: LLMProvider,
        private budget: PromptBudget,
        private systemPrompt: string = DOCUMENT_QA_SYSTEM_PROMPT
    ) {}

    /**
     * Exactly one LLM call per answer, or none at all when there is nothing
     * to ground it in.
     */
    async answer({ query, retrieval, history, generation }: AnswerRequest): Promise<Answer> {
        if (retrieval.length === 0 && history.length === 0) {
            throw new EmptyContextError();
        }

        return await sentryMonitoringService.track(
            "document_question_answering",
            "qa_pipeline",
            {
                query_length: query.length,
                retrieved_chunks: retrieval.length,
                history_turns: history.length,
                model: generation.model,
            },
            async () => {
                const prompt = assemblePrompt(
                    this.systemPrompt,
                    query,
                    retrieval,
                    history,
                    this.budget
                );

                if (prompt.droppedChunks > 0 || prompt.droppedHistoryTurns > 0 || prompt.truncatedChunkId) {
                    this.logger.warn("Prompt trimmed to fit the token budget", {
                        droppedChunks: prompt.droppedChunks,
                        droppedHistoryTurns: prompt.droppedHistoryTurns,
                        truncatedChunkId: prompt.truncatedChunkId,
                        budgetTokens: this.budget.budgetTokens,
                    });
                }

                const text = await this.llm.generateResponse(
                    prompt.systemPrompt,
                    prompt.userMessage,
                    generation
                );

                const included = new Set(prompt.includedChunkIds);
                const sources = retrieval
                    .filter(({ chunk }) => included.has(chunk.id))
                    .map(({ chunk }) => ({
                        chunkId: chunk.id,
                        label: sourceLabel(chunk),
                        snippet: chunk.text.substring(0, SNIPPET_LENGTH),
                    }));

                return {
                    text,
                    sourceChunkIds: prompt.includedChunkIds,
                    sources,
                    promptTokens: prompt.estimatedTokens,
                    droppedChunks: prompt.droppedChunks,
                    droppedHistoryTurns: prompt.droppedHistoryTurns,
                };
            }
        );
    }
}
