import type { ConversationTurn, RetrievalResult } from "../../types/document.types";
import { PromptTooLargeError } from "../../utils/PipelineError";
import type { AssembledPrompt, PromptBudget, PromptChunk } from "./types";

export function estimateTokens(text: string, charsPerToken: number): number {
    return Math.ceil(text.length / charsPerToken);
}

export function sourceTag(chunkId: string): string {
    return `[source: ${chunkId}]`;
}

export function renderUserMessage(
    chunks: readonly PromptChunk[],
    turns: readonly ConversationTurn[],
    query: string
): string {
    const sections: string[] = [];

    if (chunks.length > 0) {
        sections.push(
            "Document excerpts:\n\n" +
                chunks.map((chunk) => `${sourceTag(chunk.id)}\n${chunk.text}`).join("\n\n")
        );
    }

    if (turns.length > 0) {
        sections.push(
            "Conversation so far:\n" +
                turns.map((turn) => `User: ${turn.query}\nAssistant: ${turn.answer}`).join("\n")
        );
    }

    sections.push(`Question: ${query}`);
    return sections.join("\n\n");
}

/**
 * Builds the prompt for one question within the token budget. Over budget,
 * history goes first (oldest turn first), then chunks from the most distant
 * one, down to a single chunk whose text is cut to fit.
 */
export function assemblePrompt(
    systemPrompt: string,
    query: string,
    retrieval: RetrievalResult,
    history: readonly ConversationTurn[],
    budget: PromptBudget
): AssembledPrompt {
    const { budgetTokens, charsPerToken, historyWindow } = budget;
    const tokensFor = (userMessage: string) =>
        estimateTokens(systemPrompt + userMessage, charsPerToken);

    const chunks: PromptChunk[] = retrieval.map(({ chunk }) => ({
        id: chunk.id,
        text: chunk.text,
    }));
    const turns = historyWindow > 0 ? history.slice(-historyWindow) : [];
    const offeredTurns = turns.length;

    const firstChunk = chunks[0];
    const fixed = renderUserMessage(
        firstChunk ? [{ id: firstChunk.id, text: "" }] : [],
        [],
        query
    );
    if (tokensFor(fixed) > budgetTokens) {
        throw new PromptTooLargeError(tokensFor(fixed), budgetTokens);
    }

    const fits = () => tokensFor(renderUserMessage(chunks, turns, query)) <= budgetTokens;

    while (!fits() && turns.length > 0) {
        turns.shift();
    }
    while (!fits() && chunks.length > 1) {
        chunks.pop();
    }

    let truncatedChunkId: string | null = null;
    const lastChunk = chunks[0];
    if (!fits() && lastChunk) {
        const room = budgetTokens * charsPerToken - (systemPrompt + fixed).length;
        lastChunk.text = lastChunk.text.slice(0, Math.max(0, room));
        truncatedChunkId = lastChunk.id;
    }

    const userMessage = renderUserMessage(chunks, turns, query);
    return {
        systemPrompt,
        userMessage,
        includedChunkIds: chunks.map((chunk) => chunk.id),
        includedHistoryTurns: turns.length,
        droppedChunks: retrieval.length - chunks.length,
        droppedHistoryTurns: offeredTurns - turns.length,
        truncatedChunkId,
        estimatedTokens: tokensFor(userMessage),
    };
}
