import type { ChunkPreset, ModelProfile } from "./types";

/**
 * Chat models offered for selection, with the generation settings each one
 * runs with.
 */
export const MODEL_CATALOG: readonly ModelProfile[] = [
    {
        id: "llama-3.1-8b-instant",
        description: "Fast & efficient (recommended)",
        maxTokens: 2000,
        temperature: 0.1,
    },
    {
        id: "llama-3.2-1b-preview",
        description: "Very fast, lightweight",
        maxTokens: 2000,
        temperature: 0.1,
    },
    {
        id: "llama-3.2-3b-preview",
        description: "Fast, good balance",
        maxTokens: 2000,
        temperature: 0.1,
    },
    {
        id: "llama-3.3-70b-versatile",
        description: "High quality (may hit rate limits)",
        maxTokens: 1500,
        temperature: 0.1,
    },
    {
        id: "llama-guard-3-8b",
        description: "Safety-focused",
        maxTokens: 2000,
        temperature: 0.1,
    },
    {
        id: "mixtral-8x7b-32768",
        description: "Large context window",
        maxTokens: 2000,
        temperature: 0.1,
    },
];

const FALLBACK_GENERATION = { maxTokens: 1500, temperature: 0.1 };

export function getModelProfile(modelId: string): ModelProfile {
    const known = MODEL_CATALOG.find((model) => model.id === modelId);
    if (known) return known;

    return {
        id: modelId,
        description: "Custom model",
        ...FALLBACK_GENERATION,
    };
}

// Small/instant models get smaller chunks to keep prompts under their rate limits.
export function getChunkPreset(modelId: string): ChunkPreset {
    const lowered = modelId.toLowerCase();
    if (lowered.includes("8b") || lowered.includes("instant")) {
        return { chunkSize: 600, chunkOverlap: 80 };
    }
    return { chunkSize: 800, chunkOverlap: 100 };
}
