import { InvalidConfigError } from "../utils/PipelineError";
import type { PipelineConfig } from "./types";

export function pipelineConfigIssues(config: PipelineConfig): string[] {
    const issues: string[] = [];

    if (!config.embeddingModel.trim()) issues.push("embeddingModel must not be empty");
    if (!config.llmModel.trim()) issues.push("llmModel must not be empty");
    if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
        issues.push("chunkSize must be a positive integer");
    }
    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
        issues.push("chunkOverlap must be a non-negative integer");
    } else if (config.chunkOverlap >= config.chunkSize) {
        issues.push("chunkOverlap must be smaller than chunkSize");
    }
    if (!Number.isInteger(config.topK) || config.topK <= 0) {
        issues.push("topK must be a positive integer");
    }
    if (!config.apiCredential) issues.push("apiCredential is not set");

    return issues;
}

export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
    const issues = pipelineConfigIssues(config);
    if (issues.length > 0) {
        throw new InvalidConfigError(issues);
    }
    return Object.freeze({ ...config });
}
