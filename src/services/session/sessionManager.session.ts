import { randomUUID } from "crypto";
import { Config } from "../../config";
import { getChunkPreset, getModelProfile } from "../../config/models";
import { validatePipelineConfig } from "../../config/pipeline.config";
import type { AIConfig, AppConfig, PipelineConfig } from "../../config/types";
import { SessionNotFoundError } from "../../utils/PipelineError";
import { loggingService } from "../logging";
import { ChatSession } from "./chat.session";
import { createProviderPipeline } from "./pipeline.session";
import type { PipelineFactory, SessionCreateOptions, SessionSettings } from "./types";

export interface SessionManagerOptions {
    app: AppConfig;
    ai: AIConfig;
    createPipeline?: PipelineFactory;
    now?: () => number;
    generateId?: () => string;
}

export interface SessionManagerStats {
    activeSessions: number;
    busySessions: number;
    indexedSessions: number;
    created: number;
    expired: number;
}

/**
 * Owns every live session. There is no conversation state outside of the
 * sessions it holds.
 */
export class SessionManager {
    private sessions = new Map<string, ChatSession>();
    private sweepTimer: ReturnType<typeof setInterval> | null = null;
    private created = 0;
    private expired = 0;
    private logger = loggingService.createComponentLogger("SessionManager");
    private createPipeline: PipelineFactory;
    private now: () => number;
    private generateId: () => string;

    constructor(private options: SessionManagerOptions) {
        this.createPipeline = options.createPipeline ?? createProviderPipeline;
        this.now = options.now ?? Date.now;
        this.generateId = options.generateId ?? randomUUID;
    }

    /**
     * Resolves the pipeline settings for a new session. An explicit chunk
     * size wins; otherwise a chosen model brings its preset and the
     * configured defaults apply when no model was chosen.
     */
    resolvePipelineConfig(request: SessionCreateOptions = {}): PipelineConfig {
        const { app, ai } = this.options;
        const llmModel = request.model ?? ai.llm.model;
        const preset = request.model
            ? getChunkPreset(request.model)
            : { chunkSize: app.chunking.chunkSize, chunkOverlap: app.chunking.chunkOverlap };

        return validatePipelineConfig({
            embeddingModel: ai.embedding.model,
            llmModel,
            chunkSize: request.chunkSize ?? preset.chunkSize,
            chunkOverlap: request.chunkOverlap ?? preset.chunkOverlap,
            topK: request.topK ?? app.qa.topK,
            apiCredential: ai.llm.apiKey,
        });
    }

    create(request: SessionCreateOptions = {}): ChatSession {
        const pipelineConfig = this.resolvePipelineConfig(request);
        const profile = getModelProfile(pipelineConfig.llmModel);
        const { qa, session } = this.options.app;

        const settings: SessionSettings = {
            pipeline: pipelineConfig,
            generation: {
                model: profile.id,
                temperature: profile.temperature,
                maxTokens: profile.maxTokens,
            },
            metric: qa.distanceMetric,
            optimizeQuery: qa.optimizeQuery,
            maxUploadBytes: session.maxUploadBytes,
        };

        const chatSession = new ChatSession(
            this.generateId(),
            settings,
            this.createPipeline(pipelineConfig, settings),
            this.now
        );
        this.sessions.set(chatSession.id, chatSession);
        this.created++;

        this.logger.info(`🆕 Session ${chatSession.id} opened`, {
            model: pipelineConfig.llmModel,
            chunkSize: pipelineConfig.chunkSize,
            chunkOverlap: pipelineConfig.chunkOverlap,
            topK: pipelineConfig.topK,
        });
        return chatSession;
    }

    get(id: string): ChatSession {
        const chatSession = this.sessions.get(id);
        if (!chatSession) {
            throw new SessionNotFoundError(id);
        }
        return chatSession;
    }

    close(id: string): void {
        const chatSession = this.get(id);
        chatSession.close();
        this.sessions.delete(id);
    }

    /**
     * Tears down sessions idle for longer than the TTL. Busy sessions are
     * left alone until their operation finishes.
     */
    sweep(now: number = this.now()): string[] {
        const ttlMs = this.options.app.session.ttlMinutes * 60 * 1000;
        const closed: string[] = [];

        for (const [id, chatSession] of this.sessions) {
            if (chatSession.isBusy()) continue;
            if (now - chatSession.getLastActivity() > ttlMs) {
                chatSession.close();
                this.sessions.delete(id);
                closed.push(id);
            }
        }

        if (closed.length > 0) {
            this.expired += closed.length;
            this.logger.info(`⌛ Expired ${closed.length} idle session(s)`, { ids: closed });
        }
        return closed;
    }

    start(): void {
        if (this.sweepTimer) return;

        this.sweepTimer = setInterval(
            () => this.sweep(),
            this.options.app.session.sweepIntervalSeconds * 1000
        );
        // The sweep alone should not keep the process alive
        this.sweepTimer.unref();
    }

    shutdown(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }

        for (const chatSession of this.sessions.values()) {
            chatSession.close();
        }
        this.logger.info(`🛑 Closed ${this.sessions.size} session(s) on shutdown`);
        this.sessions.clear();
    }

    getStats(): SessionManagerStats {
        const sessions = [...this.sessions.values()];
        return {
            activeSessions: sessions.length,
            busySessions: sessions.filter((s) => s.isBusy()).length,
            indexedSessions: sessions.filter((s) => s.getStats().chunkCount > 0).length,
            created: this.created,
            expired: this.expired,
        };
    }
}

export function createSessionManager(): SessionManager {
    return new SessionManager({
        app: Config.app.getConfig(),
        ai: {
            llm: Config.ai.getLLMConfig(),
            embedding: Config.ai.getEmbeddingConfig(),
        },
    });
}
