export type MonitoredOperation =
    | "llm"
    | "embedding"
    | "extraction"
    | "chunking"
    | "vector_search"
    | "qa_pipeline"
    | "ingestion";

export type SpanAttributeValue = string | number | boolean;

export interface MonitoringStats {
    enabled: boolean;
    sentryDsn: boolean;
    environment: string;
    trackedOperations: number;
    failedOperations: number;
}
