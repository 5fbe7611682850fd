export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    component?: string;
    metadata?: LogMetadata;
}

export interface ComponentLogger {
    info(message: string, metadata?: LogMetadata): void;
    warn(message: string, metadata?: LogMetadata): void;
    error(message: string, metadata?: LogMetadata): void;
    debug(message: string, metadata?: LogMetadata): void;
}

export interface LoggingStats {
    enabled: boolean;
    fileLogging: boolean;
    logsDirectory: string;
    logFiles: string[];
    totalLogFiles: number;
    estimatedLogSize: string;
}
