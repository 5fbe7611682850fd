import { appendFileSync, existsSync, mkdirSync, readdirSync, statSync } from "fs";
import { join } from "path";
import { Config } from "../../config";
import type {
    ComponentLogger,
    LogEntry,
    LoggingStats,
    LogLevel,
    LogMetadata,
} from "./types";

const CONSOLE_PREFIX: Record<LogLevel, string> = {
    info: "ℹ️",
    warn: "⚠️",
    error: "❌",
    debug: "🐛",
};

export class LoggingService {
    private static instance: LoggingService;
    private logsDir: string;
    private fileLogging: boolean;
    private hasLoggedWriteError: boolean = false;

    private constructor() {
        const config = Config.logging.getLoggingConfig();
        this.logsDir = config.directory;
        this.fileLogging = config.enabled && config.fileLogging;

        this.ensureLogsDirectory();
    }

    public static getInstance(): LoggingService {
        if (!LoggingService.instance) {
            LoggingService.instance = new LoggingService();
        }
        return LoggingService.instance;
    }

    private ensureLogsDirectory(): void {
        if (!this.fileLogging) return;

        try {
            if (!existsSync(this.logsDir)) {
                mkdirSync(this.logsDir, { recursive: true });
            }
        } catch (error) {
            console.warn(
                `⚠️ Cannot create log directory ${this.logsDir}, disabling file logging:`,
                error
            );
            this.fileLogging = false;
        }
    }

    private writeLog(entry: LogEntry): void {
        if (!this.fileLogging) return;

        const logLine = this.formatLogLine(entry);

        try {
            appendFileSync(join(this.logsDir, "application.log"), logLine + "\n");
            appendFileSync(join(this.logsDir, `${entry.level}.log`), logLine + "\n");
        } catch (error) {
            // Only report once; a broken disk would otherwise flood stderr
            if (!this.hasLoggedWriteError) {
                console.error("Failed to write to log file, disabling file logging:", error);
                this.hasLoggedWriteError = true;
                this.fileLogging = false;
            }
        }
    }

    private formatLogLine(entry: LogEntry): string {
        const baseLog = `[${entry.timestamp}] [${entry.level.toUpperCase()}]${
            entry.component ? ` [${entry.component}]` : ""
        } ${entry.message}`;

        if (entry.metadata && Object.keys(entry.metadata).length > 0) {
            return `${baseLog} | Metadata: ${JSON.stringify(entry.metadata)}`;
        }

        return baseLog;
    }

    private log(level: LogLevel, message: string, component?: string, metadata?: LogMetadata): void {
        if (!Config.logging.shouldLog(level)) return;

        this.writeLog({
            timestamp: new Date().toISOString(),
            level,
            message,
            component,
            metadata,
        });

        if (!Config.logging.getLoggingConfig().consoleLogging) return;

        const line = `${CONSOLE_PREFIX[level]} ${component ? `[${component}] ` : ""}${message}`;
        switch (level) {
            case "error":
                console.error(line);
                break;
            case "warn":
                console.warn(line);
                break;
            case "debug":
                console.debug(line);
                break;
            default:
                console.log(line);
        }
    }

    public info(message: string, component?: string, metadata?: LogMetadata): void {
        this.log("info", message, component, metadata);
    }

    public warn(message: string, component?: string, metadata?: LogMetadata): void {
        this.log("warn", message, component, metadata);
    }

    public error(message: string, component?: string, metadata?: LogMetadata): void {
        this.log("error", message, component, metadata);
    }

    public debug(message: string, component?: string, metadata?: LogMetadata): void {
        this.log("debug", message, component, metadata);
    }

    public createComponentLogger(componentName: string): ComponentLogger {
        return {
            info: (message, metadata) => this.info(message, componentName, metadata),
            warn: (message, metadata) => this.warn(message, componentName, metadata),
            error: (message, metadata) => this.error(message, componentName, metadata),
            debug: (message, metadata) => this.debug(message, componentName, metadata),
        };
    }

    public getStats(): LoggingStats {
        const base = {
            enabled: Config.logging.getLoggingConfig().enabled,
            fileLogging: this.fileLogging,
            logsDirectory: this.logsDir,
        };

        if (!this.fileLogging || !existsSync(this.logsDir)) {
            return { ...base, logFiles: [], totalLogFiles: 0, estimatedLogSize: "0 Bytes" };
        }

        try {
            const logFiles = readdirSync(this.logsDir).filter((file) => file.endsWith(".log"));
            const totalSize = logFiles.reduce(
                (sum, file) => sum + statSync(join(this.logsDir, file)).size,
                0
            );

            return {
                ...base,
                logFiles,
                totalLogFiles: logFiles.length,
                estimatedLogSize: formatBytes(totalSize),
            };
        } catch (error) {
            console.error("Failed to read log directory:", error);
            return { ...base, logFiles: [], totalLogFiles: 0, estimatedLogSize: "Unknown" };
        }
    }
}

export function formatBytes(bytes: number): string {
    if (bytes === 0) return "0 Bytes";
    const k = 1024;
    const sizes = ["Bytes", "KB", "MB", "GB"];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + " " + sizes[i];
}

export const loggingService = LoggingService.getInstance();
