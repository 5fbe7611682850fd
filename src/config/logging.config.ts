import "dotenv/config";
import { join } from "path";
import type { LoggingConfig } from "./types";

const LEVELS: LoggingConfig["logLevel"][] = ["debug", "info", "warn", "error"];

const isLogLevel = (value: string | undefined): value is LoggingConfig["logLevel"] =>
    LEVELS.some((level) => level === value);

export class LoggingConfigService {
    private static instance: LoggingConfigService;

    private constructor() {}

    public static getInstance(): LoggingConfigService {
        if (!LoggingConfigService.instance) {
            LoggingConfigService.instance = new LoggingConfigService();
        }
        return LoggingConfigService.instance;
    }

    public getLoggingConfig(): LoggingConfig {
        const level = process.env.LOG_LEVEL;
        return {
            enabled: process.env.NODE_ENV !== "test",
            logLevel: isLogLevel(level) ? level : "info",
            fileLogging: process.env.FILE_LOGGING !== "false",
            consoleLogging: process.env.CONSOLE_LOGGING !== "false",
            directory: process.env.LOG_DIR || join(process.cwd(), "logs"),
        };
    }

    public shouldLog(level: LoggingConfig["logLevel"]): boolean {
        const config = this.getLoggingConfig();
        if (!config.enabled) return false;

        return LEVELS.indexOf(level) >= LEVELS.indexOf(config.logLevel);
    }
}
