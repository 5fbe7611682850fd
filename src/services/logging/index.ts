export { LoggingService, loggingService, formatBytes } from "./core.logging";
export type * from "./types";
