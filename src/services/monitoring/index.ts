export { SentryMonitoringService, sentryMonitoringService } from "./sentry.monitoring";
export type * from "./types";
