export { LoggerServiceTag, LoggerServiceLive } from "./LoggerService"
export type { LoggerService, SummaryStats } from "./LoggerService"
