export { PresenceTracker, assertIdentifier, assertTimestamp } from "./presence";

export { ActiveWorkerSummarizer, parseWorkerList } from "./summarizer";

export { StalenessSweep } from "./sweep";

export { SweepScheduler } from "./sweep-scheduler";
export type { SweepSchedulerOptions } from "./sweep-scheduler";

export { WalletStatsStore, parsePoolMetrics } from "./wallet-stats";
