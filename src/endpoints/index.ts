export { Health } from "./health";
export { WorkerSeen, WorkerDropped } from "./workers";
export { WalletList, WalletStatsGet, WalletStatsPut, WalletWorkers } from "./wallets";
export { Sweep } from "./sweep";
