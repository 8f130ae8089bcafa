export * from "./errors";
export * from "./chain";
export * from "./access";
export * from "./ledger";
export * from "./erc20-token";
export * from "./chain-role";
export * from "./transfer-package";
export * from "./relay-gateway";
export * from "./wrapped-stable";
export * from "./bridge-coordinator";
export * from "./in-memory-relay";
export * from "./deployment";
export * from "./config";
export { logger, componentLogger } from "./logger";
export * as metrics from "./metrics";
