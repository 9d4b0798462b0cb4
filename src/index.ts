export * from "./codec/tlb";
export * from "./codec/boc";
export * from "./core/errors";
export * from "./message/message";
export * from "./message/jetton";
export * from "./message/registry";
export { assertValid, MAX_COINS, MAX_U64 } from "./model/validation";
export { loadConfig, loggerFromEnv, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
export { asOpcode, formatOpcode, type Opcode } from "./types/brands";
