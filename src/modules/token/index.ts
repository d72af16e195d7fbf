export * from "./token-ledger";
export * from "./in-memory-token-ledger";
export * from "./token.module";
