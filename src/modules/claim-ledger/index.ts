export * from "./claim-ledger";
export * from "./in-memory-claim-ledger";
export * from "./claim-ledger.module";
