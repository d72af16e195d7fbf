export * from "./protocol-fee.service";
export * from "./fees.module";
