export * from "./pay-loan.dto";
