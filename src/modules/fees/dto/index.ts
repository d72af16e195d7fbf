export * from "./set-protocol-fee.dto";
export * from "./set-loan-offer-fee.dto";
