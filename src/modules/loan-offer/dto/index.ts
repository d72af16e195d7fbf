export * from "./create-loan-offer.dto";
export * from "./accept-loan.dto";
