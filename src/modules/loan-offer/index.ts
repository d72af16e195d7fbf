export * from "./loan-offer.types";
export * from "./loan-offer.service";
export * from "./loan-offer.controller";
export * from "./loan-offer.module";
export * from "./offer-id";
