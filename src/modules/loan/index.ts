export * from "./loan.types";
export * from "./loan.service";
export * from "./loan.view";
export * from "./loan.module";
