export * from "./unit-of-work.service";
export * from "./unit-of-work.module";
