export * from "./batch.types";
export * from "./batch.service";
export * from "./batch.module";
