export * from "./callback.types";
export * from "./callback-registry.service";
export * from "./callback.module";
