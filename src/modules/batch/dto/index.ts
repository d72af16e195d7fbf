export * from "./batch.dto";
