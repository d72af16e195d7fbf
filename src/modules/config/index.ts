export * from "./env.validation";
export * from "./protocol.config";
