export * from "./bus";
export * from "./cache";
export * from "./config";
export * from "./service";
