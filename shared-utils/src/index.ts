export * from "./bus";
export * from "./config";
export * from "./service";
