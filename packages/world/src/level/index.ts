export * from "./factories";
export * from "./level";
