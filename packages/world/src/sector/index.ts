export * from "./sector";
export * from "./wall-stack";
