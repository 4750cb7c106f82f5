export * from "./room-mesh";
export * from "./types";
