export * from "./room";
export { SectorArena } from "./sector-arena";
