/**
 * Sector-based level geometry.
 *
 * Rooms are grids of 1024-unit sectors; each sector has an optional floor,
 * an optional ceiling and up to three stacked walls per edge or diagonal.
 */

export * from "./core";
export * from "./faces";
export * from "./gap";
export * from "./level";
export * from "./render";
export * from "./room";
export * from "./sector";
export * from "./serialization";
export * from "./utils";
