export * from "./codec";
export {
  horizontalFaceFromData,
  horizontalFaceToData,
  levelFromData,
  levelToData,
  roomFromData,
  roomToData,
  sectorFromData,
  sectorToData,
  verticalFaceFromData,
  verticalFaceToData,
} from "./convert";
export { validateLevel } from "./validate-level";
