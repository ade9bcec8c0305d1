export * from "./types";
export { WamiArn, WamiArnProps, ARN_PREFIX, WAMI_MARKER } from "./WamiArn";
export { ArnBuilder } from "./ArnBuilder";
export {
  parseArn,
  tryParseArn,
  formatArn,
  classifyArnTail,
  ArnTail,
  ArnTailLayout,
} from "./ArnParser";
export * from "./transformers";
export * from "./OpaqueArnBuilder";
