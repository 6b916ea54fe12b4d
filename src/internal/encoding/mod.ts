export { canonicalizeEncodingLabel, decodeMarkupBytes, sniffMarkupEncoding } from "./sniff.js";

export type {
  DecodedMarkup,
  EncodingSniffOptions,
  EncodingSniffResult,
  EncodingSniffSource
} from "./sniff.js";
