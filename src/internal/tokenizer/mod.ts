export { tokenize } from "./tokenize.js";

export type {
  EndTagToken,
  MarkupToken,
  StartTagToken,
  TextToken,
  TokenSpan,
  TokenizeOptions,
  TokenizeResult,
  TokenizerBudgets,
  TokenizerDebugOptions,
  TokenizerDebugSnapshot,
  TokenizerErrorCode,
  TokenizerParseError,
  TokenizerState
} from "./tokens.js";
