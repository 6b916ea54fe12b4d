export {
  BudgetExceededError,
  buildTree,
  findAllByTagName,
  findById,
  parse,
  parseBytes,
  serialize,
  serializeTokens,
  textContent,
  tokenize,
  walk,
  walkElements
} from "./mod.js";
export { printTokens, printTree } from "./print.js";

export type {
  BudgetExceededPayload,
  BudgetOptions,
  BuildOptions,
  DocumentTree,
  ElementNode,
  ElementVisitor,
  EndTagToken,
  MarkupNode,
  NodeId,
  NodeKind,
  NodeVisitor,
  ParseError,
  ParseErrorCode,
  ParseOptions,
  Span,
  StartTagToken,
  TextNode,
  TextToken,
  Token,
  TokenizeOptions,
  TraceEvent
} from "./mod.js";
