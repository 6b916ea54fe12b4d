import { decodeMarkupBytes, type EncodingSniffSource } from "../internal/encoding/mod.js";
import { serializeTokens as serializeMarkupTokens } from "../internal/serializer/serialize.js";
import {
  tokenize as tokenizeMarkup,
  type MarkupToken,
  type TokenizerParseError
} from "../internal/tokenizer/mod.js";
import {
  ROOT_TAG_NAME,
  buildTreeFromMarkup,
  buildTreeFromTokens,
  type TreeBudgets,
  type TreeBuildResult,
  type TreeBuilderError,
  type TreeNode,
  type TreeNodeElement,
  type TreeNodeText,
  type TreeSpan
} from "../internal/tree/mod.js";

import type {
  BudgetExceededPayload,
  BudgetOptions,
  BuildOptions,
  DocumentTree,
  ElementNode,
  ElementVisitor,
  MarkupNode,
  NodeId,
  NodeVisitor,
  ParseError,
  ParseErrorCode,
  ParseOptions,
  Span,
  TextNode,
  Token,
  TokenizeOptions,
  TraceEvent
} from "./types.js";

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
} from "./types.js";

const PARSE_ERROR_MESSAGES: Readonly<Record<ParseErrorCode, string>> = Object.freeze({
  "unterminated-tag": "Input ended before the tag was closed by '>'",
  "empty-tag-name": "Tag has an empty name and was kept as text",
  "unbalanced-close": "End tag has no matching open element and was ignored",
  "misnested-close": "End tag also closed elements still open inside its element",
  "max-nodes-exceeded": "Node count exceeded the maxNodes budget",
  "max-depth-exceeded": "Nesting depth exceeded the maxDepth budget"
});

export class BudgetExceededError extends Error {
  readonly payload: BudgetExceededPayload;

  constructor(payload: BudgetExceededPayload) {
    super(
      `Budget exceeded: ${payload.budget} limit=${String(payload.limit)} actual=${String(payload.actual)}`
    );
    this.name = "BudgetExceededError";
    this.payload = payload;
  }
}

class NodeIdAssigner {
  #next: NodeId = 1;

  next(): NodeId {
    const value = this.#next;
    this.#next += 1;
    return value;
  }
}

interface NodeMetrics {
  readonly nodes: number;
  readonly maxDepth: number;
}

interface IterateFrame {
  readonly nodes: readonly MarkupNode[];
  readonly depth: number;
  next: number;
}

function* iterateNodes(
  nodes: readonly MarkupNode[],
  depth: number
): IterableIterator<{ readonly node: MarkupNode; readonly depth: number }> {
  const stack: IterateFrame[] = [{ nodes, depth, next: 0 }];

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const node = frame.nodes[frame.next];
    if (node === undefined) {
      stack.pop();
      continue;
    }

    frame.next += 1;
    yield { node, depth: frame.depth };
    if (node.kind === "element" && node.children.length > 0) {
      stack.push({ nodes: node.children, depth: frame.depth + 1, next: 0 });
    }
  }
}

interface DecodeContext {
  readonly source: "input" | "sniff";
  readonly encoding: string;
  readonly sniffSource: "input" | EncodingSniffSource;
}

function enforceBudget(
  budget: BudgetExceededPayload["budget"],
  limit: number | undefined,
  actual: number
): void {
  if (limit === undefined || actual <= limit) {
    return;
  }

  throw new BudgetExceededError({
    code: "BUDGET_EXCEEDED",
    budget,
    limit,
    actual
  });
}

function eventSize(event: TraceEvent): number {
  return JSON.stringify(event).length;
}

type TraceEventInput =
  TraceEvent extends infer Event
    ? Event extends { readonly seq: number }
      ? Omit<Event, "seq">
      : never
    : never;

interface TraceState {
  readonly events: TraceEvent[];
  bytes: number;
}

function pushTrace(
  trace: TraceState | undefined,
  event: TraceEventInput,
  budgets: BudgetOptions | undefined
): void {
  if (!trace) {
    return;
  }

  const nextEvent = {
    seq: trace.events.length + 1,
    ...event
  } as TraceEvent;
  enforceBudget("maxTraceEvents", budgets?.maxTraceEvents, trace.events.length + 1);

  const bytes = trace.bytes + eventSize(nextEvent);
  enforceBudget("maxTraceBytes", budgets?.maxTraceBytes, bytes);

  trace.events.push(nextEvent);
  trace.bytes = bytes;
}

function pushBudgetTrace(
  trace: TraceState | undefined,
  budget: BudgetExceededPayload["budget"],
  limit: number | undefined,
  actual: number,
  budgets: BudgetOptions | undefined
): void {
  pushTrace(trace, {
    kind: "budget",
    budget,
    limit: limit ?? null,
    actual,
    status: limit === undefined || actual <= limit ? "ok" : "exceeded"
  }, budgets);
}

function toPublicSpan(span: TreeSpan | undefined): Span | undefined {
  if (!span) {
    return undefined;
  }

  return { start: span.start, end: span.end };
}

function fromTokenizerError(error: TokenizerParseError): ParseError {
  return Object.freeze({
    code: error.code,
    message: PARSE_ERROR_MESSAGES[error.code],
    span: { start: error.index, end: error.index + 1 }
  });
}

function fromTreeBuilderError(error: TreeBuilderError): ParseError {
  const { startOffset, endOffset } = error;
  const hasOffsets =
    startOffset !== undefined &&
    endOffset !== undefined &&
    startOffset >= 0 &&
    endOffset >= startOffset;

  return Object.freeze({
    code: error.code,
    message: PARSE_ERROR_MESSAGES[error.code],
    ...(hasOffsets ? { span: { start: startOffset, end: endOffset } } : {})
  });
}

function treeBudgetsFromOptions(budgets: BudgetOptions | undefined): TreeBudgets | undefined {
  if (!budgets) {
    return undefined;
  }

  const next: TreeBudgets = {
    ...(budgets.maxNodes !== undefined ? { maxNodes: budgets.maxNodes } : {}),
    ...(budgets.maxDepth !== undefined ? { maxDepth: budgets.maxDepth } : {})
  };

  return Object.keys(next).length > 0 ? next : undefined;
}

function toToken(token: MarkupToken): Token {
  const span = toPublicSpan(token.span);

  if (token.type === "StartTag") {
    return Object.freeze({ kind: "startTag", name: token.name, ...(span ? { span } : {}) });
  }

  if (token.type === "EndTag") {
    return Object.freeze({ kind: "endTag", name: token.name, ...(span ? { span } : {}) });
  }

  return Object.freeze({ kind: "text", value: token.content, ...(span ? { span } : {}) });
}

function fromToken(token: Token): MarkupToken {
  const span = token.span ? { start: token.span.start, end: token.span.end } : undefined;

  if (token.kind === "startTag") {
    return { type: "StartTag", name: token.name, ...(span ? { span } : {}) };
  }

  if (token.kind === "endTag") {
    return { type: "EndTag", name: token.name, ...(span ? { span } : {}) };
  }

  return { type: "Text", content: token.value, ...(span ? { span } : {}) };
}

function convertTextNode(node: TreeNodeText, id: NodeId): TextNode {
  const span = toPublicSpan(node.span);

  return {
    id,
    kind: "text",
    value: node.value,
    ...(span ? { span } : {})
  };
}

function convertElementNode(node: TreeNodeElement, id: NodeId, children: readonly MarkupNode[]): ElementNode {
  const span = toPublicSpan(node.span);

  return {
    id,
    kind: "element",
    tagName: node.name,
    children,
    ...(span ? { span } : {})
  };
}

interface ConvertFrame {
  readonly source: readonly TreeNode[];
  readonly target: MarkupNode[];
  next: number;
}

// Ids are assigned in pre-order. The walk keeps its own stack so nesting depth is bounded only by memory.
function convertChildren(
  parent: TreeNodeElement,
  assigner: NodeIdAssigner,
  ids: Map<TreeNode, NodeId>
): MarkupNode[] {
  const converted: MarkupNode[] = [];
  const stack: ConvertFrame[] = [{ source: parent.children, target: converted, next: 0 }];

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const node = frame.source[frame.next];
    if (node === undefined) {
      stack.pop();
      continue;
    }

    frame.next += 1;
    const id = assigner.next();
    ids.set(node, id);

    if (node.kind === "text") {
      frame.target.push(convertTextNode(node, id));
      continue;
    }

    const children: MarkupNode[] = [];
    frame.target.push(convertElementNode(node, id, children));
    stack.push({ source: node.children, target: children, next: 0 });
  }

  return converted;
}

function collectMetrics(nodes: readonly MarkupNode[]): NodeMetrics {
  let totalNodes = 0;
  let maxDepth = 0;

  for (const entry of iterateNodes(nodes, 1)) {
    totalNodes += 1;
    if (entry.depth > maxDepth) {
      maxDepth = entry.depth;
    }
  }

  return { nodes: totalNodes, maxDepth };
}

function finishDocument(
  built: TreeBuildResult,
  errors: readonly ParseError[],
  budgets: BudgetOptions | undefined,
  trace: TraceState | undefined
): DocumentTree {
  const assigner = new NodeIdAssigner();
  const documentId = assigner.next();
  const ids = new Map<TreeNode, NodeId>();

  const children = convertChildren(built.document, assigner, ids);
  const metrics = collectMetrics(children);
  const totalNodes = metrics.nodes + 1;

  enforceBudget("maxNodes", budgets?.maxNodes, totalNodes);
  enforceBudget("maxDepth", budgets?.maxDepth, metrics.maxDepth);

  const openElements: NodeId[] = [];
  for (const element of built.openElements) {
    const id = ids.get(element);
    if (id !== undefined) {
      openElements.push(id);
    }
  }

  for (const error of errors) {
    pushTrace(trace, { kind: "parse-error", code: error.code }, budgets);
  }

  pushTrace(trace, {
    kind: "tree-mutation",
    nodeCount: totalNodes,
    errorCount: errors.length,
    openElementCount: openElements.length
  }, budgets);
  pushBudgetTrace(trace, "maxNodes", budgets?.maxNodes, totalNodes, budgets);
  pushBudgetTrace(trace, "maxDepth", budgets?.maxDepth, metrics.maxDepth, budgets);

  return {
    id: documentId,
    kind: "element",
    tagName: ROOT_TAG_NAME,
    children,
    errors,
    openElements,
    ...(trace ? { trace: trace.events } : {})
  };
}

function parseDocumentInternal(input: string, options: ParseOptions, decode: DecodeContext): DocumentTree {
  const budgets = options.budgets;
  const onParseError = options.onParseError;
  const trace: TraceState | undefined = options.trace ? { events: [], bytes: 0 } : undefined;

  enforceBudget("maxInputBytes", budgets?.maxInputBytes, input.length);
  pushTrace(trace, { kind: "decode", ...decode }, budgets);
  pushBudgetTrace(trace, "maxInputBytes", budgets?.maxInputBytes, input.length, budgets);

  const built = buildTreeFromMarkup(input, treeBudgetsFromOptions(budgets), {
    captureSpans: options.captureSpans ?? false,
    ...(onParseError
      ? {
          onTokenizerError(error: TokenizerParseError): void {
            onParseError(fromTokenizerError(error));
          },
          onParseError(error: TreeBuilderError): void {
            onParseError(fromTreeBuilderError(error));
          }
        }
      : {})
  });

  pushTrace(trace, {
    kind: "token",
    count: built.tokenCount
  }, budgets);

  const errors = [
    ...built.tokenizerErrors.map((error) => fromTokenizerError(error)),
    ...built.errors.map((error) => fromTreeBuilderError(error))
  ];

  return finishDocument(built, errors, budgets, trace);
}

export function tokenize(input: string, options: TokenizeOptions = {}): readonly Token[] {
  const onParseError = options.onParseError;
  const tokenized = tokenizeMarkup(input, {
    captureSpans: options.captureSpans ?? false,
    ...(onParseError
      ? {
          onParseError(error: TokenizerParseError): void {
            onParseError(fromTokenizerError(error));
          }
        }
      : {})
  });

  return Object.freeze(tokenized.tokens.map((token) => toToken(token)));
}

export function buildTree(tokens: readonly Token[], options: BuildOptions = {}): DocumentTree {
  const onParseError = options.onParseError;
  const built = buildTreeFromTokens(
    tokens.map((token) => fromToken(token)),
    treeBudgetsFromOptions(options.budgets),
    {
      captureSpans: tokens.some((token) => token.span !== undefined),
      ...(onParseError
        ? {
            onParseError(error: TreeBuilderError): void {
              onParseError(fromTreeBuilderError(error));
            }
          }
        : {})
    }
  );

  const errors = built.errors.map((error) => fromTreeBuilderError(error));
  return finishDocument(built, errors, options.budgets, undefined);
}

export function parse(input: string, options: ParseOptions = {}): DocumentTree {
  return parseDocumentInternal(input, options, {
    source: "input",
    encoding: "utf-16",
    sniffSource: "input"
  });
}

export function parseBytes(bytes: Uint8Array, options: ParseOptions = {}): DocumentTree {
  enforceBudget("maxInputBytes", options.budgets?.maxInputBytes, bytes.byteLength);

  const decoded = decodeMarkupBytes(
    bytes,
    options.transportEncodingLabel
      ? { transportEncodingLabel: options.transportEncodingLabel }
      : {}
  );

  return parseDocumentInternal(decoded.text, options, {
    source: "sniff",
    encoding: decoded.sniff.encoding,
    sniffSource: decoded.sniff.source
  });
}

function isDocumentTree(node: MarkupNode | DocumentTree): node is DocumentTree {
  return "errors" in node;
}

interface SerializeFrame {
  readonly nodes: readonly MarkupNode[];
  readonly endTag: string | null;
  next: number;
}

function serializeNodes(nodes: readonly MarkupNode[]): string {
  const parts: string[] = [];
  const stack: SerializeFrame[] = [{ nodes, endTag: null, next: 0 }];

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const node = frame.nodes[frame.next];
    if (node === undefined) {
      stack.pop();
      if (frame.endTag !== null) {
        parts.push(frame.endTag);
      }
      continue;
    }

    frame.next += 1;
    if (node.kind === "text") {
      parts.push(node.value);
      continue;
    }

    parts.push(`<${node.tagName}>`);
    stack.push({ nodes: node.children, endTag: `</${node.tagName}>`, next: 0 });
  }

  return parts.join("");
}

// Text is written back verbatim; open elements are written closed.
export function serialize(tree: DocumentTree | MarkupNode): string {
  return serializeNodes(isDocumentTree(tree) ? tree.children : [tree]);
}

export function serializeTokens(tokens: readonly Token[]): string {
  return serializeMarkupTokens(tokens.map((token) => fromToken(token)));
}

export function textContent(node: DocumentTree | MarkupNode): string {
  if (node.kind === "text") {
    return node.value;
  }

  const parts: string[] = [];
  for (const entry of iterateNodes(node.children, 0)) {
    if (entry.node.kind === "text") {
      parts.push(entry.node.value);
    }
  }
  return parts.join("");
}

export function walk(tree: DocumentTree, visitor: NodeVisitor): void {
  for (const entry of iterateNodes(tree.children, 0)) {
    visitor(entry.node, entry.depth);
  }
}

export function walkElements(tree: DocumentTree, visitor: ElementVisitor): void {
  for (const entry of iterateNodes(tree.children, 0)) {
    if (entry.node.kind === "element") {
      visitor(entry.node, entry.depth);
    }
  }
}

export function findById(tree: DocumentTree, id: NodeId): DocumentTree | MarkupNode | null {
  if (tree.id === id) {
    return tree;
  }

  for (const entry of iterateNodes(tree.children, 0)) {
    if (entry.node.id === id) {
      return entry.node;
    }
  }

  return null;
}

export function* findAllByTagName(tree: DocumentTree, tagName: string): IterableIterator<ElementNode> {
  for (const entry of iterateNodes(tree.children, 0)) {
    if (entry.node.kind === "element" && entry.node.tagName === tagName) {
      yield entry.node;
    }
  }
}
