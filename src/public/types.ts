export type NodeId = number;

export type NodeKind = "element" | "text";

export interface Span {
  readonly start: number;
  readonly end: number;
}

export type ParseErrorCode =
  | "unterminated-tag"
  | "empty-tag-name"
  | "unbalanced-close"
  | "misnested-close"
  | "max-nodes-exceeded"
  | "max-depth-exceeded";

export interface ParseError {
  readonly code: ParseErrorCode;
  readonly message: string;
  readonly span?: Span;
}

export interface BudgetOptions {
  readonly maxInputBytes?: number;
  readonly maxNodes?: number;
  readonly maxDepth?: number;
  readonly maxTraceEvents?: number;
  readonly maxTraceBytes?: number;
}

export interface TokenizeOptions {
  readonly captureSpans?: boolean;
  readonly onParseError?: (error: ParseError) => void;
}

export interface BuildOptions {
  readonly budgets?: BudgetOptions;
  readonly onParseError?: (error: ParseError) => void;
}

export interface ParseOptions {
  readonly captureSpans?: boolean;
  readonly trace?: boolean;
  readonly transportEncodingLabel?: string;
  readonly budgets?: BudgetOptions;
  readonly onParseError?: (error: ParseError) => void;
}

export interface StartTagToken {
  readonly kind: "startTag";
  readonly name: string;
  readonly span?: Span;
}

export interface EndTagToken {
  readonly kind: "endTag";
  readonly name: string;
  readonly span?: Span;
}

export interface TextToken {
  readonly kind: "text";
  readonly value: string;
  readonly span?: Span;
}

export type Token = StartTagToken | EndTagToken | TextToken;

export interface TraceDecodeEvent {
  readonly seq: number;
  readonly kind: "decode";
  readonly source: "input" | "sniff";
  readonly encoding: string;
  readonly sniffSource: "input" | "bom" | "transport" | "default";
}

export interface TraceTokenEvent {
  readonly seq: number;
  readonly kind: "token";
  readonly count: number;
}

export interface TraceTreeMutationEvent {
  readonly seq: number;
  readonly kind: "tree-mutation";
  readonly nodeCount: number;
  readonly errorCount: number;
  readonly openElementCount: number;
}

export interface TraceParseErrorEvent {
  readonly seq: number;
  readonly kind: "parse-error";
  readonly code: ParseErrorCode;
}

export interface TraceBudgetEvent {
  readonly seq: number;
  readonly kind: "budget";
  readonly budget: BudgetExceededPayload["budget"];
  readonly limit: number | null;
  readonly actual: number;
  readonly status: "ok" | "exceeded";
}

export type TraceEvent =
  | TraceDecodeEvent
  | TraceTokenEvent
  | TraceTreeMutationEvent
  | TraceParseErrorEvent
  | TraceBudgetEvent;

export interface TextNode {
  readonly id: NodeId;
  readonly kind: "text";
  readonly value: string;
  readonly span?: Span;
}

export interface ElementNode {
  readonly id: NodeId;
  readonly kind: "element";
  readonly tagName: string;
  readonly children: readonly MarkupNode[];
  readonly span?: Span;
}

export type MarkupNode = ElementNode | TextNode;

/** The synthetic root element. It is never closed by an end tag. */
export interface DocumentTree extends ElementNode {
  readonly tagName: "document";
  readonly errors: readonly ParseError[];
  /** Ids of elements still open at end of input, innermost last. */
  readonly openElements: readonly NodeId[];
  readonly trace?: readonly TraceEvent[];
}

export type NodeVisitor = (node: MarkupNode, depth: number) => void;

export type ElementVisitor = (node: ElementNode, depth: number) => void;

export interface BudgetExceededPayload {
  readonly code: "BUDGET_EXCEEDED";
  readonly budget:
    | "maxInputBytes"
    | "maxNodes"
    | "maxDepth"
    | "maxTraceEvents"
    | "maxTraceBytes";
  readonly limit: number;
  readonly actual: number;
}
