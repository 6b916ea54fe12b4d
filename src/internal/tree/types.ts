import type { TokenizerParseError } from "../tokenizer/tokens.js";

export interface TreeBudgets {
  readonly maxNodes?: number;
  readonly maxDepth?: number;
}

export interface TreeSpan {
  readonly start: number;
  readonly end: number;
}

export interface TreeBuildOptions {
  readonly captureSpans?: boolean;
  readonly onParseError?: (error: TreeBuilderError) => void;
  readonly onTokenizerError?: (error: TokenizerParseError) => void;
}

// Element spans are filled in when the element closes, or at end of input.
export interface TreeNodeElement {
  readonly kind: "element";
  readonly name: string;
  readonly children: TreeNode[];
  span?: TreeSpan;
}

export interface TreeNodeText {
  readonly kind: "text";
  readonly value: string;
  readonly span?: TreeSpan;
}

export type TreeNode =
  | TreeNodeElement
  | TreeNodeText;

export type TreeBuilderErrorCode =
  | "unbalanced-close"
  | "misnested-close"
  | "max-nodes-exceeded"
  | "max-depth-exceeded";

export interface TreeBuilderError {
  readonly code: TreeBuilderErrorCode;
  readonly tokenIndex: number;
  readonly startOffset?: number;
  readonly endOffset?: number;
}

export interface TreeBuildResult {
  readonly document: TreeNodeElement;
  readonly errors: readonly TreeBuilderError[];
  /** Elements left open at end of input, innermost last. The root is not included. */
  readonly openElements: readonly TreeNodeElement[];
}

export interface MarkupTreeBuildResult extends TreeBuildResult {
  readonly tokenizerErrors: readonly TokenizerParseError[];
  readonly tokenCount: number;
}
