export type TokenizerState =
  | "Data"
  | "TagName";

export interface TokenSpan {
  readonly start: number;
  readonly end: number;
}

export interface StartTagToken {
  readonly type: "StartTag";
  readonly name: string;
  readonly span?: TokenSpan;
}

export interface EndTagToken {
  readonly type: "EndTag";
  readonly name: string;
  readonly span?: TokenSpan;
}

export interface TextToken {
  readonly type: "Text";
  readonly content: string;
  readonly span?: TokenSpan;
}

export type MarkupToken =
  | StartTagToken
  | EndTagToken
  | TextToken;

export type TokenizerErrorCode =
  | "unterminated-tag"
  | "empty-tag-name";

export interface TokenizerParseError {
  readonly code: TokenizerErrorCode;
  readonly index: number;
}

export interface TokenizerBudgets {
  readonly maxParseErrors?: number;
}

export interface TokenizerDebugOptions {
  readonly enabled?: boolean;
  readonly windowCodePoints?: number;
  readonly lastTokens?: number;
}

export interface TokenizeOptions {
  readonly budgets?: TokenizerBudgets;
  readonly debug?: TokenizerDebugOptions;
  readonly captureSpans?: boolean;
  readonly onParseError?: (error: TokenizerParseError) => void;
}

export interface TokenizerDebugSnapshot {
  readonly currentState: TokenizerState;
  readonly inputWindow: string;
  readonly lastTokens: readonly MarkupToken[];
}

export interface TokenizeResult {
  readonly tokens: readonly MarkupToken[];
  readonly errors: readonly TokenizerParseError[];
  readonly debug?: TokenizerDebugSnapshot;
}
