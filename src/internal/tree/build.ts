import { tokenize } from "../tokenizer/tokenize.js";

import type {
  MarkupTreeBuildResult,
  TreeBudgets,
  TreeBuildOptions,
  TreeBuildResult,
  TreeBuilderError,
  TreeBuilderErrorCode,
  TreeNodeElement,
  TreeNodeText,
  TreeSpan
} from "./types.js";
import type { EndTagToken, MarkupToken, TokenSpan } from "../tokenizer/tokens.js";

export const ROOT_TAG_NAME = "document";

interface OpenElement {
  readonly node: TreeNodeElement;
  readonly start: number | undefined;
}

interface BuildState {
  readonly budgets: TreeBudgets | undefined;
  readonly captureSpans: boolean;
  readonly errors: TreeBuilderError[];
  readonly reportedBudgets: Set<TreeBuilderErrorCode>;
  readonly onParseError: ((error: TreeBuilderError) => void) | undefined;
  nodeCount: number;
}

function pushError(state: BuildState, code: TreeBuilderErrorCode, tokenIndex: number, span?: TokenSpan): void {
  const error: TreeBuilderError = {
    code,
    tokenIndex,
    ...(span ? { startOffset: span.start, endOffset: span.end } : {})
  };
  state.errors.push(error);
  state.onParseError?.(error);
}

function pushBudgetError(state: BuildState, code: TreeBuilderErrorCode, tokenIndex: number, span?: TokenSpan): void {
  if (state.reportedBudgets.has(code)) {
    return;
  }

  state.reportedBudgets.add(code);
  pushError(state, code, tokenIndex, span);
}

function enforceTreeBudgets(depth: number, state: BuildState, tokenIndex: number, span?: TokenSpan): void {
  const maxDepth = state.budgets?.maxDepth;
  if (maxDepth !== undefined && depth > maxDepth) {
    pushBudgetError(state, "max-depth-exceeded", tokenIndex, span);
  }

  const maxNodes = state.budgets?.maxNodes;
  if (maxNodes !== undefined && state.nodeCount > maxNodes) {
    pushBudgetError(state, "max-nodes-exceeded", tokenIndex, span);
  }
}

function currentElement(stack: readonly OpenElement[], root: TreeNodeElement): TreeNodeElement {
  return stack[stack.length - 1]?.node ?? root;
}

function closeSpan(state: BuildState, open: OpenElement, end: number | undefined): void {
  if (!state.captureSpans || open.start === undefined || end === undefined) {
    return;
  }

  const span: TreeSpan = Object.freeze({ start: open.start, end });
  open.node.span = span;
}

// Closes the innermost open element named like the end tag, along with everything opened inside it.
// The root sits at stack index 0 and is never a candidate.
function closeElement(stack: OpenElement[], token: EndTagToken, tokenIndex: number, state: BuildState): void {
  let matchIndex = -1;
  for (let index = stack.length - 1; index > 0; index -= 1) {
    if (stack[index]?.node.name === token.name) {
      matchIndex = index;
      break;
    }
  }

  if (matchIndex === -1) {
    pushError(state, "unbalanced-close", tokenIndex, token.span);
    return;
  }

  if (matchIndex < stack.length - 1) {
    pushError(state, "misnested-close", tokenIndex, token.span);
  }

  const closing = stack.splice(matchIndex);
  const matched = closing[0];
  for (const open of closing) {
    closeSpan(state, open, open === matched ? token.span?.end : token.span?.start);
  }
}

export function buildTreeFromTokens(
  tokens: readonly MarkupToken[],
  budgets?: TreeBudgets,
  options: TreeBuildOptions = {}
): TreeBuildResult {
  const state: BuildState = {
    budgets,
    captureSpans: options.captureSpans ?? false,
    errors: [],
    reportedBudgets: new Set(),
    onParseError: options.onParseError,
    nodeCount: 0
  };

  const document: TreeNodeElement = {
    kind: "element",
    name: ROOT_TAG_NAME,
    children: []
  };
  const stack: OpenElement[] = [{ node: document, start: undefined }];
  let lastOffset: number | undefined;

  for (const [tokenIndex, token] of tokens.entries()) {
    if (token.span) {
      lastOffset = token.span.end;
    }

    if (token.type === "StartTag") {
      const element: TreeNodeElement = {
        kind: "element",
        name: token.name,
        children: []
      };

      currentElement(stack, document).children.push(element);
      stack.push({ node: element, start: token.span?.start });
      state.nodeCount += 1;
      enforceTreeBudgets(stack.length - 1, state, tokenIndex, token.span);
      continue;
    }

    if (token.type === "Text") {
      const textNode: TreeNodeText = {
        kind: "text",
        value: token.content,
        ...(state.captureSpans && token.span ? { span: token.span } : {})
      };

      currentElement(stack, document).children.push(textNode);
      state.nodeCount += 1;
      enforceTreeBudgets(stack.length, state, tokenIndex, token.span);
      continue;
    }

    closeElement(stack, token, tokenIndex, state);
  }

  const openElements = stack.slice(1);
  for (const open of openElements) {
    closeSpan(state, open, lastOffset);
  }

  return {
    document,
    errors: state.errors,
    openElements: openElements.map((open) => open.node)
  };
}

export function buildTreeFromMarkup(
  input: string,
  budgets?: TreeBudgets,
  options: TreeBuildOptions = {}
): MarkupTreeBuildResult {
  const tokenized = tokenize(input, {
    captureSpans: options.captureSpans ?? false,
    ...(options.onTokenizerError ? { onParseError: options.onTokenizerError } : {})
  });
  const built = buildTreeFromTokens(tokenized.tokens, budgets, options);

  return {
    ...built,
    tokenizerErrors: tokenized.errors,
    tokenCount: tokenized.tokens.length
  };
}
