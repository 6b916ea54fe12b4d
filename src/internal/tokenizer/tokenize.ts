import type {
  MarkupToken,
  TextToken,
  TokenSpan,
  TokenizeOptions,
  TokenizeResult,
  TokenizerDebugSnapshot,
  TokenizerErrorCode,
  TokenizerParseError,
  TokenizerState
} from "./tokens.js";

const TAG_OPEN = "<";
const TAG_CLOSE = ">";
const END_TAG_MARKER = "/";

class TokenizerRuntime {
  readonly input: string;
  readonly options: TokenizeOptions;
  readonly tokens: MarkupToken[] = [];
  readonly errors: TokenizerParseError[] = [];
  state: TokenizerState = "Data";
  index = 0;

  constructor(input: string, options: TokenizeOptions) {
    this.input = input;
    this.options = options;
  }

  addError(code: TokenizerErrorCode, index: number): void {
    const maxParseErrors = this.options.budgets?.maxParseErrors;
    if (maxParseErrors !== undefined && this.errors.length >= maxParseErrors) {
      return;
    }

    const error: TokenizerParseError = { code, index };
    this.errors.push(error);
    this.options.onParseError?.(error);
  }

  span(start: number, end: number): TokenSpan | undefined {
    return this.options.captureSpans ? Object.freeze({ start, end }) : undefined;
  }

  emit(token: MarkupToken): void {
    const previous = this.tokens[this.tokens.length - 1];
    if (previous?.type === "Text" && token.type === "Text") {
      const span = previous.span && token.span
        ? { start: previous.span.start, end: token.span.end }
        : undefined;
      const merged: TextToken = {
        type: "Text",
        content: previous.content + token.content,
        ...(span ? { span } : {})
      };
      this.tokens[this.tokens.length - 1] = merged;
      return;
    }

    this.tokens.push(token);
  }

  emitText(start: number, end: number): void {
    if (end <= start) {
      return;
    }

    const span = this.span(start, end);
    this.emit({
      type: "Text",
      content: this.input.slice(start, end),
      ...(span ? { span } : {})
    });
  }
}

function consumeText(runtime: TokenizerRuntime): void {
  const next = runtime.input.indexOf(TAG_OPEN, runtime.index);
  const end = next === -1 ? runtime.input.length : next;

  runtime.emitText(runtime.index, end);
  runtime.index = end;
}

// Tag names are read verbatim up to the next ">", or to end of input when there is none.
function consumeTag(runtime: TokenizerRuntime): void {
  const start = runtime.index;
  runtime.state = "TagName";

  const isEndTag = runtime.input[start + 1] === END_TAG_MARKER;
  const nameStart = start + (isEndTag ? 2 : 1);

  const close = runtime.input.indexOf(TAG_CLOSE, nameStart);
  const nameEnd = close === -1 ? runtime.input.length : close;
  const end = close === -1 ? runtime.input.length : close + 1;
  const name = runtime.input.slice(nameStart, nameEnd);

  if (close === -1) {
    runtime.addError("unterminated-tag", start);
  }

  if (name.length === 0) {
    runtime.addError("empty-tag-name", start);
    runtime.emitText(start, end);
  } else {
    const span = runtime.span(start, end);
    runtime.emit(
      isEndTag
        ? { type: "EndTag", name, ...(span ? { span } : {}) }
        : { type: "StartTag", name, ...(span ? { span } : {}) }
    );
  }

  runtime.index = end;
  // Input that ends inside a tag leaves the scanner in TagName.
  if (close !== -1) {
    runtime.state = "Data";
  }
}

function createDebugSnapshot(runtime: TokenizerRuntime): TokenizerDebugSnapshot | undefined {
  if (!runtime.options.debug?.enabled) {
    return undefined;
  }

  const windowCodePoints = runtime.options.debug.windowCodePoints ?? 32;
  const inputWindowStart = Math.max(0, runtime.index - windowCodePoints);
  const inputWindow = runtime.input.slice(inputWindowStart, runtime.index + windowCodePoints);

  const lastTokensCount = runtime.options.debug.lastTokens ?? 5;
  const lastTokens = runtime.tokens.slice(Math.max(0, runtime.tokens.length - lastTokensCount));

  return {
    currentState: runtime.state,
    inputWindow,
    lastTokens
  };
}

export function tokenize(input: string, options: TokenizeOptions = {}): TokenizeResult {
  const runtime = new TokenizerRuntime(input, options);

  while (runtime.index < runtime.input.length) {
    if (runtime.input[runtime.index] === TAG_OPEN) {
      consumeTag(runtime);
      continue;
    }

    runtime.state = "Data";
    consumeText(runtime);
  }

  const debug = createDebugSnapshot(runtime);

  return {
    tokens: runtime.tokens,
    errors: runtime.errors,
    ...(debug ? { debug } : {})
  };
}
