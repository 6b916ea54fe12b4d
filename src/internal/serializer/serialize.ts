import type { MarkupToken } from "../tokenizer/tokens.js";

// Content is written back verbatim: the tokenizer never decodes, so nothing is escaped here.

function serializeToken(token: MarkupToken): string {
  if (token.type === "StartTag") {
    return `<${token.name}>`;
  }

  if (token.type === "EndTag") {
    return `</${token.name}>`;
  }

  return token.content;
}

export function serializeTokens(tokens: readonly MarkupToken[]): string {
  return tokens.map((token) => serializeToken(token)).join("");
}
