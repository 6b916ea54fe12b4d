import type { DocumentTree, MarkupNode, Token } from "./types.js";

function indent(depth: number): string {
  return "  ".repeat(depth);
}

interface PrintFrame {
  readonly nodes: readonly MarkupNode[];
  readonly depth: number;
  readonly closingLine: string | null;
  next: number;
}

// Only the document root is printed without a closing line.
export function printTree(node: DocumentTree | MarkupNode): string {
  const lines: string[] = [];
  const stack: PrintFrame[] = [{ nodes: [node], depth: 0, closingLine: null, next: 0 }];

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const current = frame.nodes[frame.next];
    if (current === undefined) {
      stack.pop();
      if (frame.closingLine !== null) {
        lines.push(frame.closingLine);
      }
      continue;
    }

    frame.next += 1;
    const prefix = indent(frame.depth);

    if (current.kind === "text") {
      lines.push(`${prefix}Text: "${current.value}"`);
      continue;
    }

    lines.push(`${prefix}<${current.tagName}>`);
    stack.push({
      nodes: current.children,
      depth: frame.depth + 1,
      closingLine: "errors" in current ? null : `${prefix}</${current.tagName}>`,
      next: 0
    });
  }

  return lines.join("\n");
}

function printToken(token: Token): string {
  if (token.kind === "startTag") {
    return `StartTag: ${token.name}`;
  }

  if (token.kind === "endTag") {
    return `EndTag: ${token.name}`;
  }

  return `Text: ${token.value}`;
}

export function printTokens(tokens: readonly Token[]): string {
  return tokens.map((token) => printToken(token)).join("\n");
}
