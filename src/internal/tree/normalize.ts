import type { TreeNode, TreeNodeElement } from "./types.js";

interface NormalizeFrame {
  readonly nodes: readonly TreeNode[];
  readonly level: number;
  next: number;
}

function indent(level: number): string {
  return "  ".repeat(level);
}

function quoteRaw(value: string): string {
  return `"${value}"`;
}

export function normalizeTree(document: TreeNodeElement): string {
  const lines: string[] = [];
  const stack: NormalizeFrame[] = [{ nodes: document.children, level: 0, next: 0 }];

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const node = frame.nodes[frame.next];
    if (node === undefined) {
      stack.pop();
      continue;
    }

    frame.next += 1;
    if (node.kind === "text") {
      lines.push(`| ${indent(frame.level)}${quoteRaw(node.value)}`);
      continue;
    }

    lines.push(`| ${indent(frame.level)}<${node.name}>`);
    stack.push({ nodes: node.children, level: frame.level + 1, next: 0 });
  }

  return lines.join("\n");
}
